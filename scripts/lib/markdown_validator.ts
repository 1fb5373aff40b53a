import { MalformedTemplateError } from './errors.js';
import type { MarkdownTree } from './markdown_tree.js';

export type HeaderValue =
  | { kind: 'leaf'; value: unknown }
  | { kind: 'mapping'; entries: HeaderDict };

export type HeaderDict = Map<string, HeaderValue>;

export type IsPlaceholder = (headingText: string) => boolean;

export const TEMPLATE_VERSION_KEY = 'x-template-version';
export const VERSION_KEY = 'Version';
export const DEFAULT_PLACEHOLDER_PATTERN = /\{\{.+?\}\}/;

export const VALIDATION_PASSES = [
  'template-version',
  'header-keys',
  'governed-section',
  'body-headings'
] as const;

export type ValidationPassName = (typeof VALIDATION_PASSES)[number];

export type ValidationResult =
  | { valid: true }
  | { valid: false; failedPass: ValidationPassName; reason: string };

export interface MarkdownValidatorOptions {
  templatePath: string;
  templateHeader: HeaderDict;
  templateTree: MarkdownTree;
  validateHeader: boolean;
  validateBody: boolean;
  governedHeading?: string;
  templateVersion?: boolean;
  isPlaceholder?: IsPlaceholder;
}

export interface MarkdownInstance {
  /** Path or other identity of the instance; checked for the template version. */
  path: string;
  header: HeaderDict;
  tree: MarkdownTree;
}

function isPlainMapping(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function toHeaderValue(value: unknown): HeaderValue {
  return isPlainMapping(value) ? { kind: 'mapping', entries: toHeaderDict(value) } : { kind: 'leaf', value };
}

export function toHeaderDict(record: Record<string, unknown>): HeaderDict {
  return new Map(Object.entries(record).map(([key, value]) => [key, toHeaderValue(value)]));
}

export function regexPlaceholder(pattern: RegExp | string = DEFAULT_PLACEHOLDER_PATTERN): IsPlaceholder {
  const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
  return (headingText) => regex.test(headingText);
}

/**
 * True when `candidate` has exactly the keys of `template` at every level the
 * template nests mappings. Leaf values are not compared.
 */
export function compareKeys(template: HeaderDict, candidate: HeaderDict): boolean {
  if (template.size !== candidate.size) {
    return false;
  }

  for (const [key, templateValue] of template) {
    const candidateValue = candidate.get(key);
    if (!candidateValue) {
      return false;
    }

    switch (templateValue.kind) {
      case 'leaf':
        break;
      case 'mapping':
        if (candidateValue.kind !== 'mapping' || !compareKeys(templateValue.entries, candidateValue.entries)) {
          return false;
        }
        break;
    }
  }

  return true;
}

export type HeadingSequenceResult =
  | { valid: true }
  | { valid: false; reason: 'reordered' | 'removed'; heading: string };

/**
 * Checks that `instance` contains the `template` headings as an ordered
 * subsequence. Extra instance headings are allowed. A template heading that
 * is a placeholder may be skipped, or stand for one unknown instance heading.
 */
export function validateHeadingSequence(
  template: string[],
  instance: string[],
  isPlaceholder: IsPlaceholder
): HeadingSequenceResult {
  const templateKeys = new Set(template);
  let pointer = 0;

  for (const key of instance) {
    if (pointer >= template.length) {
      break;
    }

    if (key === template[pointer]) {
      pointer += 1;
      continue;
    }

    if (templateKeys.has(key)) {
      while (pointer < template.length && key !== template[pointer] && isPlaceholder(template[pointer])) {
        pointer += 1;
      }
      if (pointer < template.length && key === template[pointer]) {
        pointer += 1;
        continue;
      }
      return { valid: false, reason: 'reordered', heading: key };
    }

    if (isPlaceholder(template[pointer])) {
      pointer += 1;
    }
  }

  while (pointer < template.length && isPlaceholder(template[pointer])) {
    pointer += 1;
  }

  if (pointer !== template.length) {
    return { valid: false, reason: 'removed', heading: template[pointer] };
  }

  return { valid: true };
}

/** Keys of the headings that sit more than one level below the heading before them. */
export function depthSkips(tree: MarkdownTree): string[] {
  const skips: string[] = [];
  let previous: number | null = null;
  for (const node of tree.nodes()) {
    if (previous !== null && node.level > previous + 1) {
      skips.push(node.key);
    }
    previous = node.level;
  }
  return skips;
}

function headerLeaf(header: HeaderDict, key: string): unknown {
  const value = header.get(key);
  return value?.kind === 'leaf' ? value.value : undefined;
}

type PassOutcome = { ok: true; skip?: ValidationPassName[] } | { ok: false; reason: string };

export class MarkdownValidator {
  private readonly governedHeading: string | null;
  private readonly isPlaceholder: IsPlaceholder;

  constructor(private readonly options: MarkdownValidatorOptions) {
    this.governedHeading = options.governedHeading?.trim() || null;
    this.isPlaceholder = options.isPlaceholder ?? regexPlaceholder();

    if (this.governedHeading && !options.templateTree.getNodeForKey(this.governedHeading, false)) {
      throw new MalformedTemplateError(
        options.templatePath,
        `governed heading '${this.governedHeading}' is not present`
      );
    }
  }

  /** Passes in the order they run; disabled passes are left out. */
  enabledPasses(): ValidationPassName[] {
    return VALIDATION_PASSES.filter((pass) => {
      switch (pass) {
        case 'template-version':
          return this.options.templateVersion === true;
        case 'header-keys':
          return this.options.validateHeader;
        case 'governed-section':
          return this.governedHeading !== null;
        case 'body-headings':
          return this.options.validateBody;
      }
    });
  }

  validate(instance: MarkdownInstance): ValidationResult {
    const skipped = new Set<ValidationPassName>();

    for (const pass of this.enabledPasses()) {
      if (skipped.has(pass)) {
        continue;
      }

      const outcome = this.runPass(pass, instance);
      if (!outcome.ok) {
        return { valid: false, failedPass: pass, reason: outcome.reason };
      }
      for (const next of outcome.skip ?? []) {
        skipped.add(next);
      }
    }

    return { valid: true };
  }

  isValidAgainstTemplate(instance: MarkdownInstance): boolean {
    return this.validate(instance).valid;
  }

  private runPass(pass: ValidationPassName, instance: MarkdownInstance): PassOutcome {
    switch (pass) {
      case 'template-version':
        return this.checkTemplateVersion(instance);
      case 'header-keys':
        return this.checkHeaderKeys(instance);
      case 'governed-section':
        return this.checkGovernedSection(instance);
      case 'body-headings':
        return this.checkBodyHeadings(instance);
    }
  }

  /**
   * The template header must declare its version and the instance path must
   * carry it. With header validation on, the template's own `Version` must
   * also agree, and a passing version check stands in for the header key check.
   */
  private checkTemplateVersion(instance: MarkdownInstance): PassOutcome {
    const required = headerLeaf(this.options.templateHeader, TEMPLATE_VERSION_KEY);
    if (required === undefined || required === null) {
      return { ok: false, reason: `template header has no '${TEMPLATE_VERSION_KEY}' key` };
    }

    const requiredVersion = String(required);
    if (!instance.path.includes(requiredVersion)) {
      return { ok: false, reason: `instance path does not contain template version '${requiredVersion}'` };
    }

    if (!this.options.validateHeader) {
      return { ok: true };
    }

    const declared = headerLeaf(this.options.templateHeader, VERSION_KEY);
    if (declared === undefined || String(declared) !== requiredVersion) {
      return {
        ok: false,
        reason: `template '${VERSION_KEY}' does not match '${TEMPLATE_VERSION_KEY}' ${requiredVersion}`
      };
    }

    return { ok: true, skip: ['header-keys'] };
  }

  private checkHeaderKeys(instance: MarkdownInstance): PassOutcome {
    if (compareKeys(this.options.templateHeader, instance.header)) {
      return { ok: true };
    }
    return { ok: false, reason: `YAML header keys differ from template ${this.options.templatePath}` };
  }

  private checkGovernedSection(instance: MarkdownInstance): PassOutcome {
    const heading = this.governedHeading ?? '';
    const instanceKeys = instance.tree.getGovernedDocument(heading);
    if (!instanceKeys) {
      return { ok: false, reason: `governed section '${heading}' not found` };
    }
    const templateKeys = this.options.templateTree.getGovernedDocument(heading) ?? new Map<string, string>();

    return this.compareSequences(Array.from(templateKeys.keys()), Array.from(instanceKeys.keys()), 'governed key');
  }

  private checkBodyHeadings(instance: MarkdownInstance): PassOutcome {
    const templateKeys = this.options.templateTree.subnodesKeys;
    const instanceKeys = instance.tree.subnodesKeys;

    const requiredCount = templateKeys.filter((key) => !this.isPlaceholder(key)).length;
    if (requiredCount > instanceKeys.length) {
      return { ok: false, reason: 'headings were removed' };
    }

    const templateTopLevel = Array.from(this.options.templateTree.getAllHeadersForLevel(1)).length;
    const instanceTopLevel = Array.from(instance.tree.getAllHeadersForLevel(1)).length;
    if (instanceTopLevel > templateTopLevel) {
      return { ok: false, reason: 'new level 1 headings were added' };
    }

    const templateSkips = new Set(depthSkips(this.options.templateTree));
    const skipped = depthSkips(instance.tree).find((key) => !templateSkips.has(key));
    if (skipped) {
      return { ok: false, reason: `heading '${skipped}' skips a level` };
    }

    return this.compareSequences(templateKeys, instanceKeys, 'heading');
  }

  private compareSequences(template: string[], instance: string[], label: string): PassOutcome {
    const result = validateHeadingSequence(template, instance, this.isPlaceholder);
    if (result.valid) {
      return { ok: true };
    }
    if (result.reason === 'reordered') {
      return { ok: false, reason: `${label} '${result.heading}' was moved or modified` };
    }
    return { ok: false, reason: `${label} '${result.heading}' was removed` };
  }
}
