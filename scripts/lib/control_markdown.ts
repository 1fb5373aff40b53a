import matter from 'gray-matter';

import type { Control, Parameter, Part } from './catalog_model.js';
import { findProperty } from './catalog_model.js';
import { CatalogFormatError } from './errors.js';
import type { MarkdownNode } from './markdown_tree.js';
import { MarkdownTree } from './markdown_tree.js';
import { DEFAULT_VALUE_SEPARATOR, substituteParams, type ParameterRep } from './param_resolver.js';

export const GROUP_TITLE_KEY = 'x-group-title';
export const PARAMS_KEY = 'x-control-params';
export const PARENT_CONTROL_KEY = 'x-parent-control';
export const RESERVED_HEADER_KEYS: readonly string[] = [GROUP_TITLE_KEY, PARAMS_KEY, PARENT_CONTROL_KEY];

export const STATEMENT_HEADING = 'Control Statement';
const PART_HEADING_PREFIX = 'Control ';
const PART_ID_SUFFIXES: Record<string, string> = {
  statement: 'smt',
  guidance: 'gdn',
  objective: 'obj',
  assessment: 'asm'
};
const TITLE_PATTERN = /^(\S+)\s+-\s+(.*)$/;
// Rendered labels are escaped, so a label may itself contain brackets.
const ESCAPED_ITEM_PATTERN = /^(\s*)[-*]\s+\\\[(.+?)\\\]\s*(.*)$/;
const PLAIN_ITEM_PATTERN = /^(\s*)[-*]\s+\[(.+?)\]\s*(.*)$/;

export type HeaderRecord = Record<string, unknown>;

export interface ControlRenderContext {
  header: HeaderRecord;
  groupTitle?: string;
  parentId?: string;
  params: Map<string, Parameter>;
  paramRep: ParameterRep;
  separator?: string;
}

export interface ParsedControlMarkdown {
  /** Front matter without the keys this module reserves. */
  header: HeaderRecord;
  control: Control;
  groupTitle?: string;
  /** Id of the control this one is nested in, when it is a sub-control. */
  parentId?: string;
}

function isRecord(value: unknown): value is HeaderRecord {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Combines an existing header with a header template. Keys missing from
 * `existing` are added; nested mappings merge key by key; a key present in
 * both keeps the existing value unless `overwrite` is set.
 */
export function mergeHeaders(existing: HeaderRecord, template: HeaderRecord, overwrite: boolean): HeaderRecord {
  const merged: HeaderRecord = { ...existing };

  for (const [key, templateValue] of Object.entries(template)) {
    if (!(key in merged)) {
      merged[key] = templateValue;
      continue;
    }

    const current = merged[key];
    if (isRecord(current) && isRecord(templateValue)) {
      merged[key] = mergeHeaders(current, templateValue, overwrite);
    } else if (overwrite) {
      merged[key] = templateValue;
    }
  }

  return merged;
}

/** The label an item is rendered with: its label property, else the last segment of its id. */
export function partLabel(part: Part): string {
  const label = findProperty(part.props, 'label')?.value;
  if (label) {
    return label;
  }
  const id = part.id ?? '';
  return id.slice(id.lastIndexOf('.') + 1) || part.name;
}

function labelKey(label: string): string {
  return label.replace(/[^A-Za-z0-9]+/g, '');
}

function flattenProse(prose: string): string {
  return prose.replace(/\s*\n\s*/g, ' ').trim();
}

function headerParamValue(param: Parameter): string | string[] | null {
  const values = param.values ?? [];
  if (values.length === 0) {
    return null;
  }
  return values.length === 1 ? values[0] : [...values];
}

export function partHeading(part: Part): string {
  return part.name === 'statement' ? STATEMENT_HEADING : `${PART_HEADING_PREFIX}${part.name}`;
}

export function renderControlMarkdown(control: Control, context: ControlRenderContext): string {
  const separator = context.separator ?? DEFAULT_VALUE_SEPARATOR;
  const render = (prose: string): string =>
    substituteParams(prose, context.params, context.paramRep, separator);

  const itemLines = (parts: Part[], depth: number): string[] =>
    parts.flatMap((part) => {
      const prose = part.prose ? ` ${flattenProse(render(part.prose))}` : '';
      const line = `${'  '.repeat(depth)}- \\[${partLabel(part)}\\]${prose}`;
      return [line, ...itemLines(part.parts ?? [], depth + 1)];
    });

  const blocks: string[] = [`# ${control.id} - ${control.title}`];
  for (const part of control.parts ?? []) {
    blocks.push(`## ${partHeading(part)}`);
    if (part.prose) {
      blocks.push(render(part.prose));
    }
    if (part.parts && part.parts.length > 0) {
      blocks.push(itemLines(part.parts, 0).join('\n'));
    }
  }

  const header: HeaderRecord = { ...context.header };
  if (context.groupTitle !== undefined) {
    header[GROUP_TITLE_KEY] = context.groupTitle;
  }
  if (context.parentId !== undefined) {
    header[PARENT_CONTROL_KEY] = context.parentId;
  }
  if (control.params && control.params.length > 0) {
    const params: HeaderRecord = {};
    for (const param of control.params) {
      params[param.id] = headerParamValue(context.params.get(param.id) ?? param);
    }
    header[PARAMS_KEY] = params;
  }

  return matter.stringify(`\n${blocks.join('\n\n')}\n`, header);
}

function headerValueToStrings(value: unknown, source: string, paramId: string): string[] {
  if (value === null || value === undefined) {
    return [];
  }
  if (Array.isArray(value)) {
    return value.flatMap((entry: unknown) => headerValueToStrings(entry, source, paramId));
  }
  if (value instanceof Date) {
    return [value.toISOString().slice(0, 10)];
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return [String(value)];
  }
  throw new CatalogFormatError(`${source} has an unsupported value for parameter '${paramId}'`);
}

function readParams(value: unknown, source: string): Parameter[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === null) {
    return [];
  }
  if (!isRecord(value)) {
    throw new CatalogFormatError(`${source} header '${PARAMS_KEY}' must be a mapping of parameter ids`);
  }

  return Object.entries(value).map(([id, raw]) => {
    const values = headerValueToStrings(raw, source, id);
    return values.length > 0 ? { id, values } : { id };
  });
}

interface ItemFrame {
  depth: number;
  part: Part;
}

function parsePartBody(content: string, partId: string): { prose?: string; parts?: Part[] } {
  const proseLines: string[] = [];
  const roots: Part[] = [];
  const stack: ItemFrame[] = [];
  let last: Part | null = null;

  for (const line of content.split('\n')) {
    const match = line.match(ESCAPED_ITEM_PATTERN) ?? line.match(PLAIN_ITEM_PATTERN);
    if (!match) {
      if (last && line.trim()) {
        last.prose = last.prose ? `${last.prose} ${line.trim()}` : line.trim();
      } else if (!last) {
        proseLines.push(line);
      }
      continue;
    }

    const depth = Math.floor(match[1].replace(/\t/g, '  ').length / 2);
    while (stack.length > 0 && stack[stack.length - 1].depth >= depth) {
      stack.pop();
    }

    const parent = stack.length > 0 ? stack[stack.length - 1].part : null;
    const label = match[2].trim();
    const item: Part = {
      id: `${parent?.id ?? partId}.${labelKey(label)}`,
      name: 'item',
      props: [{ name: 'label', value: label }]
    };
    const prose = match[3].trim();
    if (prose) {
      item.prose = prose;
    }

    if (parent) {
      parent.parts = [...(parent.parts ?? []), item];
    } else {
      roots.push(item);
    }
    stack.push({ depth, part: item });
    last = item;
  }

  const prose = proseLines.join('\n').trim();
  return {
    ...(prose ? { prose } : {}),
    ...(roots.length > 0 ? { parts: roots } : {})
  };
}

function readPart(node: MarkdownNode, controlId: string): Part | null {
  let name: string;
  if (node.text === STATEMENT_HEADING) {
    name = 'statement';
  } else if (node.text.startsWith(PART_HEADING_PREFIX)) {
    name = node.text.slice(PART_HEADING_PREFIX.length).trim();
  } else {
    return null;
  }

  const id = `${controlId}_${PART_ID_SUFFIXES[name] ?? name}`;
  return { id, name, ...parsePartBody(node.content, id) };
}

export function parseControlMarkdown(markdown: string, source: string): ParsedControlMarkdown {
  let data: unknown;
  let body: string;
  try {
    const parsed = matter(markdown, {});
    data = parsed.data;
    body = parsed.content;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CatalogFormatError(`${source} has an invalid YAML header: ${detail}`);
  }

  const header: HeaderRecord = isRecord(data) ? { ...data } : {};
  const tree = MarkdownTree.parse(body);
  const titleNode = tree.root.subnodes.find((node) => node.level === 1);
  const titleMatch = titleNode?.text.match(TITLE_PATTERN);
  if (!titleNode || !titleMatch) {
    throw new CatalogFormatError(`${source} is missing a '# <control-id> - <title>' heading`);
  }

  const control: Control = { id: titleMatch[1], title: titleMatch[2].trim() };

  const params = readParams(header[PARAMS_KEY], source);
  if (params !== undefined) {
    control.params = params;
  }

  const parts = titleNode.subnodes
    .map((node) => readPart(node, control.id))
    .filter((part): part is Part => part !== null);
  if (parts.length > 0) {
    control.parts = parts;
  }

  const groupTitle = header[GROUP_TITLE_KEY];
  const parentId = header[PARENT_CONTROL_KEY];
  for (const key of RESERVED_HEADER_KEYS) {
    delete header[key];
  }

  return {
    header,
    control,
    ...(typeof groupTitle === 'string' ? { groupTitle } : {}),
    ...(typeof parentId === 'string' ? { parentId } : {})
  };
}
