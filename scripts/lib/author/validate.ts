import fs from 'fs-extra';
import matter from 'gray-matter';
import path from 'node:path';

import { CatalogFormatError, IoFailureError, errorMessage } from '../errors.js';
import { listMarkdownFiles, toPosixRelative } from '../io.js';
import { MarkdownTree } from '../markdown_tree.js';
import {
  MarkdownValidator,
  regexPlaceholder,
  toHeaderDict,
  type HeaderDict,
  type HeaderValue,
  type ValidationResult
} from '../markdown_validator.js';

export interface MarkdownDocument {
  filePath: string;
  header: HeaderDict;
  tree: MarkdownTree;
}

export interface ValidateOptions {
  templatePath: string;
  markdownDir: string;
  validateHeader: boolean;
  validateBody: boolean;
  governedHeading?: string;
  templateVersion: boolean;
  placeholderPattern: string;
}

/** A validation outcome, or a file whose front matter could not be read at all. */
export type InstanceResult = ValidationResult | { valid: false; failedPass: 'front-matter'; reason: string };

export interface InstanceReport {
  filePath: string;
  result: InstanceResult;
}

async function validateInstance(validator: MarkdownValidator, filePath: string): Promise<InstanceResult> {
  let document: MarkdownDocument;
  try {
    document = await loadMarkdownDocument(filePath);
  } catch (error) {
    if (error instanceof CatalogFormatError) {
      return { valid: false, failedPass: 'front-matter', reason: error.message };
    }
    throw error;
  }

  return validator.validate({
    path: toPosixRelative(filePath),
    header: document.header,
    tree: document.tree
  });
}

export async function loadMarkdownDocument(filePath: string): Promise<MarkdownDocument> {
  if (!(await fs.pathExists(filePath))) {
    throw new IoFailureError(toPosixRelative(filePath), 'markdown file does not exist');
  }

  const raw = await fs.readFile(filePath, 'utf8');
  let data: unknown;
  let content: string;
  try {
    const parsed = matter(raw, {});
    data = parsed.data;
    content = parsed.content;
  } catch (error) {
    throw new CatalogFormatError(`${toPosixRelative(filePath)} has an invalid YAML header: ${errorMessage(error)}`);
  }

  const header: HeaderDict =
    data && typeof data === 'object' && !Array.isArray(data)
      ? toHeaderDict({ ...data })
      : new Map<string, HeaderValue>();
  return { filePath, header, tree: MarkdownTree.parse(content) };
}

export async function createValidator(options: ValidateOptions): Promise<MarkdownValidator> {
  const template = await loadMarkdownDocument(options.templatePath);
  let placeholder: RegExp;
  try {
    placeholder = new RegExp(options.placeholderPattern);
  } catch (error) {
    throw new Error(`Invalid placeholder pattern '${options.placeholderPattern}': ${errorMessage(error)}`);
  }

  return new MarkdownValidator({
    templatePath: toPosixRelative(options.templatePath),
    templateHeader: template.header,
    templateTree: template.tree,
    validateHeader: options.validateHeader,
    validateBody: options.validateBody,
    governedHeading: options.governedHeading,
    templateVersion: options.templateVersion,
    isPlaceholder: regexPlaceholder(placeholder)
  });
}

/**
 * Validates every markdown file under `markdownDir` against the template.
 * A failing instance, including one with unreadable front matter, is
 * reported and the walk moves on to the next one.
 */
export async function validateMarkdownDir(options: ValidateOptions): Promise<InstanceReport[]> {
  const validator = await createValidator(options);
  const templateAbsolute = path.resolve(options.templatePath);
  const reports: InstanceReport[] = [];

  for (const relativePath of await listMarkdownFiles(options.markdownDir)) {
    const filePath = path.join(options.markdownDir, ...relativePath.split('/'));
    if (path.resolve(filePath) === templateAbsolute) {
      continue;
    }

    const result = await validateInstance(validator, filePath);
    if (!result.valid) {
      console.log(`${toPosixRelative(filePath)}: ${result.failedPass} check failed, ${result.reason}`);
    }
    reports.push({ filePath, result });
  }

  return reports;
}
