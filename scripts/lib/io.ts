import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'node:path';

export interface RunOptions {
  check: boolean;
}

export function resolveFromCwd(...parts: string[]): string {
  return path.resolve(process.cwd(), ...parts);
}

export function toPosixRelative(filePath: string): string {
  return path.relative(process.cwd(), filePath).split(path.sep).join('/');
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
}

export function stableJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

export function stableText(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

export interface WriteResult {
  changed: boolean;
  wrote: boolean;
}

async function writeIfChanged(filePath: string, next: string, options: RunOptions): Promise<WriteResult> {
  let current: string | null = null;

  if (await fs.pathExists(filePath)) {
    current = await fs.readFile(filePath, 'utf8');
  }

  if (current === next) {
    return { changed: false, wrote: false };
  }

  if (options.check) {
    return { changed: true, wrote: false };
  }

  await ensureParentDir(filePath);
  await fs.writeFile(filePath, next, 'utf8');
  return { changed: true, wrote: true };
}

export async function writeJsonFile(
  filePath: string,
  data: unknown,
  options: RunOptions
): Promise<WriteResult> {
  return writeIfChanged(filePath, stableJson(data), options);
}

export async function writeTextFile(
  filePath: string,
  content: string,
  options: RunOptions
): Promise<WriteResult> {
  return writeIfChanged(filePath, stableText(content), options);
}

export function compareNaturally(left: string, right: string): number {
  return left.localeCompare(right, 'en', { numeric: true });
}

/**
 * Markdown files under `rootDir`, relative to it with forward slashes, in
 * natural order (`ac-2` before `ac-10`).
 */
export async function listMarkdownFiles(rootDir: string): Promise<string[]> {
  if (!(await fs.pathExists(rootDir))) {
    return [];
  }

  const files = await fg('**/*.md', {
    cwd: rootDir,
    dot: false,
    onlyFiles: true
  });

  return files.sort(compareNaturally);
}
