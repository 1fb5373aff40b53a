import path from 'node:path';

export function controlMarkdownPath(markdownDir: string, groupPath: string[], controlId: string): string {
  return path.join(markdownDir, ...groupPath, `${controlId}.md`);
}

/** Group ids of a control file, taken from its directories below `markdownDir`. */
export function groupPathOfControlFile(markdownDir: string, filePath: string): string[] {
  const relativeDir = path.relative(markdownDir, path.dirname(filePath));
  if (!relativeDir) {
    return [];
  }
  return relativeDir.split(path.sep).filter((segment) => segment.length > 0);
}

export function controlIdOfFile(filePath: string): string {
  return path.basename(filePath, '.md');
}
