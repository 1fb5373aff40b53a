export interface MarkdownNode {
  /** Heading line as written, e.g. `## Control Statement`. Empty for the root. */
  key: string;
  /** Number of `#` markers; 0 for the root. */
  level: number;
  text: string;
  /** Body text under this heading, up to the next heading of any level. */
  content: string;
  subnodes: MarkdownNode[];
}

const HEADING_PATTERN = /^(#{1,6})\s+(.*?)(?:\s+#+)?\s*$/;
const FENCE_PATTERN = /^\s*(```|~~~)/;
const GOVERNED_LINE_PATTERN = /^(?:[-*+]\s+)?(?:\*\*)?([^:*]+?)(?:\*\*)?:(?:\*\*)?\s*(.*)$/;

function trimBlankLines(lines: string[]): string {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === '') {
    start += 1;
  }
  while (end > start && lines[end - 1].trim() === '') {
    end -= 1;
  }
  return lines.slice(start, end).join('\n');
}

/**
 * Reads `key: value` lines (optionally bulleted or bold) from a governed
 * section body. Keys keep their first position; a repeated key takes the last
 * value.
 */
export function parseGovernedDocument(content: string): Map<string, string> {
  const entries = new Map<string, string>();

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }

    const match = line.match(GOVERNED_LINE_PATTERN);
    if (!match) {
      continue;
    }

    const key = match[1].trim();
    if (key) {
      entries.set(key, match[2].trim());
    }
  }

  return entries;
}

export class MarkdownTree {
  constructor(readonly root: MarkdownNode) {}

  static parse(markdown: string): MarkdownTree {
    const root: MarkdownNode = { key: '', level: 0, text: '', content: '', subnodes: [] };
    const stack: MarkdownNode[] = [root];
    const buffers = new Map<MarkdownNode, string[]>([[root, []]]);
    let current = root;
    let fence: string | null = null;

    for (const line of markdown.replace(/\r\n?/g, '\n').split('\n')) {
      const fenceMatch = line.match(FENCE_PATTERN);
      if (fenceMatch) {
        if (fence === null) {
          fence = fenceMatch[1];
        } else if (fence === fenceMatch[1]) {
          fence = null;
        }
      }

      const headingMatch = fence === null && !fenceMatch ? line.match(HEADING_PATTERN) : null;
      if (!headingMatch) {
        buffers.get(current)?.push(line);
        continue;
      }

      const level = headingMatch[1].length;
      const text = headingMatch[2].trim();
      const node: MarkdownNode = {
        key: `${headingMatch[1]} ${text}`,
        level,
        text,
        content: '',
        subnodes: []
      };

      while (stack.length > 1 && stack[stack.length - 1].level >= level) {
        stack.pop();
      }
      stack[stack.length - 1].subnodes.push(node);
      stack.push(node);
      buffers.set(node, []);
      current = node;
    }

    for (const [node, lines] of buffers) {
      node.content = trimBlankLines(lines);
    }

    return new MarkdownTree(root);
  }

  /** Every heading node in document order. */
  *nodes(): Generator<MarkdownNode> {
    const walk = function* (node: MarkdownNode): Generator<MarkdownNode> {
      for (const child of node.subnodes) {
        yield child;
        yield* walk(child);
      }
    };
    yield* walk(this.root);
  }

  get subnodesKeys(): string[] {
    return Array.from(this.nodes(), (node) => node.key);
  }

  /**
   * With `exact`, matches the full heading line or the heading text. Without
   * it, the first heading whose line contains `key` wins.
   */
  getNodeForKey(key: string, exact = true): MarkdownNode | null {
    const wanted = key.trim();
    for (const node of this.nodes()) {
      if (exact ? node.key === wanted || node.text === wanted : node.key.includes(wanted)) {
        return node;
      }
    }
    return null;
  }

  *getAllHeadersForLevel(level: number): Generator<string> {
    for (const node of this.nodes()) {
      if (node.level === level) {
        yield node.key;
      }
    }
  }

  getGovernedDocument(key: string): Map<string, string> | null {
    const node = this.getNodeForKey(key, false);
    return node ? parseGovernedDocument(node.content) : null;
  }
}
