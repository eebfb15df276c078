import type { Heading, TocNode } from '../domain';

const INDENT = '  ';

export function formatOutline(tree: readonly TocNode[]): string {
  const lines: string[] = [];
  const walk = (nodes: readonly TocNode[], depth: number) => {
    for (const node of nodes) {
      lines.push(`${INDENT.repeat(depth)}${formatHeading(node.heading)}`);
      walk(node.children, depth + 1);
    }
  };
  walk(tree, 0);
  return lines.join('\n');
}

export function formatHeadingList(headings: readonly Heading[]): string {
  return headings
    .map((heading) => `${'#'.repeat(heading.level)} ${formatHeading(heading)}`)
    .join('\n');
}

function formatHeading(heading: Heading): string {
  return `${heading.text}  #${heading.id}`;
}

export interface SerializedTocNode {
  level: number;
  text: string;
  id: string;
  children: SerializedTocNode[];
}

export function serializeTocTree(tree: readonly TocNode[]): SerializedTocNode[] {
  return tree.map((node) => ({
    level: node.heading.level,
    text: node.heading.text,
    id: node.heading.id,
    children: serializeTocTree(node.children),
  }));
}
