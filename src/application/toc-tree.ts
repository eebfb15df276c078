import type { Heading, TocNode } from '../domain';

interface OpenTocNode {
  heading: Heading;
  children: OpenTocNode[];
}

export function buildTocTree(headings: readonly Heading[]): TocNode[] {
  const roots: OpenTocNode[] = [];
  const stack: OpenTocNode[] = [];

  for (const heading of headings) {
    while (stack.length > 0 && stack[stack.length - 1].heading.level >= heading.level) {
      stack.pop();
    }

    const node: OpenTocNode = { heading, children: [] };
    const parent = stack.at(-1);
    (parent ? parent.children : roots).push(node);
    stack.push(node);
  }

  return roots.map(freezeTocNode);
}

export function buildParentMap(nodes: readonly TocNode[]): Map<string, string | null> {
  const map = new Map<string, string | null>();
  const walk = (items: readonly TocNode[], parent: string | null) => {
    for (const item of items) {
      map.set(item.heading.id, parent);
      walk(item.children, item.heading.id);
    }
  };
  walk(nodes, null);
  return map;
}

export function limitHeadingLevel(headings: readonly Heading[], maxLevel: number): Heading[] {
  return headings.filter((heading) => heading.level <= maxLevel);
}

function freezeTocNode(node: OpenTocNode): TocNode {
  return { heading: node.heading, children: node.children.map(freezeTocNode) };
}
