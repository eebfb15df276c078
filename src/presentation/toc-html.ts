import type { TocNode } from '../domain';
import { buildParentMap } from '../application/toc-tree';
import { escapeHtml } from './document-view-utils';

export interface TocHtmlOptions {
  isCollapsed: (id: string) => boolean;
}

const EXPANDED_BY_DEFAULT: TocHtmlOptions = {
  isCollapsed: () => false,
};

export function renderTocHtml(
  tree: readonly TocNode[],
  options: TocHtmlOptions = EXPANDED_BY_DEFAULT
): string {
  if (tree.length === 0) {
    return '<li class="toc-empty">No headings</li>';
  }

  const parents = buildParentMap(tree);
  return tree.map((node) => renderNode(node, parents, options)).join('');
}

function renderNode(
  node: TocNode,
  parents: Map<string, string | null>,
  options: TocHtmlOptions
): string {
  const { id, level, text } = node.heading;
  const hasChildren = node.children.length > 0;
  const collapsed = hasChildren && options.isCollapsed(id);
  const parentId = parents.get(id) ?? '';
  const toggle = hasChildren
    ? `<button class="toc-toggle" data-toc-toggle="1" data-id="${escapeHtml(id)}" aria-expanded="${collapsed ? 'false' : 'true'}" aria-label="Toggle section">${collapsed ? '▸' : '▾'}</button>`
    : '<span class="toc-toggle spacer"></span>';

  const children = hasChildren
    ? `<ul class="toc-children${collapsed ? ' collapsed' : ''}">${node.children
        .map((child) => renderNode(child, parents, options))
        .join('')}</ul>`
    : '';

  return `<li class="toc-item level-${level}" data-id="${escapeHtml(id)}" data-parent="${escapeHtml(parentId)}"><div class="toc-row">${toggle}<a class="toc-link" href="#${encodeURIComponent(id)}" data-toc-link="1" data-id="${escapeHtml(id)}">${escapeHtml(text)}</a></div>${children}</li>`;
}
