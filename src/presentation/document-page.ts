import type { MarkdownDocument } from '../domain';
import type { OutlineSettings } from '../application/settings';
import { buildTocTree, limitHeadingLevel } from '../application/toc-tree';
import { escapeHtml } from './document-view-utils';
import { highlightMarkdownSource } from './source-highlight';
import { renderTocHtml } from './toc-html';

const PAGE_STYLE = `
  * { box-sizing: border-box; }
  body { margin: 0; font: 16px/1.62 system-ui, sans-serif; color: #1f2328; background: #fbfaf7; }
  .workspace { display: flex; min-height: 100vh; }
  .workspace.toc-right { flex-direction: row-reverse; }
  .toc-panel { flex: 0 0 280px; position: sticky; top: 0; max-height: 100vh; overflow-y: auto; padding: 1.5rem 1rem; border-right: 1px solid #e4e1da; }
  .toc-right .toc-panel { border-right: none; border-left: 1px solid #e4e1da; }
  .toc-header { display: flex; align-items: center; justify-content: space-between; margin: 0 0 0.75rem; }
  .toc-controls { display: flex; gap: 0.25rem; }
  .toc-control { width: 1.6rem; height: 1.6rem; border: 1px solid #e4e1da; border-radius: 4px; background: #fff; cursor: pointer; color: #6a6f76; }
  .toc-panel h2 { margin: 0; font-size: 0.85rem; text-transform: uppercase; letter-spacing: 0.06em; color: #6a6f76; }
  .toc-list, .toc-children { list-style: none; margin: 0; padding: 0; }
  .toc-children { padding-left: 0.9rem; }
  .toc-children.collapsed { display: none; }
  .toc-row { display: flex; align-items: baseline; gap: 0.25rem; }
  .toc-toggle { width: 1.1rem; flex: 0 0 1.1rem; border: none; background: none; padding: 0; cursor: pointer; color: #6a6f76; }
  .toc-link { color: inherit; text-decoration: none; font-size: 0.9rem; }
  .toc-link:hover { text-decoration: underline; }
  .toc-item.active > .toc-row > .toc-link { font-weight: 600; }
  .toc-empty { color: #6a6f76; font-style: italic; }
  .viewer-column { flex: 1 1 auto; min-width: 0; padding: 2rem 3rem; }
  .markdown-body { max-width: 76ch; margin: 0 auto; }
  .markdown-body pre { overflow-x: auto; padding: 0.75rem 1rem; background: #f1efe9; border-radius: 6px; }
  .markdown-body code { font-family: ui-monospace, monospace; font-size: 0.9em; }
  .viewer-toolbar { display: flex; justify-content: flex-end; margin-bottom: 1rem; }
  .view-toggle { border: 1px solid #e4e1da; border-radius: 4px; background: #fff; padding: 0.3rem 0.8rem; cursor: pointer; }
  .raw-source { display: none; margin: 0; white-space: pre-wrap; font: 14px/1.5 ui-monospace, monospace; }
  .show-source .raw-source { display: block; }
  .show-source .markdown-body, .show-source .toc-panel { display: none; }
  .md-heading { color: #0550ae; font-weight: 600; }
  .md-code { color: #6a6f76; background: #f1efe9; }
  .md-quote { color: #57606a; font-style: italic; }
  .md-list { color: #953800; }
`;

const PAGE_SCRIPT = `
  (function () {
    var workspace = document.querySelector('.workspace');
    var viewToggle = document.getElementById('view-toggle');
    if (workspace && viewToggle) {
      viewToggle.addEventListener('click', function () {
        var showingSource = workspace.classList.toggle('show-source');
        viewToggle.textContent = showingSource ? 'Show Rendered' : 'Show Source';
        viewToggle.setAttribute('aria-pressed', showingSource ? 'true' : 'false');
      });
    }
    var list = document.getElementById('toc-list');
    if (!list) return;
    function setExpanded(item, expanded) {
      var children = item.querySelector(':scope > .toc-children');
      var toggle = item.querySelector(':scope > .toc-row > .toc-toggle[data-toc-toggle]');
      if (!children || !toggle) return;
      children.classList.toggle('collapsed', !expanded);
      toggle.setAttribute('aria-expanded', expanded ? 'true' : 'false');
      toggle.textContent = expanded ? '\\u25BE' : '\\u25B8';
    }
    function itemById(id) {
      var items = list.querySelectorAll('.toc-item');
      for (var i = 0; i < items.length; i += 1) {
        if (items[i].getAttribute('data-id') === id) return items[i];
      }
      return null;
    }
    function setAllExpanded(expanded) {
      var items = list.querySelectorAll('.toc-item');
      for (var i = 0; i < items.length; i += 1) setExpanded(items[i], expanded);
    }
    var expandAll = document.querySelector('[data-toc-expand-all]');
    var collapseAll = document.querySelector('[data-toc-collapse-all]');
    if (expandAll) expandAll.addEventListener('click', function () { setAllExpanded(true); });
    if (collapseAll) collapseAll.addEventListener('click', function () { setAllExpanded(false); });
    list.addEventListener('click', function (event) {
      var target = event.target;
      if (!(target instanceof Element)) return;
      var toggle = target.closest('[data-toc-toggle]');
      if (toggle) {
        var item = toggle.closest('.toc-item');
        if (item) setExpanded(item, toggle.getAttribute('aria-expanded') !== 'true');
        return;
      }
      var link = target.closest('[data-toc-link]');
      if (!link) return;
      var current = itemById(link.getAttribute('data-id'));
      var active = list.querySelectorAll('.toc-item.active');
      for (var i = 0; i < active.length; i += 1) active[i].classList.remove('active');
      if (current) current.classList.add('active');
      var parentId = current ? current.getAttribute('data-parent') : '';
      while (parentId) {
        var parent = itemById(parentId);
        if (!parent) break;
        setExpanded(parent, true);
        parentId = parent.getAttribute('data-parent');
      }
    });
  })();
`;

export function renderDocumentPage(document: MarkdownDocument, settings: OutlineSettings): string {
  const tree = buildTocTree(limitHeadingLevel(document.headings, settings.tocMaxLevel));
  const tocHtml = renderTocHtml(tree, {
    isCollapsed: () => settings.tocCollapsedByDefault,
  });

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(document.title)}</title>
  <style>${PAGE_STYLE}</style>
</head>
<body>
  <div class="workspace toc-${settings.tocPosition}">
    <aside id="toc-panel" class="toc-panel">
      <div class="toc-header">
        <h2>Outline</h2>
        <div class="toc-controls">
          <button type="button" class="toc-control" data-toc-expand-all="1" title="Expand all">+</button>
          <button type="button" class="toc-control" data-toc-collapse-all="1" title="Collapse all">−</button>
        </div>
      </div>
      <ul id="toc-list" class="toc-list">${tocHtml}</ul>
    </aside>
    <main class="viewer-column">
      <div class="viewer-toolbar">
        <button type="button" id="view-toggle" class="view-toggle" aria-pressed="false">Show Source</button>
      </div>
      <article id="markdown-content" class="markdown-body">
${document.html}
      </article>
      <pre id="raw-content" class="raw-source">${highlightMarkdownSource(document.source)}</pre>
    </main>
  </div>
  <script>${PAGE_SCRIPT}</script>
</body>
</html>
`;
}
