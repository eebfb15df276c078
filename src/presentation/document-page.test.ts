import { describe, expect, it } from 'vitest';

import type { MarkdownDocument } from '../domain';
import { buildDocumentOutline } from '../application/document-outline';
import { DEFAULT_SETTINGS } from '../application/settings';
import { renderDocumentPage } from './document-page';

function documentFrom(source: string, title: string): MarkdownDocument {
  return {
    path: 'guide.md',
    title,
    html: '<p>Body</p>',
    ...buildDocumentOutline(source),
  };
}

describe('document-page', () => {
  it('places the outline on the configured side', () => {
    const document = documentFrom('# Guide\n## Setup\n', 'Guide');

    expect(renderDocumentPage(document, DEFAULT_SETTINGS)).toContain(
      '<div class="workspace toc-left">'
    );
    expect(
      renderDocumentPage(document, { ...DEFAULT_SETTINGS, tocPosition: 'right' })
    ).toContain('<div class="workspace toc-right">');
  });

  it('embeds the rendered html and escapes the title', () => {
    const page = renderDocumentPage(documentFrom('# A\n', 'Tom & Jerry'), DEFAULT_SETTINGS);

    expect(page).toContain('<title>Tom &amp; Jerry</title>');
    expect(page).toContain('<article id="markdown-content" class="markdown-body">\n<p>Body</p>\n');
  });

  it('limits the outline depth', () => {
    const document = documentFrom('# Guide\n## Setup\n### Deep\n', 'Guide');

    const page = renderDocumentPage(document, { ...DEFAULT_SETTINGS, tocMaxLevel: 2 });

    expect(page).toContain('data-id="setup"');
    expect(page).not.toContain('data-id="deep"');
  });

  it('collapses nested sections when asked', () => {
    const document = documentFrom('# Guide\n## Setup\n', 'Guide');

    const page = renderDocumentPage(document, { ...DEFAULT_SETTINGS, tocCollapsedByDefault: true });

    expect(page).toContain('<ul class="toc-children collapsed">');
  });

  it('shows an empty outline for documents without headings', () => {
    const page = renderDocumentPage(documentFrom('text only\n', 'guide.md'), DEFAULT_SETTINGS);

    expect(page).toContain('<ul id="toc-list" class="toc-list"><li class="toc-empty">No headings</li></ul>');
  });

  it('offers expand all and collapse all controls for the outline', () => {
    const page = renderDocumentPage(documentFrom('# Guide\n## Setup\n', 'Guide'), DEFAULT_SETTINGS);

    expect(page).toContain(
      '<button type="button" class="toc-control" data-toc-expand-all="1" title="Expand all">+</button>'
    );
    expect(page).toContain(
      '<button type="button" class="toc-control" data-toc-collapse-all="1" title="Collapse all">−</button>'
    );
  });

  it('includes a source view of the fixed markdown behind a toggle', () => {
    const document = documentFrom('# Guide <v1>\n- item\n  ```\n  x\n  ```\n', 'Guide');

    const page = renderDocumentPage(document, DEFAULT_SETTINGS);

    expect(page).toContain(
      '<button type="button" id="view-toggle" class="view-toggle" aria-pressed="false">Show Source</button>'
    );
    expect(page).toContain(
      [
        '<pre id="raw-content" class="raw-source"><span class="md-heading"># Guide &lt;v1&gt;</span>',
        '<span class="md-list">- </span>item',
        '<span class="md-code">    ```</span>',
        '<span class="md-code">    x</span>',
        '<span class="md-code">    ```</span>',
        '</pre>',
      ].join('\n')
    );
  });
});
