import { describe, expect, it } from 'vitest';

import { buildDocumentOutline } from './document-outline';

const LIST_WITH_CODE = ['- item', '  ```sh', '  # comment', '', '  ```', '# Title', '## Part'].join(
  '\n'
);

describe('document-outline', () => {
  it('fixes list code blocks before extracting headings', () => {
    const outline = buildDocumentOutline(LIST_WITH_CODE);

    expect(outline.source).toBe(
      ['- item', '    ```sh', '    # comment', '  ', '    ```', '# Title', '## Part'].join('\n')
    );
    expect(outline.headings).toEqual([
      { level: 1, text: 'Title', id: 'title' },
      { level: 2, text: 'Part', id: 'part' },
    ]);
    expect(outline.toc).toHaveLength(1);
    expect(outline.toc[0].children[0].heading.id).toBe('part');
  });

  it('can leave the source untouched', () => {
    const outline = buildDocumentOutline(LIST_WITH_CODE, { fixCodeBlocks: false });

    expect(outline.source).toBe(LIST_WITH_CODE);
    expect(outline.headings.map((heading) => heading.id)).toEqual(['title', 'part']);
  });

  it('accepts bytes', () => {
    const outline = buildDocumentOutline(new TextEncoder().encode('# Bytes\n'));

    expect(outline.source).toBe('# Bytes\n');
    expect(outline.headings).toEqual([{ level: 1, text: 'Bytes', id: 'bytes' }]);
  });

  it('keeps undecodable bytes in the raw source', () => {
    const outline = buildDocumentOutline(Uint8Array.of(35, 32, 65, 233, 10, 120));

    expect(outline.rawSource).toEqual(Uint8Array.of(35, 32, 65, 233, 10, 120));
    expect(outline.source).toBe('# A\uFFFD\nx');
    expect(outline.headings).toEqual([{ level: 1, text: 'A\uFFFD', id: 'a' }]);
  });

  it('fixes byte input without decoding it', () => {
    const source = new TextEncoder().encode('- x\n  ```\n  y\n  ```');

    const outline = buildDocumentOutline(source);

    expect(outline.rawSource).toEqual(new TextEncoder().encode('- x\n    ```\n    y\n    ```'));
  });

  it('yields an empty outline for empty input', () => {
    expect(buildDocumentOutline('')).toEqual({ source: '', rawSource: '', headings: [], toc: [] });
  });
});
