import type { DocumentOutline, MarkdownSource } from '../domain';
import { fixIndentedCodeBlockBytes, fixIndentedCodeBlocks } from './code-block-indent-fix';
import { extractHeadings } from './heading-extraction';
import { decodeMarkdownSource } from './markdown-source';
import { buildTocTree } from './toc-tree';

export interface DocumentOutlineOptions {
  fixCodeBlocks: boolean;
}

const DEFAULT_OUTLINE_OPTIONS: DocumentOutlineOptions = {
  fixCodeBlocks: true,
};

export function buildDocumentOutline(
  source: MarkdownSource,
  options: DocumentOutlineOptions = DEFAULT_OUTLINE_OPTIONS
): DocumentOutline {
  const rawSource = options.fixCodeBlocks ? fixCodeBlocks(source) : source;
  const text = decodeMarkdownSource(rawSource);
  const headings = extractHeadings(text);
  return {
    source: text,
    rawSource,
    headings,
    toc: buildTocTree(headings),
  };
}

function fixCodeBlocks(source: MarkdownSource): MarkdownSource {
  return typeof source === 'string'
    ? fixIndentedCodeBlocks(source)
    : fixIndentedCodeBlockBytes(source);
}
