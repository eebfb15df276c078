import type { Heading, MarkdownDocument } from '../domain';
import { buildDocumentOutline } from './document-outline';
import { fileNameFromPath } from './path-utils';
import type { MarkdownHtmlRenderer, MarkdownSourceReader } from './ports';
import type { OutlineSettings } from './settings';

interface MarkdownDocumentServiceDeps {
  reader: MarkdownSourceReader;
  renderer: MarkdownHtmlRenderer;
  getSettings: () => OutlineSettings;
}

export class MarkdownDocumentService {
  private readonly deps: MarkdownDocumentServiceDeps;

  constructor(deps: MarkdownDocumentServiceDeps) {
    this.deps = deps;
  }

  async load(path: string): Promise<MarkdownDocument> {
    const bytes = await this.deps.reader.readMarkdownSource(path);
    const outline = buildDocumentOutline(bytes, {
      fixCodeBlocks: this.deps.getSettings().fixCodeBlocks,
    });

    return {
      path,
      title: documentTitle(path, outline.headings),
      html: this.deps.renderer.renderToHtml(outline.source),
      ...outline,
    };
  }
}

export function documentTitle(path: string, headings: readonly Heading[]): string {
  const firstTopLevel = headings.find((heading) => heading.level === 1 && heading.text.length > 0);
  return firstTopLevel ? firstTopLevel.text : fileNameFromPath(path);
}
