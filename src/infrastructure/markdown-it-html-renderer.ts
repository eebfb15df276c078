import MarkdownIt from 'markdown-it';

import type { MarkdownHtmlRenderer } from '../application/ports';
import { locateHeadings } from '../application/heading-extraction';
import {
  HeadingIdRegistry,
  headingBaseId,
  parseHeadingText,
  stripExplicitAnchor,
} from '../application/heading-text';

export class MarkdownItHtmlRenderer implements MarkdownHtmlRenderer {
  private readonly markdown: MarkdownIt;

  constructor() {
    this.markdown = new MarkdownIt({
      html: true,
      linkify: true,
      typographer: false,
    });
    this.markdown.core.ruler.push('heading_ids', (state) => {
      // Headings the line scanner finds keep the ids the outline links to.
      // Headings only markdown-it recognises (setext, quoted, list items)
      // get fresh ids that avoid every reserved one.
      const idsByLine = new Map<number, string>();
      const ids = new HeadingIdRegistry();
      for (const { heading, line } of locateHeadings(state.src)) {
        idsByLine.set(line, heading.id);
        ids.reserve(heading.id);
      }

      const tokens = state.tokens;
      for (let index = 0; index < tokens.length - 1; index += 1) {
        const open = tokens[index];
        const inline = tokens[index + 1];
        if (open.type !== 'heading_open' || inline.type !== 'inline') {
          continue;
        }

        const lineId = open.map ? idsByLine.get(open.map[0]) : undefined;
        open.attrSet('id', lineId ?? ids.claim(headingBaseId(parseHeadingText(inline.content))));

        const lastText = inline.children?.at(-1);
        if (lastText && lastText.type === 'text') {
          lastText.content = stripExplicitAnchor(lastText.content).trimEnd();
        }
      }
    });
  }

  renderToHtml(source: string): string {
    return this.markdown.render(source);
  }
}
