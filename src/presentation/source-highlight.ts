import { nextCodeFenceState } from '../application/code-fence';
import { escapeHtml } from './document-view-utils';

const HEADING_LINE = /^#{1,6}\s+\S/;
const QUOTE_LINE = /^\s*>/;
const LIST_MARKER = /^\s*(?:[-*+]|\d+[.)])\s+/;

/**
 * Escaped Markdown source with light line-level markup for the source view:
 * fenced code, ATX headings, block quotes and list markers.
 */
export function highlightMarkdownSource(source: string): string {
  let insideFence = false;

  return source
    .split('\n')
    .map((line) => {
      const nextState = nextCodeFenceState(insideFence, line);
      const inCode = insideFence || nextState;
      insideFence = nextState;

      if (inCode) {
        return `<span class="md-code">${escapeHtml(line)}</span>`;
      }
      if (HEADING_LINE.test(line.trim())) {
        return `<span class="md-heading">${escapeHtml(line)}</span>`;
      }
      if (QUOTE_LINE.test(line)) {
        return `<span class="md-quote">${escapeHtml(line)}</span>`;
      }

      const marker = LIST_MARKER.exec(line);
      if (marker) {
        const rest = line.slice(marker[0].length);
        return `<span class="md-list">${escapeHtml(marker[0])}</span>${escapeHtml(rest)}`;
      }
      return escapeHtml(line);
    })
    .join('\n');
}
