import type { Heading, HeadingLevel, MarkdownSource } from '../domain';
import { nextCodeFenceState } from './code-fence';
import { decodeMarkdownSource } from './markdown-source';
import { HeadingIdRegistry, headingBaseId, parseHeadingText } from './heading-text';

const ATX_HEADING = /^(#{1,6})\s+(.+)$/s;

export interface LocatedHeading {
  heading: Heading;
  /** Zero-based index of the heading's line in the scanned text. */
  line: number;
}

export function extractHeadings(source: MarkdownSource): Heading[] {
  return locateHeadings(source).map(({ heading }) => heading);
}

export function locateHeadings(source: MarkdownSource): LocatedHeading[] {
  const located: LocatedHeading[] = [];
  const ids = new HeadingIdRegistry();
  let insideFence = false;

  const lines = decodeMarkdownSource(source).split('\n');
  for (const [index, line] of lines.entries()) {
    const nextState = nextCodeFenceState(insideFence, line);
    if (nextState !== insideFence) {
      insideFence = nextState;
      continue;
    }
    if (insideFence) {
      continue;
    }

    const match = ATX_HEADING.exec(line.trim());
    if (!match) {
      continue;
    }

    const parsed = parseHeadingText(match[2]);
    located.push({
      heading: {
        level: headingLevel(match[1].length),
        text: parsed.text,
        id: ids.claim(headingBaseId(parsed)),
      },
      line: index,
    });
  }

  return located;
}

function headingLevel(markerLength: number): HeadingLevel {
  switch (markerLength) {
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    case 5:
      return 5;
    default:
      return 6;
  }
}
