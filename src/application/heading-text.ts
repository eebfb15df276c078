const EXPLICIT_ANCHOR = /\s*\{#([^}]+)\}\s*$/;
const NUMERIC_ID_PREFIX = 'heading-';
const EMPTY_SLUG_FALLBACK = 'heading';

export interface ParsedHeadingText {
  text: string;
  explicitId: string | null;
}

/**
 * Splits raw heading text into display text and an optional explicit anchor
 * written as a trailing `{#id}` marker.
 */
export function parseHeadingText(rawText: string): ParsedHeadingText {
  const trimmed = rawText.trim();
  const match = EXPLICIT_ANCHOR.exec(trimmed);
  if (!match) {
    return { text: cleanHeadingText(trimmed), explicitId: null };
  }

  const explicitId = match[1].trim().replace(/\s+/g, '-');
  return {
    text: cleanHeadingText(trimmed.slice(0, match.index)),
    explicitId: explicitId.length > 0 ? explicitId : null,
  };
}

export function stripExplicitAnchor(text: string): string {
  return text.replace(EXPLICIT_ANCHOR, '');
}

export function cleanHeadingText(text: string): string {
  return text
    .replace(/`[^`]+`/g, (span) => span.slice(1, -1))
    .replace(/\*\*([^*]+)\*\*/g, '$1')
    .replace(/\*([^*]+)\*/g, '$1')
    .replace(/__([^_]+)__/g, '$1')
    .replace(/_([^_]+)_/g, '$1')
    .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1')
    .replace(/!\[([^\]]*)\]\([^)]+\)/g, '$1')
    .replace(/~~([^~]+)~~/g, '$1')
    .replace(/<[^>]+>/g, '')
    .trim();
}

/**
 * Anchor slug for cleaned heading text. The renderer adapter assigns ids with
 * this same function, so the two never drift apart.
 */
export function slugifyHeadingText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function headingBaseId(parsed: ParsedHeadingText): string {
  const id = parsed.explicitId ?? (slugifyHeadingText(parsed.text) || EMPTY_SLUG_FALLBACK);
  return /^\d/.test(id) ? `${NUMERIC_ID_PREFIX}${id}` : id;
}

/**
 * Per-document duplicate tracking. The Nth repeat of an id becomes `id-N`;
 * a suffixed candidate that is already taken moves on to the next number.
 */
export class HeadingIdRegistry {
  private readonly occurrences = new Map<string, number>();
  private readonly assigned = new Set<string>();

  /** Marks an id as taken without counting it as an occurrence of any base id. */
  reserve(id: string): void {
    this.assigned.add(id);
  }

  claim(baseId: string): string {
    const seen = this.occurrences.get(baseId);
    if (seen === undefined && !this.assigned.has(baseId)) {
      this.occurrences.set(baseId, 1);
      this.assigned.add(baseId);
      return baseId;
    }

    let count = seen ?? 1;
    let candidate = `${baseId}-${count}`;
    while (this.assigned.has(candidate)) {
      count += 1;
      candidate = `${baseId}-${count}`;
    }

    this.occurrences.set(baseId, count + 1);
    this.assigned.add(candidate);
    return candidate;
  }
}
