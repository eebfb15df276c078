export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface Heading {
  readonly level: HeadingLevel;
  readonly text: string;
  readonly id: string;
}

export interface TocNode {
  readonly heading: Heading;
  readonly children: readonly TocNode[];
}

export interface DocumentOutline {
  /** Decoded Markdown after the code-block fix. */
  source: string;
  /** The same fixed Markdown in the form it was given, bytes kept as read. */
  rawSource: MarkdownSource;
  headings: Heading[];
  toc: TocNode[];
}

export interface MarkdownDocument extends DocumentOutline {
  path: string;
  title: string;
  html: string;
}

export type MarkdownSource = string | Uint8Array;
