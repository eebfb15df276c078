export type {
  DocumentOutline,
  Heading,
  HeadingLevel,
  MarkdownDocument,
  MarkdownSource,
  TocNode,
} from './outline';
