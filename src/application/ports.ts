import type { OutlineSettings } from './settings';

export interface MarkdownSourceReader {
  readMarkdownSource(path: string): Promise<Uint8Array>;
}

export interface MarkdownHtmlRenderer {
  renderToHtml(source: string): string;
}

export interface OutlineSettingsStore {
  load(): OutlineSettings;
}

export type MarkdownSourceErrorReason = 'access-denied' | 'not-found' | 'not-a-file';

export class MarkdownSourceError extends Error {
  readonly reason: MarkdownSourceErrorReason;
  readonly path: string;

  constructor(reason: MarkdownSourceErrorReason, path: string, message: string) {
    super(message);
    this.name = 'MarkdownSourceError';
    this.reason = reason;
    this.path = path;
  }
}
