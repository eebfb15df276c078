import type { MarkdownSource } from '../domain';

const utf8 = new TextDecoder('utf-8');

export function decodeMarkdownSource(source: MarkdownSource): string {
  return typeof source === 'string' ? source : utf8.decode(source);
}
