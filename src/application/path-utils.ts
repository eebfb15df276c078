const MARKDOWN_EXTENSIONS = ['md', 'markdown', 'mdown', 'mkd', 'mkdn'];

export function isMarkdownPath(path: string): boolean {
  const clean = path.toLowerCase().split('#')[0].split('?')[0];
  return MARKDOWN_EXTENSIONS.some((extension) => clean.endsWith(`.${extension}`));
}

export function fileNameFromPath(path: string): string {
  const normalized = path.replaceAll('\\', '/').replace(/\/+$/, '');
  const slashIndex = normalized.lastIndexOf('/');
  return slashIndex === -1 ? normalized : normalized.slice(slashIndex + 1);
}
