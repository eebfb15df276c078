import { readFile, stat } from 'node:fs/promises';
import { isAbsolute, relative, resolve, sep } from 'node:path';

import { MarkdownSourceError, type MarkdownSourceReader } from '../application/ports';

export class FsMarkdownSourceReader implements MarkdownSourceReader {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  async readMarkdownSource(path: string): Promise<Uint8Array> {
    const fullPath = resolve(this.rootDir, path);
    const fromRoot = relative(this.rootDir, fullPath);
    if (fromRoot === '..' || fromRoot.startsWith(`..${sep}`) || isAbsolute(fromRoot)) {
      throw new MarkdownSourceError('access-denied', path, `Access denied: ${path}`);
    }

    const info = await stat(fullPath).catch(() => null);
    if (!info) {
      throw new MarkdownSourceError('not-found', path, `File not found: ${path}`);
    }
    if (!info.isFile()) {
      throw new MarkdownSourceError('not-a-file', path, `Not a file: ${path}`);
    }

    try {
      return await readFile(fullPath);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new MarkdownSourceError('not-found', path, `Unable to read ${path}: ${detail}`);
    }
  }
}
