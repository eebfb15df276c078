import { describe, expect, it } from 'vitest';

type Layer = 'domain' | 'application' | 'infrastructure' | 'presentation';

const sources = import.meta.glob<string>('./**/*.ts', {
  eager: true,
  import: 'default',
  query: '?raw',
});

const runtimeSources = Object.entries(sources)
  .filter(([path]) => !path.endsWith('.test.ts'))
  .map(([path, source]) => ({ path: path.slice('./'.length), source }));

// Which layers each layer may import from.
const ALLOWED_LAYER_IMPORTS: Record<Layer, readonly Layer[]> = {
  domain: ['domain'],
  application: ['domain', 'application'],
  infrastructure: ['domain', 'application', 'infrastructure'],
  presentation: ['domain', 'application', 'presentation'],
};

const ALLOWED_PACKAGES: Record<Layer, readonly string[]> = {
  domain: [],
  application: [],
  infrastructure: ['markdown-it', 'node:'],
  presentation: ['commander', 'chalk'],
};

const NODE_GLOBALS = /\b(?:process\.|console\.|Buffer\b|__dirname\b|require\s*\()/;
const BYTE_DECODING_MODULE = 'application/markdown-source.ts';

function layerOf(path: string): Layer | null {
  const [top] = path.split('/');
  return top === 'domain' || top === 'application' || top === 'infrastructure' || top === 'presentation'
    ? top
    : null;
}

function importSpecifiers(source: string): string[] {
  return Array.from(source.matchAll(/^(?:import|export)\b[^'"]*?from\s+'([^']+)'/gm), (match) => match[1]);
}

function resolveRelative(fromPath: string, specifier: string): string {
  const parts = fromPath.split('/').slice(0, -1);
  for (const part of specifier.split('/')) {
    if (part === '..') {
      parts.pop();
    } else if (part !== '.') {
      parts.push(part);
    }
  }
  return parts.join('/');
}

describe('layer boundaries', () => {
  it('keeps every runtime module except the composition root inside a layer', () => {
    const strays = runtimeSources
      .map(({ path }) => path)
      .filter((path) => path !== 'main.ts' && layerOf(path) === null);

    expect(strays).toEqual([]);
  });

  it('imports only from permitted layers and packages', () => {
    const violations: string[] = [];

    for (const { path, source } of runtimeSources) {
      const layer = layerOf(path);
      if (!layer) {
        continue;
      }

      for (const specifier of importSpecifiers(source)) {
        if (specifier.startsWith('.')) {
          const target = layerOf(resolveRelative(path, specifier));
          if (!target || !ALLOWED_LAYER_IMPORTS[layer].includes(target)) {
            violations.push(`${path} -> ${specifier}`);
          }
        } else if (!ALLOWED_PACKAGES[layer].some((name) => specifier.startsWith(name))) {
          violations.push(`${path} -> ${specifier}`);
        }
      }
    }

    expect(violations).toEqual([]);
  });

  it('keeps Node.js globals out of domain and application', () => {
    const violations = runtimeSources
      .filter(({ path }) => layerOf(path) === 'domain' || layerOf(path) === 'application')
      .filter(({ source }) => NODE_GLOBALS.test(source))
      .map(({ path }) => path);

    expect(violations).toEqual([]);
  });

  it('decodes bytes in a single application module', () => {
    const decoders = runtimeSources
      .filter(({ source }) => /\bTextDecoder\b/.test(source))
      .map(({ path }) => path);

    expect(decoders).toEqual([BYTE_DECODING_MODULE]);
  });
});
