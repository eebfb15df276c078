import { Command, InvalidArgumentError } from 'commander';

import type { MarkdownDocument } from '../domain';
import { isMarkdownPath } from '../application/path-utils';
import {
  isTocPosition,
  mergeOutlineSettings,
  type OutlineSettings,
} from '../application/settings';
import { buildTocTree, limitHeadingLevel } from '../application/toc-tree';
import type { CliOutput } from './cli-output';
import { renderDocumentPage } from './document-page';
import { errorToMessage } from './error-utils';
import { formatHeadingList, formatOutline, serializeTocTree } from './outline-format';

export interface DocumentLoader {
  load(path: string): Promise<MarkdownDocument>;
}

export interface CliDeps {
  output: CliOutput;
  loadSettings: (configPath: string | undefined) => OutlineSettings;
  createDocumentLoader: (rootDir: string, settings: OutlineSettings) => DocumentLoader;
  writeFile: (path: string, content: string) => Promise<void>;
  setExitCode: (code: number) => void;
}

type GlobalOptions = {
  root: string;
  config?: string;
  rawCodeBlocks?: boolean;
};

interface OutlineOptions {
  json?: boolean;
  maxLevel?: number;
}

interface RenderOptions {
  output?: string;
  tocPosition?: string;
  maxLevel?: number;
  collapsed?: boolean;
}

export function createCli(deps: CliDeps): Command {
  const program = new Command();

  program
    .name('mdtoc')
    .description('Extract heading outlines from Markdown and render navigable HTML pages')
    .version('0.1.0')
    .option('-r, --root <dir>', 'Directory documents are resolved against', '.')
    .option('-c, --config <file>', 'Settings file (default: mdtoc.config.json)')
    .option('--raw-code-blocks', 'Skip the list code-block indentation fix');

  program
    .command('headings <file>')
    .description('List headings in document order')
    .option('--json', 'Output as JSON')
    .action(async (file: string, options: OutlineOptions) => {
      await runAction(deps, async () => {
        const globals = program.opts<GlobalOptions>();
        const settings = resolveSettings(deps, globals, {});
        const document = await loadDocument(deps, globals.root, file, settings);
        deps.output.data(
          options.json ? JSON.stringify(document.headings, null, 2) : formatHeadingList(document.headings)
        );
      });
    });

  program
    .command('toc <file>')
    .description('Print the table of contents tree')
    .option('--json', 'Output as JSON')
    .option('-l, --max-level <level>', 'Deepest heading level to include', parseLevel)
    .action(async (file: string, options: OutlineOptions) => {
      await runAction(deps, async () => {
        const globals = program.opts<GlobalOptions>();
        const settings = resolveSettings(deps, globals, { tocMaxLevel: options.maxLevel });
        const document = await loadDocument(deps, globals.root, file, settings);
        const tree = buildTocTree(limitHeadingLevel(document.headings, settings.tocMaxLevel));
        deps.output.data(
          options.json ? JSON.stringify(serializeTocTree(tree), null, 2) : formatOutline(tree)
        );
      });
    });

  program
    .command('render <file>')
    .description('Render a standalone HTML page with a table of contents')
    .option('-o, --output <file>', 'Write the page to a file instead of stdout')
    .option('-p, --toc-position <position>', 'Table of contents side: left or right')
    .option('-l, --max-level <level>', 'Deepest heading level shown in the table of contents', parseLevel)
    .option('--collapsed', 'Start with nested table of contents sections collapsed')
    .action(async (file: string, options: RenderOptions) => {
      await runAction(deps, async () => {
        const globals = program.opts<GlobalOptions>();
        const overrides: Record<string, unknown> = {
          tocMaxLevel: options.maxLevel,
          tocCollapsedByDefault: options.collapsed,
        };
        if (options.tocPosition !== undefined) {
          if (isTocPosition(options.tocPosition)) {
            overrides.tocPosition = options.tocPosition;
          } else {
            deps.output.warning(
              `Invalid table of contents position '${options.tocPosition}', using 'left'`
            );
            overrides.tocPosition = 'left';
          }
        }

        const settings = resolveSettings(deps, globals, overrides);
        const document = await loadDocument(deps, globals.root, file, settings);
        const page = renderDocumentPage(document, settings);
        if (options.output) {
          await deps.writeFile(options.output, page);
          deps.output.success(`Wrote ${options.output}`);
          return;
        }
        deps.output.data(page);
      });
    });

  program
    .command('fix <file>')
    .description('Print the document with list code-block indentation fixed')
    .action(async (file: string) => {
      await runAction(deps, async () => {
        const globals = program.opts<GlobalOptions>();
        const settings = resolveSettings(deps, globals, {});
        const document = await loadDocument(deps, globals.root, file, {
          ...settings,
          fixCodeBlocks: true,
        });
        deps.output.raw(document.rawSource);
      });
    });

  return program;
}

function resolveSettings(
  deps: CliDeps,
  globals: GlobalOptions,
  overrides: Record<string, unknown>
): OutlineSettings {
  const base = deps.loadSettings(globals.config);
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return mergeOutlineSettings({
    ...base,
    ...defined,
    ...(globals.rawCodeBlocks ? { fixCodeBlocks: false } : {}),
  });
}

async function loadDocument(
  deps: CliDeps,
  rootDir: string,
  file: string,
  settings: OutlineSettings
): Promise<MarkdownDocument> {
  if (!isMarkdownPath(file)) {
    deps.output.warning(`${file} does not look like a Markdown file`);
  }
  return deps.createDocumentLoader(rootDir, settings).load(file);
}

async function runAction(deps: CliDeps, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    deps.output.error(errorToMessage(error));
    deps.setExitCode(1);
  }
}

export function parseLevel(value: string): number {
  if (!/^[1-6]$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a heading level from 1 to 6.');
  }
  return Number(value);
}
