import { writeFile } from 'node:fs/promises';

import { MarkdownDocumentService } from './application/document-service';
import { FsMarkdownSourceReader } from './infrastructure/fs-markdown-source-reader';
import { JsonFileSettingsStore } from './infrastructure/json-file-settings-store';
import { MarkdownItHtmlRenderer } from './infrastructure/markdown-it-html-renderer';
import { createCli, createConsoleOutput, errorToMessage } from './presentation';

async function bootstrap(): Promise<void> {
  const output = createConsoleOutput();
  const renderer = new MarkdownItHtmlRenderer();

  const program = createCli({
    output,
    loadSettings: (configPath) => new JsonFileSettingsStore(configPath).load(),
    createDocumentLoader: (rootDir, settings) =>
      new MarkdownDocumentService({
        reader: new FsMarkdownSourceReader(rootDir),
        renderer,
        getSettings: () => settings,
      }),
    writeFile: (path, content) => writeFile(path, content, 'utf8'),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  });

  await program.parseAsync(process.argv);
}

bootstrap().catch((error: unknown) => {
  console.error(errorToMessage(error));
  process.exitCode = 1;
});
