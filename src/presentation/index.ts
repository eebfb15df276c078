export { createCli, type CliDeps, type DocumentLoader } from './cli';
export { createConsoleOutput, type CliOutput } from './cli-output';
export { renderDocumentPage } from './document-page';
export { errorToMessage } from './error-utils';
export { formatHeadingList, formatOutline, serializeTocTree } from './outline-format';
export { highlightMarkdownSource } from './source-highlight';
export { renderTocHtml } from './toc-html';
