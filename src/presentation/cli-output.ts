import chalk from 'chalk';

export interface CliOutput {
  data(text: string): void;
  /** Writes content exactly as given, with no trailing newline added. */
  raw(content: string | Uint8Array): void;
  error(message: string): void;
  warning(message: string): void;
  success(message: string): void;
}

export function createConsoleOutput(): CliOutput {
  return {
    data: (text) => {
      process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
    },
    raw: (content) => {
      process.stdout.write(content);
    },
    error: (message) => {
      console.error(chalk.red('✗'), message);
    },
    warning: (message) => {
      console.error(chalk.yellow('!'), message);
    },
    success: (message) => {
      console.error(chalk.green('✓'), message);
    },
  };
}
