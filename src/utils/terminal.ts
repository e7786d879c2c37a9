import { Theme } from './theme';

export interface Terminal {
  readonly theme: Theme;
  clear(): void;
  print(text: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleTerminal(theme: Theme, options: { clearScreen: boolean }): Terminal {
  return {
    theme,
    clear() {
      if (options.clearScreen) {
        // clear screen + cursor home
        process.stdout.write('\u001b[2J\u001b[H');
      }
    },
    print(text) {
      console.log(text);
    },
    info(message) {
      console.log(theme.paint(message, 'muted'));
    },
    success(message) {
      console.log(`${theme.paint('[OK]', 'success')} ${message}`);
    },
    warn(message) {
      console.log(`${theme.paint('[WARN]', 'warn')} ${message}`);
    },
    error(message) {
      console.error(`${theme.paint('[ERROR]', 'error')} ${message}`);
    },
  };
}
