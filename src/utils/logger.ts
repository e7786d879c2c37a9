export interface Logger {
  debug(message: string, data?: unknown): void;
}

const TAG = '[android-workbench]';

export function createLogger(options: { verbose: boolean }): Logger {
  return {
    debug(message, data) {
      if (!options.verbose) return;
      const suffix = data !== undefined ? ` ${JSON.stringify(data)}` : '';
      console.error(`${TAG} ${new Date().toISOString()} ${message}${suffix}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
};
