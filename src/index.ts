#!/usr/bin/env node

import pkg from '../package.json';
import { CliCommand, USAGE, parseArgs } from './config';
import { formatError } from './utils/error';
import { createLogger } from './utils/logger';
import { createOutputSink } from './utils/output';
import { createNodeProcessRunner } from './utils/process';
import { createTerminalPrompter } from './utils/prompt';
import { createConsoleTerminal } from './utils/terminal';
import { createTheme } from './utils/theme';
import { Workbench } from './workbench';

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(formatError(error));
    console.error(USAGE);
    return 1;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (command.kind === 'version') {
    console.log(pkg.version);
    return 0;
  }

  const { config } = command;
  if (!process.stdin.isTTY) {
    console.error('android-workbench needs an interactive terminal (stdin is not a TTY).');
    return 1;
  }

  const logger = createLogger({ verbose: config.verbose });
  const theme = createTheme(config.color && Boolean(process.stdout.isTTY));
  const deps = {
    runner: createNodeProcessRunner(logger),
    prompter: createTerminalPrompter(),
    terminal: createConsoleTerminal(theme, { clearScreen: Boolean(process.stdout.isTTY) }),
    sink: createOutputSink(config),
    logger,
  };

  logger.debug('config', config);
  const workbench = await Workbench.create(deps, config);
  return workbench.run();
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('android-workbench failed:', error);
    process.exitCode = 1;
  });
