import { HANDLERS, HandlerContext, selectDevice } from './handlers';
import { MAIN_MENU, parseMenuChoice, renderMenu } from './menu';
import { Session, WorkbenchConfig } from './types';
import { formatError, isWarning } from './utils/error';
import { Logger } from './utils/logger';
import { OutputSink } from './utils/output';
import { ProcessRunner } from './utils/process';
import { PromptAbortedError, Prompter } from './utils/prompt';
import { Terminal } from './utils/terminal';

export interface WorkbenchDeps {
  runner: ProcessRunner;
  prompter: Prompter;
  terminal: Terminal;
  sink: OutputSink;
  logger: Logger;
  clock?: () => Date;
}

export class Workbench {
  private readonly deps: WorkbenchDeps;
  private readonly clock: () => Date;
  private session: Session;

  constructor(deps: WorkbenchDeps, session: Session) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
    this.session = session;
  }

  get currentSession(): Session {
    return this.session;
  }

  /**
   * Resolves the starting target: the configured serial, otherwise whatever
   * `adb devices` offers. Failing to list devices leaves the session without
   * a target.
   */
  static async create(deps: WorkbenchDeps, config: Pick<WorkbenchConfig, 'serial' | 'dryRun'>): Promise<Workbench> {
    let serial = config.serial ?? null;
    if (!serial) {
      try {
        serial = await selectDevice(deps);
      } catch (error) {
        if (error instanceof PromptAbortedError) {
          throw error;
        }
        deps.terminal.warn(formatError(error));
      }
    }
    return new Workbench(deps, { serial, dryRun: config.dryRun });
  }

  private report(error: unknown): void {
    const message = formatError(error);
    if (isWarning(error)) {
      this.deps.terminal.warn(message);
    } else {
      this.deps.terminal.error(message);
    }
    if (error instanceof Error && error.stack) {
      this.deps.logger.debug(error.stack);
    }
  }

  private render(): void {
    const { terminal } = this.deps;
    terminal.clear();
    terminal.print(terminal.theme.banner());
    terminal.print(terminal.theme.statusLine(this.session, this.clock()));
    terminal.print('');
    terminal.print(renderMenu(terminal.theme, MAIN_MENU, 'MAIN MENU'));
  }

  private context(): HandlerContext {
    return {
      session: this.session,
      runner: this.deps.runner,
      prompter: this.deps.prompter,
      terminal: this.deps.terminal,
      sink: this.deps.sink,
      clock: this.clock,
    };
  }

  private async pause(): Promise<void> {
    await this.deps.prompter.ask(this.deps.terminal.theme.paint('Press Enter to continue...', 'muted'));
  }

  /** Runs until the user quits or input closes. Resolves to the process exit code. */
  async run(): Promise<number> {
    try {
      for (;;) {
        this.render();
        const answer = await this.deps.prompter.ask(this.deps.terminal.theme.paint('> ', 'highlight'));
        const choice = parseMenuChoice(MAIN_MENU, answer);

        if (!choice) {
          this.deps.terminal.warn(`Unknown choice: ${answer.trim()}`);
          await this.pause();
          continue;
        }
        if (choice.kind === 'quit') {
          return 0;
        }

        this.deps.logger.debug(`operation: ${choice.operation}`);
        try {
          const next = await HANDLERS[choice.operation](this.context());
          if (next) {
            this.session = next;
          }
        } catch (error) {
          if (error instanceof PromptAbortedError) {
            throw error;
          }
          this.report(error);
        }

        if (choice.operation !== 'toggle-dry-run') {
          await this.pause();
        }
      }
    } catch (error) {
      if (error instanceof PromptAbortedError) {
        this.deps.terminal.print('');
        return 0;
      }
      throw error;
    }
  }
}
