import { spawn, spawnSync } from 'child_process';
import { CaptureResult, CommandSpec, StreamResult, UnresolvedBinaryError, WorkbenchError } from '../types';
import { describeCommand } from './commands';
import { Logger, silentLogger } from './logger';

const DEFAULT_MAX_BUFFER = 256 * 1024 * 1024;

// Conventional exit status for a child stopped by SIGINT
const SIGINT_EXIT_CODE = 130;

export interface ProcessRunner {
  /** Buffers stdout and stderr until the child exits. */
  capture(spec: CommandSpec): Promise<CaptureResult>;
  /** Hands the terminal to the child until it exits or the user interrupts it. */
  stream(spec: CommandSpec): Promise<StreamResult>;
}

function isMissingBinary(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function spawnFailure(spec: CommandSpec, error: Error): WorkbenchError {
  if (isMissingBinary(error)) {
    return new UnresolvedBinaryError(spec.argv[0]);
  }
  return new WorkbenchError('SPAWN_FAILED', `Failed to start ${spec.argv[0]}: ${error.message}`, {
    command: describeCommand(spec),
  });
}

function assertPolicy(spec: CommandSpec, expected: CommandSpec['policy']): void {
  if (spec.policy !== expected) {
    throw new WorkbenchError(
      'POLICY_MISMATCH',
      `'${describeCommand(spec)}' is a ${spec.policy} command and cannot run ${expected}`
    );
  }
}

export function createNodeProcessRunner(logger: Logger = silentLogger): ProcessRunner {
  return {
    async capture(spec) {
      assertPolicy(spec, 'captured');
      const [binary, ...args] = spec.argv;
      logger.debug(`capture: ${describeCommand(spec)}`);

      const result = spawnSync(binary, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        maxBuffer: DEFAULT_MAX_BUFFER,
      });

      if (result.error) {
        throw spawnFailure(spec, result.error);
      }

      const exitCode = result.status ?? (result.signal ? SIGINT_EXIT_CODE : 1);
      logger.debug(`exit ${exitCode}: ${describeCommand(spec)}`);

      return {
        exitCode,
        stdout: result.stdout ?? Buffer.alloc(0),
        stderr: result.stderr ?? Buffer.alloc(0),
      };
    },

    stream(spec) {
      assertPolicy(spec, 'streamed');
      const [binary, ...args] = spec.argv;
      logger.debug(`stream: ${describeCommand(spec)}`);

      return new Promise<StreamResult>((resolve, reject) => {
        let interrupted = false;
        const child = spawn(binary, args, { stdio: 'inherit' });

        // Ctrl+C reaches the whole foreground group; keep this process alive
        // and make sure the child goes down with it.
        const onInterrupt = () => {
          interrupted = true;
          logger.debug(`interrupt: ${describeCommand(spec)}`);
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGINT');
          }
        };
        process.on('SIGINT', onInterrupt);

        const finish = () => {
          process.removeListener('SIGINT', onInterrupt);
        };

        child.once('error', error => {
          finish();
          reject(spawnFailure(spec, error));
        });

        child.once('close', (code, signal) => {
          finish();
          const exitCode = code ?? (signal ? SIGINT_EXIT_CODE : 0);
          logger.debug(`exit ${exitCode}: ${describeCommand(spec)}`);
          resolve({ exitCode, interrupted: interrupted || signal === 'SIGINT' });
        });
      });
    },
  };
}
