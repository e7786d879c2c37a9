import { InvalidArgumentError, WorkbenchConfig, WorkbenchConfigSchema } from './types';
import { defaultLogDir, defaultMediaDir, defaultReportDir, resolvePath } from './utils/paths';

export type CliCommand = { kind: 'run'; config: WorkbenchConfig } | { kind: 'help' } | { kind: 'version' };

export const USAGE = `Usage: android-workbench [options]

Options:
  --serial <id>        ADB/fastboot serial to use (skip interactive selection)
  --dry-run            Start with dry-run enabled (print commands instead of running them)
  --media-dir <dir>    Where screenshots and recordings are written
  --report-dir <dir>   Where quick reports are written
  --log-dir <dir>      Where logcat dumps are written
  --no-color           Disable ANSI colours
  --verbose            Log every subprocess to stderr
  -v, --version        Print the version
  -h, --help           Show this help
`;

const VALUE_FLAGS = {
  '--serial': 'serial',
  '--media-dir': 'mediaDir',
  '--report-dir': 'reportDir',
  '--log-dir': 'logDir',
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(arg: string): arg is ValueFlag {
  return Object.prototype.hasOwnProperty.call(VALUE_FLAGS, arg);
}

export function parseArgs(args: string[]): CliCommand {
  if (args.includes('--help') || args.includes('-h')) {
    return { kind: 'help' };
  }
  if (args.includes('--version') || args.includes('-v') || args.includes('-V')) {
    return { kind: 'version' };
  }

  const raw: Record<string, unknown> = {
    mediaDir: defaultMediaDir(),
    reportDir: defaultReportDir(),
    logDir: defaultLogDir(),
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const inlineValue = eq > 0 ? arg.slice(eq + 1) : undefined;

    if (isValueFlag(flag)) {
      const value = inlineValue ?? args[++i];
      if (value === undefined || value.startsWith('--')) {
        throw new InvalidArgumentError(flag, `${flag} requires a value`);
      }
      raw[VALUE_FLAGS[flag]] = value;
    } else if (flag === '--dry-run') {
      raw.dryRun = true;
    } else if (flag === '--no-color') {
      raw.color = false;
    } else if (flag === '--verbose') {
      raw.verbose = true;
    } else {
      throw new InvalidArgumentError('argv', `Unknown option: ${arg}`);
    }
  }

  const parsed = WorkbenchConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(issue?.path.join('.') || 'argv', issue?.message ?? 'Invalid options');
  }

  const config = parsed.data;
  return {
    kind: 'run',
    config: {
      ...config,
      mediaDir: resolvePath(config.mediaDir),
      reportDir: resolvePath(config.reportDir),
      logDir: resolvePath(config.logDir),
    },
  };
}
