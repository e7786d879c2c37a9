import { z } from 'zod';
import {
  Binary,
  ClearAppDataInputSchema,
  CommandSpec,
  DestructiveCommandError,
  DumpsysInputSchema,
  ExecutionPolicy,
  FastbootRebootTarget,
  GetpropInputSchema,
  InstallApkInputSchema,
  InvalidArgumentError,
  LogcatTagInputSchema,
  OpenUrlInputSchema,
  PositiveCountSchema,
  PullInputSchema,
  RemotePathInputSchema,
} from '../types';

/** Bootloader subcommands that can wipe or unlock a device. Never built. */
export const DESTRUCTIVE_FASTBOOT_TOKENS: readonly string[] = ['flash', 'erase', 'format', 'unlock', 'oem'];

export type CommandRequest =
  | { kind: 'list-adb-devices' }
  | { kind: 'list-fastboot-devices' }
  | { kind: 'getprop'; property: string }
  | { kind: 'shell-id' }
  | { kind: 'shell-uptime' }
  | { kind: 'dumpsys'; service: string[] }
  | { kind: 'reboot-bootloader' }
  | { kind: 'logcat-dump'; tail?: number; tag?: string }
  | { kind: 'logcat-crashes' }
  | { kind: 'logcat-follow' }
  | { kind: 'logcat-clear' }
  | { kind: 'screenshot' }
  | { kind: 'screenrecord'; durationSec: number; remotePath: string }
  | { kind: 'pull'; remotePath: string; localPath: string }
  | { kind: 'remove-remote'; remotePath: string }
  | { kind: 'install-apk'; apkPath: string }
  | { kind: 'clear-app-data'; packageName: string }
  | { kind: 'open-url'; url: string }
  | { kind: 'fastboot-getvar-all' }
  | { kind: 'fastboot-reboot'; target: FastbootRebootTarget };

export type CommandKind = CommandRequest['kind'];

// `adb shell` joins its arguments and hands them to the device's sh
export function quoteForDeviceShell(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'input';
    throw new InvalidArgumentError(field, issue?.message ?? 'Invalid input');
  }
  return result.data;
}

function parseCount(field: string, value: number): number {
  const result = PositiveCountSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(field, `${field} ${result.error.issues[0]?.message ?? 'is invalid'}`);
  }
  return result.data;
}

function base(binary: Binary, serial: string | null): [Binary, ...string[]] {
  return serial ? [binary, '-s', serial] : [binary];
}

/**
 * Rejects any fastboot argv carrying a destructive subcommand. The value that
 * follows `-s` is a serial, not a subcommand, and is skipped.
 */
export function assertSafeCommand(argv: readonly string[]): void {
  if (argv[0] !== 'fastboot') {
    return;
  }

  for (let i = 1; i < argv.length; i++) {
    if (argv[i] === '-s') {
      i++;
      continue;
    }
    const token = argv[i].toLowerCase();
    if (DESTRUCTIVE_FASTBOOT_TOKENS.includes(token)) {
      throw new DestructiveCommandError(token, argv);
    }
  }
}

export function createCommandSpec(
  argv: readonly [Binary, ...string[]],
  policy: ExecutionPolicy = 'captured'
): CommandSpec {
  assertSafeCommand(argv);
  return { argv, policy };
}

function adbArgs(request: CommandRequest): string[] {
  switch (request.kind) {
    case 'getprop': {
      const { property } = parseInput(GetpropInputSchema, request);
      return ['shell', 'getprop', property];
    }
    case 'shell-id':
      return ['shell', 'id'];
    case 'shell-uptime':
      return ['shell', 'uptime'];
    case 'dumpsys': {
      const { service } = parseInput(DumpsysInputSchema, request);
      return ['shell', 'dumpsys', ...service];
    }
    case 'reboot-bootloader':
      return ['reboot', 'bootloader'];
    case 'logcat-dump': {
      const args = ['logcat', '-b', 'all', '-d'];
      if (request.tail !== undefined) {
        args.push('-t', String(parseCount('tail', request.tail)));
      }
      args.push('-v', 'time');
      if (request.tag !== undefined) {
        const { tag } = parseInput(LogcatTagInputSchema, request);
        args.push(`${tag}:V`, '*:S');
      }
      return args;
    }
    case 'logcat-crashes':
      return ['logcat', '-d', '-v', 'time', 'AndroidRuntime:E', '*:S'];
    case 'logcat-follow':
      return ['logcat', '-b', 'all', '-v', 'time'];
    case 'logcat-clear':
      return ['logcat', '-b', 'all', '-c'];
    case 'screenshot':
      return ['exec-out', 'screencap', '-p'];
    case 'screenrecord': {
      const { remotePath } = parseInput(RemotePathInputSchema, request);
      const duration = parseCount('durationSec', request.durationSec);
      return ['shell', 'screenrecord', '--time-limit', String(duration), remotePath];
    }
    case 'pull': {
      const { remotePath, localPath } = parseInput(PullInputSchema, request);
      return ['pull', remotePath, localPath];
    }
    case 'remove-remote': {
      const { remotePath } = parseInput(RemotePathInputSchema, request);
      return ['shell', 'rm', '-f', remotePath];
    }
    case 'install-apk': {
      const { apkPath } = parseInput(InstallApkInputSchema, request);
      return ['install', '-r', apkPath];
    }
    case 'clear-app-data': {
      const { packageName } = parseInput(ClearAppDataInputSchema, request);
      return ['shell', 'pm', 'clear', quoteForDeviceShell(packageName)];
    }
    case 'open-url': {
      const { url } = parseInput(OpenUrlInputSchema, request);
      return ['shell', 'am', 'start', '-a', 'android.intent.action.VIEW', '-d', quoteForDeviceShell(url)];
    }
    default:
      throw new Error(`Not an adb request: ${request.kind}`);
  }
}

function fastbootArgs(target: FastbootRebootTarget): string[] {
  switch (target) {
    case 'system':
      return ['reboot'];
    case 'bootloader':
      return ['reboot', 'bootloader'];
    case 'recovery':
      return ['reboot', 'recovery'];
    default: {
      const exhaust: never = target;
      throw new InvalidArgumentError('target', `Unknown reboot target: ${String(exhaust)}`);
    }
  }
}

/**
 * Builds the argv for a request. Device-scoped commands get `-s <serial>` when
 * a target is selected; the device listings never do.
 */
export function buildCommand(request: CommandRequest, serial: string | null): CommandSpec {
  switch (request.kind) {
    case 'list-adb-devices':
      return createCommandSpec(['adb', 'devices', '-l']);
    case 'list-fastboot-devices':
      return createCommandSpec(['fastboot', 'devices']);
    case 'fastboot-getvar-all':
      return createCommandSpec([...base('fastboot', serial), 'getvar', 'all']);
    case 'fastboot-reboot':
      return createCommandSpec([...base('fastboot', serial), ...fastbootArgs(request.target)]);
    case 'logcat-follow':
      return createCommandSpec([...base('adb', serial), ...adbArgs(request)], 'streamed');
    default:
      return createCommandSpec([...base('adb', serial), ...adbArgs(request)]);
  }
}

// Human-readable form for dry-run and log lines
export function describeCommand(spec: CommandSpec): string {
  return spec.argv.join(' ');
}
