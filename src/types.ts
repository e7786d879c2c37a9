import { z } from 'zod';

export type Binary = 'adb' | 'fastboot';

// How the process runner treats the child's stdio
export type ExecutionPolicy = 'captured' | 'streamed';

export interface CommandSpec {
  readonly argv: readonly [Binary, ...string[]];
  readonly policy: ExecutionPolicy;
}

export interface CaptureResult {
  exitCode: number;
  stdout: Buffer;
  stderr: Buffer;
}

export interface StreamResult {
  exitCode: number;
  interrupted: boolean;
}

// Device information parsed from `adb devices -l`
export interface AndroidDevice {
  id: string;
  status: 'device' | 'offline' | 'unauthorized' | 'recovery' | 'sideload' | 'bootloader' | 'unknown';
  model?: string;
  product?: string;
  transportId?: string;
  usb?: string;
}

/**
 * Session configuration handed to every handler. Handlers that change the
 * target or the dry-run flag return a new value instead of mutating this one.
 */
export interface Session {
  readonly serial: string | null;
  readonly dryRun: boolean;
}

export type Operation =
  | 'status'
  | 'report'
  | 'reboot-bootloader'
  | 'logcat-lab'
  | 'device-summary'
  | 'screenrecord'
  | 'foreground-app'
  | 'install-apk'
  | 'clear-app-data'
  | 'open-url'
  | 'screenshot'
  | 'fastboot-getvar'
  | 'fastboot-reboot'
  | 'select-device'
  | 'toggle-dry-run';

export type MenuChoice = { kind: 'operation'; operation: Operation } | { kind: 'quit' };

export type LogcatView =
  | 'dump-recent'
  | 'follow'
  | 'crashes'
  | 'selinux-denials'
  | 'by-tag'
  | 'by-regex'
  | 'save-dump'
  | 'clear-buffers';

export type FastbootRebootTarget = 'system' | 'bootloader' | 'recovery';

export type ArtifactKind = 'screenshot' | 'screenrecord' | 'report' | 'logcat';

// Error handling
export interface WorkbenchErrorShape {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
}

export class WorkbenchError extends Error implements WorkbenchErrorShape {
  code: string;
  details?: Record<string, unknown>;
  suggestion?: string;

  constructor(code: string, message: string, details?: Record<string, unknown>, suggestion?: string) {
    super(message);
    this.name = 'WorkbenchError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
  }
}

export class InvalidArgumentError extends WorkbenchError {
  constructor(field: string, message: string) {
    super('INVALID_ARGUMENT', message, { field });
    this.name = 'InvalidArgumentError';
  }
}

export class SubprocessFailureError extends WorkbenchError {
  readonly exitCode: number;

  constructor(argv: readonly string[], exitCode: number, stdout = '', stderr = '') {
    super('SUBPROCESS_FAILURE', `${argv[0]} exited with code ${exitCode}`, {
      command: argv.join(' '),
      stdout,
      stderr,
    });
    this.name = 'SubprocessFailureError';
    this.exitCode = exitCode;
  }
}

export class WriteError extends WorkbenchError {
  constructor(targetPath: string, originalError?: Error) {
    super(
      'WRITE_ERROR',
      `Cannot write to '${targetPath}'`,
      { path: targetPath, originalError: originalError?.message },
      'Check that the output directory exists and is writable, or pass another one with --media-dir / --report-dir / --log-dir'
    );
    this.name = 'WriteError';
  }
}

export class UnresolvedBinaryError extends WorkbenchError {
  constructor(binary: string) {
    super(
      'UNRESOLVED_BINARY',
      `'${binary}' was not found on PATH`,
      { binary },
      'Install Android SDK Platform Tools and ensure adb and fastboot are in your PATH'
    );
    this.name = 'UnresolvedBinaryError';
  }
}

export class DestructiveCommandError extends WorkbenchError {
  constructor(token: string, argv: readonly string[]) {
    super(
      'DESTRUCTIVE_COMMAND_BLOCKED',
      `Refusing to build a fastboot command containing '${token}'`,
      { command: argv.join(' ') }
    );
    this.name = 'DestructiveCommandError';
  }
}

export class NoDeviceSelectedError extends WorkbenchError {
  constructor() {
    super(
      'NO_DEVICE_SELECTED',
      'No ADB serial selected',
      undefined,
      'Connect an authorized device booted into Android, then pick it with "t"'
    );
    this.name = 'NoDeviceSelectedError';
  }
}

export class ScreenshotCaptureError extends WorkbenchError {
  constructor(serial: string) {
    super(
      'SCREENSHOT_CAPTURE_FAILED',
      `screencap on '${serial}' returned no image data`,
      { serial },
      'Please ensure the device is connected and screen is unlocked'
    );
    this.name = 'ScreenshotCaptureError';
  }
}

// Input schemas for values typed at the prompts
const requiredText = (label: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${label} must not be empty` });

export const InstallApkInputSchema = z.object({
  apkPath: requiredText('APK path'),
});

export const ClearAppDataInputSchema = z.object({
  packageName: requiredText('Package name'),
});

export const OpenUrlInputSchema = z.object({
  url: requiredText('URL'),
});

export const LogcatTagInputSchema = z.object({
  tag: requiredText('Tag'),
});

export const RemotePathInputSchema = z.object({
  remotePath: requiredText('Device path'),
});

export const PullInputSchema = z.object({
  remotePath: requiredText('Device path'),
  localPath: requiredText('Host path'),
});

export const GetpropInputSchema = z.object({
  property: requiredText('Property name'),
});

export const DumpsysInputSchema = z.object({
  service: z.array(requiredText('dumpsys argument')).min(1, { message: 'dumpsys needs a service name' }),
});

export const PositiveCountSchema = z
  .number()
  .int({ message: 'must be a whole number' })
  .positive({ message: 'must be greater than zero' });

export const ScreenrecordDurationSchema = z.coerce.number().int().catch(15).transform(value => {
  return Math.max(1, Math.min(180, value));
});

export const WorkbenchConfigSchema = z.object({
  serial: z.string().trim().min(1).optional(),
  dryRun: z.boolean().default(false),
  mediaDir: z.string().min(1),
  reportDir: z.string().min(1),
  logDir: z.string().min(1),
  color: z.boolean().default(true),
  verbose: z.boolean().default(false),
});

export type WorkbenchConfig = z.infer<typeof WorkbenchConfigSchema>;
