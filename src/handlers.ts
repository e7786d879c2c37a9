import fs from 'fs';
import path from 'path';
import {
  CaptureResult,
  CommandSpec,
  InvalidArgumentError,
  LogcatView,
  NoDeviceSelectedError,
  Operation,
  ScreenrecordDurationSchema,
  ScreenshotCaptureError,
  Session,
  SubprocessFailureError,
} from './types';
import { FASTBOOT_REBOOT_MENU, LOGCAT_MENU, isBack, parseMenuChoice, renderMenu } from './menu';
import { CommandRequest, buildCommand, describeCommand } from './utils/commands';
import { availableDevices, describeDevice, parseDeviceList, pickByIndex } from './utils/devices';
import {
  compileFilter,
  filterByRegex,
  filterSelinuxDenials,
  focusedWindowLines,
  resumedActivityLines,
} from './utils/filters';
import { OutputSink, artifactFileName } from './utils/output';
import { resolvePath, timestampForFilename } from './utils/paths';
import { ProcessRunner } from './utils/process';
import { Prompter } from './utils/prompt';
import { Terminal } from './utils/terminal';

export interface HandlerContext {
  session: Session;
  runner: ProcessRunner;
  prompter: Prompter;
  terminal: Terminal;
  sink: OutputSink;
  clock: () => Date;
}

/** A handler returns a new session when it changes the target or the run mode. */
export type Handler = (ctx: HandlerContext) => Promise<Session | void>;

const LOGCAT_RECENT_LINES = 200;
const BATTERY_SUMMARY_LINES = 40;
const DEFAULT_RECORD_SECONDS = 15;

type PropertyRow = readonly [label: string, property: string];

const REPORT_PROPERTIES: readonly PropertyRow[] = [
  ['model', 'ro.product.model'],
  ['android', 'ro.build.version.release'],
  ['security_patch', 'ro.build.version.security_patch'],
  ['fingerprint', 'ro.build.fingerprint'],
  ['abi', 'ro.product.cpu.abi'],
  ['verifiedbootstate', 'ro.boot.verifiedbootstate'],
  ['flash.locked', 'ro.boot.flash.locked'],
  ['vbmeta.device_state', 'ro.boot.vbmeta.device_state'],
];

const SUMMARY_PROPERTIES: readonly PropertyRow[] = [
  ['model', 'ro.product.model'],
  ['android', 'ro.build.version.release'],
  ['security_patch', 'ro.build.version.security_patch'],
  ['abi', 'ro.product.cpu.abi'],
  ['fingerprint', 'ro.build.fingerprint'],
];

function requireSerial(session: Session): string {
  if (!session.serial) {
    throw new NoDeviceSelectedError();
  }
  return session.serial;
}

function text(data: Buffer): string {
  return data.toString('utf-8').trim();
}

function orNoOutput(value: string): string {
  return value || '(no output)';
}

function previewDryRun(terminal: Terminal, specs: CommandSpec[], target?: string): void {
  const redirect = target ? ` > ${target}` : '';
  for (const spec of specs) {
    terminal.print(`${terminal.theme.paint('Dry-run. Would run:', 'muted')} ${describeCommand(spec)}${redirect}`);
  }
}

export async function captureChecked(runner: ProcessRunner, spec: CommandSpec): Promise<CaptureResult> {
  const result = await runner.capture(spec);
  if (result.exitCode !== 0) {
    throw new SubprocessFailureError(spec.argv, result.exitCode, text(result.stdout), text(result.stderr));
  }
  return result;
}

async function captureText(runner: ProcessRunner, spec: CommandSpec): Promise<string> {
  return text((await captureChecked(runner, spec)).stdout);
}

// fastboot writes most of its answers to stderr
function combinedOutput(result: CaptureResult): string {
  return `${result.stdout.toString('utf-8')}${result.stderr.toString('utf-8')}`.trim();
}

async function runAndPrint(ctx: HandlerContext, request: CommandRequest, serial: string | null): Promise<void> {
  const spec = buildCommand(request, serial);
  if (ctx.session.dryRun) {
    previewDryRun(ctx.terminal, [spec]);
    return;
  }
  const result = await captureChecked(ctx.runner, spec);
  ctx.terminal.print(orNoOutput(text(result.stdout)));
  const stderr = text(result.stderr);
  if (stderr) {
    ctx.terminal.info(stderr);
  }
}

async function readProperties(
  ctx: HandlerContext,
  serial: string,
  rows: readonly PropertyRow[]
): Promise<string[]> {
  const lines: string[] = [];
  for (const [label, property] of rows) {
    const value = await captureText(ctx.runner, buildCommand({ kind: 'getprop', property }, serial));
    lines.push(`${label}: ${value}`);
  }
  return lines;
}

export async function selectDevice(
  deps: Pick<HandlerContext, 'runner' | 'prompter' | 'terminal'>
): Promise<string | null> {
  const spec = buildCommand({ kind: 'list-adb-devices' }, null);
  const devices = parseDeviceList(await captureText(deps.runner, spec));
  const ready = availableDevices(devices);

  for (const device of devices) {
    if (device.status !== 'device') {
      deps.terminal.warn(`${device.id} is ${device.status}`);
    }
  }

  if (ready.length === 0) {
    deps.terminal.warn('No authorized ADB device found.');
    return null;
  }
  if (ready.length === 1) {
    return ready[0].id;
  }

  deps.terminal.print('Multiple ADB devices detected:');
  ready.forEach((device, index) => deps.terminal.print(` ${index + 1}) ${describeDevice(device)}`));
  const picked = pickByIndex(ready, await deps.prompter.ask('Pick one: '));
  if (!picked) {
    deps.terminal.warn('No device selected.');
    return null;
  }
  return picked.id;
}

async function handleStatus(ctx: HandlerContext): Promise<void> {
  const adbSpec = buildCommand({ kind: 'list-adb-devices' }, null);
  const fastbootSpec = buildCommand({ kind: 'list-fastboot-devices' }, null);
  if (ctx.session.dryRun) {
    previewDryRun(ctx.terminal, [adbSpec, fastbootSpec]);
    return;
  }

  ctx.terminal.print('ADB devices:');
  ctx.terminal.print(orNoOutput(await captureText(ctx.runner, adbSpec)));
  ctx.terminal.print('');
  ctx.terminal.print('Fastboot devices:');
  ctx.terminal.print(orNoOutput(await captureText(ctx.runner, fastbootSpec)));
}

async function handleReport(ctx: HandlerContext): Promise<void> {
  const serial = requireSerial(ctx.session);
  const idSpec = buildCommand({ kind: 'shell-id' }, serial);
  if (ctx.session.dryRun) {
    previewDryRun(ctx.terminal, [
      ...REPORT_PROPERTIES.map(([, property]) => buildCommand({ kind: 'getprop', property }, serial)),
      idSpec,
    ]);
    return;
  }

  const lines = [
    `serial: ${serial}`,
    `when: ${ctx.clock().toISOString()}`,
    '',
    ...(await readProperties(ctx, serial, REPORT_PROPERTIES)),
    '',
    'id:',
    await captureText(ctx.runner, idSpec),
  ];

  const written = ctx.sink.writeText({ kind: 'report', serial, extension: 'txt' }, `${lines.join('\n')}\n`);
  ctx.terminal.success(`Wrote: ${written}`);
}

async function handleRebootBootloader(ctx: HandlerContext): Promise<void> {
  const serial = requireSerial(ctx.session);
  const spec = buildCommand({ kind: 'reboot-bootloader' }, serial);
  if (ctx.session.dryRun) {
    previewDryRun(ctx.terminal, [spec]);
    return;
  }
  ctx.terminal.info(`Running: ${describeCommand(spec)}`);
  const output = await captureText(ctx.runner, spec);
  if (output) {
    ctx.terminal.print(output);
  }
}

async function followLogcat(ctx: HandlerContext, serial: string): Promise<void> {
  const spec = buildCommand({ kind: 'logcat-follow' }, serial);
  if (ctx.session.dryRun) {
    previewDryRun(ctx.terminal, [spec]);
    return;
  }

  ctx.terminal.info('Streaming logcat. Ctrl+C to stop.');
  const result = await ctx.runner.stream(spec);
  if (result.interrupted) {
    ctx.terminal.info('Stopped following logcat.');
    return;
  }
  if (result.exitCode !== 0) {
    throw new SubprocessFailureError(spec.argv, result.exitCode);
  }
}

async function runLogcatView(ctx: HandlerContext, serial: string, view: LogcatView): Promise<void> {
  switch (view) {
    case 'follow':
      return followLogcat(ctx, serial);
    case 'dump-recent':
      return runAndPrint(ctx, { kind: 'logcat-dump', tail: LOGCAT_RECENT_LINES }, serial);
    case 'crashes':
      return runAndPrint(ctx, { kind: 'logcat-crashes' }, serial);
    case 'by-tag': {
      const tag = await ctx.prompter.ask('Tag (e.g. ActivityManager): ');
      return runAndPrint(ctx, { kind: 'logcat-dump', tag }, serial);
    }
    case 'selinux-denials':
    case 'by-regex':
    case 'save-dump': {
      // the regex is checked before anything runs
      const regex = view === 'by-regex' ? compileFilter(await ctx.prompter.ask('Regex: ')) : undefined;
      const spec = buildCommand({ kind: 'logcat-dump' }, serial);
      if (ctx.session.dryRun) {
        previewDryRun(ctx.terminal, [spec]);
        return;
      }

      const dump = (await captureChecked(ctx.runner, spec)).stdout.toString('utf-8');
      if (view === 'save-dump') {
        const written = ctx.sink.writeText({ kind: 'logcat', serial, extension: 'txt' }, dump);
        ctx.terminal.success(`Wrote: ${written}`);
        return;
      }
      const filtered = regex ? filterByRegex(dump, regex) : filterSelinuxDenials(dump);
      ctx.terminal.print(orNoOutput(filtered.trim()));
      return;
    }
    case 'clear-buffers': {
      const confirm = (await ctx.prompter.ask('This clears log buffers. Type YES to continue: ')).trim();
      if (confirm !== 'YES') {
        ctx.terminal.info('Cancelled.');
        return;
      }
      return runAndPrint(ctx, { kind: 'logcat-clear' }, serial);
    }
    default: {
      const exhaust: never = view;
      throw new InvalidArgumentError('view', `Unknown logcat view: ${String(exhaust)}`);
    }
  }
}

async function handleLogcatLab(ctx: HandlerContext): Promise<void> {
  const serial = requireSerial(ctx.session);
  ctx.terminal.print(renderMenu(ctx.terminal.theme, LOGCAT_MENU, 'LOGCAT LAB'));
  const answer = await ctx.prompter.ask(ctx.terminal.theme.paint('> ', 'highlight'));
  const view = parseMenuChoice(LOGCAT_MENU, answer);

  if (view === undefined) {
    ctx.terminal.warn(`Unknown choice: ${answer.trim()}`);
    return;
  }
  if (isBack(view)) {
    return;
  }
  await runLogcatView(ctx, serial, view);
}

async function handleDeviceSummary(ctx: HandlerContext): Promise<void> {
  const serial = requireSerial(ctx.session);
  const uptimeSpec = buildCommand({ kind: 'shell-uptime' }, serial);
  const batterySpec = buildCommand({ kind: 'dumpsys', service: ['battery'] }, serial);
  if (ctx.session.dryRun) {
    previewDryRun(ctx.terminal, [
      ...SUMMARY_PROPERTIES.map(([, property]) => buildCommand({ kind: 'getprop', property }, serial)),
      uptimeSpec,
      batterySpec,
    ]);
    return;
  }

  const properties = await readProperties(ctx, serial, SUMMARY_PROPERTIES);
  const uptime = await captureText(ctx.runner, uptimeSpec);
  const battery = await captureText(ctx.runner, batterySpec);

  const lines = [
    ...properties,
    '',
    'uptime:',
    uptime,
    '',
    'battery:',
    ...battery.split('\n').slice(0, BATTERY_SUMMARY_LINES).map(line => line.trimEnd()),
  ];
  ctx.terminal.print(ctx.terminal.theme.box(lines, ctx.terminal.theme.paint('DEVICE SUMMARY', 'highlight')));
}

export function parseRecordDuration(answer: string): number {
  const trimmed = answer.trim();
  return trimmed ? ScreenrecordDurationSchema.parse(trimmed) : DEFAULT_RECORD_SECONDS;
}

async function handleScreenrecord(ctx: HandlerContext): Promise<void> {
  const serial = requireSerial(ctx.session);
  const durationSec = parseRecordDuration(await ctx.prompter.ask('Duration seconds (max 180, default 15): '));
  const now = ctx.clock();
  const remotePath = `/sdcard/workbench-record-${timestampForFilename(now)}.mp4`;
  const artifact = { kind: 'screenrecord', serial, extension: 'mp4' } as const;
  const recordSpec = buildCommand({ kind: 'screenrecord', durationSec, remotePath }, serial);

  if (ctx.session.dryRun) {
    const preview = path.join(ctx.sink.directoryFor('screenrecord'), artifactFileName(artifact, now));
    previewDryRun(ctx.terminal, [recordSpec, buildCommand({ kind: 'pull', remotePath, localPath: preview }, serial)]);
    return;
  }

  const localPath = ctx.sink.reserve(artifact);
  ctx.terminal.info(`Recording for ${durationSec}s...`);
  // screenrecord exits non-zero on some builds even when the file is complete, so the pull still runs
  const recorded = await ctx.runner.capture(recordSpec);
  if (recorded.exitCode !== 0) {
    const stderr = text(recorded.stderr);
    ctx.terminal.warn(`screenrecord exited with code ${recorded.exitCode}${stderr ? `: ${stderr}` : ''}`);
  }

  await captureChecked(ctx.runner, buildCommand({ kind: 'pull', remotePath, localPath }, serial));
  ctx.terminal.success(`Wrote: ${localPath}`);

  const removed = await ctx.runner.capture(buildCommand({ kind: 'remove-remote', remotePath }, serial));
  if (removed.exitCode !== 0) {
    ctx.terminal.warn(`Could not remove ${remotePath} from the device`);
  }
}

async function handleForegroundApp(ctx: HandlerContext): Promise<void> {
  const serial = requireSerial(ctx.session);
  const activitySpec = buildCommand({ kind: 'dumpsys', service: ['activity', 'activities'] }, serial);
  const windowSpec = buildCommand({ kind: 'dumpsys', service: ['window'] }, serial);
  if (ctx.session.dryRun) {
    previewDryRun(ctx.terminal, [activitySpec, windowSpec]);
    return;
  }

  let hits = resumedActivityLines(await captureText(ctx.runner, activitySpec));
  if (hits.length === 0) {
    hits = focusedWindowLines(await captureText(ctx.runner, windowSpec));
  }

  const lines = hits.length > 0 ? hits : ['(No foreground activity line found; dumpsys output format may differ.)'];
  ctx.terminal.print(ctx.terminal.theme.box(lines, ctx.terminal.theme.paint('FOREGROUND', 'highlight')));
}

async function handleInstallApk(ctx: HandlerContext): Promise<void> {
  const serial = requireSerial(ctx.session);
  const answer = (await ctx.prompter.ask('Path to APK (e.g. ~/Downloads/app.apk): ')).trim();
  const apkPath = answer ? resolvePath(answer) : answer;
  const spec = buildCommand({ kind: 'install-apk', apkPath }, serial);

  if (!fs.existsSync(apkPath)) {
    throw new InvalidArgumentError('apkPath', `Not found: ${apkPath}`);
  }
  if (ctx.session.dryRun) {
    previewDryRun(ctx.terminal, [spec]);
    return;
  }

  const result = await captureChecked(ctx.runner, spec);
  ctx.terminal.print(orNoOutput(text(result.stdout)));
  const stderr = text(result.stderr);
  if (stderr) {
    ctx.terminal.info(stderr);
  }
}

async function handleClearAppData(ctx: HandlerContext): Promise<void> {
  const serial = requireSerial(ctx.session);
  const packageName = await ctx.prompter.ask('Package to clear (e.g. com.example.app): ');
  await runAndPrint(ctx, { kind: 'clear-app-data', packageName }, serial);
}

async function handleOpenUrl(ctx: HandlerContext): Promise<void> {
  const serial = requireSerial(ctx.session);
  const url = await ctx.prompter.ask('URL (https://...): ');
  await runAndPrint(ctx, { kind: 'open-url', url }, serial);
}

async function handleScreenshot(ctx: HandlerContext): Promise<void> {
  const serial = requireSerial(ctx.session);
  const spec = buildCommand({ kind: 'screenshot' }, serial);
  const artifact = { kind: 'screenshot', serial, extension: 'png' } as const;

  if (ctx.session.dryRun) {
    const preview = path.join(ctx.sink.directoryFor('screenshot'), artifactFileName(artifact, ctx.clock()));
    previewDryRun(ctx.terminal, [spec], preview);
    return;
  }

  // exec-out hands back the PNG bytes on stdout
  const result = await captureChecked(ctx.runner, spec);
  if (result.stdout.length === 0) {
    throw new ScreenshotCaptureError(serial);
  }
  const written = ctx.sink.writeBytes(artifact, result.stdout);
  ctx.terminal.success(`Wrote: ${written}`);
}

async function handleFastbootGetvar(ctx: HandlerContext): Promise<void> {
  const spec = buildCommand({ kind: 'fastboot-getvar-all' }, ctx.session.serial);
  if (ctx.session.dryRun) {
    previewDryRun(ctx.terminal, [spec]);
    return;
  }
  const result = await captureChecked(ctx.runner, spec);
  ctx.terminal.print(orNoOutput(combinedOutput(result)));
}

async function handleFastbootReboot(ctx: HandlerContext): Promise<void> {
  ctx.terminal.print(renderMenu(ctx.terminal.theme, FASTBOOT_REBOOT_MENU, 'FASTBOOT REBOOT'));
  const answer = await ctx.prompter.ask(ctx.terminal.theme.paint('> ', 'highlight'));
  const target = parseMenuChoice(FASTBOOT_REBOOT_MENU, answer);

  if (target === undefined) {
    ctx.terminal.warn(`Unknown choice: ${answer.trim()}`);
    return;
  }
  if (isBack(target)) {
    return;
  }

  const spec = buildCommand({ kind: 'fastboot-reboot', target }, ctx.session.serial);
  if (ctx.session.dryRun) {
    previewDryRun(ctx.terminal, [spec]);
    return;
  }
  const result = await captureChecked(ctx.runner, spec);
  ctx.terminal.print(orNoOutput(combinedOutput(result)));
}

async function handleSelectDevice(ctx: HandlerContext): Promise<Session> {
  const serial = await selectDevice(ctx);
  if (!serial) {
    if (ctx.session.serial) {
      ctx.terminal.warn(`Keeping current target: ${ctx.session.serial}`);
    }
    return ctx.session;
  }
  ctx.terminal.success(`Target: ${serial}`);
  return { ...ctx.session, serial };
}

async function handleToggleDryRun(ctx: HandlerContext): Promise<Session> {
  return { ...ctx.session, dryRun: !ctx.session.dryRun };
}

export const HANDLERS: { readonly [K in Operation]: Handler } = {
  status: handleStatus,
  report: handleReport,
  'reboot-bootloader': handleRebootBootloader,
  'logcat-lab': handleLogcatLab,
  'device-summary': handleDeviceSummary,
  screenrecord: handleScreenrecord,
  'foreground-app': handleForegroundApp,
  'install-apk': handleInstallApk,
  'clear-app-data': handleClearAppData,
  'open-url': handleOpenUrl,
  screenshot: handleScreenshot,
  'fastboot-getvar': handleFastbootGetvar,
  'fastboot-reboot': handleFastbootReboot,
  'select-device': handleSelectDevice,
  'toggle-dry-run': handleToggleDryRun,
};
