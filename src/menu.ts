import { FastbootRebootTarget, LogcatView, MenuChoice } from './types';
import { Theme } from './utils/theme';

export interface MenuEntry<T> {
  key: string;
  label: string;
  value: T;
}

/** `null` renders as a blank separator line. */
export type MenuLayout<T> = ReadonlyArray<MenuEntry<T> | null>;

export type Back = { kind: 'back' };
const BACK: Back = { kind: 'back' };

export const MAIN_MENU: MenuLayout<MenuChoice> = [
  { key: '1', label: 'Status (adb/fastboot devices)', value: { kind: 'operation', operation: 'status' } },
  { key: '2', label: 'Write quick report', value: { kind: 'operation', operation: 'report' } },
  { key: '3', label: 'Reboot bootloader (adb)', value: { kind: 'operation', operation: 'reboot-bootloader' } },
  { key: '4', label: 'Logcat Lab', value: { kind: 'operation', operation: 'logcat-lab' } },
  null,
  { key: '5', label: 'Device Summary (props/battery/uptime)', value: { kind: 'operation', operation: 'device-summary' } },
  { key: '6', label: 'Screenrecord (pull to host)', value: { kind: 'operation', operation: 'screenrecord' } },
  { key: '7', label: 'Foreground app/activity', value: { kind: 'operation', operation: 'foreground-app' } },
  { key: '8', label: 'Install APK', value: { kind: 'operation', operation: 'install-apk' } },
  { key: '9', label: 'Clear app data', value: { kind: 'operation', operation: 'clear-app-data' } },
  { key: 'u', label: 'Open URL on device', value: { kind: 'operation', operation: 'open-url' } },
  { key: 's', label: 'Screenshot (pull to host)', value: { kind: 'operation', operation: 'screenshot' } },
  null,
  { key: 'fa', label: 'Fastboot getvar all', value: { kind: 'operation', operation: 'fastboot-getvar' } },
  { key: 'fr', label: 'Fastboot reboot menu', value: { kind: 'operation', operation: 'fastboot-reboot' } },
  null,
  { key: 't', label: 'Select target device', value: { kind: 'operation', operation: 'select-device' } },
  { key: 'd', label: 'Toggle dry-run', value: { kind: 'operation', operation: 'toggle-dry-run' } },
  { key: 'q', label: 'Quit', value: { kind: 'quit' } },
];

export const LOGCAT_MENU: MenuLayout<LogcatView | Back> = [
  { key: 'l1', label: 'Dump last 200 lines (all buffers)', value: 'dump-recent' },
  { key: 'l2', label: 'Live follow (all buffers)', value: 'follow' },
  { key: 'l3', label: 'Crashes only (AndroidRuntime)', value: 'crashes' },
  { key: 'l4', label: 'SELinux denials (avc)', value: 'selinux-denials' },
  { key: 'l5', label: 'Filter by tag', value: 'by-tag' },
  { key: 'l6', label: 'Filter by regex (host regex)', value: 'by-regex' },
  { key: 'l7', label: 'Save dump to file', value: 'save-dump' },
  { key: 'l8', label: 'Clear logcat buffers (confirm)', value: 'clear-buffers' },
  { key: 'b', label: 'Back', value: BACK },
];

export const FASTBOOT_REBOOT_MENU: MenuLayout<FastbootRebootTarget | Back> = [
  { key: 'f1', label: 'fastboot reboot', value: 'system' },
  { key: 'f2', label: 'fastboot reboot bootloader', value: 'bootloader' },
  { key: 'f3', label: 'fastboot reboot recovery', value: 'recovery' },
  { key: 'b', label: 'Back', value: BACK },
];

export function isBack(value: unknown): value is Back {
  return value === BACK;
}

// Input is trimmed and case-insensitive
export function parseMenuChoice<T>(layout: MenuLayout<T>, input: string): T | undefined {
  const key = input.trim().toLowerCase();
  return layout.find((entry): entry is MenuEntry<T> => entry !== null && entry.key === key)?.value;
}

export function renderMenu<T>(theme: Theme, layout: MenuLayout<T>, title: string): string {
  const lines = layout.map(entry => (entry ? theme.menuEntry(entry.key, entry.label) : ''));
  return theme.box(lines, theme.paint(title, 'highlight'));
}
