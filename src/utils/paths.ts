import os from 'os';
import path from 'path';

export function workbenchHome(): string {
  return path.join(os.homedir(), 'scripts');
}

export function defaultMediaDir(): string {
  return path.join(workbenchHome(), 'android_media');
}

export function defaultReportDir(): string {
  return path.join(workbenchHome(), 'android-reports');
}

export function defaultLogDir(): string {
  return path.join(workbenchHome(), 'android_logs');
}

export function resolvePath(value: string): string {
  if (value === '~' || value.startsWith('~/')) {
    return path.resolve(path.join(os.homedir(), value.slice(1)));
  }
  return path.resolve(value);
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

// 20240131-235959
export function timestampForFilename(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-${pad(
    date.getHours()
  )}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function timeString(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
