import { InvalidArgumentError } from '../types';

function splitLines(output: string): string[] {
  return output.split(/\r?\n/);
}

// SELinux denials carry "avc:" in the message
export function filterSelinuxDenials(output: string): string {
  return splitLines(output)
    .filter(line => line.toLowerCase().includes('avc:'))
    .join('\n');
}

export function compileFilter(pattern: string): RegExp {
  const trimmed = pattern.trim();
  if (!trimmed) {
    throw new InvalidArgumentError('regex', 'Regex must not be empty');
  }
  try {
    return new RegExp(trimmed);
  } catch (error) {
    throw new InvalidArgumentError(
      'regex',
      `Bad regex: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export function filterByRegex(output: string, regex: RegExp): string {
  return splitLines(output)
    .filter(line => regex.test(line))
    .join('\n');
}

const ACTIVITY_MARKERS = ['mResumedActivity', 'topResumedActivity'];
const WINDOW_MARKERS = ['mCurrentFocus', 'mFocusedApp'];

function linesWith(output: string, markers: string[]): string[] {
  return splitLines(output)
    .filter(line => markers.some(marker => line.includes(marker)))
    .map(line => line.trim());
}

// Lines of `dumpsys activity activities` naming the resumed activity
export function resumedActivityLines(output: string): string[] {
  return linesWith(output, ACTIVITY_MARKERS);
}

// Fallback for releases that word the activity dump differently
export function focusedWindowLines(output: string): string[] {
  return linesWith(output, WINDOW_MARKERS);
}
