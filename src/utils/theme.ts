import pkg from '../../package.json';
import { Session } from '../types';
import { timeString } from './paths';

export type Tone = 'plain' | 'accent' | 'muted' | 'info' | 'success' | 'warn' | 'error' | 'highlight';

const ANSI_RESET = '\u001b[0m';
const ANSI_BOLD = '\u001b[1m';

const TONE_ANSI: Record<Tone, string | null> = {
  plain: null,
  accent: '\u001b[38;5;51m',
  muted: '\u001b[38;5;245m',
  info: '\u001b[38;5;141m',
  success: '\u001b[38;5;46m',
  warn: '\u001b[38;5;226m',
  error: '\u001b[38;5;196m',
  highlight: '\u001b[38;5;213m',
};

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

export function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

function padVisible(text: string, width: number): string {
  const missing = width - visibleLength(text);
  return missing > 0 ? `${text}${' '.repeat(missing)}` : text;
}

export interface Theme {
  useColor: boolean;
  paint: (text: string, tone?: Tone) => string;
  bold: (text: string) => string;
  box: (lines: string[], title?: string) => string;
  banner: () => string;
  statusLine: (session: Session, now: Date) => string;
  menuEntry: (key: string, label: string) => string;
}

export function createTheme(useColor: boolean): Theme {
  const paint = (text: string, tone: Tone = 'plain') => {
    const code = TONE_ANSI[tone];
    return useColor && code ? `${code}${text}${ANSI_RESET}` : text;
  };
  const bold = (text: string) => (useColor ? `${ANSI_BOLD}${text}${ANSI_RESET}` : text);

  // +- TITLE ----+
  // | line       |
  // +------------+
  const box = (lines: string[], title = '') => {
    const width = Math.max(0, ...lines.map(visibleLength), visibleLength(title));
    const top = title
      ? `+ ${title}${'-'.repeat(width + 1 - visibleLength(title))}+`
      : `+${'-'.repeat(width + 2)}+`;
    const bottom = `+${'-'.repeat(width + 2)}+`;
    return [top, ...lines.map(line => `| ${padVisible(line, width)} |`), bottom].join('\n');
  };

  return {
    useColor,
    paint,
    bold,
    box,
    banner: () =>
      box(
        [
          `${paint(bold('ANDROID WORKBENCH'), 'accent')} ${paint(`v${pkg.version}`, 'muted')}`,
          paint('adb / fastboot operator console', 'muted'),
        ],
        paint('WORKBENCH', 'info')
      ),
    statusLine: (session, now) => {
      const serial = session.serial ?? '(none)';
      const runState = session.dryRun ? paint('DRY', 'warn') : paint('LIVE', 'success');
      return `${paint('serial:', 'muted')} ${paint(serial, 'accent')}  ${paint('run:', 'muted')} ${runState}  ${paint(
        timeString(now),
        'muted'
      )}`;
    },
    menuEntry: (key, label) => `${paint(key, 'accent')} ${label}`,
  };
}
