import type { ExpertStatus } from '../types/expert.js';

export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const RED = '\x1b[31m';
export const GREEN = '\x1b[32m';
export const YELLOW = '\x1b[33m';
export const BLUE = '\x1b[34m';
export const MAGENTA = '\x1b[35m';
export const CYAN = '\x1b[36m';
export const WHITE = '\x1b[37m';
export const GRAY = '\x1b[90m';

const STATUS_COLORS: Record<ExpertStatus, string> = {
  pending: GRAY,
  starting: YELLOW,
  ready: CYAN,
  busy: GREEN,
  stuck: RED + BOLD,
  unknown: MAGENTA,
};

const STATUS_SYMBOLS: Record<ExpertStatus, string> = {
  pending: '○',
  starting: '◌',
  ready: '◎',
  busy: '●',
  stuck: '✗',
  unknown: '?',
};

const NAMED_COLORS: Record<string, string> = {
  red: RED,
  green: GREEN,
  yellow: YELLOW,
  blue: BLUE,
  magenta: MAGENTA,
  cyan: CYAN,
  white: WHITE,
  gray: GRAY,
};

export function formatStatus(status: ExpertStatus): string {
  return `${STATUS_COLORS[status]}${STATUS_SYMBOLS[status]} ${status}${RESET}`;
}

/** Maps a config color name ("red", "cyan", ...) to its escape code. Unknown names render uncolored. */
export function namedColor(name: string): string {
  return NAMED_COLORS[name.toLowerCase()] ?? '';
}

export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

/** Truncate to `max` characters, ending in "..." when shortened. Counts code points, not bytes. */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return chars.slice(0, Math.max(0, max - 3)).join('') + '...';
}

export function output(data: unknown, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(data);
  }
}

export function outputError(error: unknown, json: boolean): void {
  const message = error instanceof Error ? error.message : String(error);
  if (json) {
    const code = error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : 'UNKNOWN';
    console.error(JSON.stringify({ error: message, code }));
  } else {
    console.error(`${RED}Error:${RESET} ${message}`);
  }
}

export interface Column<Row> {
  header: string;
  key: keyof Row & string;
  width?: number;
  format?: (value: Row[keyof Row], row: Row) => string;
}

export function formatTable<Row extends object>(rows: Row[], columns: Column<Row>[]): string {
  if (rows.length === 0) return 'No results.';

  const cell = (row: Row, col: Column<Row>): string => {
    const value = row[col.key];
    return col.format ? col.format(value, row) : String(value ?? '');
  };

  const widths = columns.map((col) => {
    const maxDataLen = rows.reduce(
      (max, row) => Math.max(max, stripAnsi(cell(row, col)).length),
      0,
    );
    return col.width ?? Math.max(col.header.length, maxDataLen);
  });

  const header = columns
    .map((col, i) => `${BOLD}${col.header.padEnd(widths[i])}${RESET}`)
    .join('  ');

  const separator = widths.map((w) => DIM + '─'.repeat(w) + RESET).join('  ');

  const body = rows.map((row) =>
    columns
      .map((col, i) => {
        const val = cell(row, col);
        const padding = Math.max(0, widths[i] - stripAnsi(val).length);
        return val + ' '.repeat(padding);
      })
      .join('  '),
  ).join('\n');

  return `${header}\n${separator}\n${body}`;
}

export function info(message: string): void {
  console.log(`${CYAN}▸${RESET} ${message}`);
}

export function success(message: string): void {
  console.log(`${GREEN}✓${RESET} ${message}`);
}

export function warn(message: string): void {
  console.log(`${YELLOW}⚠${RESET} ${message}`);
}
