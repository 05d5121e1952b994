import readline from 'node:readline';
import type { InputSource, KeyEvent, Renderer, TowerView } from '../core/tower.js';
import { BOLD, DIM, RESET, formatStatus, namedColor, truncate } from '../lib/output.js';

const ENTER_ALT_SCREEN = '\x1b[?1049h\x1b[?25l';
const LEAVE_ALT_SCREEN = '\x1b[?1049l\x1b[?25h';
const HOME_AND_CLEAR = '\x1b[H\x1b[2J';

const HELP = 'j/k select  l launch  w worktree  r root  x reset  c role  q quit';

export interface KeypressStream {
  readonly isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'keypress', listener: (str: string | undefined, key: readline.Key | undefined) => void): unknown;
  off(event: 'keypress', listener: (str: string | undefined, key: readline.Key | undefined) => void): unknown;
}

/** Queues raw-mode keypresses until the tower drains them on its next tick. */
export class KeypressInput implements InputSource {
  private queue: KeyEvent[] = [];
  private active = false;

  constructor(private readonly stdin: KeypressStream & NodeJS.ReadableStream = process.stdin) {}

  start(): void {
    if (this.active) return;
    this.active = true;
    readline.emitKeypressEvents(this.stdin);
    this.stdin.setRawMode?.(true);
    this.stdin.on('keypress', this.onKeypress);
    this.stdin.resume();
  }

  drain(): KeyEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  stop(): void {
    if (!this.active) return;
    this.active = false;
    this.stdin.off('keypress', this.onKeypress);
    this.stdin.setRawMode?.(false);
    this.stdin.pause();
  }

  private readonly onKeypress = (str: string | undefined, key: readline.Key | undefined): void => {
    const event = toKeyEvent(str, key);
    if (event) this.queue.push(event);
  };
}

export function toKeyEvent(str: string | undefined, key: readline.Key | undefined): KeyEvent | null {
  const name = key?.name ?? str;
  if (!name) return null;
  const event: KeyEvent = { name };
  if (key?.ctrl) event.ctrl = true;
  if (str !== undefined && !key?.ctrl && !key?.meta) event.char = str;
  return event;
}

export function renderFrame(view: TowerView, width = 100): string {
  const lines: string[] = [];
  lines.push(`${BOLD}crewmux${RESET} ${view.sessionName}  ${DIM}${view.projectRoot}${RESET}`);
  lines.push('');

  const nameWidth = Math.max(...view.experts.map((e) => e.name.length), 4);
  const roleWidth = Math.max(...view.experts.map((e) => e.role.length), 4);
  for (const row of view.experts) {
    const cursor = row.id === view.selected ? '›' : ' ';
    const name = `${namedColor(row.color)}${row.name.padEnd(nameWidth)}${RESET}`;
    let line = `${cursor} ${row.id}  ${name}  ${row.role.padEnd(roleWidth)}  ${formatStatus(row.status)}`;
    if (row.branch) line += `  ${DIM}⎇ ${row.branch}${RESET}`;
    if (row.activity) line += `  ${DIM}(${row.activity})${RESET}`;
    lines.push(line);
  }

  lines.push('');
  lines.push(truncate(view.message, width));
  if (view.mode === 'branch-input') {
    lines.push(`Branch: ${view.input}_`);
  }
  lines.push(`${DIM}${HELP}${RESET}`);
  return lines.join('\n');
}

/** Draws the tower on the alternate screen. Repeated identical frames are skipped. */
export class AnsiRenderer implements Renderer {
  private entered = false;
  private lastFrame = '';

  constructor(
    private readonly write: (text: string) => void = (text) => {
      process.stdout.write(text);
    },
    private readonly columns: () => number = () => process.stdout.columns ?? 100,
  ) {}

  render(view: TowerView): void {
    if (!this.entered) {
      this.entered = true;
      this.write(ENTER_ALT_SCREEN);
    }
    const frame = renderFrame(view, this.columns());
    if (frame === this.lastFrame) return;
    this.lastFrame = frame;
    this.write(HOME_AND_CLEAR + frame);
  }

  restore(): void {
    if (!this.entered) return;
    this.entered = false;
    this.lastFrame = '';
    this.write(LEAVE_ALT_SCREEN);
  }
}
