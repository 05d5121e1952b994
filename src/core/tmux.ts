import { execa, ExecaError } from 'execa';
import { ExternalCommandError, TmuxNotFoundError } from '../lib/errors.js';
import { execaEnv } from '../lib/env.js';
import { shellQuote } from '../lib/shell.js';
import type { PaneController, PaneInfo } from './process-manager.js';

export const ENV_PROJECT_PATH = 'CREWMUX_PROJECT_PATH';
export const ENV_NUM_EXPERTS = 'CREWMUX_NUM_EXPERTS';
export const ENV_CREATED_AT = 'CREWMUX_CREATED_AT';

export interface SessionInfo {
  sessionName: string;
  projectPath: string;
  numExperts: number;
  createdAt: string;
}

export async function checkTmux(): Promise<void> {
  try {
    await execa('tmux', ['-V'], execaEnv);
  } catch {
    throw new TmuxNotFoundError();
  }
}

async function tmux(context: string, args: string[]): Promise<string> {
  try {
    const result = await execa('tmux', args, execaEnv);
    return result.stdout;
  } catch (err) {
    if (err instanceof ExecaError) {
      throw new ExternalCommandError(context, {
        command: 'tmux',
        args,
        exitCode: err.exitCode,
        stderr: String(err.stderr ?? ''),
      });
    }
    throw err;
  }
}

export class TmuxManager implements PaneController {
  constructor(readonly sessionName: string) {}

  /** All experts live in window 0; pane N belongs to expert N. */
  paneTarget(paneIndex: number): string {
    return `${this.sessionName}:0.${paneIndex}`;
  }

  async sessionExists(): Promise<boolean> {
    try {
      // '=' forces an exact match so 'crewmux-ab' never matches 'crewmux-abcd'
      await execa('tmux', ['has-session', '-t', `=${this.sessionName}`], execaEnv);
      return true;
    } catch {
      return false;
    }
  }

  async createSession(numPanes: number, cwd: string): Promise<void> {
    await tmux('create tmux session', [
      'new-session', '-d', '-s', this.sessionName, '-c', cwd, '-x', '220', '-y', '50',
    ]);
    await tmux('set mouse mode', ['set-option', '-t', this.sessionName, 'mouse', 'on']);
    for (let i = 1; i < numPanes; i++) {
      await tmux(`create pane ${i}`, ['split-window', '-t', `${this.sessionName}:0`, '-c', cwd]);
      // Re-tile after each split so later splits always have room
      await tmux('tile panes', ['select-layout', '-t', `${this.sessionName}:0`, 'tiled']);
    }
  }

  async killSession(): Promise<void> {
    await tmux('kill tmux session', ['kill-session', '-t', `=${this.sessionName}`]);
  }

  async setPaneTitle(paneIndex: number, title: string): Promise<void> {
    await tmux(`set title of pane ${paneIndex}`, ['select-pane', '-t', this.paneTarget(paneIndex), '-T', title]);
  }

  async exec(paneIndex: number, text: string): Promise<void> {
    const target = this.paneTarget(paneIndex);
    await tmux(`clear input of pane ${paneIndex}`, ['send-keys', '-t', target, 'C-u']);
    // Literal text, then Enter as a key name: '-l' with '\n' inserts a newline
    // in the agent's prompt instead of submitting it. '--' keeps a leading '-'
    // in the text from being parsed as a flag.
    await tmux(`send-keys to pane ${paneIndex}`, ['send-keys', '-t', target, '-l', '--', text]);
    await tmux(`send Enter to pane ${paneIndex}`, ['send-keys', '-t', target, 'Enter']);
  }

  async changeDirectory(paneIndex: number, dir: string): Promise<void> {
    await this.exec(paneIndex, `cd ${shellQuote(dir)}`);
  }

  async sendKeys(paneIndex: number, keys: string, options: { literal?: boolean } = {}): Promise<void> {
    const args = ['send-keys', '-t', this.paneTarget(paneIndex)];
    if (options.literal) args.push('-l', '--');
    args.push(keys);
    await tmux(`send-keys to pane ${paneIndex}`, args);
  }

  async capturePane(paneIndex: number, lines?: number): Promise<string> {
    const args = ['capture-pane', '-t', this.paneTarget(paneIndex), '-p'];
    if (lines) {
      args.push('-S', `-${lines}`);
    }
    return tmux(`capture-pane ${paneIndex}`, args);
  }

  /**
   * One tmux call for every pane of window 0. A missing session yields an
   * empty map, which the detector reads as "pane missing".
   */
  async listPanes(): Promise<Map<number, PaneInfo>> {
    const map = new Map<number, PaneInfo>();
    let stdout: string;
    try {
      const result = await execa('tmux', [
        'list-panes',
        '-t', `${this.sessionName}:0`,
        '-F', '#{pane_index}|#{pane_id}|#{pane_pid}|#{pane_current_command}|#{pane_dead}|#{pane_dead_status}',
      ], execaEnv);
      stdout = result.stdout;
    } catch {
      return map;
    }
    for (const line of stdout.trim().split('\n').filter(Boolean)) {
      const info = parsePaneLine(line);
      if (info) map.set(info.index, info);
    }
    return map;
  }

  async setEnv(key: string, value: string): Promise<void> {
    await tmux(`set session env ${key}`, ['setenv', '-t', this.sessionName, key, value]);
  }

  async getEnv(key: string): Promise<string | null> {
    try {
      const result = await execa('tmux', ['showenv', '-t', this.sessionName, key], execaEnv);
      const prefix = `${key}=`;
      const line = result.stdout.trim();
      return line.startsWith(prefix) ? line.slice(prefix.length) : null;
    } catch {
      return null;
    }
  }

  async initSessionMetadata(projectPath: string, numExperts: number): Promise<void> {
    await this.setEnv(ENV_PROJECT_PATH, projectPath);
    await this.setEnv(ENV_NUM_EXPERTS, String(numExperts));
    await this.setEnv(ENV_CREATED_AT, new Date().toISOString());
  }

  async sessionInfo(): Promise<SessionInfo> {
    const numExperts = Number(await this.getEnv(ENV_NUM_EXPERTS));
    return {
      sessionName: this.sessionName,
      projectPath: (await this.getEnv(ENV_PROJECT_PATH)) ?? 'unknown',
      numExperts: Number.isInteger(numExperts) ? numExperts : 0,
      createdAt: (await this.getEnv(ENV_CREATED_AT)) ?? '',
    };
  }

  /** Every running session whose name starts with `<prefix>-`. No tmux server means none. */
  static async listCrewSessions(prefix: string): Promise<SessionInfo[]> {
    let stdout: string;
    try {
      const result = await execa('tmux', ['list-sessions', '-F', '#{session_name}'], execaEnv);
      stdout = result.stdout;
    } catch {
      return [];
    }
    const sessions: SessionInfo[] = [];
    for (const name of stdout.trim().split('\n').filter(Boolean)) {
      if (!name.startsWith(`${prefix}-`)) continue;
      sessions.push(await new TmuxManager(name).sessionInfo());
    }
    return sessions;
  }
}

export function parsePaneLine(line: string): PaneInfo | null {
  const [index, paneId, panePid, currentCommand, dead, deadStatus] = line.split('|');
  const paneIndex = Number(index);
  if (!Number.isInteger(paneIndex) || paneId === undefined) return null;
  return {
    index: paneIndex,
    paneId,
    panePid: panePid ?? '',
    currentCommand: currentCommand ?? '',
    isDead: dead === '1',
    deadStatus: deadStatus ? parseInt(deadStatus, 10) : undefined,
  };
}
