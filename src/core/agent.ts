import type { AgentCommandConfig } from '../types/config.js';
import { shellQuote } from '../lib/shell.js';
import type { AgentController, PaneController } from './process-manager.js';

export const READY_POLL_MS = 500;
export const INSTRUCTION_CHUNK_SIZE = 200;
export const INSTRUCTION_CHUNK_DELAY_MS = 50;

export interface Clock {
  sleep(ms: number): Promise<void>;
  now(): number;
}

export const systemClock: Clock = {
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  now: () => Date.now(),
};

const SESSION_ID_PATTERNS = [
  /Session:\s*([a-zA-Z0-9_-]+)/,
  /session[:\s]+([a-f0-9-]{36})/i,
];

/**
 * Build the shell line typed into a pane to start an agent in `workingDir`.
 * CLAUDECODE is unset so a nested agent does not think it is a subprocess.
 */
export function buildLaunchCommand(
  agent: AgentCommandConfig,
  workingDir: string,
  resumeToken?: string,
  settingsFile?: string,
): string {
  const args = [...agent.args];
  if (settingsFile) {
    args.push(agent.settingsFlag, shellQuote(settingsFile));
  }
  if (resumeToken) {
    args.push(agent.resumeFlag, shellQuote(resumeToken));
  }
  const command = [agent.command, ...args].join(' ');
  return `unset CLAUDECODE; cd ${shellQuote(workingDir)} && ${command}`;
}

/** Split by code point so a chunk boundary never cuts a surrogate pair. */
export function chunkText(text: string, size: number): string[] {
  const chars = Array.from(text);
  const chunks: string[] = [];
  for (let i = 0; i < chars.length; i += size) {
    chunks.push(chars.slice(i, i + size).join(''));
  }
  return chunks;
}

export class AgentManager implements AgentController {
  constructor(
    private readonly panes: PaneController,
    private readonly agent: Readonly<AgentCommandConfig>,
    private readonly clock: Clock = systemClock,
  ) {}

  async launch(expertId: number, workingDir: string, resumeToken?: string, settingsFile?: string): Promise<void> {
    await this.panes.exec(expertId, buildLaunchCommand(this.agent, workingDir, resumeToken, settingsFile));
  }

  async sendExit(expertId: number): Promise<void> {
    await this.panes.exec(expertId, this.agent.exitCommand);
  }

  /**
   * Types the instruction in fixed-size literal chunks with a short pause
   * between them, then submits. Large single pastes get dropped by some
   * agent TUIs.
   */
  async sendInstruction(expertId: number, instruction: string): Promise<void> {
    for (const chunk of chunkText(instruction, INSTRUCTION_CHUNK_SIZE)) {
      await this.panes.sendKeys(expertId, chunk, { literal: true });
      await this.clock.sleep(INSTRUCTION_CHUNK_DELAY_MS);
    }
    await this.panes.sendKeys(expertId, 'Enter');
  }

  async waitForReady(expertId: number, timeoutMs: number): Promise<boolean> {
    const deadline = this.clock.now() + timeoutMs;
    while (this.clock.now() < deadline) {
      if (await this.isReady(expertId)) return true;
      await this.clock.sleep(READY_POLL_MS);
    }
    return false;
  }

  async captureSessionId(expertId: number): Promise<string | null> {
    let content: string;
    try {
      content = await this.panes.capturePane(expertId);
    } catch {
      return null;
    }
    for (const pattern of SESSION_ID_PATTERNS) {
      const match = pattern.exec(content);
      if (match?.[1]) return match[1];
    }
    return null;
  }

  private async isReady(expertId: number): Promise<boolean> {
    try {
      const content = await this.panes.capturePane(expertId);
      return content.includes(this.agent.readyPattern);
    } catch {
      // Pane may still be spawning; a capture failure is "not yet"
      return false;
    }
  }
}
