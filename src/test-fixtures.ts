import type { PaneController, PaneInfo, AgentController } from './core/process-manager.js';
import type { ExpertContext } from './types/context.js';

export function makePaneInfo(overrides?: Partial<PaneInfo>): PaneInfo {
  return {
    index: 0,
    paneId: '%1',
    panePid: '12345',
    currentCommand: 'claude',
    isDead: false,
    ...overrides,
  };
}

export function makeContext(overrides?: Partial<ExpertContext>): ExpertContext {
  return {
    expertId: 0,
    expertName: 'architect',
    sessionHash: 'abcd1234',
    role: 'architect',
    knowledge: { filesAnalyzed: [], patternsDiscovered: [] },
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export interface PaneCall {
  method: 'exec' | 'sendKeys' | 'setPaneTitle';
  paneIndex: number;
  text: string;
}

/** In-memory stand-in for tmux. Screens are set per pane by the test. */
export class FakePaneController implements PaneController {
  readonly calls: PaneCall[] = [];
  readonly screens = new Map<number, string>();
  readonly panes = new Map<number, PaneInfo>();
  readonly env = new Map<string, string>();
  exists = true;
  created: { numPanes: number; cwd: string } | null = null;
  captureError: Error | null = null;

  constructor(readonly sessionName = 'crewmux-abcd1234') {}

  async sessionExists(): Promise<boolean> {
    return this.exists;
  }

  async createSession(numPanes: number, cwd: string): Promise<void> {
    this.created = { numPanes, cwd };
    this.exists = true;
    for (let i = 0; i < numPanes; i++) {
      this.panes.set(i, makePaneInfo({ index: i, paneId: `%${i}`, currentCommand: 'zsh' }));
    }
  }

  async killSession(): Promise<void> {
    this.exists = false;
    this.panes.clear();
  }

  async setPaneTitle(paneIndex: number, title: string): Promise<void> {
    this.calls.push({ method: 'setPaneTitle', paneIndex, text: title });
  }

  async exec(paneIndex: number, text: string): Promise<void> {
    this.calls.push({ method: 'exec', paneIndex, text });
  }

  async changeDirectory(paneIndex: number, dir: string): Promise<void> {
    this.calls.push({ method: 'exec', paneIndex, text: `cd ${dir}` });
  }

  async sendKeys(paneIndex: number, keys: string): Promise<void> {
    this.calls.push({ method: 'sendKeys', paneIndex, text: keys });
  }

  async capturePane(paneIndex: number): Promise<string> {
    if (this.captureError) throw this.captureError;
    return this.screens.get(paneIndex) ?? '';
  }

  async listPanes(): Promise<Map<number, PaneInfo>> {
    return new Map(this.panes);
  }

  async setEnv(key: string, value: string): Promise<void> {
    this.env.set(key, value);
  }

  async getEnv(key: string): Promise<string | null> {
    return this.env.get(key) ?? null;
  }

  callsFor(paneIndex: number): PaneCall[] {
    return this.calls.filter((c) => c.paneIndex === paneIndex);
  }
}

export interface AgentCall {
  method: 'launch' | 'sendExit' | 'sendInstruction' | 'waitForReady';
  expertId: number;
  arg?: string | number;
  settingsFile?: string;
}

/**
 * Records calls in order. `ready` decides what waitForReady resolves and
 * `sessionId` what captureSessionId finds on screen.
 */
export class FakeAgentController implements AgentController {
  readonly calls: AgentCall[] = [];
  ready = true;
  sessionId: string | null = null;
  exitError: Error | null = null;
  launchError: Error | null = null;

  async launch(expertId: number, workingDir: string, resumeToken?: string, settingsFile?: string): Promise<void> {
    const call: AgentCall = { method: 'launch', expertId, arg: resumeToken ? `${workingDir}#${resumeToken}` : workingDir };
    if (settingsFile) call.settingsFile = settingsFile;
    this.calls.push(call);
    if (this.launchError) throw this.launchError;
  }

  async captureSessionId(_expertId: number): Promise<string | null> {
    return this.sessionId;
  }

  async sendExit(expertId: number): Promise<void> {
    this.calls.push({ method: 'sendExit', expertId });
    if (this.exitError) throw this.exitError;
  }

  async sendInstruction(expertId: number, instruction: string): Promise<void> {
    this.calls.push({ method: 'sendInstruction', expertId, arg: instruction });
  }

  async waitForReady(expertId: number, timeoutMs: number): Promise<boolean> {
    this.calls.push({ method: 'waitForReady', expertId, arg: timeoutMs });
    return this.ready;
  }

  methods(): string[] {
    return this.calls.map((c) => c.method);
  }
}
