export interface PaneInfo {
  /** Pane index inside window 0, which is also the expert id. */
  index: number;
  paneId: string;
  panePid: string;
  currentCommand: string;
  isDead: boolean;
  deadStatus?: number;
}

/**
 * Everything the rest of the system needs from the terminal multiplexer.
 * Panes are addressed by expert id; the implementation owns the target format.
 */
export interface PaneController {
  readonly sessionName: string;
  sessionExists(): Promise<boolean>;
  createSession(numPanes: number, cwd: string): Promise<void>;
  killSession(): Promise<void>;
  setPaneTitle(paneIndex: number, title: string): Promise<void>;
  /** Clear the input line, type the text literally, then press Enter. */
  exec(paneIndex: number, text: string): Promise<void>;
  changeDirectory(paneIndex: number, dir: string): Promise<void>;
  /** Send tmux key names or literal text without a trailing Enter. */
  sendKeys(paneIndex: number, keys: string, options?: { literal?: boolean }): Promise<void>;
  capturePane(paneIndex: number, lines?: number): Promise<string>;
  listPanes(): Promise<Map<number, PaneInfo>>;
  setEnv(key: string, value: string): Promise<void>;
  getEnv(key: string): Promise<string | null>;
}

/** Lifecycle of the agent process running inside one pane. */
export interface AgentController {
  /** `settingsFile` is passed with the agent's settings flag when given. */
  launch(expertId: number, workingDir: string, resumeToken?: string, settingsFile?: string): Promise<void>;
  sendExit(expertId: number): Promise<void>;
  sendInstruction(expertId: number, instruction: string): Promise<void>;
  /** Resolves `false` on timeout; never rejects for a slow agent. */
  waitForReady(expertId: number, timeoutMs: number): Promise<boolean>;
}
