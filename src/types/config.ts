export interface ExpertConfig {
  name: string;
  role: string;
  color: string;
}

export interface TimeoutConfig {
  /** Seconds to wait for the agent's ready prompt after launch. */
  agentReady: number;
  /** Seconds to wait after asking an agent to exit before reusing its pane. */
  gracefulShutdown: number;
  /** Seconds a `processing` marker may stay unchanged before the expert is reported stuck. */
  stuckAfter: number;
}

export interface AgentCommandConfig {
  command: string;
  args: string[];
  resumeFlag: string;
  readyPattern: string;
  exitCommand: string;
  /** Flag that hands the agent a settings file. */
  settingsFlag: string;
  /** Install hooks that write the status marker on prompt submit and on stop. */
  statusHooks: boolean;
}

export interface Config {
  sessionPrefix: string;
  numExperts: number;
  experts: ExpertConfig[];
  timeouts: TimeoutConfig;
  agent: AgentCommandConfig;
  tickMs: number;
  statusRefreshMs: number;
}

/**
 * Everything a session needs, fixed at bootstrap. Shared by every background
 * operation and never mutated afterwards.
 */
export interface SessionConfig {
  readonly projectRoot: string;
  readonly sessionHash: string;
  readonly sessionName: string;
  readonly experts: readonly Readonly<ExpertConfig>[];
  readonly timeouts: Readonly<TimeoutConfig>;
  readonly agent: Readonly<AgentCommandConfig>;
  readonly tickMs: number;
  readonly statusRefreshMs: number;
}
