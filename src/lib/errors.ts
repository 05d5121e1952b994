export class CrewError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CrewError';
  }
}

export class TmuxNotFoundError extends CrewError {
  constructor() {
    super(
      'tmux is not installed or not in PATH. Install it with your package manager (e.g. brew install tmux)',
      'TMUX_NOT_FOUND',
    );
    this.name = 'TmuxNotFoundError';
  }
}

export class NotGitRepoError extends CrewError {
  constructor(dir: string, detail?: string) {
    super(
      detail ? `Not a git repository: ${dir} (${detail})` : `Not a git repository: ${dir}`,
      'NOT_GIT_REPO',
    );
    this.name = 'NotGitRepoError';
  }
}

/**
 * Bootstrap-time failure. The session must not proceed past this point.
 */
export class InfrastructureError extends CrewError {
  constructor(step: string, cause: unknown) {
    super(`Session bootstrap failed while ${step}: ${errorMessage(cause)}`, 'INFRASTRUCTURE');
    this.name = 'InfrastructureError';
    this.cause = cause;
  }
}

export class GuardRejectedError extends CrewError {
  constructor(
    public readonly resourceKey: string,
    public readonly activeLabel: string,
  ) {
    super(`${activeLabel} already in progress for ${resourceKey}`, 'GUARD_REJECTED');
    this.name = 'GuardRejectedError';
  }
}

export interface ExternalCommandDetails {
  command: string;
  args: readonly string[];
  exitCode?: number;
  stderr: string;
}

export class ExternalCommandError extends CrewError {
  public readonly details: ExternalCommandDetails;

  constructor(context: string, details: ExternalCommandDetails) {
    const status = details.exitCode === undefined ? 'failed' : `exited with ${details.exitCode}`;
    const stderr = details.stderr.trim();
    super(
      `${context}: ${details.command} ${status}${stderr ? `: ${stderr}` : ''}`,
      'EXTERNAL_COMMAND_FAILED',
    );
    this.name = 'ExternalCommandError';
    this.details = details;
  }
}

export class StaleWorktreeError extends CrewError {
  constructor(branch: string, worktreePath: string, reason: string) {
    super(
      `Worktree for '${branch}' at ${worktreePath} is stale (${reason}). Run 'git worktree prune' and remove the directory before retrying.`,
      'STALE_WORKTREE',
    );
    this.name = 'StaleWorktreeError';
  }
}

export class SessionNotFoundError extends CrewError {
  constructor(name: string) {
    super(
      `No running tmux session named ${name}. Start one with 'crewmux start' or 'crewmux launch'.`,
      'SESSION_NOT_FOUND',
    );
    this.name = 'SessionNotFoundError';
  }
}

export class ExpertNotFoundError extends CrewError {
  constructor(ref: string) {
    super(`Expert not found: ${ref}`, 'EXPERT_NOT_FOUND');
    this.name = 'ExpertNotFoundError';
  }
}

export class ContextLockError extends CrewError {
  constructor(file: string) {
    super(
      `Could not acquire lock on ${file}. Another crewmux process may be writing it.`,
      'CONTEXT_LOCK',
    );
    this.name = 'ContextLockError';
  }
}

export class ContextCorruptError extends CrewError {
  constructor(file: string, detail: string) {
    super(`Corrupt context file ${file}: ${detail}`, 'CONTEXT_CORRUPT');
    this.name = 'ContextCorruptError';
  }
}

export class ReportInvalidError extends CrewError {
  constructor(file: string, detail: string) {
    super(`Invalid report file ${file}: ${detail}`, 'REPORT_INVALID');
    this.name = 'ReportInvalidError';
  }
}

export class ConfigError extends CrewError {
  constructor(file: string, detail: string) {
    super(`Invalid config file ${file}: ${detail}`, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
