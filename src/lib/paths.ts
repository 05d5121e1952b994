import os from 'node:os';
import path from 'node:path';

export const DATA_DIR = '.crewmux';

export function globalConfigPath(): string {
  return path.join(os.homedir(), '.config', 'crewmux', 'config.yaml');
}

/** Session data root. Worktrees alias back to this directory. */
export function dataDir(projectRoot: string): string {
  return path.join(projectRoot, DATA_DIR);
}

export function configPath(projectRoot: string): string {
  return path.join(dataDir(projectRoot), 'config.yaml');
}

export function queueDir(projectRoot: string): string {
  return path.join(dataDir(projectRoot), 'queue');
}

export function statusDir(projectRoot: string): string {
  return path.join(queueDir(projectRoot), 'status');
}

export function statusFile(projectRoot: string, expertId: number): string {
  return path.join(statusDir(projectRoot), `expert${expertId}`);
}

export function reportsDir(projectRoot: string): string {
  return path.join(queueDir(projectRoot), 'reports');
}

export function reportFile(projectRoot: string, expertId: number): string {
  return path.join(reportsDir(projectRoot), `expert${expertId}_report.yaml`);
}

export function renderedInstructionsDir(projectRoot: string): string {
  return path.join(queueDir(projectRoot), 'instructions');
}

export function renderedInstructionFile(projectRoot: string, expertId: number): string {
  return path.join(renderedInstructionsDir(projectRoot), `expert${expertId}.md`);
}

export function hooksSettingsDir(projectRoot: string): string {
  return path.join(queueDir(projectRoot), 'settings');
}

export function hooksSettingsFile(projectRoot: string, expertId: number): string {
  return path.join(hooksSettingsDir(projectRoot), `expert${expertId}.json`);
}

export function sessionsDir(queuePath: string): string {
  return path.join(queuePath, 'sessions');
}

export function sessionDir(queuePath: string, sessionHash: string): string {
  return path.join(sessionsDir(queuePath), sessionHash);
}

export function expertContextDir(queuePath: string, sessionHash: string, expertId: number): string {
  return path.join(sessionDir(queuePath, sessionHash), 'experts', `expert${expertId}`);
}

export function expertContextFile(queuePath: string, sessionHash: string, expertId: number): string {
  return path.join(expertContextDir(queuePath, sessionHash, expertId), 'context.yaml');
}

export function sharedContextDir(queuePath: string, sessionHash: string): string {
  return path.join(sessionDir(queuePath, sessionHash), 'shared');
}

export function sharedContextFile(queuePath: string, sessionHash: string): string {
  return path.join(sharedContextDir(queuePath, sessionHash), 'decisions.yaml');
}

export function sessionRolesFile(queuePath: string, sessionHash: string): string {
  return path.join(sessionDir(queuePath, sessionHash), 'expert_roles.yaml');
}

export function instructionsDir(projectRoot: string): string {
  return path.join(dataDir(projectRoot), 'instructions');
}

export function logsDir(projectRoot: string): string {
  return path.join(dataDir(projectRoot), 'logs');
}

export function logFile(projectRoot: string, name: string): string {
  return path.join(logsDir(projectRoot), `${name}.log`);
}

export function worktreeBaseDir(projectRoot: string): string {
  return path.join(dataDir(projectRoot), 'worktrees');
}

export function worktreePath(projectRoot: string, branch: string): string {
  return path.join(worktreeBaseDir(projectRoot), branch);
}

/** Alias entry placed at the root of every worktree. */
export function worktreeAliasPath(worktree: string): string {
  return path.join(worktree, DATA_DIR);
}
