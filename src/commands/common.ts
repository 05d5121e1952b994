import path from 'node:path';
import type { SessionConfig } from '../types/config.js';
import type { Logger } from '../lib/log.js';
import { CrewError, SessionNotFoundError } from '../lib/errors.js';
import { loadConfig, withNumExperts } from '../core/config.js';
import { createSessionConfig } from '../core/session.js';
import { resolveGitRoot } from '../core/worktree.js';
import { TmuxManager } from '../core/tmux.js';
import { systemClock } from '../core/agent.js';
import { setRole } from '../core/context.js';
import { performGuardedLaunch, type LaunchDeps, type LaunchResult } from '../core/launch.js';
import type { BackgroundTaskCoordinator, PollResult } from '../core/coordinator.js';
import { Tower, type InputSource, type Renderer } from '../core/tower.js';
import type { Session } from '../core/bootstrap.js';
import { AnsiRenderer, KeypressInput } from '../ui/terminal.js';

export interface ProjectOptions {
  config?: string;
  numExperts?: number;
}

/**
 * Session settings for the repository containing `projectPath`. The data
 * root always sits in the main checkout, even when run from a worktree.
 */
export async function resolveProjectConfig(
  projectPath: string | undefined,
  options: ProjectOptions = {},
): Promise<SessionConfig> {
  const gitRoot = await resolveGitRoot(path.resolve(projectPath ?? process.cwd()));
  let config = await loadConfig(gitRoot, { configFile: options.config });
  if (options.numExperts !== undefined) {
    config = withNumExperts(config, options.numExperts);
  }
  return createSessionConfig(gitRoot, config);
}

export interface ExistingSession {
  config: SessionConfig;
  panes: TmuxManager;
}

/**
 * A running session, by name or by the project in the current directory.
 * A named session takes its project and expert count from its tmux metadata.
 */
export async function resolveExistingSession(
  sessionName: string | undefined,
  options: ProjectOptions = {},
): Promise<ExistingSession> {
  if (!sessionName) {
    const config = await resolveProjectConfig(undefined, options);
    const panes = new TmuxManager(config.sessionName);
    if (!(await panes.sessionExists())) throw new SessionNotFoundError(config.sessionName);
    return { config, panes };
  }

  const panes = new TmuxManager(sessionName);
  if (!(await panes.sessionExists())) throw new SessionNotFoundError(sessionName);
  const info = await panes.sessionInfo();
  let loaded = await loadConfig(info.projectPath, { configFile: options.config });
  if (info.numExperts > 0) loaded = withNumExperts(loaded, info.numExperts);
  const config = await createSessionConfig(info.projectPath, loaded);
  if (config.sessionName !== sessionName) {
    throw new CrewError(
      `Session ${sessionName} does not match ${info.projectPath} (expected ${config.sessionName})`,
      'SESSION_MISMATCH',
    );
  }
  return { config, panes };
}

export function launchDeps(session: Session, logger: Logger): LaunchDeps {
  return {
    session: session.config,
    agents: session.agents,
    worktrees: session.worktrees,
    store: session.store,
    markers: session.detector,
    logger,
    sleep: systemClock.sleep,
  };
}

export type TerminalOutcome = Extract<PollResult<LaunchResult>, { kind: 'completed' | 'failed' }>;

/** Poll every key until each has reported a terminal outcome. */
export async function waitForLaunches(
  coordinator: BackgroundTaskCoordinator<LaunchResult>,
  ids: number[],
  intervalMs: number,
  sleep: (ms: number) => Promise<void> = systemClock.sleep,
): Promise<Map<number, TerminalOutcome>> {
  const outcomes = new Map<number, TerminalOutcome>();
  while (outcomes.size < ids.length) {
    for (const id of ids) {
      if (outcomes.has(id)) continue;
      const result = coordinator.poll(id);
      if (result.kind === 'completed' || result.kind === 'failed') outcomes.set(id, result);
      // Nothing tracked means the launch was never started or was abandoned
      if (result.kind === 'idle') {
        outcomes.set(id, { kind: 'failed', label: 'Launch', error: new Error('launch was not started') });
      }
    }
    if (outcomes.size < ids.length) await sleep(intervalMs);
  }
  return outcomes;
}

export interface TowerIo {
  input: InputSource;
  renderer: Renderer;
}

export function createTower(
  session: Session,
  coordinator: BackgroundTaskCoordinator<LaunchResult>,
  logger: Logger,
  io: TowerIo = { input: new KeypressInput(), renderer: new AnsiRenderer() },
): Tower {
  const { config, store, detector } = session;
  const deps = launchDeps(session, logger);
  return new Tower({
    session: config,
    coordinator,
    detector,
    input: io.input,
    renderer: io.renderer,
    logger,
    launch: (request) => performGuardedLaunch(deps, request),
    loadContext: (expertId) => store.load(config.sessionHash, expertId),
    loadRoles: () => store.loadSessionRoles(config.sessionHash),
    saveRole: async (expertId, role) => {
      await store.updateSessionRoles(config.sessionHash, (roles) => setRole(roles, expertId, role));
    },
  });
}

export function requireTty(): void {
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new CrewError('The tower needs an interactive terminal', 'NOT_A_TTY');
  }
}
