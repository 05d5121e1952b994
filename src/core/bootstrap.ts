import fs from 'node:fs/promises';
import type { SessionConfig } from '../types/config.js';
import { InfrastructureError, SessionNotFoundError } from '../lib/errors.js';
import { logsDir, queueDir, reportsDir } from '../lib/paths.js';
import type { Logger } from '../lib/log.js';
import { checkTmux, TmuxManager } from './tmux.js';
import { AgentManager } from './agent.js';
import { WorktreeManager } from './worktree.js';
import { ContextStore } from './context-store.js';
import { ExpertStateDetector } from './detector.js';
import { createSessionRoles, setRole } from './context.js';

export interface Session {
  config: SessionConfig;
  panes: TmuxManager;
  agents: AgentManager;
  worktrees: WorktreeManager;
  store: ContextStore;
  detector: ExpertStateDetector;
  /** False when an already running tmux session was reused. */
  created: boolean;
}

export interface BootstrapOptions {
  /** Reuse a running tmux session instead of creating one. */
  attach?: boolean;
  logger: Logger;
}

async function step<T>(name: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof SessionNotFoundError) throw err;
    throw new InfrastructureError(name, err);
  }
}

/**
 * One-shot session setup. Runs to completion before any background
 * operation exists; any failure aborts the whole session.
 */
export async function bootstrap(config: SessionConfig, options: BootstrapOptions): Promise<Session> {
  const { logger } = options;
  const numExperts = config.experts.length;

  await step('checking for tmux', checkTmux);

  const worktrees = await step('resolving the git root', () => WorktreeManager.resolve(config.projectRoot));

  const store = new ContextStore(queueDir(config.projectRoot));
  await step('creating session directories', async () => {
    await fs.mkdir(reportsDir(config.projectRoot), { recursive: true });
    await fs.mkdir(logsDir(config.projectRoot), { recursive: true });
    await store.initSession(config.sessionHash, numExperts);
  });

  const panes = new TmuxManager(config.sessionName);
  const detector = ExpertStateDetector.forSession(panes, config);
  await step('creating the status directory', () => detector.ensureStatusDir());

  const exists = await panes.sessionExists();
  const created = !exists;
  if (options.attach) {
    if (!exists) throw new SessionNotFoundError(config.sessionName);
    logger.info(`Attached to ${config.sessionName}`);
  } else if (exists) {
    logger.info(`Reusing running session ${config.sessionName}`);
  } else {
    await step('creating the tmux session', () => panes.createSession(numExperts, config.projectRoot));
    await step('writing session metadata', () => panes.initSessionMetadata(config.projectRoot, numExperts));
    await step('titling panes', async () => {
      for (const [id, expert] of config.experts.entries()) {
        await panes.setPaneTitle(id, expert.name);
      }
    });
    await step('saving expert roles', async () => {
      let roles = (await store.loadSessionRoles(config.sessionHash)) ?? createSessionRoles(config.sessionHash);
      for (const [id, expert] of config.experts.entries()) {
        if (!roles.assignments.some((a) => a.expertId === id)) {
          roles = setRole(roles, id, expert.role);
        }
      }
      await store.saveSessionRoles(roles);
    });
    logger.info(`Created session ${config.sessionName} with ${numExperts} panes`);
  }

  const agents = new AgentManager(panes, config.agent);
  return { config, panes, agents, worktrees, store, detector, created };
}
