import type { SessionConfig } from '../types/config.js';
import { errorMessage } from '../lib/errors.js';
import { queueDir } from '../lib/paths.js';
import { info, output, success, warn } from '../lib/output.js';
import { AgentManager, systemClock } from '../core/agent.js';
import { ContextStore } from '../core/context-store.js';
import { ExpertStateDetector } from '../core/detector.js';
import type { PaneController } from '../core/process-manager.js';
import { ReportStore } from '../core/reports.js';
import { WorktreeManager } from '../core/worktree.js';
import { resolveExistingSession, type ProjectOptions } from './common.js';

export interface DownOptions extends Pick<ProjectOptions, 'config'> {
  /** Kill the session without asking agents to exit first. */
  force?: boolean;
  /** Also delete the session's contexts, markers and reports, and prune stale worktree records. */
  cleanup?: boolean;
  json?: boolean;
}

/**
 * Drops what a stopped session leaves behind: its context records, the
 * markers and reports of its experts, and git's records of deleted worktrees.
 * Worktree checkouts themselves stay.
 */
export async function cleanupSessionData(
  config: SessionConfig,
  panes: PaneController,
  worktrees: WorktreeManager,
): Promise<void> {
  await new ContextStore(queueDir(config.projectRoot)).cleanupSession(config.sessionHash);
  const detector = ExpertStateDetector.forSession(panes, config);
  const reports = new ReportStore(config.projectRoot);
  for (const [id] of config.experts.entries()) {
    await detector.clearMarker(id);
    await reports.clear(id);
  }
  await worktrees.pruneWorktrees();
}

export async function downCommand(sessionName: string | undefined, options: DownOptions): Promise<void> {
  const { config, panes } = await resolveExistingSession(sessionName, options);

  const exitFailures: string[] = [];
  if (!options.force) {
    const agents = new AgentManager(panes, config.agent);
    for (const [id, expert] of config.experts.entries()) {
      try {
        await agents.sendExit(id);
      } catch (err) {
        exitFailures.push(expert.name);
        if (!options.json) warn(`Could not ask ${expert.name} to exit: ${errorMessage(err)}`);
      }
    }
    if (!options.json) info(`Waiting ${config.timeouts.gracefulShutdown}s for agents to exit`);
    await systemClock.sleep(config.timeouts.gracefulShutdown * 1000);
  }

  await panes.killSession();

  if (options.cleanup) {
    await cleanupSessionData(config, panes, await WorktreeManager.resolve(config.projectRoot));
  }

  if (options.json) {
    output({ success: true, sessionName: config.sessionName, cleaned: Boolean(options.cleanup), exitFailures }, true);
  } else {
    success(`Stopped ${config.sessionName}${options.cleanup ? ' and removed its stored context' : ''}`);
  }
}
