import type { SessionConfig } from '../types/config.js';
import type { SessionRoles } from '../types/context.js';
import { errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/log.js';
import { formatTable, info, output, success, warn, GREEN, RED, RESET, YELLOW, type Column } from '../lib/output.js';
import { bootstrap } from '../core/bootstrap.js';
import { BackgroundTaskCoordinator } from '../core/coordinator.js';
import { roleFor } from '../core/context.js';
import { performGuardedLaunch, type LaunchRequest, type LaunchResult } from '../core/launch.js';
import { launchDeps, resolveProjectConfig, waitForLaunches, type ProjectOptions, type TerminalOutcome } from './common.js';

export interface StartOptions extends ProjectOptions {
  json?: boolean;
}

export type LaunchState = 'ready' | 'timeout' | 'failed';

export interface LaunchSummaryRow {
  id: number;
  name: string;
  role: string;
  state: LaunchState;
  workingDir: string;
  detail: string;
}

/** One request per expert; a reused session gets its agents restarted. */
export function initialRequests(config: SessionConfig, roles: SessionRoles | null, restart: boolean): LaunchRequest[] {
  return config.experts.map((expert, expertId): LaunchRequest => {
    const request: LaunchRequest = {
      expertId,
      expertName: expert.name,
      role: roleFor(roles, expertId) ?? expert.role,
    };
    if (restart) request.restart = true;
    return request;
  });
}

export function summarizeLaunches(
  config: SessionConfig,
  requests: LaunchRequest[],
  outcomes: Map<number, TerminalOutcome>,
): LaunchSummaryRow[] {
  return requests.map((request): LaunchSummaryRow => {
    const base = { id: request.expertId, name: request.expertName, role: request.role };
    const outcome = outcomes.get(request.expertId);
    if (!outcome || outcome.kind === 'failed') {
      const detail = outcome ? errorMessage(outcome.error) : 'no result';
      return { ...base, state: 'failed', workingDir: config.projectRoot, detail };
    }
    const result = outcome.value;
    if (result.error) {
      return { ...base, state: 'failed', workingDir: result.workingDir, detail: result.error.message };
    }
    if (!result.ready) {
      return {
        ...base,
        state: 'timeout',
        workingDir: result.workingDir,
        detail: `not ready after ${config.timeouts.agentReady}s`,
      };
    }
    return {
      ...base,
      state: 'ready',
      workingDir: result.workingDir,
      detail: result.instructionSent ? 'instructions sent' : '',
    };
  });
}

const STATE_COLORS: Record<LaunchState, string> = { ready: GREEN, timeout: YELLOW, failed: RED };

const columns: Column<LaunchSummaryRow>[] = [
  { header: 'ID', key: 'id' },
  { header: 'Expert', key: 'name' },
  { header: 'Role', key: 'role' },
  { header: 'State', key: 'state', format: (_v, row) => `${STATE_COLORS[row.state]}${row.state}${RESET}` },
  { header: 'Directory', key: 'workingDir' },
  { header: 'Detail', key: 'detail' },
];

export async function startCommand(projectPath: string | undefined, options: StartOptions): Promise<void> {
  const config = await resolveProjectConfig(projectPath, options);
  const logger = createLogger(config.projectRoot, 'crewmux', { echo: !options.json });
  const session = await bootstrap(config, { logger });

  if (!options.json) {
    info(`${session.created ? 'Created' : 'Reusing'} ${config.sessionName}; launching ${config.experts.length} experts`);
  }

  const roles = await session.store.loadSessionRoles(config.sessionHash);
  const requests = initialRequests(config, roles, !session.created);
  const coordinator = new BackgroundTaskCoordinator<LaunchResult>();
  const deps = launchDeps(session, logger);
  for (const request of requests) {
    coordinator.start(request.expertId, 'Launch', () => performGuardedLaunch(deps, request));
  }

  const outcomes = await waitForLaunches(coordinator, requests.map((r) => r.expertId), config.tickMs);
  const rows = summarizeLaunches(config, requests, outcomes);
  await logger.flush();

  if (options.json) {
    output({ sessionName: config.sessionName, projectRoot: config.projectRoot, experts: rows }, true);
  } else {
    console.log(formatTable(rows, columns));
    const ready = rows.filter((r) => r.state === 'ready').length;
    if (ready === rows.length) {
      success(`All ${ready} experts ready. Attach with: tmux attach -t ${config.sessionName}`);
    } else {
      warn(`${ready}/${rows.length} experts ready. See ${config.projectRoot}/.crewmux/logs/crewmux.log`);
    }
  }

  if (rows.some((r) => r.state === 'failed')) {
    process.exitCode = 1;
  }
}
