import { CrewError } from '../lib/errors.js';
import { createLogger } from '../lib/log.js';
import { queueDir } from '../lib/paths.js';
import { info, output, success, warn } from '../lib/output.js';
import { AgentManager, systemClock } from '../core/agent.js';
import { resolveExpertId } from '../core/config.js';
import { ContextStore } from '../core/context-store.js';
import { clearKnowledge, createExpertContext, roleFor } from '../core/context.js';
import { ExpertStateDetector } from '../core/detector.js';
import { performGuardedLaunch, type LaunchRequest } from '../core/launch.js';
import { WorktreeManager } from '../core/worktree.js';
import { resolveExistingSession, type ProjectOptions } from './common.js';

export interface ResetOptions extends Pick<ProjectOptions, 'config'> {
  session?: string;
  /** Also return the expert to the project root. */
  full?: boolean;
  /** Keep the conversation; only forget recorded knowledge. */
  keepHistory?: boolean;
  json?: boolean;
}

/**
 * Every reset restarts the agent. By default the context is cleared and the
 * worktree kept; `full` also moves back to the root; `keepHistory` resumes
 * the same conversation.
 */
export function resetRequest(expertId: number, expertName: string, role: string, options: ResetOptions): LaunchRequest {
  if (options.full && options.keepHistory) {
    throw new CrewError('--full and --keep-history cannot be combined', 'INVALID_ARGS');
  }
  const base = { expertId, expertName, role };
  if (options.full) return { ...base, relocate: { kind: 'root' }, resetContext: true };
  if (options.keepHistory) return { ...base, restart: true };
  return { ...base, restart: true, resetContext: true };
}

export async function resetCommand(expertRef: string, options: ResetOptions): Promise<void> {
  const { config, panes } = await resolveExistingSession(options.session, options);
  const expertId = resolveExpertId(config.experts, expertRef);
  const expert = config.experts[expertId];
  if (!expert) throw new CrewError(`Expert ${expertRef} is outside this session`, 'EXPERT_NOT_FOUND');

  const hash = config.sessionHash;
  const store = new ContextStore(queueDir(config.projectRoot));
  const role = roleFor(await store.loadSessionRoles(hash), expertId) ?? expert.role;
  const request = resetRequest(expertId, expert.name, role, options);

  if (options.keepHistory) {
    await store.update(hash, expertId, () => createExpertContext(hash, expertId, expert.name, role), clearKnowledge);
  }

  if (!options.json) info(`Resetting ${expert.name} (expert ${expertId})`);
  const logger = createLogger(config.projectRoot, 'crewmux', { echo: !options.json });
  const result = await performGuardedLaunch(
    {
      session: config,
      agents: new AgentManager(panes, config.agent),
      worktrees: await WorktreeManager.resolve(config.projectRoot),
      store,
      markers: ExpertStateDetector.forSession(panes, config),
      logger,
      sleep: systemClock.sleep,
    },
    request,
  );
  await logger.flush();

  if (result.error) throw result.error;
  if (options.json) {
    output({ success: result.ready, ...result }, true);
  } else if (result.ready) {
    success(`${expert.name} reset in ${result.workingDir}`);
  } else {
    warn(`${expert.name} restarted but not ready after ${config.timeouts.agentReady}s`);
  }
}
