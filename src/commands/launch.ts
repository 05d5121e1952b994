import { createLogger } from '../lib/log.js';
import { success } from '../lib/output.js';
import { bootstrap } from '../core/bootstrap.js';
import { BackgroundTaskCoordinator } from '../core/coordinator.js';
import type { LaunchResult } from '../core/launch.js';
import { createTower, requireTty, resolveProjectConfig, type ProjectOptions } from './common.js';

export type LaunchCommandOptions = ProjectOptions;

/** Bootstrap, queue a launch per expert and hand the terminal to the tower at once. */
export async function launchCommand(projectPath: string | undefined, options: LaunchCommandOptions): Promise<void> {
  requireTty();
  const config = await resolveProjectConfig(projectPath, options);
  const logger = createLogger(config.projectRoot, 'tower');
  const session = await bootstrap(config, { logger });

  const tower = createTower(session, new BackgroundTaskCoordinator<LaunchResult>(), logger);
  const restart = !session.created;
  await tower.run(config.experts.map((_, expertId) => ({ expertId, options: restart ? { restart } : {} })));
  await logger.flush();
  success(`Left the tower. ${config.sessionName} keeps running.`);
}
