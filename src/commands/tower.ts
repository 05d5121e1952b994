import { createLogger } from '../lib/log.js';
import { success } from '../lib/output.js';
import { bootstrap } from '../core/bootstrap.js';
import { BackgroundTaskCoordinator } from '../core/coordinator.js';
import type { LaunchResult } from '../core/launch.js';
import { createTower, requireTty, resolveProjectConfig, type ProjectOptions } from './common.js';

export type TowerCommandOptions = ProjectOptions;

export async function towerCommand(projectPath: string | undefined, options: TowerCommandOptions): Promise<void> {
  requireTty();
  const config = await resolveProjectConfig(projectPath, options);
  const logger = createLogger(config.projectRoot, 'tower');
  const session = await bootstrap(config, { attach: true, logger });

  const tower = createTower(session, new BackgroundTaskCoordinator<LaunchResult>(), logger);
  await tower.run();
  await logger.flush();
  success(`Left the tower. ${config.sessionName} keeps running.`);
}
