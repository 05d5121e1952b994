import { formatTable, output, type Column } from '../lib/output.js';
import { loadConfig } from '../core/config.js';
import { TmuxManager, type SessionInfo } from '../core/tmux.js';

export interface SessionsOptions {
  config?: string;
  json?: boolean;
}

const columns: Column<SessionInfo>[] = [
  { header: 'Session', key: 'sessionName' },
  { header: 'Project', key: 'projectPath' },
  { header: 'Experts', key: 'numExperts' },
  { header: 'Created', key: 'createdAt' },
];

export async function sessionsCommand(options: SessionsOptions): Promise<void> {
  const config = await loadConfig(process.cwd(), { configFile: options.config });
  const sessions = await TmuxManager.listCrewSessions(config.sessionPrefix);

  if (options.json) {
    output({ sessions }, true);
    return;
  }
  if (sessions.length === 0) {
    console.log(`No ${config.sessionPrefix} sessions running.`);
    return;
  }
  console.log(formatTable(sessions, columns));
}
