import type { SessionConfig } from '../types/config.js';
import type { ExpertContext, SessionRoles } from '../types/context.js';
import type { ExpertStatus } from '../types/expert.js';
import { queueDir } from '../lib/paths.js';
import { formatStatus, formatTable, namedColor, output, BOLD, DIM, RESET, type Column } from '../lib/output.js';
import { ContextStore } from '../core/context-store.js';
import { roleFor } from '../core/context.js';
import { ExpertStateDetector } from '../core/detector.js';
import { resolveExistingSession, type ProjectOptions } from './common.js';

export interface StatusOptions extends Pick<ProjectOptions, 'config'> {
  json?: boolean;
}

export interface ExpertStatusRow {
  id: number;
  name: string;
  role: string;
  status: ExpertStatus;
  branch: string;
  color: string;
}

export function buildStatusRows(
  config: SessionConfig,
  statuses: ExpertStatus[],
  roles: SessionRoles | null,
  contexts: (ExpertContext | null)[],
): ExpertStatusRow[] {
  return config.experts.map((expert, id) => ({
    id,
    name: expert.name,
    role: roleFor(roles, id) ?? contexts[id]?.role ?? expert.role,
    status: statuses[id] ?? 'unknown',
    branch: contexts[id]?.worktreeBranch ?? '',
    color: expert.color,
  }));
}

const columns: Column<ExpertStatusRow>[] = [
  { header: 'ID', key: 'id' },
  { header: 'Expert', key: 'name', format: (_v, row) => `${namedColor(row.color)}${row.name}${RESET}` },
  { header: 'Role', key: 'role' },
  { header: 'Status', key: 'status', format: (_v, row) => formatStatus(row.status) },
  { header: 'Worktree', key: 'branch', format: (_v, row) => row.branch || `${DIM}(root)${RESET}` },
];

export async function statusCommand(sessionName: string | undefined, options: StatusOptions): Promise<void> {
  const { config, panes } = await resolveExistingSession(sessionName, options);
  const info = await panes.sessionInfo();

  const detector = ExpertStateDetector.forSession(panes, config);
  await detector.refresh();

  const store = new ContextStore(queueDir(config.projectRoot));
  const roles = await store.loadSessionRoles(config.sessionHash);
  const contexts = await Promise.all(config.experts.map((_, id) => store.load(config.sessionHash, id)));
  const rows = buildStatusRows(config, detector.classifyAll(), roles, contexts);

  if (options.json) {
    output({ ...info, sessionHash: config.sessionHash, experts: rows.map(({ color: _c, ...row }) => row) }, true);
    return;
  }

  console.log(`${BOLD}${config.sessionName}${RESET}  ${config.projectRoot}`);
  if (info.createdAt) console.log(`${DIM}created ${info.createdAt}${RESET}`);
  console.log('');
  console.log(formatTable(rows, columns));
}
