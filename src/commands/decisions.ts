import type { SessionConfig } from '../types/config.js';
import type { SharedContext } from '../types/context.js';
import { queueDir } from '../lib/paths.js';
import { formatTable, output, success, type Column } from '../lib/output.js';
import { resolveExpertId } from '../core/config.js';
import { ContextStore } from '../core/context-store.js';
import { createDecision } from '../core/context.js';
import { resolveProjectConfig, type ProjectOptions } from './common.js';

export interface DecideOptions extends Pick<ProjectOptions, 'config'> {
  path?: string;
  rationale?: string;
  /** Comma-separated expert ids or names. */
  affects?: string;
  json?: boolean;
}

export interface DecisionsOptions extends Pick<ProjectOptions, 'config'> {
  json?: boolean;
}

export interface DecisionRow {
  id: string;
  timestamp: string;
  madeBy: string;
  topic: string;
  decision: string;
  affects: string;
}

export function parseAffects(config: SessionConfig, value: string | undefined): number[] {
  if (!value) return [];
  const ids = value
    .split(',')
    .map((ref) => ref.trim())
    .filter((ref) => ref.length > 0)
    .map((ref) => resolveExpertId(config.experts, ref));
  return [...new Set(ids)].sort((a, b) => a - b);
}

export function buildDecisionRows(config: SessionConfig, shared: SharedContext): DecisionRow[] {
  const nameOf = (id: number): string => config.experts[id]?.name ?? `expert${id}`;
  return shared.decisions.map((d) => ({
    id: d.id,
    timestamp: d.timestamp,
    madeBy: nameOf(d.madeBy),
    topic: d.topic,
    decision: d.decision,
    affects: d.affectsExperts.map(nameOf).join(', '),
  }));
}

const columns: Column<DecisionRow>[] = [
  { header: 'When', key: 'timestamp' },
  { header: 'By', key: 'madeBy' },
  { header: 'Topic', key: 'topic' },
  { header: 'Decision', key: 'decision' },
  { header: 'Affects', key: 'affects' },
];

export async function decideCommand(
  expertRef: string,
  topic: string,
  decision: string,
  options: DecideOptions,
): Promise<void> {
  const config = await resolveProjectConfig(options.path, options);
  const madeBy = resolveExpertId(config.experts, expertRef);
  const record = createDecision(madeBy, topic, decision, options.rationale ?? '', parseAffects(config, options.affects));

  await new ContextStore(queueDir(config.projectRoot)).addDecision(config.sessionHash, record);

  if (options.json) {
    output({ success: true, decision: record }, true);
  } else {
    success(`Recorded ${record.id} on '${topic}' for ${config.experts[madeBy]?.name ?? expertRef}`);
  }
}

export async function decisionsCommand(projectPath: string | undefined, options: DecisionsOptions): Promise<void> {
  const config = await resolveProjectConfig(projectPath, options);
  const shared = await new ContextStore(queueDir(config.projectRoot)).loadShared(config.sessionHash);

  if (options.json) {
    output({ sessionHash: config.sessionHash, ...shared }, true);
    return;
  }
  if (shared.decisions.length === 0) {
    console.log('No decisions recorded.');
    return;
  }
  console.log(formatTable(buildDecisionRows(config, shared), columns));
}
