import fs from 'node:fs/promises';
import { statusDir, statusFile } from '../lib/paths.js';
import { writeFileAtomically } from '../lib/cjs-compat.js';
import type { SessionConfig } from '../types/config.js';
import type { ExpertStatus, StatusMarker } from '../types/expert.js';
import type { PaneController, PaneInfo } from './process-manager.js';

const SHELL_COMMANDS = new Set(['bash', 'zsh', 'sh', 'fish', 'dash', 'tcsh', 'csh']);

export type MarkerRead =
  | { kind: 'present'; content: string; mtimeMs: number }
  | { kind: 'missing' }
  | { kind: 'unreadable'; error: string };

export interface DetectorSnapshot {
  readonly takenAt: number;
  readonly panes: ReadonlyMap<number, PaneInfo>;
  readonly markers: ReadonlyMap<number, MarkerRead>;
}

async function readMarker(file: string): Promise<MarkerRead> {
  try {
    const [content, stat] = await Promise.all([fs.readFile(file, 'utf-8'), fs.stat(file)]);
    return { kind: 'present', content: content.trim(), mtimeMs: stat.mtimeMs };
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return { kind: 'missing' };
    return { kind: 'unreadable', error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Pure classification of one expert from a snapshot. Checked in order:
 * pane existence, dead pane, launch marker, shell in foreground, then the
 * marker the agent writes while it works.
 *
 * A launch marker older than `startingGraceMs` with the agent in the
 * foreground means the launch gave up waiting but the agent came up anyway.
 */
export function classifyExpert(
  snapshot: DetectorSnapshot | null,
  expertId: number,
  stuckAfterMs: number,
  now: number,
  startingGraceMs = Number.POSITIVE_INFINITY,
): ExpertStatus {
  if (!snapshot) return 'unknown';
  const pane = snapshot.panes.get(expertId);
  const marker = snapshot.markers.get(expertId) ?? { kind: 'missing' };
  if (!pane || marker.kind === 'unreadable') return 'unknown';
  if (pane.isDead) return 'pending';

  const agentInFront = !SHELL_COMMANDS.has(pane.currentCommand);
  if (marker.kind === 'present' && marker.content === 'starting') {
    return agentInFront && now - marker.mtimeMs > startingGraceMs ? 'ready' : 'starting';
  }
  if (!agentInFront) return 'pending';
  if (marker.kind === 'missing') return 'starting';

  switch (marker.content) {
    case 'pending':
      return 'ready';
    case 'processing':
      return now - marker.mtimeMs > stuckAfterMs ? 'stuck' : 'busy';
    default:
      return 'unknown';
  }
}

export class ExpertStateDetector {
  private snapshot: DetectorSnapshot | null = null;

  constructor(
    private readonly panes: PaneController,
    private readonly projectRoot: string,
    private readonly numExperts: number,
    private readonly stuckAfterMs: number,
    private readonly startingGraceMs = Number.POSITIVE_INFINITY,
    private readonly now: () => number = Date.now,
  ) {}

  /** Stuck after `timeouts.stuckAfter`; a launch marker expires after `timeouts.agentReady`. */
  static forSession(panes: PaneController, config: SessionConfig): ExpertStateDetector {
    return new ExpertStateDetector(
      panes,
      config.projectRoot,
      config.experts.length,
      config.timeouts.stuckAfter * 1000,
      config.timeouts.agentReady * 1000,
    );
  }

  /** One pane listing plus one read per marker, then swap in a new snapshot. */
  async refresh(): Promise<DetectorSnapshot> {
    const panes = await this.panes.listPanes();
    const markers = new Map<number, MarkerRead>();
    await Promise.all(
      Array.from({ length: this.numExperts }, async (_, id) => {
        markers.set(id, await readMarker(statusFile(this.projectRoot, id)));
      }),
    );
    const snapshot: DetectorSnapshot = { takenAt: this.now(), panes, markers };
    this.snapshot = snapshot;
    return snapshot;
  }

  classify(expertId: number): ExpertStatus {
    return classifyExpert(this.snapshot, expertId, this.stuckAfterMs, this.now(), this.startingGraceMs);
  }

  classifyAll(): ExpertStatus[] {
    return Array.from({ length: this.numExperts }, (_, id) => this.classify(id));
  }

  async ensureStatusDir(): Promise<void> {
    await fs.mkdir(statusDir(this.projectRoot), { recursive: true });
  }

  async setMarker(expertId: number, content: StatusMarker): Promise<void> {
    await this.ensureStatusDir();
    await writeFileAtomically(statusFile(this.projectRoot, expertId), `${content}\n`);
  }

  async clearMarker(expertId: number): Promise<void> {
    await fs.rm(statusFile(this.projectRoot, expertId), { force: true });
  }
}
