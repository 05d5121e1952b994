import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';
import {
  expertContextDir,
  expertContextFile,
  sessionDir,
  sessionRolesFile,
  sharedContextDir,
  sharedContextFile,
} from '../lib/paths.js';
import { getLock, writeFileAtomically } from '../lib/cjs-compat.js';
import { ContextCorruptError, ContextLockError, errorMessage } from '../lib/errors.js';
import type { Decision, ExpertContext, SessionRoles, SharedContext } from '../types/context.js';
import {
  addDecision,
  createSessionRoles,
  parseExpertContext,
  parseSessionRoles,
  parseSharedContext,
} from './context.js';

async function readYaml(file: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
  try {
    return YAML.parse(raw);
  } catch (err) {
    throw new ContextCorruptError(file, errorMessage(err));
  }
}

async function writeYaml(file: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await writeFileAtomically(file, YAML.stringify(value, { indent: 2 }));
}

/** Runs `fn` while holding a lock on `file`, which need not exist yet. */
async function withFileLock<T>(file: string, fn: () => Promise<T>): Promise<T> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const lock = await getLock();
  let release: () => Promise<void>;
  try {
    release = await lock(file, {
      realpath: false,
      stale: 10_000,
      retries: { retries: 5, minTimeout: 100, maxTimeout: 1000 },
    });
  } catch {
    throw new ContextLockError(file);
  }

  try {
    return await fn();
  } finally {
    await release();
  }
}

/**
 * Per-record YAML store under `queue/sessions/<hash>`. Each expert's context
 * is its own file, so updates for different experts never share a lock.
 */
export class ContextStore {
  constructor(readonly queueDir: string) {}

  async initSession(sessionHash: string, numExperts: number): Promise<void> {
    for (let id = 0; id < numExperts; id++) {
      await fs.mkdir(expertContextDir(this.queueDir, sessionHash, id), { recursive: true });
    }
    await fs.mkdir(sharedContextDir(this.queueDir, sessionHash), { recursive: true });
  }

  async load(sessionHash: string, expertId: number): Promise<ExpertContext | null> {
    const file = expertContextFile(this.queueDir, sessionHash, expertId);
    const raw = await readYaml(file);
    if (raw === undefined) return null;
    return parseExpertContext(file, raw);
  }

  /** Atomic replace; stamps `updatedAt`. Returns what was written. */
  async save(ctx: ExpertContext): Promise<ExpertContext> {
    const stamped = { ...ctx, updatedAt: new Date().toISOString() };
    await writeYaml(expertContextFile(this.queueDir, ctx.sessionHash, ctx.expertId), stamped);
    return stamped;
  }

  /**
   * Locked read-modify-write of one expert record. `fallback` supplies the
   * starting value when nothing is stored yet.
   */
  async update(
    sessionHash: string,
    expertId: number,
    fallback: () => ExpertContext,
    updater: (ctx: ExpertContext) => ExpertContext,
  ): Promise<ExpertContext> {
    const file = expertContextFile(this.queueDir, sessionHash, expertId);
    return withFileLock(file, async () => {
      const current = (await this.load(sessionHash, expertId)) ?? fallback();
      return this.save(updater(current));
    });
  }

  async clear(sessionHash: string, expertId: number): Promise<void> {
    await fs.rm(expertContextFile(this.queueDir, sessionHash, expertId), { force: true });
  }

  async loadShared(sessionHash: string): Promise<SharedContext> {
    const file = sharedContextFile(this.queueDir, sessionHash);
    return parseSharedContext(file, await readYaml(file));
  }

  private async saveShared(sessionHash: string, shared: SharedContext): Promise<void> {
    await writeYaml(sharedContextFile(this.queueDir, sessionHash), shared);
  }

  async addDecision(sessionHash: string, decision: Decision): Promise<void> {
    await withFileLock(sharedContextFile(this.queueDir, sessionHash), async () => {
      const shared = await this.loadShared(sessionHash);
      await this.saveShared(sessionHash, addDecision(shared, decision));
    });
  }

  async loadSessionRoles(sessionHash: string): Promise<SessionRoles | null> {
    const file = sessionRolesFile(this.queueDir, sessionHash);
    const raw = await readYaml(file);
    if (raw === undefined) return null;
    return parseSessionRoles(file, raw);
  }

  async saveSessionRoles(roles: SessionRoles): Promise<void> {
    await writeYaml(sessionRolesFile(this.queueDir, roles.sessionHash), {
      ...roles,
      updatedAt: new Date().toISOString(),
    });
  }

  /** Locked read-modify-write of the role file, so concurrent role changes all land. */
  async updateSessionRoles(
    sessionHash: string,
    updater: (roles: SessionRoles) => SessionRoles,
  ): Promise<SessionRoles> {
    return withFileLock(sessionRolesFile(this.queueDir, sessionHash), async () => {
      const current = (await this.loadSessionRoles(sessionHash)) ?? createSessionRoles(sessionHash);
      const next = updater(current);
      await this.saveSessionRoles(next);
      return next;
    });
  }

  /** Removes only `queue/sessions/<hash>`. */
  async cleanupSession(sessionHash: string): Promise<void> {
    await fs.rm(sessionDir(this.queueDir, sessionHash), { recursive: true, force: true });
  }
}
