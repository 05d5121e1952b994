import type {
  Convention,
  Decision,
  ExpertContext,
  FileAnalysis,
  Knowledge,
  Pattern,
  RoleAssignment,
  SessionRoles,
  SharedContext,
} from '../types/context.js';
import { ContextCorruptError } from '../lib/errors.js';
import { decisionId } from '../lib/id.js';

export function createExpertContext(
  sessionHash: string,
  expertId: number,
  expertName: string,
  role: string,
  now = new Date().toISOString(),
): ExpertContext {
  return {
    expertId,
    expertName,
    sessionHash,
    role,
    knowledge: { filesAnalyzed: [], patternsDiscovered: [] },
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Point the expert at a worktree. The resume token is dropped in the same
 * step: a conversation started in one directory must not be resumed in another.
 */
export function assignWorktree(ctx: ExpertContext, branch: string, worktreePath: string): ExpertContext {
  const { resumeToken: _dropped, ...rest } = ctx;
  return { ...rest, worktreeBranch: branch, worktreePath };
}

/** Back to the project root. Also drops the resume token. */
export function clearWorktree(ctx: ExpertContext): ExpertContext {
  const { resumeToken: _token, worktreeBranch: _branch, worktreePath: _path, ...rest } = ctx;
  return rest;
}

/** Forget what the expert learned; identity, location and token stay. */
export function clearKnowledge(ctx: ExpertContext): ExpertContext {
  return { ...ctx, knowledge: { filesAnalyzed: [], patternsDiscovered: [] } };
}

export function setResumeToken(ctx: ExpertContext, token: string): ExpertContext {
  return { ...ctx, resumeToken: token };
}

export function emptySharedContext(): SharedContext {
  return { decisions: [], conventions: [] };
}

export function createDecision(
  madeBy: number,
  topic: string,
  decision: string,
  rationale: string,
  affectsExperts: number[] = [],
  timestamp = new Date().toISOString(),
): Decision {
  return { id: decisionId(), madeBy, timestamp, topic, decision, rationale, affectsExperts };
}

export function addDecision(shared: SharedContext, decision: Decision): SharedContext {
  return { ...shared, decisions: [...shared.decisions, decision] };
}

export function createSessionRoles(sessionHash: string, now = new Date().toISOString()): SessionRoles {
  return { sessionHash, createdAt: now, updatedAt: now, assignments: [] };
}

/** Insert or replace the assignment for `expertId`, keeping assignments ordered by id. */
export function setRole(roles: SessionRoles, expertId: number, role: string, now = new Date().toISOString()): SessionRoles {
  const assignments = roles.assignments.filter((a) => a.expertId !== expertId);
  assignments.push({ expertId, role, assignedAt: now });
  assignments.sort((a, b) => a.expertId - b.expertId);
  return { ...roles, assignments, updatedAt: now };
}

export function roleFor(roles: SessionRoles | null, expertId: number): string | undefined {
  return roles?.assignments.find((a) => a.expertId === expertId)?.role;
}

// --- parsing -------------------------------------------------------------

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Field accessors over parsed YAML. `invalid` builds the error for a bad field. */
export class FieldReader {
  constructor(
    private readonly file: string,
    private readonly invalid: (file: string, detail: string) => Error = (f, d) => new ContextCorruptError(f, d),
  ) {}

  record(value: unknown, what: string): Fields {
    if (!isRecord(value)) throw this.invalid(this.file, `${what} must be a mapping`);
    return value;
  }

  string(obj: Fields, key: string): string {
    const value = obj[key];
    if (typeof value !== 'string') throw this.invalid(this.file, `${key} must be a string`);
    return value;
  }

  optionalString(obj: Fields, key: string): string | undefined {
    const value = obj[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') throw this.invalid(this.file, `${key} must be a string`);
    return value;
  }

  number(obj: Fields, key: string): number {
    const value = obj[key];
    if (typeof value !== 'number') throw this.invalid(this.file, `${key} must be a number`);
    return value;
  }

  optionalNumber(obj: Fields, key: string): number | undefined {
    const value = obj[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number') throw this.invalid(this.file, `${key} must be a number`);
    return value;
  }

  list<T>(obj: Fields, key: string, item: (entry: Fields) => T): T[] {
    const value = obj[key];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) throw this.invalid(this.file, `${key} must be a list`);
    return value.map((entry: unknown) => item(this.record(entry, `${key} entry`)));
  }

  strings(obj: Fields, key: string): string[] {
    const value = obj[key];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value) || !value.every((v: unknown) => typeof v === 'string')) {
      throw this.invalid(this.file, `${key} must be a list of strings`);
    }
    return value;
  }
}

export function parseExpertContext(file: string, raw: unknown): ExpertContext {
  const r = new FieldReader(file);
  const obj = r.record(raw, 'context');
  const knowledgeRaw = obj.knowledge === undefined ? {} : r.record(obj.knowledge, 'knowledge');
  const knowledge: Knowledge = {
    filesAnalyzed: r.list(knowledgeRaw, 'filesAnalyzed', (e): FileAnalysis => ({
      path: r.string(e, 'path'),
      summary: r.string(e, 'summary'),
      lastRead: r.string(e, 'lastRead'),
    })),
    patternsDiscovered: r.list(knowledgeRaw, 'patternsDiscovered', (e): Pattern => ({
      patternType: r.string(e, 'patternType'),
      pattern: r.string(e, 'pattern'),
    })),
  };

  const ctx: ExpertContext = {
    expertId: r.number(obj, 'expertId'),
    expertName: r.string(obj, 'expertName'),
    sessionHash: r.string(obj, 'sessionHash'),
    role: r.string(obj, 'role'),
    knowledge,
    createdAt: r.string(obj, 'createdAt'),
    updatedAt: r.string(obj, 'updatedAt'),
  };
  const resumeToken = r.optionalString(obj, 'resumeToken');
  const worktreeBranch = r.optionalString(obj, 'worktreeBranch');
  const worktreePath = r.optionalString(obj, 'worktreePath');
  if (resumeToken !== undefined) ctx.resumeToken = resumeToken;
  if (worktreeBranch !== undefined) ctx.worktreeBranch = worktreeBranch;
  if (worktreePath !== undefined) ctx.worktreePath = worktreePath;
  return ctx;
}

export function parseSharedContext(file: string, raw: unknown): SharedContext {
  if (raw === null || raw === undefined) return emptySharedContext();
  const r = new FieldReader(file);
  const obj = r.record(raw, 'shared context');
  return {
    decisions: r.list(obj, 'decisions', (e): Decision => ({
      id: r.string(e, 'id'),
      madeBy: r.number(e, 'madeBy'),
      timestamp: r.string(e, 'timestamp'),
      topic: r.string(e, 'topic'),
      decision: r.string(e, 'decision'),
      rationale: r.string(e, 'rationale'),
      affectsExperts: Array.isArray(e.affectsExperts)
        ? e.affectsExperts.filter((n: unknown): n is number => typeof n === 'number')
        : [],
    })),
    conventions: r.list(obj, 'conventions', (e): Convention => ({
      pattern: r.string(e, 'pattern'),
      description: r.string(e, 'description'),
      discoveredAt: r.string(e, 'discoveredAt'),
      discoveredBy: r.number(e, 'discoveredBy'),
    })),
  };
}

export function parseSessionRoles(file: string, raw: unknown): SessionRoles {
  const r = new FieldReader(file);
  const obj = r.record(raw, 'session roles');
  return {
    sessionHash: r.string(obj, 'sessionHash'),
    createdAt: r.string(obj, 'createdAt'),
    updatedAt: r.string(obj, 'updatedAt'),
    assignments: r.list(obj, 'assignments', (e): RoleAssignment => ({
      expertId: r.number(e, 'expertId'),
      role: r.string(e, 'role'),
      assignedAt: r.string(e, 'assignedAt'),
    })),
  };
}
