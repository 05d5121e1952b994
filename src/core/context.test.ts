import { describe, test, expect } from 'vitest';
import {
  clearKnowledge,
  createDecision,
  addDecision,
  assignWorktree,
  clearWorktree,
  createSessionRoles,
  emptySharedContext,
  parseExpertContext,
  roleFor,
  setResumeToken,
  setRole,
} from './context.js';
import { ContextCorruptError } from '../lib/errors.js';
import { makeContext } from '../test-fixtures.js';

describe('assignWorktree', () => {
  test('given a context with a resume token, should drop the token while setting the path', () => {
    const ctx = makeContext({ resumeToken: 'tok-1' });

    const next = assignWorktree(ctx, 'feature-x', '/repo/.crewmux/worktrees/feature-x');

    expect(next.worktreeBranch).toBe('feature-x');
    expect(next.worktreePath).toBe('/repo/.crewmux/worktrees/feature-x');
    expect('resumeToken' in next).toBe(false);
  });

  test('given any context, should not mutate the input', () => {
    const ctx = makeContext({ resumeToken: 'tok-1' });

    assignWorktree(ctx, 'feature-x', '/wt');

    expect(ctx.resumeToken).toBe('tok-1');
    expect(ctx.worktreePath).toBeUndefined();
  });
});

describe('clearWorktree', () => {
  test('given a relocated context, should drop branch, path and token together', () => {
    const ctx = setResumeToken(assignWorktree(makeContext(), 'b', '/wt'), 'tok-2');

    const next = clearWorktree(ctx);

    expect(Object.keys(next).sort()).toEqual(
      ['createdAt', 'expertId', 'expertName', 'knowledge', 'role', 'sessionHash', 'updatedAt'],
    );
  });
});

describe('clearKnowledge', () => {
  test('given a context with knowledge, should empty it and keep the token and worktree', () => {
    const ctx = makeContext({
      resumeToken: 'tok-1',
      worktreeBranch: 'feature-x',
      worktreePath: '/tmp/wt',
      knowledge: {
        filesAnalyzed: [{ path: 'src/a.ts', summary: 'entry', lastRead: '2026-01-01T00:00:00.000Z' }],
        patternsDiscovered: [{ patternType: 'naming', pattern: 'kebab-case files' }],
      },
    });

    expect(clearKnowledge(ctx)).toEqual(makeContext({
      resumeToken: 'tok-1',
      worktreeBranch: 'feature-x',
      worktreePath: '/tmp/wt',
    }));
  });
});

describe('setRole', () => {
  test('given an existing assignment, should replace it and keep order', () => {
    let roles = createSessionRoles('abcd1234', 't0');
    roles = setRole(roles, 2, 'tester', 't1');
    roles = setRole(roles, 0, 'architect', 't2');
    roles = setRole(roles, 2, 'backend', 't3');

    expect(roles.assignments).toEqual([
      { expertId: 0, role: 'architect', assignedAt: 't2' },
      { expertId: 2, role: 'backend', assignedAt: 't3' },
    ]);
    expect(roles.updatedAt).toBe('t3');
    expect(roleFor(roles, 2)).toBe('backend');
    expect(roleFor(roles, 1)).toBeUndefined();
  });
});

describe('addDecision', () => {
  test('given a decision, should append without mutating', () => {
    const shared = emptySharedContext();
    const decision = {
      id: 'decision-1', madeBy: 0, timestamp: 't', topic: 'db', decision: 'sqlite', rationale: 'small', affectsExperts: [2],
    };

    const next = addDecision(shared, decision);

    expect(next.decisions).toEqual([decision]);
    expect(shared.decisions).toEqual([]);
  });
});

describe('createDecision', () => {
  test('given decision fields, should stamp a generated id and the timestamp', () => {
    const decision = createDecision(1, 'db', 'sqlite', 'small', [2], '2026-01-01T00:00:00.000Z');

    expect(decision.id).toMatch(/^decision-[a-z0-9]{8}$/);
    expect(decision).toMatchObject({
      madeBy: 1,
      timestamp: '2026-01-01T00:00:00.000Z',
      topic: 'db',
      decision: 'sqlite',
      rationale: 'small',
      affectsExperts: [2],
    });
  });
});

describe('parseExpertContext', () => {
  test('given a stored context without knowledge, should fill empty knowledge', () => {
    const ctx = parseExpertContext('context.yaml', {
      expertId: 1, expertName: 'frontend', sessionHash: 'abcd1234', role: 'frontend', createdAt: 'a', updatedAt: 'b',
      worktreePath: '/wt', worktreeBranch: 'ui',
    });

    expect(ctx.knowledge).toEqual({ filesAnalyzed: [], patternsDiscovered: [] });
    expect(ctx.worktreeBranch).toBe('ui');
    expect(ctx.resumeToken).toBeUndefined();
  });

  test('given a wrong field type, should throw ContextCorruptError', () => {
    expect(() => parseExpertContext('context.yaml', { expertId: 'one' })).toThrow(ContextCorruptError);
  });
});
