import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ContextStore } from './context-store.js';
import { assignWorktree, createExpertContext, createSessionRoles, setResumeToken, setRole } from './context.js';
import { ContextCorruptError } from '../lib/errors.js';

const HASH = 'abcd1234';
let queue: string;
let store: ContextStore;

beforeEach(async () => {
  queue = await fs.mkdtemp(path.join(os.tmpdir(), 'crewmux-store-'));
  store = new ContextStore(queue);
});

afterEach(async () => {
  await fs.rm(queue, { recursive: true, force: true });
});

describe('ContextStore', () => {
  test('given initSession, should create one directory per expert and the shared dir', async () => {
    await store.initSession(HASH, 3);

    const experts = await fs.readdir(path.join(queue, 'sessions', HASH, 'experts'));
    expect(experts.sort()).toEqual(['expert0', 'expert1', 'expert2']);
    expect((await fs.stat(path.join(queue, 'sessions', HASH, 'shared'))).isDirectory()).toBe(true);
  });

  test('given nothing saved, should load null', async () => {
    expect(await store.load(HASH, 0)).toBeNull();
  });

  test('given a saved context, should load an equal record', async () => {
    const ctx = setResumeToken(createExpertContext(HASH, 1, 'frontend', 'frontend', 't0'), 'tok');

    const saved = await store.save(ctx);
    const loaded = await store.load(HASH, 1);

    expect(loaded).toEqual(saved);
    expect(loaded?.resumeToken).toBe('tok');
    expect(saved.updatedAt).not.toBe('t0');
  });

  test('given update on a missing record, should start from the fallback', async () => {
    const updated = await store.update(
      HASH, 2,
      () => createExpertContext(HASH, 2, 'backend', 'backend'),
      (ctx) => assignWorktree(ctx, 'api', '/wt/api'),
    );

    expect(updated.worktreePath).toBe('/wt/api');
    expect((await store.load(HASH, 2))?.worktreeBranch).toBe('api');
  });

  test('given concurrent updates of different experts, should both persist', async () => {
    const fallback = (id: number) => () => createExpertContext(HASH, id, `e${id}`, 'general');

    await Promise.all([
      store.update(HASH, 0, fallback(0), (c) => assignWorktree(c, 'a', '/wt/a')),
      store.update(HASH, 1, fallback(1), (c) => assignWorktree(c, 'b', '/wt/b')),
    ]);

    expect((await store.load(HASH, 0))?.worktreeBranch).toBe('a');
    expect((await store.load(HASH, 1))?.worktreeBranch).toBe('b');
  });

  test('given unparseable YAML, should throw ContextCorruptError', async () => {
    const file = path.join(queue, 'sessions', HASH, 'experts', 'expert0', 'context.yaml');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, 'expertId: [unclosed', 'utf-8');

    await expect(store.load(HASH, 0)).rejects.toBeInstanceOf(ContextCorruptError);
  });

  test('given clear, should remove only that expert record', async () => {
    await store.save(createExpertContext(HASH, 0, 'a', 'architect'));
    await store.save(createExpertContext(HASH, 1, 'b', 'backend'));

    await store.clear(HASH, 0);

    expect(await store.load(HASH, 0)).toBeNull();
    expect(await store.load(HASH, 1)).not.toBeNull();
  });

  test('given decisions added, should append them to the shared file', async () => {
    await store.addDecision(HASH, {
      id: 'decision-1', madeBy: 0, timestamp: 't', topic: 'api', decision: 'rest', rationale: 'simple', affectsExperts: [],
    });
    await store.addDecision(HASH, {
      id: 'decision-2', madeBy: 1, timestamp: 't', topic: 'ui', decision: 'tabs', rationale: 'space', affectsExperts: [0],
    });

    const shared = await store.loadShared(HASH);
    expect(shared.decisions.map((d) => d.id)).toEqual(['decision-1', 'decision-2']);
    expect(shared.conventions).toEqual([]);
  });

  test('given saved session roles, should load them back', async () => {
    const roles = setRole(createSessionRoles(HASH, 't0'), 1, 'tester', 't1');

    await store.saveSessionRoles(roles);

    expect((await store.loadSessionRoles(HASH))?.assignments).toEqual([
      { expertId: 1, role: 'tester', assignedAt: 't1' },
    ]);
  });

  test('given concurrent role changes for different experts, should keep both', async () => {
    await Promise.all([
      store.updateSessionRoles(HASH, (roles) => setRole(roles, 0, 'frontend', 't1')),
      store.updateSessionRoles(HASH, (roles) => setRole(roles, 1, 'backend', 't1')),
    ]);

    expect((await store.loadSessionRoles(HASH))?.assignments).toEqual([
      { expertId: 0, role: 'frontend', assignedAt: 't1' },
      { expertId: 1, role: 'backend', assignedAt: 't1' },
    ]);
  });

  test('given two sessions, should clean up only one', async () => {
    await store.initSession(HASH, 1);
    await store.initSession('ffff0000', 1);

    await store.cleanupSession(HASH);

    expect(await fs.readdir(path.join(queue, 'sessions'))).toEqual(['ffff0000']);
  });
});
