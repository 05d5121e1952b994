import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

const state = vi.hoisted(() => ({
  sessionExists: false,
  created: null as { numPanes: number; cwd: string } | null,
  titles: [] as string[],
  env: new Map<string, string>(),
}));

vi.mock('./tmux.js', async () => {
  const { FakePaneController } = await import('../test-fixtures.js');
  class FakeTmux extends FakePaneController {
    constructor(name: string) {
      super(name);
      this.exists = state.sessionExists;
    }

    override async createSession(numPanes: number, cwd: string): Promise<void> {
      state.created = { numPanes, cwd };
      await super.createSession(numPanes, cwd);
    }

    override async setPaneTitle(paneIndex: number, title: string): Promise<void> {
      state.titles[paneIndex] = title;
    }

    async initSessionMetadata(projectPath: string, numExperts: number): Promise<void> {
      state.env.set('CREWMUX_PROJECT_PATH', projectPath);
      state.env.set('CREWMUX_NUM_EXPERTS', String(numExperts));
    }
  }
  return { checkTmux: vi.fn(async () => {}), TmuxManager: FakeTmux };
});

vi.mock('./worktree.js', () => ({
  WorktreeManager: { resolve: vi.fn(async (gitRoot: string) => ({ gitRoot })) },
}));

import { bootstrap } from './bootstrap.js';
import { checkTmux } from './tmux.js';
import { WorktreeManager } from './worktree.js';
import { buildSessionConfig } from './session.js';
import { defaultConfig } from './config.js';
import { InfrastructureError, NotGitRepoError, SessionNotFoundError, TmuxNotFoundError } from '../lib/errors.js';
import { silentLogger } from '../lib/log.js';

let root: string;

beforeEach(async () => {
  vi.clearAllMocks();
  state.sessionExists = false;
  state.created = null;
  state.titles = [];
  state.env.clear();
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'crewmux-boot-'));
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe('bootstrap', () => {
  test('given no running session, should create panes, title them and save roles', async () => {
    const config = buildSessionConfig(root, defaultConfig());

    const session = await bootstrap(config, { logger: silentLogger });

    expect(session.created).toBe(true);
    expect(state.created).toEqual({ numPanes: 4, cwd: root });
    expect(state.titles).toEqual(['architect', 'frontend', 'backend', 'tester']);
    expect(state.env.get('CREWMUX_NUM_EXPERTS')).toBe('4');
    const roles = await session.store.loadSessionRoles(config.sessionHash);
    expect(roles?.assignments.map((a) => a.role)).toEqual(['architect', 'frontend', 'backend', 'tester']);
    await expect(fs.stat(path.join(root, '.crewmux', 'queue', 'status'))).resolves.toBeDefined();
    await expect(fs.stat(path.join(root, '.crewmux', 'queue', 'reports'))).resolves.toBeDefined();
  });

  test('given a running session, should reuse it without creating panes', async () => {
    state.sessionExists = true;

    const session = await bootstrap(buildSessionConfig(root, defaultConfig()), { logger: silentLogger });

    expect(session.created).toBe(false);
    expect(state.created).toBeNull();
  });

  test('given attach with no running session, should throw SessionNotFoundError', async () => {
    await expect(
      bootstrap(buildSessionConfig(root, defaultConfig()), { attach: true, logger: silentLogger }),
    ).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  test('given tmux is missing, should wrap the failure in InfrastructureError', async () => {
    vi.mocked(checkTmux).mockRejectedValueOnce(new TmuxNotFoundError());

    const promise = bootstrap(buildSessionConfig(root, defaultConfig()), { logger: silentLogger });

    await expect(promise).rejects.toBeInstanceOf(InfrastructureError);
    await expect(promise).rejects.toThrow(/^Session bootstrap failed while checking for tmux: tmux is not installed/);
  });

  test('given a directory outside git, should fail before touching tmux', async () => {
    vi.mocked(WorktreeManager.resolve).mockRejectedValueOnce(new NotGitRepoError(root));

    await expect(
      bootstrap(buildSessionConfig(root, defaultConfig()), { logger: silentLogger }),
    ).rejects.toThrow(/resolving the git root/);
    expect(state.created).toBeNull();
  });
});
