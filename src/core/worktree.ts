import fs from 'node:fs/promises';
import path from 'node:path';
import { execa, ExecaError } from 'execa';
import { dataDir, worktreeAliasPath, worktreeBaseDir, worktreePath } from '../lib/paths.js';
import { ExternalCommandError, NotGitRepoError, StaleWorktreeError, errorMessage } from '../lib/errors.js';
import { execaEnv } from '../lib/env.js';

export interface WorktreeEntry {
  path: string;
  head?: string;
  /** Short branch name; absent for a detached HEAD. */
  branch?: string;
  prunable: boolean;
}

async function git(context: string, args: string[], cwd: string): Promise<string> {
  try {
    const result = await execa('git', args, { ...execaEnv, cwd });
    return result.stdout;
  } catch (err) {
    if (err instanceof ExecaError) {
      throw new ExternalCommandError(context, {
        command: 'git',
        args,
        exitCode: err.exitCode,
        stderr: String(err.stderr ?? ''),
      });
    }
    throw err;
  }
}

/**
 * Main repository root for `projectPath`, even when called from inside a
 * linked worktree: the parent of the absolute common git dir.
 */
export async function resolveGitRoot(projectPath: string): Promise<string> {
  let commonDir: string;
  try {
    commonDir = (await git(
      'resolve git root',
      ['rev-parse', '--path-format=absolute', '--git-common-dir'],
      projectPath,
    )).trim();
  } catch (err) {
    throw new NotGitRepoError(projectPath, errorMessage(err));
  }
  return path.dirname(commonDir);
}

export function parseWorktreeList(porcelain: string): WorktreeEntry[] {
  const entries: WorktreeEntry[] = [];
  let current: WorktreeEntry | null = null;
  for (const line of porcelain.split('\n')) {
    if (line.startsWith('worktree ')) {
      current = { path: line.slice('worktree '.length), prunable: false };
      entries.push(current);
    } else if (!current) {
      continue;
    } else if (line.startsWith('HEAD ')) {
      current.head = line.slice('HEAD '.length);
    } else if (line.startsWith('branch ')) {
      current.branch = line.slice('branch '.length).replace(/^refs\/heads\//, '');
    } else if (line === 'prunable' || line.startsWith('prunable ')) {
      current.prunable = true;
    }
  }
  return entries;
}

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}

export class WorktreeManager {
  constructor(readonly gitRoot: string) {}

  static async resolve(projectPath: string): Promise<WorktreeManager> {
    return new WorktreeManager(await resolveGitRoot(projectPath));
  }

  /** Session data root the alias in every worktree points back to. */
  dataRoot(): string {
    return dataDir(this.gitRoot);
  }

  worktreeDir(): string {
    return worktreeBaseDir(this.gitRoot);
  }

  worktreePath(branch: string): string {
    return worktreePath(this.gitRoot, branch);
  }

  async listWorktrees(): Promise<WorktreeEntry[]> {
    const stdout = await git('list worktrees', ['worktree', 'list', '--porcelain'], this.gitRoot);
    return parseWorktreeList(stdout);
  }

  /**
   * Returns the worktree path for `branch`, creating it if needed.
   * A checkout registered with git and present on disk is reused as is, so
   * two experts may share one branch. A path known to only one of git or the
   * filesystem is stale and must be pruned by the user.
   */
  async createWorktree(branch: string): Promise<string> {
    const wtPath = this.worktreePath(branch);
    const registered = (await this.listWorktrees()).some(
      (entry) => path.resolve(entry.path) === path.resolve(wtPath),
    );
    const onDisk = await pathExists(wtPath);

    if (registered && onDisk) return wtPath;
    if (registered) {
      throw new StaleWorktreeError(branch, wtPath, 'registered with git but missing on disk');
    }
    if (onDisk) {
      throw new StaleWorktreeError(branch, wtPath, 'directory exists but is not a registered worktree');
    }

    await fs.mkdir(this.worktreeDir(), { recursive: true });
    try {
      // Existing branch first, then a new branch off the current HEAD
      await git('git worktree add', ['worktree', 'add', wtPath, branch], this.gitRoot);
    } catch {
      await git(`git worktree add -b ${branch}`, ['worktree', 'add', wtPath, '-b', branch], this.gitRoot);
    }
    return wtPath;
  }

  /**
   * Make `<worktree>/.crewmux` a symlink to the canonical data root, replacing
   * whatever is there (stale link, checked-out directory, plain file).
   */
  async establishAlias(worktree: string): Promise<void> {
    const alias = worktreeAliasPath(worktree);
    const target = await fs.realpath(this.dataRoot());

    if (await pathExists(alias)) {
      try {
        await fs.unlink(alias);
      } catch {
        await fs.rm(alias, { recursive: true, force: true });
      }
    }
    await fs.symlink(target, alias, 'dir');
  }

  /** Drop git's records of worktrees whose directories are gone. */
  async pruneWorktrees(): Promise<void> {
    await git('git worktree prune', ['worktree', 'prune'], this.gitRoot);
  }
}
