import fs from 'node:fs/promises';
import type { SessionConfig } from '../types/config.js';
import type { ExpertContext } from '../types/context.js';
import type { StatusMarker } from '../types/expert.js';
import type { Logger } from '../lib/log.js';
import { errorMessage } from '../lib/errors.js';
import { reportFile, statusFile } from '../lib/paths.js';
import type { AgentController } from './process-manager.js';
import { assignWorktree, clearWorktree, createExpertContext, setResumeToken } from './context.js';
import { renderRoleInstruction, writeRenderedInstruction } from './instructions.js';
import { writeHooksSettings } from './hooks.js';

export type Relocation =
  | { kind: 'worktree'; branch: string }
  | { kind: 'root' };

export interface LaunchRequest {
  expertId: number;
  expertName: string;
  role: string;
  relocate?: Relocation;
  /** Directory for a launch that does not relocate. Used once, never recorded. */
  workingDir?: string;
  /** Ask the running agent to exit first, without moving it. */
  restart?: boolean;
  /** Drop the stored context before loading it. The worktree assignment survives. */
  resetContext?: boolean;
}

export interface LaunchResult {
  expertId: number;
  expertName: string;
  workingDir: string;
  branch?: string;
  /** Worktree the expert was in before this relocation, left on disk. */
  previousBranch?: string;
  ready: boolean;
  instructionSent: boolean;
  error?: Error;
}

export interface WorktreeProvisioner {
  createWorktree(branch: string): Promise<string>;
  establishAlias(worktree: string): Promise<void>;
}

export interface ContextRecords {
  load(sessionHash: string, expertId: number): Promise<ExpertContext | null>;
  update(
    sessionHash: string,
    expertId: number,
    fallback: () => ExpertContext,
    updater: (ctx: ExpertContext) => ExpertContext,
  ): Promise<ExpertContext>;
  clear(sessionHash: string, expertId: number): Promise<void>;
}

export interface MarkerWriter {
  setMarker(expertId: number, content: StatusMarker): Promise<void>;
}

export interface LaunchDeps {
  session: SessionConfig;
  agents: AgentController & { captureSessionId?(expertId: number): Promise<string | null> };
  worktrees: WorktreeProvisioner;
  store: ContextRecords;
  markers: MarkerWriter;
  logger: Logger;
  sleep(ms: number): Promise<void>;
}

async function directoryExists(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Launch, relaunch or relocate one expert. Runs inside a coordinator slot
 * keyed by the expert id, so nothing else touches this expert meanwhile.
 *
 * Worktree and alias failures reject; anything after the context is loaded
 * comes back as `error` on the result.
 */
export async function performGuardedLaunch(deps: LaunchDeps, request: LaunchRequest): Promise<LaunchResult> {
  const { session, agents, worktrees, store, markers, logger } = deps;
  const { expertId, expertName, relocate } = request;
  const hash = session.sessionHash;

  // 1. Best-effort exit of whatever is running in the pane
  if (relocate || request.restart) {
    try {
      await agents.sendExit(expertId);
      await deps.sleep(session.timeouts.gracefulShutdown * 1000);
    } catch (err) {
      logger.warn(`Exit request to ${expertName} failed, continuing: ${errorMessage(err)}`);
    }
  }

  // 2–3. Materialize the worktree and link it back to the data root
  let newWorktree: string | undefined;
  if (relocate?.kind === 'worktree') {
    newWorktree = await worktrees.createWorktree(relocate.branch);
    await worktrees.establishAlias(newWorktree);
    logger.info(`Worktree for ${expertName} ready at ${newWorktree}`);
  }

  const result: LaunchResult = {
    expertId,
    expertName,
    workingDir: session.projectRoot,
    ready: false,
    instructionSent: false,
  };

  try {
    // 4–5. Load, then record the new location with the token cleared
    const fresh = () => createExpertContext(hash, expertId, expertName, request.role);
    let before = (await store.load(hash, expertId)) ?? fresh();
    if (request.resetContext) {
      await store.clear(hash, expertId);
      const kept = before;
      before = kept.worktreeBranch && kept.worktreePath
        ? assignWorktree(fresh(), kept.worktreeBranch, kept.worktreePath)
        : fresh();
    }
    const fallback = () => before;
    if (before.worktreeBranch && relocate && before.worktreeBranch !== branchOf(relocate)) {
      result.previousBranch = before.worktreeBranch;
    }

    let relocateTo: (c: ExpertContext) => ExpertContext = (c) => c;
    if (relocate?.kind === 'worktree' && newWorktree) {
      const wt = newWorktree;
      relocateTo = (c) => assignWorktree(c, relocate.branch, wt);
    } else if (relocate?.kind === 'root') {
      relocateTo = clearWorktree;
    } else if (before.worktreePath && !(await directoryExists(before.worktreePath))) {
      logger.warn(`Worktree ${before.worktreePath} for ${expertName} no longer exists; using project root`);
      relocateTo = clearWorktree;
    }
    const ctx = await store.update(hash, expertId, fallback, (c) => relocateTo({ ...c, role: request.role }));

    const recorded = ctx.worktreePath ?? session.projectRoot;
    result.workingDir = relocate ? recorded : (request.workingDir ?? recorded);
    if (ctx.worktreeBranch) result.branch = ctx.worktreeBranch;

    // 6. Launch, resuming only when the context still carries a token
    const status = statusFile(session.projectRoot, expertId);
    const settingsFile = session.agent.statusHooks
      ? await writeHooksSettings(session.projectRoot, expertId, status)
      : undefined;
    await markers.setMarker(expertId, 'starting');
    await agents.launch(expertId, result.workingDir, ctx.resumeToken, settingsFile);

    // 7. Readiness; a timeout is a result, not an error
    result.ready = await agents.waitForReady(expertId, session.timeouts.agentReady * 1000);
    if (!result.ready) {
      logger.warn(`${expertName} not ready after ${session.timeouts.agentReady}s`);
      return result;
    }

    // 8. Role instruction
    await markers.setMarker(expertId, 'pending');
    const instruction = await renderRoleInstruction(session.projectRoot, ctx.role, {
      EXPERT_ID: String(expertId),
      EXPERT_NAME: expertName,
      ROLE: ctx.role,
      WORKING_DIR: result.workingDir,
      STATUS_FILE: status,
      REPORT_FILE: reportFile(session.projectRoot, expertId),
      PROJECT_ROOT: session.projectRoot,
    });
    if (instruction) {
      await writeRenderedInstruction(session.projectRoot, expertId, instruction);
      await agents.sendInstruction(expertId, instruction);
      result.instructionSent = true;
    }

    // A relocated expert starts a new conversation; its token stays cleared
    if (!relocate && agents.captureSessionId) {
      const token = await agents.captureSessionId(expertId);
      if (token) {
        await store.update(hash, expertId, fallback, (c) => setResumeToken(c, token));
      }
    }
    return result;
  } catch (err) {
    logger.error(`Launch of ${expertName} failed: ${errorMessage(err)}`);
    result.error = err instanceof Error ? err : new Error(String(err));
    return result;
  }
}

function branchOf(relocate: Relocation): string | undefined {
  return relocate.kind === 'worktree' ? relocate.branch : undefined;
}
