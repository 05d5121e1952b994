import fs from 'node:fs/promises';
import type { SessionConfig } from '../types/config.js';
import type { ExpertStatus } from '../types/expert.js';
import type { ExpertContext, SessionRoles } from '../types/context.js';
import type { Logger } from '../lib/log.js';
import { errorMessage } from '../lib/errors.js';
import { sanitizeBranchName } from '../lib/name.js';
import { bundledRoleNames } from '../bundled/roles.js';
import { roleFor } from './context.js';
import type { BackgroundTaskCoordinator, StartResult } from './coordinator.js';
import type { LaunchRequest, LaunchResult, Relocation } from './launch.js';

export type TowerState = 'bootstrapping' | 'running' | 'terminated';

export interface KeyEvent {
  /** Key name as reported by readline: 'up', 'return', 'escape', 'a', ... */
  name: string;
  ctrl?: boolean;
  /** Printable character, when there is one. */
  char?: string;
}

export interface InputSource {
  start(): void;
  /** Everything received since the last call, oldest first. */
  drain(): KeyEvent[];
  stop(): void;
}

export interface ExpertRow {
  id: number;
  name: string;
  /** Config color name, e.g. "red". */
  color: string;
  role: string;
  status: ExpertStatus;
  branch?: string;
  /** Set while a background operation runs for this expert. */
  activity?: 'working';
}

export interface TowerView {
  sessionName: string;
  projectRoot: string;
  experts: ExpertRow[];
  selected: number;
  message: string;
  mode: 'normal' | 'branch-input';
  input: string;
}

export interface Renderer {
  render(view: TowerView): void;
  restore(): void;
}

export interface StatusSource {
  refresh(): Promise<unknown>;
  classifyAll(): ExpertStatus[];
}

export interface LaunchOptions {
  relocate?: Relocation;
  restart?: boolean;
  resetContext?: boolean;
}

export interface TowerDeps {
  session: SessionConfig;
  coordinator: BackgroundTaskCoordinator<LaunchResult>;
  detector: StatusSource;
  input: InputSource;
  renderer: Renderer;
  logger: Logger;
  launch(request: LaunchRequest): Promise<LaunchResult>;
  loadContext(expertId: number): Promise<ExpertContext | null>;
  loadRoles(): Promise<SessionRoles | null>;
  saveRole(expertId: number, role: string): Promise<void>;
  now?: () => number;
}

function labelFor(options: LaunchOptions): string {
  if (options.relocate?.kind === 'worktree') return 'Worktree launch';
  if (options.relocate?.kind === 'root') return 'Return to root';
  if (options.resetContext) return 'Reset';
  return 'Launch';
}

/**
 * Foreground control loop. `tick` never awaits: launches go through the
 * coordinator, status refreshes run detached with at most one in flight.
 */
export class Tower {
  private state: TowerState = 'bootstrapping';
  private selected = 0;
  private message = '';
  private mode: TowerView['mode'] = 'normal';
  private inputBuffer = '';
  private statuses: ExpertStatus[];
  private readonly roles: string[];
  private readonly branches: (string | undefined)[];
  private refreshing = false;
  private lastRefresh = Number.NEGATIVE_INFINITY;
  private interval: NodeJS.Timeout | undefined;
  private finished: (() => void) | undefined;
  private readonly now: () => number;

  constructor(private readonly deps: TowerDeps) {
    const n = deps.session.experts.length;
    this.statuses = Array.from({ length: n }, (): ExpertStatus => 'unknown');
    this.roles = deps.session.experts.map((e) => e.role);
    this.branches = Array.from({ length: n }, () => undefined);
    this.now = deps.now ?? Date.now;
  }

  getState(): TowerState {
    return this.state;
  }

  getMessage(): string {
    return this.message;
  }

  /**
   * Pull roles and worktree assignments from disk before the loop starts.
   * The session role file wins over the role recorded in a context.
   */
  async restore(): Promise<void> {
    let roles: SessionRoles | null = null;
    try {
      roles = await this.deps.loadRoles();
    } catch (err) {
      this.deps.logger.warn(`Could not load session roles: ${errorMessage(err)}`);
    }
    for (const [id, expert] of this.deps.session.experts.entries()) {
      const assigned = roleFor(roles, id);
      if (assigned) this.roles[id] = assigned;
      let ctx: ExpertContext | null;
      try {
        ctx = await this.deps.loadContext(id);
      } catch (err) {
        this.deps.logger.warn(`Could not load context for ${expert.name}: ${errorMessage(err)}`);
        continue;
      }
      if (!ctx) continue;
      if (!assigned) this.roles[id] = ctx.role;
      if (!ctx.worktreePath || !ctx.worktreeBranch) continue;
      try {
        await fs.access(ctx.worktreePath);
        this.branches[id] = ctx.worktreeBranch;
      } catch {
        this.deps.logger.warn(`Worktree ${ctx.worktreePath} for ${expert.name} is gone; ignoring it`);
      }
    }
  }

  startGuardedLaunch(expertId: number, options: LaunchOptions = {}): StartResult {
    const expert = this.deps.session.experts[expertId];
    if (!expert) throw new RangeError(`No expert with id ${expertId}`);
    const request: LaunchRequest = {
      expertId,
      expertName: expert.name,
      role: this.roles[expertId] ?? expert.role,
      ...options,
    };
    const result = this.deps.coordinator.start(expertId, labelFor(options), () => this.deps.launch(request));
    if (result.started) {
      this.message = options.relocate?.kind === 'worktree'
        ? `Creating worktree '${options.relocate.branch}' for ${expert.name}...`
        : `${labelFor(options)} of ${expert.name} started`;
    } else {
      this.message = `Launch of ${expert.name} already in progress`;
      this.deps.logger.info(result.error.message);
    }
    return result;
  }

  /** Apply the terminal outcome for one expert, if there is one. */
  poll(expertId: number): void {
    const expert = this.deps.session.experts[expertId];
    if (!expert) return;
    const outcome = this.deps.coordinator.poll(expertId);
    if (outcome.kind === 'idle' || outcome.kind === 'running') return;

    if (outcome.kind === 'failed') {
      this.message = `${expert.name} launch failed: ${errorMessage(outcome.error)}`;
      this.deps.logger.error(this.message);
      return;
    }

    const result = outcome.value;
    // A failed launch may not have reached the context; keep the last known branch
    if (!result.error || result.branch) this.branches[expertId] = result.branch;
    if (result.error) {
      this.message = `${expert.name} launch failed: ${result.error.message}`;
    } else if (result.ready && result.branch && outcome.label === 'Worktree launch') {
      this.message = `${expert.name} launched in worktree '${result.branch}'`;
    } else if (result.ready) {
      this.message = `${expert.name} ready`;
    } else if (result.branch) {
      this.message = `Worktree '${result.branch}' created but ${expert.name} may still be starting`;
    } else {
      this.message = `${expert.name} launched but may still be starting`;
    }
    this.deps.logger.info(this.message);
  }

  tick(): void {
    if (this.state !== 'running') return;

    for (const event of this.deps.input.drain()) {
      this.handleKey(event);
      if (this.state !== 'running') return;
    }

    for (let id = 0; id < this.deps.session.experts.length; id++) {
      this.poll(id);
    }

    this.kickRefresh();
    this.statuses = this.deps.detector.classifyAll();

    try {
      this.deps.renderer.render(this.view());
    } catch (err) {
      this.deps.logger.error(`Render failed: ${errorMessage(err)}`);
    }
  }

  view(): TowerView {
    return {
      sessionName: this.deps.session.sessionName,
      projectRoot: this.deps.session.projectRoot,
      selected: this.selected,
      message: this.message,
      mode: this.mode,
      input: this.inputBuffer,
      experts: this.deps.session.experts.map((expert, id): ExpertRow => {
        const row: ExpertRow = {
          id,
          name: expert.name,
          color: expert.color,
          role: this.roles[id] ?? expert.role,
          status: this.statuses[id] ?? 'unknown',
        };
        const branch = this.branches[id];
        if (branch) row.branch = branch;
        if (this.deps.coordinator.isInProgress(id)) row.activity = 'working';
        return row;
      }),
    };
  }

  /**
   * Restore, start `initial` launches, then tick on an interval. Resolves
   * once the loop has terminated.
   */
  async run(initial: { expertId: number; options?: LaunchOptions }[] = []): Promise<void> {
    await this.restore();
    for (const { expertId, options } of initial) {
      this.startGuardedLaunch(expertId, options);
    }
    this.state = 'running';
    const done = new Promise<void>((resolve) => {
      this.finished = resolve;
    });
    this.deps.input.start();
    this.interval = setInterval(() => this.tick(), this.deps.session.tickMs);
    this.tick();
    return done;
  }

  /**
   * Leave the loop. In-flight launches are abandoned, not cancelled: agents
   * and git keep running; their results are never polled by this process.
   */
  stop(): void {
    if (this.state === 'terminated') return;
    this.state = 'terminated';
    if (this.interval) clearInterval(this.interval);
    this.interval = undefined;

    const abandoned = this.deps.coordinator.keys().filter((k) => this.deps.coordinator.isInProgress(k));
    this.deps.coordinator.abandon();
    if (abandoned.length > 0) {
      this.deps.logger.info(`Exiting with ${abandoned.length} background operation(s) still running`);
    }

    try {
      this.deps.input.stop();
    } catch (err) {
      this.deps.logger.warn(`Input shutdown failed: ${errorMessage(err)}`);
    }
    try {
      this.deps.renderer.restore();
    } catch (err) {
      this.deps.logger.warn(`Terminal restore failed: ${errorMessage(err)}`);
    }
    this.finished?.();
  }

  private kickRefresh(): void {
    if (this.refreshing) return;
    const now = this.now();
    if (now - this.lastRefresh < this.deps.session.statusRefreshMs) return;
    this.refreshing = true;
    this.lastRefresh = now;
    this.deps.detector.refresh().then(
      () => {
        this.refreshing = false;
      },
      (err: unknown) => {
        this.refreshing = false;
        this.deps.logger.warn(`Status refresh failed: ${errorMessage(err)}`);
      },
    );
  }

  private handleKey(event: KeyEvent): void {
    if (event.ctrl && event.name === 'c') {
      this.stop();
      return;
    }
    if (this.mode === 'branch-input') {
      this.handleBranchInput(event);
      return;
    }

    const count = this.deps.session.experts.length;
    switch (event.name) {
      case 'up':
      case 'k':
        this.selected = (this.selected - 1 + count) % count;
        break;
      case 'down':
      case 'j':
        this.selected = (this.selected + 1) % count;
        break;
      case 'l':
        this.startGuardedLaunch(this.selected, { restart: true });
        break;
      case 'w':
        this.mode = 'branch-input';
        this.inputBuffer = '';
        this.message = 'Branch for worktree (Enter to launch, Esc to cancel)';
        break;
      case 'r':
        this.startGuardedLaunch(this.selected, { relocate: { kind: 'root' } });
        break;
      case 'x':
        this.startGuardedLaunch(this.selected, { restart: true, resetContext: true });
        break;
      case 'c':
        this.cycleRole(this.selected);
        break;
      case 'q':
        this.stop();
        break;
      default:
        break;
    }
  }

  private handleBranchInput(event: KeyEvent): void {
    switch (event.name) {
      case 'escape':
        this.mode = 'normal';
        this.inputBuffer = '';
        this.message = 'Cancelled';
        return;
      case 'backspace':
        this.inputBuffer = this.inputBuffer.slice(0, -1);
        return;
      case 'return':
      case 'enter': {
        const branch = sanitizeBranchName(this.inputBuffer);
        this.mode = 'normal';
        this.inputBuffer = '';
        if (!branch) {
          this.message = 'Invalid branch name';
          return;
        }
        this.startGuardedLaunch(this.selected, { relocate: { kind: 'worktree', branch } });
        return;
      }
      default:
        if (event.char && event.char.length === 1 && event.char >= ' ') {
          this.inputBuffer += event.char;
        }
    }
  }

  private cycleRole(expertId: number): void {
    const expert = this.deps.session.experts[expertId];
    if (!expert) return;
    const current = this.roles[expertId] ?? expert.role;
    const index = bundledRoleNames.indexOf(current);
    const next = bundledRoleNames[(index + 1) % bundledRoleNames.length] ?? 'general';
    this.roles[expertId] = next;
    this.message = `${expert.name} role set to ${next} (applies on next launch)`;
    this.deps.saveRole(expertId, next).catch((err: unknown) => {
      this.deps.logger.error(`Saving role for ${expert.name} failed: ${errorMessage(err)}`);
    });
  }
}
