import { GuardRejectedError } from '../lib/errors.js';

export type StartResult =
  | { started: true }
  | { started: false; error: GuardRejectedError };

export type PollResult<TResult> =
  | { kind: 'idle' }
  | { kind: 'running'; label: string; startedAt: number }
  | { kind: 'completed'; label: string; value: TResult }
  | { kind: 'failed'; label: string; error: unknown };

type Outcome<TResult> =
  | { ok: true; value: TResult }
  | { ok: false; error: unknown };

interface Slot<TResult> {
  label: string;
  startedAt: number;
  token: number;
  outcome?: Outcome<TResult>;
}

/**
 * At most one background operation per resource key. The control loop starts
 * work with `start` and observes it with `poll`; neither ever waits on the
 * operation.
 */
export class BackgroundTaskCoordinator<TResult, TKey = number> {
  private readonly slots = new Map<TKey, Slot<TResult>>();
  private nextToken = 1;

  constructor(
    private readonly describeKey: (key: TKey) => string = String,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Schedules `operation` on a later turn of the event loop, so none of its
   * steps run inside the caller. Rejected when `key` already has an operation
   * that has not been polled to completion.
   */
  start(key: TKey, label: string, operation: () => Promise<TResult>): StartResult {
    const active = this.slots.get(key);
    if (active) {
      return { started: false, error: new GuardRejectedError(this.describeKey(key), active.label) };
    }

    const slot: Slot<TResult> = { label, startedAt: this.now(), token: this.nextToken++ };
    this.slots.set(key, slot);

    setImmediate(() => {
      // A synchronous throw from `operation` becomes a rejection here too
      void Promise.resolve().then(operation).then(
        (value) => this.settle(key, slot.token, { ok: true, value }),
        (error: unknown) => this.settle(key, slot.token, { ok: false, error }),
      );
    });
    return { started: true };
  }

  /** A terminal outcome is reported once; the key is idle afterwards. */
  poll(key: TKey): PollResult<TResult> {
    const slot = this.slots.get(key);
    if (!slot) return { kind: 'idle' };
    if (!slot.outcome) return { kind: 'running', label: slot.label, startedAt: slot.startedAt };

    this.slots.delete(key);
    return slot.outcome.ok
      ? { kind: 'completed', label: slot.label, value: slot.outcome.value }
      : { kind: 'failed', label: slot.label, error: slot.outcome.error };
  }

  isInProgress(key: TKey): boolean {
    const slot = this.slots.get(key);
    return slot !== undefined && slot.outcome === undefined;
  }

  keys(): TKey[] {
    return [...this.slots.keys()];
  }

  /**
   * Forget every tracked operation. Work already running is not cancelled;
   * its completion no longer matches a slot and is discarded.
   */
  abandon(): void {
    this.slots.clear();
  }

  private settle(key: TKey, token: number, outcome: Outcome<TResult>): void {
    const slot = this.slots.get(key);
    if (!slot || slot.token !== token) return;
    slot.outcome = outcome;
  }
}
