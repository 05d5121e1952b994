/** Derived each tick from pane inspection and marker files; never persisted. */
export type ExpertStatus =
  | 'pending'
  | 'starting'
  | 'ready'
  | 'busy'
  | 'stuck'
  | 'unknown';

export interface Expert {
  /** Zero-based pane index inside the session window. */
  id: number;
  name: string;
  role: string;
}

/** Contents a launch operation or an agent hook writes to `queue/status/expert<N>`. */
export type StatusMarker = 'starting' | 'pending' | 'processing';
