/**
 * Straggler Policy
 *
 * Decides when the driver stops waiting for slow sources on the current entry.
 * Skipped sources count as absent evidence for that entry only; their streams
 * keep running and may still answer later entries in time.
 */

export interface StragglerPolicy {
  /** Share of sources (0..1) that must have answered before anything is skipped */
  readonly minCompletedFraction: number;
  /** Skip once every missing source is this many entries behind the fastest (0 = off) */
  readonly maxLag: number;
  /** Skip once this long has passed since the quorum was reached (0 = off) */
  readonly graceMs: number;
}

/**
 * Never skips: every source is awaited on every entry
 */
export const WAIT_FOR_ALL: StragglerPolicy = Object.freeze({
  minCompletedFraction: 1,
  maxLag: 0,
  graceMs: 0,
});

export interface StragglerState {
  /** Index of the entry being reconciled */
  readonly position: number;
  /** Number of entries answered, per source */
  readonly answered: ReadonlyMap<string, number>;
  /** When the quorum for `position` was first observed, null before that */
  readonly quorumReachedAt: number | null;
  readonly now: number;
}

/**
 * Fraction of sources that answered the entry at `position`
 */
export function completedFraction(position: number, answered: ReadonlyMap<string, number>): number {
  if (answered.size === 0) return 1;
  let done = 0;
  for (const count of answered.values()) {
    if (count > position) done++;
  }
  return done / answered.size;
}

export function hasQuorum(policy: StragglerPolicy, position: number, answered: ReadonlyMap<string, number>): boolean {
  const fraction = completedFraction(position, answered);
  return fraction > 0 && fraction >= policy.minCompletedFraction;
}

/**
 * Whether to reconcile the entry at `position` without the sources that have
 * not answered it yet
 */
export function shouldSkipStraggler(policy: StragglerPolicy, state: StragglerState): boolean {
  const counts = [...state.answered.values()];
  const missing = counts.filter((count) => count <= state.position);
  if (missing.length === 0 || !hasQuorum(policy, state.position, state.answered)) {
    return false;
  }

  const fastest = Math.max(...counts);
  const lagging = policy.maxLag > 0 && missing.every((count) => fastest - count >= policy.maxLag);
  const expired =
    policy.graceMs > 0 && state.quorumReachedAt !== null && state.now - state.quorumReachedAt >= policy.graceMs;
  return lagging || expired;
}
