import { DEFAULT_HANDOVER_SECONDS } from '@uplink/shared';

/**
 * Seconds until the next handover boundary strictly after `now`
 * (epoch seconds), wrapping into the next minute after the last boundary.
 * Boundaries must be ascending seconds-of-minute.
 */
export function timeRemaining(now: number, boundaries: readonly number[] = DEFAULT_HANDOVER_SECONDS): number {
  if (boundaries.length === 0) throw new Error('at least one handover boundary is required');
  const second = ((Math.floor(now) % 60) + 60) % 60;
  const next = boundaries.find(b => b > second) ?? boundaries[0] + 60;
  return next - second;
}
