import type { DishAlert } from '@uplink/shared';

/** Maps dish SNR to 0-4 signal bars. */
export function snrToBars(snr: number): number {
  if (snr < 0) return 0;
  if (snr < 3) return 1;
  if (snr < 6) return 2;
  if (snr < 9) return 3;
  return 4;
}

/** Alerts raised since the previous cycle. */
export function newAlerts(previous: readonly DishAlert[], current: readonly DishAlert[]): DishAlert[] {
  const seen = new Set(previous);
  return current.filter(a => !seen.has(a));
}
