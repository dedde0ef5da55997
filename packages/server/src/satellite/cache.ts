import type { OrbitalElement } from '@uplink/shared';
import type { ElementSource } from '../types.js';
import type { UplinkError } from '../errors.js';
import { FetchError, describeError } from '../errors.js';

export type RefreshResult =
  | { status: 'fresh' }
  | { status: 'refreshed'; count: number }
  | { status: 'failed'; error: UplinkError };

/**
 * Orbital element cache. The element list is swapped as a whole on a
 * successful refresh; a failed refresh leaves list and timestamp alone so
 * callers keep estimating from the previous set.
 */
export class OrbitalElementCache {
  private elements: readonly OrbitalElement[] = [];
  private refreshedAt: number | null = null;
  private inflight: Promise<RefreshResult> | null = null;

  constructor(private source: ElementSource, private intervalSeconds = 86_400) {}

  get(): readonly OrbitalElement[] {
    return this.elements;
  }

  lastRefreshAt(): number | null {
    return this.refreshedAt;
  }

  isStale(now: number): boolean {
    return this.refreshedAt === null || now - this.refreshedAt >= this.intervalSeconds;
  }

  /** Concurrent callers share the refresh already in flight. */
  refreshIfStale(now: number): Promise<RefreshResult> {
    if (!this.isStale(now)) return Promise.resolve({ status: 'fresh' });
    if (!this.inflight) {
      this.inflight = this.refresh(now).finally(() => { this.inflight = null; });
    }
    return this.inflight;
  }

  private async refresh(now: number): Promise<RefreshResult> {
    let error: UplinkError;
    try {
      const result = await this.source.fetchElements();
      if (result.ok) {
        this.elements = Object.freeze([...result.value]);
        this.refreshedAt = now;
        console.log(`🛰️  Loaded ${result.value.length} orbital elements`);
        return { status: 'refreshed', count: result.value.length };
      }
      error = result.error;
    } catch (err) {
      error = new FetchError('TLE fetch failed', describeError(err));
    }
    console.warn(`🛰️  TLE refresh failed, keeping ${this.elements.length} cached elements: ${error.details ?? error.message}`);
    return { status: 'failed', error };
  }
}
