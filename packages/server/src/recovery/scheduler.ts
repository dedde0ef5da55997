import type { LinkType } from '@uplink/shared';
import type { RecoveryState } from './state.js';

/**
 * Gates unattended recovery: never on a wired link, and at most once per
 * cooldown window measured from the previous launch.
 */
export class AutoRecoveryScheduler {
  constructor(private state: RecoveryState, private cooldownSeconds = 300) {}

  shouldAttempt(linkType: LinkType, now: number): boolean {
    if (linkType === 'ethernet') return false;
    const last = this.state.lastAttemptAt;
    return last === null || now - last >= this.cooldownSeconds;
  }

  /** Recorded at launch, so a slow attempt still blocks the next tick. */
  markLaunched(now: number): void {
    this.state.lastAttemptAt = now;
  }

  tryBegin(linkType: LinkType, now: number): boolean {
    if (!this.shouldAttempt(linkType, now)) return false;
    this.markLaunched(now);
    return true;
  }

  /** Seconds until the cooldown lapses; 0 when an attempt is allowed. */
  remaining(now: number): number {
    const last = this.state.lastAttemptAt;
    if (last === null) return 0;
    return Math.max(0, this.cooldownSeconds - (now - last));
  }
}
