import { canonicalIdentity } from '@uplink/shared';

/**
 * Per-episode recovery bookkeeping. The tried-set only grows while the link
 * stays down and is cleared the next time the link is seen connected.
 */
export class RecoveryState {
  lastAttemptAt: number | null = null;
  private tried = new Set<string>();

  markTried(identity: string): void {
    this.tried.add(canonicalIdentity(identity));
  }

  hasTried(identity: string): boolean {
    return this.tried.has(canonicalIdentity(identity));
  }

  triedIdentities(): string[] {
    return Array.from(this.tried);
  }

  resetTried(): void {
    this.tried.clear();
  }
}
