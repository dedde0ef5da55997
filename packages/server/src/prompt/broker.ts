import { randomUUID } from 'crypto';
import type { CredentialRequest } from '@uplink/shared';
import type { CredentialPrompt } from '../types.js';

/** Delivers a request and returns how many clients received it. */
export type RequestSender = (request: CredentialRequest) => number;

/**
 * Credential prompt answered by WebSocket clients. The first response for a
 * request wins; no listener, a timeout or an abort all count as declined.
 */
export class CredentialBroker implements CredentialPrompt {
  private pending = new Map<string, (secret: string | null) => void>();

  constructor(private send: RequestSender, private timeoutMs = 120_000) {}

  get pendingCount(): number {
    return this.pending.size;
  }

  ask(name: string, signal?: AbortSignal): Promise<string | null> {
    if (signal?.aborted) return Promise.resolve(null);
    const id = randomUUID();

    return new Promise(resolve => {
      const finish = (secret: string | null) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.pending.delete(id);
        resolve(secret);
      };
      const onAbort = () => finish(null);
      const timer = setTimeout(() => {
        console.warn(`🔑 No credential for ${name} within ${Math.round(this.timeoutMs / 1000)}s`);
        finish(null);
      }, this.timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.pending.set(id, finish);

      if (this.send({ type: 'credential_request', id, name }) === 0) {
        console.warn(`🔑 No client connected to enter a credential for ${name}`);
        finish(null);
      }
    });
  }

  /** Returns false when the request is unknown or already settled. */
  answer(id: string, secret: string | null): boolean {
    const finish = this.pending.get(id);
    if (!finish) return false;
    finish(secret ? secret : null);
    return true;
  }

  cancelAll(): void {
    for (const finish of Array.from(this.pending.values())) finish(null);
  }
}
