// ============================================================================
// Uplink — Connection Attempt Engine
// ============================================================================
import { EventEmitter } from 'events';
import type {
  AccessPointRecord, AttemptRecord, ExhaustedReason, RankedCandidate, RecoveryOutcome, RecoveryPhase,
} from '@uplink/shared';
import type { ConnectPrimitive, CredentialPrompt, NetworkScanner } from '../types.js';
import type { ConnectionLedger } from '../ledger/service.js';
import type { RecoveryState } from './state.js';
import { rankCandidates } from '../wifi/ranker.js';
import { errorDetails } from '../errors.js';

export type LedgerPort = Pick<ConnectionLedger, 'listAll' | 'touch' | 'upsert'>;

export interface EngineDeps {
  scanner: NetworkScanner;
  connector: ConnectPrimitive;
  ledger: LedgerPort;
  state: RecoveryState;
  prompt?: CredentialPrompt;
  allowList: string[];
  now?: () => number;
}

export interface RunOptions {
  /** A human is present to answer credential prompts. */
  interactive: boolean;
  signal?: AbortSignal;
}

/**
 * Walks one recovery session:
 * idle → scanning → attempting_known → attempting_new → succeeded | exhausted.
 *
 * Emits `phase` on every transition and `attempt` for every connect try.
 * Never throws for connect, scan or ledger failures; exhaustion is an outcome.
 */
export class ConnectionAttemptEngine extends EventEmitter {
  private current: RecoveryPhase = 'idle';
  private now: () => number;

  constructor(private deps: EngineDeps) {
    super();
    this.now = deps.now ?? (() => Math.floor(Date.now() / 1000));
  }

  get phase(): RecoveryPhase { return this.current; }

  async run({ interactive, signal }: RunOptions): Promise<RecoveryOutcome> {
    const { scanner, connector, state, prompt } = this.deps;
    const startedAt = this.now();
    const attempts: AttemptRecord[] = [];

    const record = (attempt: AttemptRecord) => {
      attempts.push(attempt);
      this.emit('attempt', attempt);
    };
    const exhausted = (reason: ExhaustedReason): RecoveryOutcome => {
      this.setPhase('exhausted');
      console.log(`🔁 Recovery exhausted (${reason}) after ${attempts.length} attempt(s)`);
      return { status: 'exhausted', reason, interactive, attempts, startedAt, finishedAt: this.now() };
    };
    const succeeded = (c: RankedCandidate): RecoveryOutcome => {
      this.setPhase('succeeded');
      console.log(`🔁 Connected to ${c.name} (${c.identity})`);
      return {
        status: 'succeeded', identity: c.identity, name: c.name, interactive, attempts, startedAt, finishedAt: this.now(),
      };
    };

    this.setPhase('scanning');
    const scan = await scanner.scan(this.deps.allowList);
    if (signal?.aborted) return exhausted('cancelled');
    if (!scan.ok || scan.value.length === 0) {
      if (!scan.ok) console.warn(`🔁 Scan unavailable: ${scan.error.details ?? scan.error.message}`);
      return exhausted('no_candidates');
    }

    const ranked = rankCandidates(scan.value, this.ledgerSnapshot());

    // Known access points, most recently used first
    this.setPhase('attempting_known');
    for (const c of ranked) {
      if (!c.record || state.hasTried(c.identity)) continue;
      if (signal?.aborted) return exhausted('cancelled');

      const result = await connector.connectWithCredential(c.identity, c.name, c.record.secret);
      if (result.ok) {
        record({ identity: c.identity, name: c.name, phase: 'attempting_known', method: 'credential', result: 'connected' });
        this.ledgerWrite('touch', () => this.deps.ledger.touch(c.identity));
        return succeeded(c);
      }
      record({
        identity: c.identity, name: c.name, phase: 'attempting_known', method: 'credential', result: 'failed',
        error: result.error.details ?? result.error.message,
      });
      state.markTried(c.identity);
    }

    // Everything left, strongest first
    this.setPhase('attempting_new');
    const remaining = ranked.filter(c => !state.hasTried(c.identity)).sort((a, b) => b.signal - a.signal);
    for (const c of remaining) {
      if (signal?.aborted) return exhausted('cancelled');

      const profile = await connector.connectByProfile(c.name);
      if (profile.ok) {
        record({ identity: c.identity, name: c.name, phase: 'attempting_new', method: 'profile', result: 'connected' });
        if (c.record) this.ledgerWrite('touch', () => this.deps.ledger.touch(c.identity));
        return succeeded(c);
      }
      record({
        identity: c.identity, name: c.name, phase: 'attempting_new', method: 'profile', result: 'failed',
        error: profile.error.details ?? profile.error.message,
      });

      if (!interactive || !prompt) {
        record({ identity: c.identity, name: c.name, phase: 'attempting_new', method: 'prompt', result: 'skipped' });
        state.markTried(c.identity);
        continue;
      }

      const secret = await prompt.ask(c.name, signal);
      if (signal?.aborted) return exhausted('cancelled');
      if (!secret) {
        record({ identity: c.identity, name: c.name, phase: 'attempting_new', method: 'prompt', result: 'declined' });
        state.markTried(c.identity);
        continue;
      }

      const result = await connector.connectWithCredential(c.identity, c.name, secret);
      if (result.ok) {
        record({ identity: c.identity, name: c.name, phase: 'attempting_new', method: 'prompt', result: 'connected' });
        this.ledgerWrite('upsert', () => this.deps.ledger.upsert(c.identity, c.name, secret));
        return succeeded(c);
      }
      record({
        identity: c.identity, name: c.name, phase: 'attempting_new', method: 'prompt', result: 'failed',
        error: result.error.details ?? result.error.message,
      });
      state.markTried(c.identity);
    }

    return exhausted('all_failed');
  }

  private setPhase(phase: RecoveryPhase) {
    this.current = phase;
    this.emit('phase', phase);
  }

  /** Best effort: a broken ledger must not stop the session. */
  private ledgerSnapshot(): AccessPointRecord[] {
    try {
      return this.deps.ledger.listAll();
    } catch (err) {
      console.error(`💾 Ledger unavailable, ranking without history: ${errorDetails(err)}`);
      return [];
    }
  }

  private ledgerWrite(operation: string, fn: () => unknown) {
    try {
      fn();
    } catch (err) {
      console.error(`💾 Ledger ${operation} failed: ${errorDetails(err)}`);
    }
  }
}
