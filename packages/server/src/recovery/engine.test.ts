import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { RecoveryPhase, ScanResult } from '@uplink/shared';
import { openDatabase, type Db } from '../services/database.js';
import { ConnectionLedger } from '../ledger/service.js';
import { ConnectFailedError, LedgerIOError, UplinkError, UplinkErrorCode } from '../errors.js';
import { fail, ok, type Result } from '../types.js';
import { ConnectionAttemptEngine, type LedgerPort } from './engine.js';
import { RecoveryState } from './state.js';

const ap = (identity: string, signal: number, name = 'STARLINK'): ScanResult => ({ identity, name, signal });

function makeConnector() {
  return {
    connectByProfile: vi.fn(async (name: string): Promise<Result<void>> => fail<void>(new ConnectFailedError(`profile ${name}`))),
    connectWithCredential: vi.fn(async (_identity: string, _name: string, _secret: string): Promise<Result<void>> => ok<void>(undefined)),
  };
}

function makeScanner(results: ScanResult[]) {
  return { scan: vi.fn(async (_allowList: string[]): Promise<Result<ScanResult[]>> => ok(results)) };
}

describe('ConnectionAttemptEngine', () => {
  let db: Db;
  let clock: number;
  let ledger: ConnectionLedger;
  let state: RecoveryState;
  let connector: ReturnType<typeof makeConnector>;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    db = openDatabase(':memory:');
    clock = 100;
    ledger = new ConnectionLedger(db, () => clock);
    state = new RecoveryState();
    connector = makeConnector();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (db.open) db.close();
  });

  function engineFor(scan: ScanResult[], extra: { ledger?: LedgerPort; prompt?: { ask: (name: string, signal?: AbortSignal) => Promise<string | null> } } = {}) {
    const engine = new ConnectionAttemptEngine({
      scanner: makeScanner(scan),
      connector,
      ledger: extra.ledger ?? ledger,
      state,
      prompt: extra.prompt,
      allowList: ['STARLINK', 'STINKY'],
      now: () => clock,
    });
    const phases: RecoveryPhase[] = [];
    engine.on('phase', (p: RecoveryPhase) => phases.push(p));
    return { engine, phases };
  }

  it('reconnects to a known access point and refreshes its last success', async () => {
    ledger.upsert('AA:BB', 'STARLINK', 'pw1');
    clock = 500;
    const { engine, phases } = engineFor([ap('AA:BB', 80)]);

    const outcome = await engine.run({ interactive: false });

    expect(connector.connectWithCredential).toHaveBeenCalledWith('AA:BB', 'STARLINK', 'pw1');
    expect(outcome.status).toBe('succeeded');
    expect(outcome.identity).toBe('AA:BB');
    expect(phases).toEqual(['scanning', 'attempting_known', 'succeeded']);
    expect(ledger.get('AA:BB')?.lastSuccess).toBe(500);
    expect(ledger.getSecret('AA:BB')).toBe('pw1');
  });

  it('falls through to new candidates and exhausts when the only known one fails', async () => {
    ledger.upsert('AA:BB', 'STARLINK', 'pw1');
    connector.connectWithCredential.mockResolvedValueOnce(fail<void>(new ConnectFailedError('AA:BB')));
    const { engine, phases } = engineFor([ap('AA:BB', 80)]);

    const outcome = await engine.run({ interactive: false });

    expect(outcome.status).toBe('exhausted');
    expect(outcome.reason).toBe('all_failed');
    expect(phases).toEqual(['scanning', 'attempting_known', 'attempting_new', 'exhausted']);
    expect(state.triedIdentities()).toEqual(['AA:BB']);
    expect(connector.connectByProfile).not.toHaveBeenCalled();
  });

  it('ends with no_candidates on an empty scan', async () => {
    const { engine, phases } = engineFor([]);
    const outcome = await engine.run({ interactive: false });
    expect(outcome).toMatchObject({ status: 'exhausted', reason: 'no_candidates', attempts: [] });
    expect(phases).toEqual(['scanning', 'exhausted']);
  });

  it('treats a failed scan as no candidates', async () => {
    const engine = new ConnectionAttemptEngine({
      scanner: { scan: async () => fail<ScanResult[]>(new UplinkError('WiFi scan failed', UplinkErrorCode.COMMAND_FAILED)) },
      connector, ledger, state, allowList: ['STARLINK'],
    });
    const outcome = await engine.run({ interactive: true });
    expect(outcome.reason).toBe('no_candidates');
  });

  it('tries saved profiles but never prompts when unattended', async () => {
    const ask = vi.fn(async () => 'secret');
    const { engine } = engineFor([ap('AA:01', 40), ap('AA:02', 90)], { prompt: { ask } });

    const outcome = await engine.run({ interactive: false });

    expect(outcome.reason).toBe('all_failed');
    expect(ask).not.toHaveBeenCalled();
    expect(connector.connectWithCredential).not.toHaveBeenCalled();
    expect(connector.connectByProfile).toHaveBeenCalledTimes(2);
    expect(state.triedIdentities()).toEqual(['AA:02', 'AA:01']);
    expect(outcome.attempts.map(a => `${a.identity}:${a.method}:${a.result}`)).toEqual([
      'AA:02:profile:failed', 'AA:02:prompt:skipped', 'AA:01:profile:failed', 'AA:01:prompt:skipped',
    ]);
  });

  it('connects through an existing profile without touching the ledger', async () => {
    connector.connectByProfile.mockResolvedValueOnce(ok<void>(undefined));
    const { engine } = engineFor([ap('AA:01', 40)]);

    const outcome = await engine.run({ interactive: false });

    expect(outcome).toMatchObject({ status: 'succeeded', identity: 'AA:01', name: 'STARLINK' });
    expect(connector.connectByProfile).toHaveBeenCalledWith('STARLINK');
    expect(ledger.listAll()).toEqual([]);
  });

  it('saves a prompted credential after a successful connect', async () => {
    clock = 900;
    const ask = vi.fn(async () => 'typed-secret');
    const { engine } = engineFor([ap('aa:cc', 70)], { prompt: { ask } });

    const outcome = await engine.run({ interactive: true });

    expect(ask).toHaveBeenCalledWith('STARLINK', undefined);
    expect(connector.connectWithCredential).toHaveBeenCalledWith('AA:CC', 'STARLINK', 'typed-secret');
    expect(outcome.status).toBe('succeeded');
    expect(ledger.get('AA:CC')).toEqual({ identity: 'AA:CC', name: 'STARLINK', secret: 'typed-secret', lastSuccess: 900 });
  });

  it('moves on to the next candidate when a prompt is declined', async () => {
    const ask = vi.fn<(name: string) => Promise<string | null>>()
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce('pw2');
    const { engine } = engineFor([ap('AA:01', 90, 'STARLINK'), ap('AA:02', 60, 'STINKY')], { prompt: { ask } });

    const outcome = await engine.run({ interactive: true });

    expect(ask.mock.calls.map(c => c[0])).toEqual(['STARLINK', 'STINKY']);
    expect(outcome).toMatchObject({ status: 'succeeded', identity: 'AA:02' });
    expect(state.hasTried('AA:01')).toBe(true);
    expect(ledger.getSecret('AA:02')).toBe('pw2');
    expect(ledger.getSecret('AA:01')).toBeUndefined();
  });

  it('skips identities already tried in this episode', async () => {
    ledger.upsert('AA:01', 'STARLINK', 'pw1');
    state.markTried('aa:01');
    const { engine } = engineFor([ap('AA:01', 90)]);

    const outcome = await engine.run({ interactive: false });

    expect(connector.connectWithCredential).not.toHaveBeenCalled();
    expect(connector.connectByProfile).not.toHaveBeenCalled();
    expect(outcome.reason).toBe('all_failed');
  });

  it('tries known access points by most recent success first', async () => {
    ledger.upsert('AA:01', 'STARLINK', 'old');
    clock = 200;
    ledger.upsert('AA:02', 'STARLINK', 'new');
    connector.connectWithCredential.mockResolvedValueOnce(fail<void>(new ConnectFailedError('AA:02')));
    const { engine } = engineFor([ap('AA:01', 99), ap('AA:02', 10)]);

    const outcome = await engine.run({ interactive: false });

    expect(connector.connectWithCredential.mock.calls.map(c => c[2])).toEqual(['new', 'old']);
    expect(outcome).toMatchObject({ status: 'succeeded', identity: 'AA:01' });
  });

  it('stops with cancelled when aborted during a prompt', async () => {
    const controller = new AbortController();
    const ask = vi.fn(async () => {
      controller.abort();
      return null;
    });
    const { engine } = engineFor([ap('AA:01', 90), ap('AA:02', 80)], { prompt: { ask } });

    const outcome = await engine.run({ interactive: true, signal: controller.signal });

    expect(outcome.reason).toBe('cancelled');
    expect(ask).toHaveBeenCalledTimes(1);
    expect(connector.connectWithCredential).not.toHaveBeenCalled();
  });

  it('still reports success when the ledger cannot be written', async () => {
    const broken: LedgerPort = {
      listAll: () => [{ identity: 'AA:01', name: 'STARLINK', secret: 'pw1', lastSuccess: 1 }],
      touch: () => { throw new LedgerIOError('touch', 'disk I/O error'); },
      upsert: () => { throw new LedgerIOError('upsert', 'disk I/O error'); },
    };
    const { engine } = engineFor([ap('AA:01', 90)], { ledger: broken });

    const outcome = await engine.run({ interactive: false });

    expect(outcome.status).toBe('succeeded');
    expect(console.error).toHaveBeenCalledWith('💾 Ledger touch failed: disk I/O error');
  });

  it('ranks without history when the ledger cannot be read', async () => {
    const broken: LedgerPort = {
      listAll: () => { throw new LedgerIOError('list'); },
      touch: () => false,
      upsert: (identity, name, secret) => ({ identity, name, secret, lastSuccess: 0 }),
    };
    connector.connectByProfile.mockResolvedValueOnce(ok<void>(undefined));
    const { engine } = engineFor([ap('AA:01', 90)], { ledger: broken });

    const outcome = await engine.run({ interactive: false });

    expect(outcome.status).toBe('succeeded');
    expect(connector.connectWithCredential).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      '💾 Ledger unavailable, ranking without history: Connection ledger list failed',
    );
  });
});
