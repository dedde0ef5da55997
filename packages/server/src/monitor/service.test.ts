import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import type {
  LinkState, LinkType, ObserverLocation, OrbitalElement, RecoveryOutcome, StatusSnapshot,
} from '@uplink/shared';
import { ProviderUnreachableError } from '../errors.js';
import { fail, ok, type Result } from '../types.js';
import type { RunOptions } from '../recovery/engine.js';
import { AutoRecoveryScheduler } from '../recovery/scheduler.js';
import { RecoveryState } from '../recovery/state.js';
import type { RefreshResult } from '../satellite/cache.js';
import { TEST_SAT } from '../satellite/fixtures.js';
import { UplinkMonitor, type MonitorDeps } from './service.js';

const T0 = 1_700_000_025_000; // second 45 of the minute
const HOME: ObserverLocation = { latitude: 10, longitude: 20, altitude: 0 };

const up = (alerts: LinkState['alerts'] = [], snr = 7): LinkState => ({
  connected: true,
  rawState: 'CONNECTED',
  metrics: { snr, downlinkBps: 1, uplinkBps: 1, latencyMs: 30, uptimeSeconds: 60 },
  alerts,
});
const down: LinkState = { connected: false, rawState: 'SEARCHING', alerts: [] };

const outcome = (interactive: boolean): RecoveryOutcome => ({
  status: 'exhausted', reason: 'all_failed', interactive, attempts: [], startedAt: 0, finishedAt: 0,
});

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(r => { resolve = r; });
  return { promise, resolve };
}

describe('UplinkMonitor', () => {
  let clock: number;
  let linkState: Result<LinkState>;
  let linkType: LinkType;
  let elements: OrbitalElement[];
  let state: RecoveryState;
  let deps: MonitorDeps & {
    status: { getLinkState: Mock<() => Promise<Result<LinkState>>> };
    engine: { run: Mock<(opts: RunOptions) => Promise<RecoveryOutcome>> };
    location: {
      get: Mock<() => ObserverLocation | undefined>;
      resolve: Mock<() => Promise<ObserverLocation | undefined>>;
    };
    elements: {
      get: () => readonly OrbitalElement[];
      lastRefreshAt: () => number | null;
      refreshIfStale: Mock<(now: number) => Promise<RefreshResult>>;
    };
  };
  let monitor: UplinkMonitor;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    clock = T0;
    linkState = ok(up());
    linkType = 'wifi';
    elements = [];
    state = new RecoveryState();
    deps = {
      status: { getLinkState: vi.fn(async () => linkState) },
      linkProbe: { getLinkType: async () => ok(linkType) },
      wifi: { disconnectWifi: async () => ok('STARLINK') },
      engine: { run: vi.fn(async (opts: RunOptions) => outcome(opts.interactive)) },
      scheduler: new AutoRecoveryScheduler(state, 300),
      state,
      elements: {
        get: () => elements,
        lastRefreshAt: () => null,
        refreshIfStale: vi.fn(async (_now: number): Promise<RefreshResult> => ({ status: 'fresh' })),
      },
      location: {
        get: vi.fn((): ObserverLocation | undefined => HOME),
        resolve: vi.fn(async (): Promise<ObserverLocation | undefined> => HOME),
      },
      config: { tickIntervalMs: 30_000, minElevationDeg: 25, handoverSeconds: [12, 27, 42, 57] },
      now: () => clock,
      elevation: el => (el.name === TEST_SAT.name ? 60 : null),
    };
    monitor = new UplinkMonitor(deps);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('assembles a snapshot for a connected dish', async () => {
    elements = [TEST_SAT];
    const snapshot = await monitor.runCycle();

    expect(snapshot).toEqual<StatusSnapshot>({
      timestamp: T0,
      link: up(),
      linkType: 'wifi',
      bars: 3,
      alerts: [],
      newAlerts: [],
      servingSatellite: 'TESTSAT-1',
      visibleSatellites: 1,
      handoverSeconds: 12,
      elementCount: 1,
      elementsRefreshedAt: null,
      recovery: null,
    });
    expect(monitor.snapshot).toBe(snapshot);
    expect(deps.location.resolve).toHaveBeenCalledTimes(1);
    expect(deps.engine.run).not.toHaveBeenCalled();
  });

  it('kicks an element refresh every cycle', async () => {
    await monitor.runCycle();
    expect(deps.elements.refreshIfStale).toHaveBeenCalledWith(T0 / 1000);
  });

  it('reports an unreachable dish as disconnected', async () => {
    linkState = fail(new ProviderUnreachableError('timeout'));
    linkType = 'ethernet';
    const snapshot = await monitor.runCycle();

    expect(snapshot.link).toEqual({
      connected: false, rawState: 'Disconnected (Unable to reach dish)', reason: 'provider_unreachable', alerts: [],
    });
    expect(snapshot.bars).toBe(0);
  });

  it('never recovers over a wired link', async () => {
    linkState = ok(down);
    linkType = 'ethernet';
    await monitor.runCycle();
    clock += 3_600_000;
    await monitor.runCycle();
    expect(deps.engine.run).not.toHaveBeenCalled();
  });

  it('recovers unattended at most once per cooldown', async () => {
    linkState = ok(down);
    const recoveries: RecoveryOutcome[] = [];
    monitor.on('recovery', (o: RecoveryOutcome) => recoveries.push(o));

    const first = await monitor.runCycle();
    clock += 299_000;
    await monitor.runCycle();
    clock += 1_000;
    await monitor.runCycle();

    expect(deps.engine.run).toHaveBeenCalledTimes(2);
    expect(deps.engine.run.mock.calls[0][0].interactive).toBe(false);
    expect(first.recovery).toEqual(outcome(false));
    expect(recoveries).toHaveLength(2);
  });

  it('clears the tried-set once the link is back', async () => {
    state.markTried('AA:01');
    await monitor.runCycle();
    expect(state.triedIdentities()).toEqual([]);
  });

  it('keeps the tried-set while the link stays down', async () => {
    linkState = ok(down);
    state.markTried('AA:01');
    await monitor.runCycle();
    expect(state.triedIdentities()).toEqual(['AA:01']);
  });

  it('emits only alerts that are new since the last cycle', async () => {
    const emitted: string[][] = [];
    monitor.on('alerts', (a: string[]) => emitted.push(a));

    linkState = ok(up(['Obstructed']));
    await monitor.runCycle();
    linkState = ok(up(['Obstructed', 'Motors Stuck']));
    const snapshot = await monitor.runCycle();

    expect(emitted).toEqual([['Obstructed'], ['Motors Stuck']]);
    expect(snapshot.newAlerts).toEqual(['Motors Stuck']);
  });

  it('reports unknown visibility without a location', async () => {
    elements = [TEST_SAT];
    deps.location.get.mockReturnValue(undefined);
    const snapshot = await monitor.runCycle();
    expect(snapshot).toMatchObject({ servingSatellite: 'unknown', visibleSatellites: 0 });
  });

  it('skips a tick while a cycle is still running', async () => {
    const pending = deferred<Result<LinkState>>();
    deps.status.getLinkState.mockReturnValueOnce(pending.promise);

    expect(monitor.tick()).toBe(true);
    expect(monitor.tick()).toBe(false);
    pending.resolve(ok(up()));
    await vi.waitFor(() => expect(monitor.snapshot).not.toBeNull());

    expect(deps.status.getLinkState).toHaveBeenCalledTimes(1);
    expect(monitor.busy).toBe(false);
  });

  it('runs a manual connect after the running cycle, with a fresh tried-set', async () => {
    const pending = deferred<Result<LinkState>>();
    deps.status.getLinkState.mockReturnValueOnce(pending.promise);
    state.markTried('AA:01');
    linkType = 'ethernet';

    const cycle = monitor.runCycle();
    const manual = monitor.connectNow();
    await Promise.resolve();
    expect(deps.engine.run).not.toHaveBeenCalled();

    pending.resolve(ok(down));
    await cycle;
    const result = await manual;

    expect(result).toEqual(outcome(true));
    expect(deps.engine.run).toHaveBeenCalledTimes(1);
    expect(deps.engine.run.mock.calls[0][0].interactive).toBe(true);
    expect(state.triedIdentities()).toEqual([]);
  });

  it('aborts the running session on stop', async () => {
    linkState = ok(down);
    let seen: AbortSignal | undefined;
    deps.engine.run.mockImplementationOnce(opts => new Promise(resolve => {
      seen = opts.signal;
      opts.signal?.addEventListener('abort', () => resolve({ ...outcome(false), reason: 'cancelled' }));
    }));
    const cancelAll = vi.fn();
    monitor = new UplinkMonitor({ ...deps, prompt: { cancelAll } });

    const cycle = monitor.runCycle();
    await vi.waitFor(() => expect(seen).toBeDefined());
    await monitor.stop();

    expect(seen?.aborted).toBe(true);
    expect(cancelAll).toHaveBeenCalledTimes(1);
    expect((await cycle).recovery?.reason).toBe('cancelled');
  });

  it('cancels a queued manual connect when stopped', async () => {
    const pending = deferred<Result<LinkState>>();
    deps.status.getLinkState.mockReturnValueOnce(pending.promise);

    const cycle = monitor.runCycle();
    const manual = monitor.connectNow();
    const stopping = monitor.stop();
    pending.resolve(ok(down));
    await cycle;
    await stopping;

    expect(await manual).toEqual<RecoveryOutcome>({
      status: 'exhausted',
      reason: 'cancelled',
      interactive: true,
      attempts: [],
      startedAt: T0 / 1000,
      finishedAt: T0 / 1000,
    });
    expect(deps.engine.run).not.toHaveBeenCalled();
  });

  it('refuses ticks and sessions after stop', async () => {
    linkState = ok(down);
    await monitor.stop();

    expect(monitor.tick()).toBe(false);
    expect((await monitor.connectNow()).reason).toBe('cancelled');
    expect(deps.status.getLinkState).not.toHaveBeenCalled();
    expect(deps.engine.run).not.toHaveBeenCalled();
  });

  it('delegates WiFi disconnect', async () => {
    expect(await monitor.disconnectWifi()).toEqual({ ok: true, value: 'STARLINK' });
  });
});
