// ============================================================================
// Uplink — Monitor: periodic status cycle and recovery driver
// ============================================================================
import { EventEmitter } from 'events';
import type {
  DishAlert, LinkState, LinkType, RecoveryOutcome, StatusSnapshot, VisibilityEstimate,
} from '@uplink/shared';
import { UNKNOWN_SATELLITE, UNREACHABLE_STATE } from '@uplink/shared';
import type { LinkTypeProbe, Result, StatusProvider } from '../types.js';
import type { TuningConfig } from '../config.js';
import type { ConnectionAttemptEngine } from '../recovery/engine.js';
import type { AutoRecoveryScheduler } from '../recovery/scheduler.js';
import type { RecoveryState } from '../recovery/state.js';
import type { OrbitalElementCache } from '../satellite/cache.js';
import type { LocationService } from '../location/service.js';
import type { ElevationFn } from '../satellite/visibility.js';
import { estimateVisibility } from '../satellite/visibility.js';
import { timeRemaining } from '../satellite/handover.js';
import { newAlerts, snrToBars } from '../dish/signal.js';
import { describeError } from '../errors.js';

export interface MonitorDeps {
  status: Pick<StatusProvider, 'getLinkState'>;
  linkProbe: LinkTypeProbe;
  wifi: { disconnectWifi(): Promise<Result<string | null>> };
  engine: Pick<ConnectionAttemptEngine, 'run'>;
  scheduler: Pick<AutoRecoveryScheduler, 'tryBegin'>;
  state: Pick<RecoveryState, 'resetTried'>;
  elements: Pick<OrbitalElementCache, 'get' | 'lastRefreshAt' | 'refreshIfStale'>;
  location: Pick<LocationService, 'get' | 'resolve'>;
  prompt?: { cancelAll(): void };
  config: Pick<TuningConfig, 'tickIntervalMs' | 'minElevationDeg' | 'handoverSeconds'>;
  /** Epoch milliseconds. */
  now?: () => number;
  elevation?: ElevationFn;
}

/**
 * Drives one status cycle per tick and launches recovery sessions.
 *
 * Cycles and manual connects share one exclusion: a tick that finds either
 * running is skipped, a manual connect waits its turn.
 *
 * Events: `snapshot`, `alerts`, `recovery`.
 */
export class UplinkMonitor extends EventEmitter {
  private timer: ReturnType<typeof setInterval> | null = null;
  private lock: Promise<void> = Promise.resolve();
  private active = 0;
  private stopped = false;
  private session: AbortController | null = null;
  private previousAlerts: DishAlert[] = [];
  private lastSnapshot: StatusSnapshot | null = null;
  private lastOutcome: RecoveryOutcome | null = null;
  private now: () => number;

  constructor(private deps: MonitorDeps) {
    super();
    this.now = deps.now ?? Date.now;
  }

  get snapshot(): StatusSnapshot | null {
    return this.lastSnapshot;
  }

  get lastRecovery(): RecoveryOutcome | null {
    return this.lastOutcome;
  }

  get busy(): boolean {
    return this.active > 0;
  }

  start() {
    if (this.timer) return;
    this.stopped = false;
    console.log(`🔁 Monitor started (every ${this.deps.config.tickIntervalMs / 1000}s)`);
    this.tick();
    this.timer = setInterval(() => this.tick(), this.deps.config.tickIntervalMs);
  }

  /** Aborts the running session; queued work after this settles as cancelled. */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.session?.abort();
    this.deps.prompt?.cancelAll();
    await this.lock;
  }

  /** Starts a cycle unless one is already running; returns whether it did. */
  tick(): boolean {
    if (this.stopped) return false;
    if (this.busy) {
      console.log('🔁 Previous cycle still running, skipping tick');
      return false;
    }
    this.runCycle().catch((err) => {
      console.error(`🔁 Status cycle failed: ${describeError(err)}`);
    });
    return true;
  }

  runCycle(): Promise<StatusSnapshot> {
    return this.exclusive(() => this.cycle());
  }

  /** Manual, attended recovery session. Starts with a fresh tried-set. */
  connectNow(): Promise<RecoveryOutcome> {
    return this.exclusive(() => {
      this.deps.state.resetTried();
      return this.runSession(true);
    });
  }

  disconnectWifi(): Promise<Result<string | null>> {
    return this.deps.wifi.disconnectWifi();
  }

  estimate(at: number = this.now()): VisibilityEstimate {
    const location = this.deps.location.get();
    if (!location) return { serving: UNKNOWN_SATELLITE, visibleCount: 0 };
    return estimateVisibility(location, this.deps.elements.get(), new Date(at), {
      minElevationDeg: this.deps.config.minElevationDeg,
      elevation: this.deps.elevation,
    });
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    this.active++;
    const run = this.lock.then(fn).finally(() => { this.active--; });
    this.lock = run.then(() => undefined, () => undefined);
    return run;
  }

  private async cycle(): Promise<StatusSnapshot> {
    const { status, linkProbe, scheduler, state, elements, location, config } = this.deps;
    const nowMs = this.now();
    const now = Math.floor(nowMs / 1000);

    const linkResult = await status.getLinkState();
    const link: LinkState = linkResult.ok
      ? linkResult.value
      : { connected: false, rawState: UNREACHABLE_STATE, reason: 'provider_unreachable', alerts: [] };

    const typeResult = await linkProbe.getLinkType();
    const linkType: LinkType = typeResult.ok ? typeResult.value : 'unknown';

    if (link.connected) {
      state.resetTried();
      await location.resolve();
    } else if (!this.stopped && scheduler.tryBegin(linkType, now)) {
      console.log(`🔁 Link down (${link.rawState}), starting unattended recovery`);
      await this.runSession(false);
    }

    // Never awaited: a stale element set is still used
    void elements.refreshIfStale(now);

    let fresh: DishAlert[] = [];
    if (link.connected) {
      fresh = newAlerts(this.previousAlerts, link.alerts);
      this.previousAlerts = link.alerts;
      if (fresh.length > 0) {
        console.warn(`⚠️ Dish alert: ${fresh.join(', ')}`);
        this.emit('alerts', fresh);
      }
    }

    const visibility = this.estimate(nowMs);
    const snapshot: StatusSnapshot = {
      timestamp: nowMs,
      link,
      linkType,
      bars: link.metrics ? snrToBars(link.metrics.snr) : 0,
      alerts: link.alerts,
      newAlerts: fresh,
      servingSatellite: visibility.serving,
      visibleSatellites: visibility.visibleCount,
      handoverSeconds: timeRemaining(now, config.handoverSeconds),
      elementCount: elements.get().length,
      elementsRefreshedAt: elements.lastRefreshAt(),
      recovery: this.lastOutcome,
    };
    this.lastSnapshot = snapshot;
    this.emit('snapshot', snapshot);
    return snapshot;
  }

  private async runSession(interactive: boolean): Promise<RecoveryOutcome> {
    if (this.stopped) {
      const at = Math.floor(this.now() / 1000);
      return { status: 'exhausted', reason: 'cancelled', interactive, attempts: [], startedAt: at, finishedAt: at };
    }
    const controller = new AbortController();
    this.session = controller;
    try {
      const outcome = await this.deps.engine.run({ interactive, signal: controller.signal });
      this.lastOutcome = outcome;
      this.emit('recovery', outcome);
      return outcome;
    } finally {
      this.session = null;
    }
  }
}
