// ============================================================================
// Uplink — Dish status client
// ============================================================================
import * as http from 'http';
import type { DishAlert, DishMetrics, LinkState, ObserverLocation } from '@uplink/shared';
import type { Result, StatusProvider } from '../types.js';
import { fail, ok } from '../types.js';
import { ProviderUnreachableError, describeError } from '../errors.js';

export type HttpGet = (url: string, timeoutMs: number) => Promise<string>;

export const fetchWithTimeout: HttpGet = (url, timeoutMs) => {
  return new Promise((resolve, reject) => {
    const req = http.get(url, { timeout: timeoutMs }, (res) => {
      if (res.statusCode && res.statusCode >= 400) {
        res.resume();
        reject(new Error(`HTTP ${res.statusCode}`));
        return;
      }
      let data = '';
      res.setEncoding('utf8');
      res.on('data', (chunk: string) => data += chunk);
      res.on('end', () => resolve(data));
    });
    req.on('error', reject);
    req.on('timeout', () => { req.destroy(); reject(new Error('timeout')); });
  });
};

type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(obj: Json, key: string): number {
  const value = obj[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

const ALERT_FLAGS: [string, DishAlert][] = [
  ['alert_obstructed', 'Obstructed'],
  ['alert_motors_stuck', 'Motors Stuck'],
  ['alert_thermal_throttle', 'Thermal Throttle'],
];

/** Newer firmware nests the status under `dishGetStatus`. */
function statusBody(data: unknown): Json {
  if (!isJson(data)) return {};
  return isJson(data.dishGetStatus) ? data.dishGetStatus : data;
}

export function parseLinkState(data: unknown): LinkState {
  const status = statusBody(data);
  const rawState = typeof status.state === 'string' ? status.state : 'UNKNOWN';
  if (rawState !== 'CONNECTED') return { connected: false, rawState, alerts: [] };

  const metrics: DishMetrics = {
    snr: numberField(status, 'snr'),
    downlinkBps: numberField(status, 'downlink_throughput_bps'),
    uplinkBps: numberField(status, 'uplink_throughput_bps'),
    latencyMs: numberField(status, 'pop_ping_latency_ms'),
    uptimeSeconds: numberField(status, 'uptime_s'),
  };
  const alerts = ALERT_FLAGS.filter(([flag]) => status[flag] === true).map(([, alert]) => alert);
  return { connected: true, rawState, metrics, alerts };
}

/** Reads a location from `/api/location` or the status page's GPS stats. */
export function parseLocation(data: unknown): ObserverLocation | null {
  if (!isJson(data)) return null;
  const status = statusBody(data);
  const gps = [data, status.gpsStats, status.gps_stats].find(
    (c): c is Json => isJson(c) && typeof c.latitude === 'number' && typeof c.longitude === 'number',
  );
  if (!gps) return null;
  return {
    latitude: numberField(gps, 'latitude'),
    longitude: numberField(gps, 'longitude'),
    altitude: numberField(gps, 'altitude'),
    source: 'dish',
  };
}

/**
 * Status provider backed by the dish's local HTTP JSON endpoints.
 */
export class DishClient implements StatusProvider {
  constructor(
    private host: string,
    private timeoutMs = 5000,
    private get: HttpGet = fetchWithTimeout,
  ) {}

  async getLinkState(): Promise<Result<LinkState>> {
    const body = await this.request('/api/v1/device/status');
    return body.ok ? ok(parseLinkState(body.value)) : body;
  }

  async getLocation(): Promise<Result<ObserverLocation | null>> {
    const body = await this.request('/api/location');
    if (!body.ok) return body;
    const location = parseLocation(body.value);
    if (location) console.log(`📍 Dish reported location ${location.latitude.toFixed(4)}°, ${location.longitude.toFixed(4)}°`);
    return ok(location);
  }

  private async request(path: string): Promise<Result<unknown>> {
    try {
      const text = await this.get(`http://${this.host}${path}`, this.timeoutMs);
      const parsed: unknown = JSON.parse(text);
      return ok(parsed);
    } catch (err) {
      return fail(new ProviderUnreachableError(`${path}: ${describeError(err)}`));
    }
  }
}
