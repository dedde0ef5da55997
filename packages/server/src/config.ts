// ============================================================================
// Uplink — Configuration
// ============================================================================
import * as path from 'path';
import type { ObserverLocation } from '@uplink/shared';
import {
  DEFAULT_ALLOWED_SSIDS, DEFAULT_HANDOVER_SECONDS, DEFAULT_MIN_SERVING_ELEVATION, DEFAULT_TLE_URL,
} from '@uplink/shared';
import { DEFAULT_DATA_DIR } from './services/database.js';
import type { SettingsService } from './services/settings.js';
import { describeError } from './errors.js';

export interface TuningConfig {
  tickIntervalMs: number;
  recoveryCooldownSeconds: number;
  tleRefreshSeconds: number;
  minElevationDeg: number;
  handoverSeconds: number[];
  allowedSsids: string[];
  credentialTimeoutMs: number;
}

export interface UplinkConfig extends TuningConfig {
  port: number;
  dataDir: string;
  dishHost: string;
  dishTimeoutMs: number;
  tleUrl: string;
  fixedLocation?: ObserverLocation;
}

export const DEFAULT_TUNING: TuningConfig = {
  tickIntervalMs: 30_000,
  recoveryCooldownSeconds: 300,
  tleRefreshSeconds: 86_400,
  minElevationDeg: DEFAULT_MIN_SERVING_ELEVATION,
  handoverSeconds: [...DEFAULT_HANDOVER_SECONDS],
  allowedSsids: [...DEFAULT_ALLOWED_SSIDS],
  credentialTimeoutMs: 120_000,
};

type Env = Record<string, string | undefined>;

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new Error(`${key} must be a number, got "${raw}"`);
  return value;
}

function list(env: Env, key: string): string[] | undefined {
  const raw = env[key];
  if (!raw) return undefined;
  return raw.split(',').map(s => s.trim()).filter(Boolean);
}

/**
 * Builds the runtime configuration: defaults, then environment, then
 * overrides stored through the settings API.
 */
export function loadConfig(env: Env = process.env, overrides: Partial<TuningConfig> = {}): UplinkConfig {
  const handover = list(env, 'HANDOVER_SECONDS');
  const fromEnv: TuningConfig = {
    tickIntervalMs: num(env, 'TICK_INTERVAL_MS', DEFAULT_TUNING.tickIntervalMs),
    recoveryCooldownSeconds: num(env, 'RECOVERY_COOLDOWN_S', DEFAULT_TUNING.recoveryCooldownSeconds),
    tleRefreshSeconds: num(env, 'TLE_REFRESH_S', DEFAULT_TUNING.tleRefreshSeconds),
    minElevationDeg: num(env, 'MIN_ELEVATION_DEG', DEFAULT_TUNING.minElevationDeg),
    handoverSeconds: handover ? parseHandoverSeconds(handover.map(Number)) : DEFAULT_TUNING.handoverSeconds,
    allowedSsids: list(env, 'ALLOWED_SSIDS') ?? DEFAULT_TUNING.allowedSsids,
    credentialTimeoutMs: num(env, 'CREDENTIAL_TIMEOUT_MS', DEFAULT_TUNING.credentialTimeoutMs),
  };

  const tuning = { ...fromEnv, ...overrides };
  parseTuningOverrides(tuning);

  let fixedLocation: ObserverLocation | undefined;
  if (env.LATITUDE && env.LONGITUDE) {
    fixedLocation = {
      latitude: num(env, 'LATITUDE', 0),
      longitude: num(env, 'LONGITUDE', 0),
      altitude: num(env, 'ALTITUDE', 0),
      source: 'manual',
    };
  }

  return {
    ...tuning,
    port: num(env, 'PORT', 3410),
    dataDir: env.DATA_DIR ? path.resolve(env.DATA_DIR) : DEFAULT_DATA_DIR,
    dishHost: env.DISH_HOST || '192.168.100.1',
    dishTimeoutMs: num(env, 'DISH_TIMEOUT_MS', 5000),
    tleUrl: env.TLE_URL || DEFAULT_TLE_URL,
    fixedLocation,
  };
}

/** Ascending, unique, whole seconds within a minute. */
export function parseHandoverSeconds(values: number[]): number[] {
  if (values.length === 0) throw new Error('handoverSeconds must not be empty');
  for (const v of values) {
    if (!Number.isInteger(v) || v < 0 || v > 59) throw new Error(`handover second out of range: ${v}`);
  }
  return [...new Set(values)].sort((a, b) => a - b);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validates a settings payload; throws on anything it does not recognise. */
export function parseTuningOverrides(input: unknown): Partial<TuningConfig> {
  if (!isRecord(input)) throw new Error('config overrides must be an object');
  const out: Partial<TuningConfig> = {};

  for (const [key, value] of Object.entries(input)) {
    switch (key) {
      case 'tickIntervalMs':
      case 'recoveryCooldownSeconds':
      case 'tleRefreshSeconds':
      case 'credentialTimeoutMs':
        if (typeof value !== 'number' || !(value > 0)) throw new Error(`${key} must be a positive number`);
        out[key] = value;
        break;
      case 'minElevationDeg':
        if (typeof value !== 'number' || value < 0 || value >= 90) throw new Error('minElevationDeg must be within [0, 90)');
        out.minElevationDeg = value;
        break;
      case 'handoverSeconds':
        if (!Array.isArray(value) || !value.every((v): v is number => typeof v === 'number')) {
          throw new Error('handoverSeconds must be an array of numbers');
        }
        out.handoverSeconds = parseHandoverSeconds(value);
        break;
      case 'allowedSsids':
        if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string' && v.length > 0)) {
          throw new Error('allowedSsids must be an array of non-empty strings');
        }
        out.allowedSsids = value;
        break;
      default:
        throw new Error(`unknown setting: ${key}`);
    }
  }
  return out;
}

/** Settings key holding the overrides saved through the API. */
export const CONFIG_OVERRIDES_KEY = 'config';

/** Stored overrides; an invalid stored value is logged and ignored. */
export function loadStoredOverrides(settings: Pick<SettingsService, 'get'>): Partial<TuningConfig> {
  const stored = settings.get(CONFIG_OVERRIDES_KEY);
  if (stored === undefined) return {};
  try {
    return parseTuningOverrides(stored);
  } catch (err) {
    console.warn(`⚙️ Ignoring stored config overrides: ${describeError(err)}`);
    return {};
  }
}
