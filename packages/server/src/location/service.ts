import type { ObserverLocation } from '@uplink/shared';
import type { StatusProvider } from '../types.js';
import type { SettingsService } from '../services/settings.js';
import { describeError } from '../errors.js';

export const LAST_KNOWN_LOCATION_KEY = 'location.lastKnown';

export type SettingsStore = Pick<SettingsService, 'get' | 'set'>;

function isLocation(value: unknown): value is ObserverLocation {
  if (typeof value !== 'object' || value === null) return false;
  return 'latitude' in value && typeof value.latitude === 'number'
    && 'longitude' in value && typeof value.longitude === 'number'
    && 'altitude' in value && typeof value.altitude === 'number';
}

/**
 * Location Service — observer position for visibility estimates.
 * Sources, in order: configured fixed location, the dish (asked until it
 * answers, then cached for the life of the process), the last location
 * persisted in settings.
 */
export class LocationService {
  private cached: ObserverLocation | null;

  constructor(
    private provider: Pick<StatusProvider, 'getLocation'>,
    private settings: SettingsStore,
    fixed?: ObserverLocation,
  ) {
    this.cached = fixed ? { ...fixed, source: 'manual' } : null;
  }

  /** Cached location, else the persisted last-known one. */
  get(): ObserverLocation | undefined {
    if (this.cached) return { ...this.cached };
    return this.lastKnown();
  }

  async resolve(): Promise<ObserverLocation | undefined> {
    if (this.cached) return { ...this.cached };

    const result = await this.provider.getLocation();
    if (!result.ok) {
      console.warn(`📍 Dish location unavailable: ${result.error.details ?? result.error.message}`);
      return undefined;
    }
    if (!result.value) return undefined;

    this.cached = { ...result.value, source: 'dish' };
    try {
      this.settings.set(LAST_KNOWN_LOCATION_KEY, {
        latitude: this.cached.latitude,
        longitude: this.cached.longitude,
        altitude: this.cached.altitude,
      });
    } catch (err) {
      console.error(`📍 Failed to persist location: ${describeError(err)}`);
    }
    console.log(`📍 Observer location: ${this.cached.latitude.toFixed(4)}°, ${this.cached.longitude.toFixed(4)}° (${this.cached.altitude} m)`);
    return { ...this.cached };
  }

  private lastKnown(): ObserverLocation | undefined {
    let stored: unknown;
    try {
      stored = this.settings.get(LAST_KNOWN_LOCATION_KEY);
    } catch (err) {
      console.error(`📍 Failed to read stored location: ${describeError(err)}`);
      return undefined;
    }
    if (!isLocation(stored)) return undefined;
    return { latitude: stored.latitude, longitude: stored.longitude, altitude: stored.altitude, source: 'stored' };
  }
}
