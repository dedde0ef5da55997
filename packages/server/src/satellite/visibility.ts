import * as satellite from 'satellite.js';
import type { ObserverLocation, OrbitalElement, VisibilityEstimate } from '@uplink/shared';
import { DEFAULT_MIN_SERVING_ELEVATION, UNKNOWN_SATELLITE } from '@uplink/shared';

/** Elevation in degrees, or null when the element cannot be propagated. */
export type ElevationFn = (element: OrbitalElement, location: ObserverLocation, time: Date) => number | null;

export interface EstimateOptions {
  minElevationDeg?: number;
  elevation?: ElevationFn;
}

const RAD2DEG = 180 / Math.PI;

const satrecs = new WeakMap<OrbitalElement, satellite.SatRec | null>();

function satrecFor(element: OrbitalElement): satellite.SatRec | null {
  const cached = satrecs.get(element);
  if (cached !== undefined) return cached;

  let satrec: satellite.SatRec | null;
  try {
    const parsed = satellite.twoline2satrec(element.line1, element.line2);
    satrec = parsed.error === 0 ? parsed : null;
  } catch {
    satrec = null;
  }
  satrecs.set(element, satrec);
  return satrec;
}

/**
 * SGP4-propagates the element to `time` and returns the topocentric
 * elevation seen from `location`.
 */
export const sgp4Elevation: ElevationFn = (element, location, time) => {
  const satrec = satrecFor(element);
  if (!satrec) return null;

  const posVel = satellite.propagate(satrec, time);
  if (!posVel || typeof posVel.position !== 'object') return null;

  const gmst = satellite.gstime(time);
  const observerGd = {
    latitude: satellite.degreesToRadians(location.latitude),
    longitude: satellite.degreesToRadians(location.longitude),
    height: location.altitude / 1000, // km
  };
  const look = satellite.ecfToLookAngles(observerGd, satellite.eciToEcf(posVel.position, gmst));
  const elevation = look.elevation * RAD2DEG;
  return Number.isFinite(elevation) ? elevation : null;
};

/**
 * Serving satellite and visible count for one instant.
 *
 * Visible means elevation above 0°. The serving satellite is the highest one
 * strictly above `minElevationDeg`; on equal elevation the element listed
 * first keeps the slot. Nothing above the threshold gives UNKNOWN_SATELLITE.
 */
export function estimateVisibility(
  location: ObserverLocation,
  elements: readonly OrbitalElement[],
  time: Date,
  { minElevationDeg = DEFAULT_MIN_SERVING_ELEVATION, elevation = sgp4Elevation }: EstimateOptions = {},
): VisibilityEstimate {
  let serving = UNKNOWN_SATELLITE;
  let best = -Infinity;
  let visibleCount = 0;

  for (const element of elements) {
    const el = elevation(element, location, time);
    if (el === null) continue;
    if (el > 0) visibleCount++;
    if (el > minElevationDeg && el > best) {
      best = el;
      serving = element.name;
    }
  }

  return { serving, visibleCount };
}
