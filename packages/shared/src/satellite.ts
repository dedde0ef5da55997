// ============================================================================
// Uplink — Satellite Types
// ============================================================================

/** Named two-line element set. */
export interface OrbitalElement {
  name: string;
  line1: string;
  line2: string;
}

export interface VisibilityEstimate {
  serving: string;        // satellite name, or UNKNOWN_SATELLITE
  visibleCount: number;   // elements above 0° elevation
}

export const UNKNOWN_SATELLITE = 'unknown';

export const DEFAULT_TLE_URL = 'https://celestrak.org/NORAD/elements/gp.php?GROUP=starlink&FORMAT=tle';

/** Seconds past each minute at which the serving satellite is assumed to change. */
export const DEFAULT_HANDOVER_SECONDS = [12, 27, 42, 57];

export const DEFAULT_MIN_SERVING_ELEVATION = 25;
