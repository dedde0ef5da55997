// ============================================================================
// Uplink — Observer Location Types
// ============================================================================

export type LocationSource = 'manual' | 'dish' | 'stored';

export interface ObserverLocation {
  latitude: number;   // degrees
  longitude: number;  // degrees
  altitude: number;   // meters above sea level
  source?: LocationSource;
}
