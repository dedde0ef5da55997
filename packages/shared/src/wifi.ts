// ============================================================================
// Uplink — WiFi Types
// ============================================================================

/** Access point as reported by one scan cycle. */
export interface ScanResult {
  identity: string;  // BSSID
  name: string;      // SSID
  signal: number;    // 0-100, higher is better
}

/** Remembered access point. `lastSuccess` is epoch seconds. */
export interface AccessPointRecord {
  identity: string;
  name: string;
  secret: string;
  lastSuccess: number;
}

/** Ledger entry as exposed over the API. */
export type AccessPointSummary = Omit<AccessPointRecord, 'secret'>;

export interface RankedCandidate extends ScanResult {
  record?: AccessPointRecord;
}

export type LinkType = 'ethernet' | 'wifi' | 'unknown';

/** SSIDs the dish router broadcasts out of the box. */
export const DEFAULT_ALLOWED_SSIDS = ['STARLINK', 'STINKY'];

/** Canonical form of a hardware address. */
export function canonicalIdentity(identity: string): string {
  return identity.trim().toUpperCase();
}
