// ============================================================================
// Uplink — Dish Status Types
// ============================================================================
import type { LinkType } from './wifi.js';
import type { RecoveryOutcome } from './recovery.js';

export type DishAlert = 'Obstructed' | 'Motors Stuck' | 'Thermal Throttle';

export interface DishMetrics {
  snr: number;
  downlinkBps: number;
  uplinkBps: number;
  latencyMs: number;
  uptimeSeconds: number;
}

export interface LinkState {
  connected: boolean;
  rawState: string;
  reason?: 'provider_unreachable';
  metrics?: DishMetrics;
  alerts: DishAlert[];
}

export interface StatusSnapshot {
  timestamp: number;          // epoch ms
  link: LinkState;
  linkType: LinkType;
  bars: number;               // 0-4
  alerts: DishAlert[];
  newAlerts: DishAlert[];
  servingSatellite: string;
  visibleSatellites: number;
  handoverSeconds: number;
  elementCount: number;
  elementsRefreshedAt: number | null;  // epoch seconds
  recovery: RecoveryOutcome | null;
}

export const UNREACHABLE_STATE = 'Disconnected (Unable to reach dish)';
