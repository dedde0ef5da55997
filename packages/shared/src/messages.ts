// ============================================================================
// Uplink — WebSocket Messages
// ============================================================================
import type { DishAlert, StatusSnapshot } from './dish.js';
import type { RecoveryOutcome } from './recovery.js';

export interface CredentialRequest {
  type: 'credential_request';
  id: string;
  name: string;
}

export type ServerMessage =
  | { type: 'snapshot'; snapshot: StatusSnapshot }
  | { type: 'alerts'; alerts: DishAlert[] }
  | { type: 'recovery'; outcome: RecoveryOutcome }
  | CredentialRequest
  | { type: 'error'; message: string };

export type ClientMessage =
  | { type: 'credential_response'; id: string; secret: string | null }
  | { type: 'connect' };
