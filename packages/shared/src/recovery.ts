// ============================================================================
// Uplink — Recovery Types
// ============================================================================

export type RecoveryPhase =
  | 'idle'
  | 'scanning'
  | 'attempting_known'
  | 'attempting_new'
  | 'succeeded'
  | 'exhausted';

export type ExhaustedReason = 'no_candidates' | 'all_failed' | 'cancelled';

export type AttemptMethod = 'credential' | 'profile' | 'prompt';

export type AttemptResult = 'connected' | 'failed' | 'declined' | 'skipped';

export interface AttemptRecord {
  identity: string;
  name: string;
  phase: 'attempting_known' | 'attempting_new';
  method: AttemptMethod;
  result: AttemptResult;
  error?: string;
}

export interface RecoveryOutcome {
  status: 'succeeded' | 'exhausted';
  reason?: ExhaustedReason;
  identity?: string;
  name?: string;
  interactive: boolean;
  attempts: AttemptRecord[];
  startedAt: number;   // epoch seconds
  finishedAt: number;  // epoch seconds
}
