// ============================================================================
// Uplink — Error Taxonomy
// ============================================================================

export enum UplinkErrorCode {
  PROVIDER_UNREACHABLE = 'PROVIDER_UNREACHABLE',
  SCAN_EMPTY = 'SCAN_EMPTY',
  CONNECT_FAILED = 'CONNECT_FAILED',
  CREDENTIAL_DECLINED = 'CREDENTIAL_DECLINED',
  FETCH_ERROR = 'FETCH_ERROR',
  LEDGER_IO = 'LEDGER_IO',
  COMMAND_FAILED = 'COMMAND_FAILED',
}

export class UplinkError extends Error {
  constructor(
    message: string,
    public code: UplinkErrorCode,
    public details?: string,
  ) {
    super(message);
    this.name = 'UplinkError';
  }
}

export class ProviderUnreachableError extends UplinkError {
  constructor(details?: string) {
    super('Dish status provider unreachable', UplinkErrorCode.PROVIDER_UNREACHABLE, details);
    this.name = 'ProviderUnreachableError';
  }
}

export class ConnectFailedError extends UplinkError {
  constructor(target: string, details?: string) {
    super(`Failed to connect to ${target}`, UplinkErrorCode.CONNECT_FAILED, details);
    this.name = 'ConnectFailedError';
  }
}

export class FetchError extends UplinkError {
  constructor(message: string, details?: string) {
    super(message, UplinkErrorCode.FETCH_ERROR, details);
    this.name = 'FetchError';
  }
}

export class LedgerIOError extends UplinkError {
  constructor(operation: string, details?: string) {
    super(`Connection ledger ${operation} failed`, UplinkErrorCode.LEDGER_IO, details);
    this.name = 'LedgerIOError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Like describeError, but prefers the underlying cause an UplinkError carries. */
export function errorDetails(err: unknown): string {
  return err instanceof UplinkError ? err.details ?? err.message : describeError(err);
}
