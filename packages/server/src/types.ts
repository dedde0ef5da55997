import type {
  LinkState, LinkType, ObserverLocation, OrbitalElement, ScanResult,
} from '@uplink/shared';
import type { UplinkError } from './errors.js';

/** Outcome of a call into an external collaborator. */
export type Result<T> = { ok: true; value: T } | { ok: false; error: UplinkError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: UplinkError): Result<T> {
  return { ok: false, error };
}

export interface StatusProvider {
  getLinkState(): Promise<Result<LinkState>>;
  getLocation(): Promise<Result<ObserverLocation | null>>;
}

export interface NetworkScanner {
  /** Visible access points whose SSID is in `allowList` (case-insensitive). */
  scan(allowList: string[]): Promise<Result<ScanResult[]>>;
}

export interface ConnectPrimitive {
  connectByProfile(name: string): Promise<Result<void>>;
  connectWithCredential(identity: string, name: string, secret: string): Promise<Result<void>>;
}

export interface LinkTypeProbe {
  getLinkType(): Promise<Result<LinkType>>;
}

export interface CredentialPrompt {
  /** Resolves with the secret, or null when declined, timed out or aborted. */
  ask(name: string, signal?: AbortSignal): Promise<string | null>;
}

export interface ElementSource {
  fetchElements(): Promise<Result<OrbitalElement[]>>;
}
