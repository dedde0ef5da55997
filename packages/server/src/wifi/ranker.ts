import type { AccessPointRecord, RankedCandidate, ScanResult } from '@uplink/shared';
import { canonicalIdentity } from '@uplink/shared';

function isKnown(c: RankedCandidate): boolean {
  return c.record !== undefined;
}

/**
 * Total order over candidates: known before unknown, known by most recent
 * success, then strongest signal, then identity.
 */
export function compareCandidates(a: RankedCandidate, b: RankedCandidate): number {
  const aKnown = isKnown(a);
  const bKnown = isKnown(b);
  if (aKnown !== bKnown) return aKnown ? -1 : 1;
  if (a.record && b.record && a.record.lastSuccess !== b.record.lastSuccess) {
    return b.record.lastSuccess - a.record.lastSuccess;
  }
  if (a.signal !== b.signal) return b.signal - a.signal;
  return a.identity < b.identity ? -1 : a.identity > b.identity ? 1 : 0;
}

/** Collapses repeated identities, keeping the strongest reading. */
export function dedupeScan(results: ScanResult[]): ScanResult[] {
  const byIdentity = new Map<string, ScanResult>();
  for (const r of results) {
    const identity = canonicalIdentity(r.identity);
    const existing = byIdentity.get(identity);
    if (!existing || r.signal > existing.signal) byIdentity.set(identity, { ...r, identity });
  }
  return Array.from(byIdentity.values());
}

/** Joins a scan with the ledger snapshot and orders the attempt sequence. */
export function rankCandidates(scan: ScanResult[], ledger: AccessPointRecord[]): RankedCandidate[] {
  const records = new Map<string, AccessPointRecord>();
  for (const r of ledger) records.set(canonicalIdentity(r.identity), r);

  return dedupeScan(scan)
    .map((s): RankedCandidate => {
      const record = records.get(s.identity);
      return record ? { ...s, record: { ...record } } : { ...s };
    })
    .sort(compareCandidates);
}
