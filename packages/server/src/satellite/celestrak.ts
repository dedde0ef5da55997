import type { OrbitalElement } from '@uplink/shared';
import { DEFAULT_TLE_URL } from '@uplink/shared';
import type { ElementSource, Result } from '../types.js';
import { fail, ok } from '../types.js';
import { FetchError, describeError } from '../errors.js';

/**
 * Parses three-line TLE text (name, line 1, line 2). Blank lines are
 * ignored and records whose lines are not numbered 1 and 2 are skipped.
 */
export function parseTleText(text: string): OrbitalElement[] {
  const lines = text.split(/\r?\n/).map(l => l.trim()).filter(Boolean);
  const elements: OrbitalElement[] = [];

  let i = 0;
  while (i + 2 < lines.length) {
    const [name, line1, line2] = lines.slice(i, i + 3);
    if (line1.startsWith('1 ') && line2.startsWith('2 ')) {
      elements.push({ name, line1, line2 });
      i += 3;
    } else {
      i += 1;
    }
  }
  return elements;
}

export class CelestrakElementSource implements ElementSource {
  constructor(private url: string = DEFAULT_TLE_URL, private timeoutMs = 10_000) {}

  async fetchElements(): Promise<Result<OrbitalElement[]>> {
    try {
      const response = await fetch(this.url, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!response.ok) return fail(new FetchError(`TLE fetch failed with HTTP ${response.status}`));
      const elements = parseTleText(await response.text());
      if (elements.length === 0) return fail(new FetchError('TLE response contained no elements'));
      return ok(elements);
    } catch (err) {
      return fail(new FetchError('TLE fetch failed', describeError(err)));
    }
  }
}
