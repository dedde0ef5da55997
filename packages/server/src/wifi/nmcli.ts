// ============================================================================
// Uplink — NetworkManager (nmcli) adapter
// ============================================================================
import { execFile } from 'child_process';
import { promisify } from 'util';
import type { LinkType, ScanResult } from '@uplink/shared';
import type { ConnectPrimitive, LinkTypeProbe, NetworkScanner, Result } from '../types.js';
import { fail, ok } from '../types.js';
import { ConnectFailedError, UplinkError, UplinkErrorCode, describeError } from '../errors.js';

export type CommandRunner = (file: string, args: string[]) => Promise<{ stdout: string }>;

const execFileAsync = promisify(execFile);

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, args, { timeout: 30_000, encoding: 'utf8' });
  return { stdout };
};

/** Splits one line of `nmcli -t` output, honouring `\:` escapes. */
export function parseTerse(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  for (let i = 0; i < line.length; i++) {
    if (line[i] === '\\' && i + 1 < line.length) {
      current += line[i + 1];
      i++;
    } else if (line[i] === ':') {
      fields.push(current);
      current = '';
    } else {
      current += line[i];
    }
  }
  fields.push(current);
  return fields;
}

function lines(stdout: string): string[][] {
  return stdout.split('\n').map(l => l.trim()).filter(Boolean).map(parseTerse);
}

/** Reads `BSSID:SSID:SIGNAL` rows, keeping only allowed SSIDs. */
export function parseScan(stdout: string, allowList: string[]): ScanResult[] {
  const allowed = new Set(allowList.map(s => s.toUpperCase()));
  const results: ScanResult[] = [];
  for (const [bssid, ssid, signal] of lines(stdout)) {
    if (!bssid || !ssid || !allowed.has(ssid.toUpperCase())) continue;
    results.push({ identity: bssid.toUpperCase(), name: ssid, signal: parseInt(signal, 10) || 0 });
  }
  return results;
}

/** First activated connection decides the link type. */
export function parseLinkType(stdout: string): LinkType {
  for (const [type, state] of lines(stdout)) {
    if (state !== 'activated') continue;
    if (type === '802-3-ethernet') return 'ethernet';
    if (type === '802-11-wireless') return 'wifi';
  }
  return 'unknown';
}

export class NmcliAdapter implements NetworkScanner, ConnectPrimitive, LinkTypeProbe {
  constructor(private run: CommandRunner = runCommand) {}

  async scan(allowList: string[]): Promise<Result<ScanResult[]>> {
    try {
      const { stdout } = await this.run('nmcli', ['-t', '-f', 'BSSID,SSID,SIGNAL', 'device', 'wifi', 'list', '--rescan', 'yes']);
      return ok(parseScan(stdout, allowList));
    } catch (err) {
      console.error(`📡 WiFi scan failed: ${describeError(err)}`);
      return fail(new UplinkError('WiFi scan failed', UplinkErrorCode.COMMAND_FAILED, describeError(err)));
    }
  }

  async connectByProfile(name: string): Promise<Result<void>> {
    try {
      await this.run('nmcli', ['con', 'up', name]);
      return ok(undefined);
    } catch (err) {
      return fail(new ConnectFailedError(`profile ${name}`, describeError(err)));
    }
  }

  async connectWithCredential(identity: string, name: string, secret: string): Promise<Result<void>> {
    try {
      await this.run('nmcli', ['dev', 'wifi', 'connect', name, 'password', secret, 'bssid', identity]);
      return ok(undefined);
    } catch (err) {
      return fail(new ConnectFailedError(`${name} (${identity})`, describeError(err)));
    }
  }

  async getLinkType(): Promise<Result<LinkType>> {
    try {
      const { stdout } = await this.run('nmcli', ['-t', '-f', 'TYPE,STATE', 'con', 'show', '--active']);
      return ok(parseLinkType(stdout));
    } catch (err) {
      return fail(new UplinkError('Link type lookup failed', UplinkErrorCode.COMMAND_FAILED, describeError(err)));
    }
  }

  /** Brings down the active wireless connection, if there is one. */
  async disconnectWifi(): Promise<Result<string | null>> {
    try {
      const { stdout } = await this.run('nmcli', ['-t', '-f', 'NAME,TYPE', 'con', 'show', '--active']);
      const active = lines(stdout).find(([, type]) => type === '802-11-wireless');
      if (!active) return ok(null);
      const [name] = active;
      await this.run('nmcli', ['con', 'down', name]);
      console.log(`📡 Disconnected WiFi connection ${name}`);
      return ok(name);
    } catch (err) {
      return fail(new UplinkError('WiFi disconnect failed', UplinkErrorCode.COMMAND_FAILED, describeError(err)));
    }
  }
}
