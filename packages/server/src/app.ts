// ============================================================================
// Uplink — REST API
// ============================================================================
import express from 'express';
import cors from 'cors';
import type { AccessPointSummary } from '@uplink/shared';
import type { UplinkMonitor } from './monitor/service.js';
import type { ConnectionLedger } from './ledger/service.js';
import type { OrbitalElementCache } from './satellite/cache.js';
import type { SettingsService } from './services/settings.js';
import type { TuningConfig } from './config.js';
import { CONFIG_OVERRIDES_KEY, parseTuningOverrides } from './config.js';
import { describeError } from './errors.js';

export const VERSION = '0.1.0';

export interface AppDeps {
  monitor: Pick<UplinkMonitor, 'snapshot' | 'connectNow' | 'disconnectWifi' | 'estimate'>;
  ledger: Pick<ConnectionLedger, 'listAll'>;
  elements: Pick<OrbitalElementCache, 'get' | 'lastRefreshAt'>;
  settings: Pick<SettingsService, 'get' | 'set'>;
}

export function createApp({ monitor, ledger, elements, settings }: AppDeps): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({
      name: 'Uplink',
      version: VERSION,
      uptime: process.uptime(),
      status: 'operational',
    });
  });

  app.get('/api/status', (_req, res) => {
    const snapshot = monitor.snapshot;
    if (!snapshot) return res.status(404).json({ error: 'No status cycle has completed yet' });
    res.json(snapshot);
  });

  // --- Ledger ---
  app.get('/api/ledger', (_req, res) => {
    try {
      const records: AccessPointSummary[] = ledger.listAll().map(({ secret: _secret, ...rest }) => rest);
      res.json(records);
    } catch (err) {
      res.status(500).json({ error: describeError(err) });
    }
  });

  // --- WiFi ---
  app.post('/api/wifi/connect', async (_req, res) => {
    try {
      res.json(await monitor.connectNow());
    } catch (err) {
      res.status(500).json({ error: describeError(err) });
    }
  });

  app.post('/api/wifi/disconnect', async (_req, res) => {
    const result = await monitor.disconnectWifi();
    if (!result.ok) return res.status(500).json({ error: result.error.details ?? result.error.message });
    res.json(result.value === null ? { disconnected: false } : { disconnected: true, connection: result.value });
  });

  // --- Satellites ---
  app.get('/api/satellites/visibility', (_req, res) => {
    try {
      res.json({
        ...monitor.estimate(),
        elementCount: elements.get().length,
        elementsRefreshedAt: elements.lastRefreshAt(),
      });
    } catch (err) {
      res.status(500).json({ error: describeError(err) });
    }
  });

  // --- Settings ---
  app.get('/api/settings', (_req, res) => {
    res.json({ config: settings.get(CONFIG_OVERRIDES_KEY) ?? {} });
  });

  app.put('/api/settings/config', (req, res) => {
    let overrides: Partial<TuningConfig>;
    try {
      overrides = parseTuningOverrides(req.body);
    } catch (err) {
      return res.status(400).json({ error: describeError(err) });
    }
    try {
      settings.set(CONFIG_OVERRIDES_KEY, overrides);
      console.log(`⚙️ Config overrides saved (${Object.keys(overrides).join(', ') || 'none'}), applied on next start`);
      res.json({ config: overrides });
    } catch (err) {
      res.status(500).json({ error: describeError(err) });
    }
  });

  return app;
}
