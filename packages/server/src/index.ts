import { createServer } from 'http';
import type {
  DishAlert, RecoveryOutcome, RecoveryPhase, ServerMessage, StatusSnapshot,
} from '@uplink/shared';
import { loadConfig, loadStoredOverrides } from './config.js';
import { createApp, VERSION } from './app.js';
import { UplinkSocketServer } from './ws.js';
import { databasePath, openDatabase } from './services/database.js';
import { SettingsService } from './services/settings.js';
import { ConnectionLedger } from './ledger/service.js';
import { NmcliAdapter } from './wifi/nmcli.js';
import { DishClient } from './dish/client.js';
import { LocationService } from './location/service.js';
import { CelestrakElementSource } from './satellite/celestrak.js';
import { OrbitalElementCache } from './satellite/cache.js';
import { RecoveryState } from './recovery/state.js';
import { AutoRecoveryScheduler } from './recovery/scheduler.js';
import { ConnectionAttemptEngine } from './recovery/engine.js';
import { CredentialBroker } from './prompt/broker.js';
import { UplinkMonitor } from './monitor/service.js';
import { describeError } from './errors.js';

// Data directory comes from the environment; tuning may be overridden from settings
const bootConfig = loadConfig();
const db = openDatabase(databasePath(bootConfig.dataDir));
const settings = new SettingsService(db);
const config = loadConfig(process.env, loadStoredOverrides(settings));

const ledger = new ConnectionLedger(db);
const nmcli = new NmcliAdapter();
const dish = new DishClient(config.dishHost, config.dishTimeoutMs);
const location = new LocationService(dish, settings, config.fixedLocation);
const elements = new OrbitalElementCache(new CelestrakElementSource(config.tleUrl), config.tleRefreshSeconds);
const state = new RecoveryState();

// Broker sends through the socket server, which exists once the HTTP server does
let sockets: UplinkSocketServer | null = null;
const broadcast = (message: ServerMessage) => sockets?.broadcast(message) ?? 0;

const broker = new CredentialBroker(broadcast, config.credentialTimeoutMs);
const engine = new ConnectionAttemptEngine({
  scanner: nmcli,
  connector: nmcli,
  ledger,
  state,
  prompt: broker,
  allowList: config.allowedSsids,
});
const monitor = new UplinkMonitor({
  status: dish,
  linkProbe: nmcli,
  wifi: nmcli,
  engine,
  scheduler: new AutoRecoveryScheduler(state, config.recoveryCooldownSeconds),
  state,
  elements,
  location,
  prompt: broker,
  config,
});

engine.on('phase', (phase: RecoveryPhase) => console.log(`🔁 Recovery phase: ${phase}`));
monitor.on('snapshot', (snapshot: StatusSnapshot) => broadcast({ type: 'snapshot', snapshot }));
monitor.on('alerts', (alerts: DishAlert[]) => broadcast({ type: 'alerts', alerts }));
monitor.on('recovery', (outcome: RecoveryOutcome) => broadcast({ type: 'recovery', outcome }));

const server = createServer(createApp({ monitor, ledger, elements, settings }));
sockets = new UplinkSocketServer(server, {
  onCredentialResponse: (id, secret) => {
    if (!broker.answer(id, secret)) console.warn(`🔑 Credential response for unknown request ${id}`);
  },
  onConnect: () => {
    monitor.connectNow().catch((err) => console.error(`🔁 Manual connect failed: ${describeError(err)}`));
  },
  greeting: () => (monitor.snapshot ? [{ type: 'snapshot', snapshot: monitor.snapshot }] : []),
});

server.listen(config.port, '0.0.0.0', () => {
  console.log(`
  ⚡ ╔═══════════════════════════════════════╗
  ⚡ ║            U P L I N K                ║
  ⚡ ║   Link Monitor & WiFi Recovery v${VERSION} ║
  ⚡ ╠═══════════════════════════════════════╣
  ⚡ ║  HTTP:  http://0.0.0.0:${config.port}            ║
  ⚡ ║  WS:    ws://0.0.0.0:${config.port}/ws           ║
  ⚡ ║  Dish:  ${config.dishHost}                 ║
  ⚡ ╚═══════════════════════════════════════╝
  `);
  monitor.start();
});

let shuttingDown = false;
async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`⚡ ${signal} received, shutting down`);
  try {
    await monitor.stop();
    await sockets?.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  } catch (err) {
    console.error(`⚡ Shutdown error: ${describeError(err)}`);
  } finally {
    db.close();
    process.exit(0);
  }
}

process.on('SIGTERM', () => { void shutdown('SIGTERM'); });
process.on('SIGINT', () => { void shutdown('SIGINT'); });
