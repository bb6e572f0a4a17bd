import express from 'express';
import cors from 'cors';
import { WebSocketServer, WebSocket } from 'ws';
import { createServer } from 'http';
import type { Alert, ComponentHealth, Diagnostic, HealthStatus, LoopStatus, ThresholdPolicy } from '@skyfuse/shared';
import { loadPolicy } from './config/policy.js';
import { PolicyError, errorMessage } from './errors.js';
import { AlertPipeline } from './alerts/pipeline.js';
import { createAlertsRouter } from './alerts/api.js';
import { openDatabase } from './services/database.js';
import { FeedPersistence } from './persistence/service.js';
import { GpsDetector } from './gps/detector.js';
import { GpsSimulator } from './gps/simulator.js';
import { GpsFeed } from './gps/feed.js';
import { CyberDetector } from './cyber/detector.js';
import { CyberSimulator } from './cyber/simulator.js';
import { CyberFeed } from './cyber/feed.js';
import { WeatherRateDetector } from './weather/detector.js';
import { DonkiSource } from './weather/donki.js';
import { FallbackSource } from './weather/fallback.js';
import { ResilientWeatherSource } from './weather/source.js';
import { WeatherIngest } from './weather/ingest.js';

const VERSION = '0.1.0';
const PORT = parseInt(process.env.PORT || '3410');

// Configuration errors are the only ones that stop the process
let policy: ThresholdPolicy;
try {
  policy = loadPolicy(process.env);
} catch (err) {
  if (err instanceof PolicyError) {
    console.error('❌ Refusing to start:', err.message);
    process.exit(1);
  }
  throw err;
}

// Services
const pipeline = new AlertPipeline(policy);
const db = openDatabase(process.env.SKYFUSE_DB || undefined);
const persistence = new FeedPersistence(db, {
  maxAlerts: policy.storeMaxAlerts,
  maxFeed: policy.storeMaxFeed,
  maxDiagnostics: 1000,
});
const restored = persistence.restoreInto(pipeline);
console.log(`💾 Restored ${restored.alerts} alerts, ${restored.samples} samples, ${restored.events} events, ${restored.cyber} cyber records`);
persistence.attach(pipeline);

const gpsDetector = new GpsDetector(pipeline);
const gpsFeed = new GpsFeed(new GpsSimulator(), gpsDetector, policy.gpsIntervalMs);
const cyberFeed = new CyberFeed(new CyberSimulator(), new CyberDetector(pipeline), policy.cyberIntervalMs);

const weatherSource = new ResilientWeatherSource(
  new DonkiSource({ apiKey: process.env.NASA_API_KEY }),
  new FallbackSource(process.env.SKYFUSE_FALLBACK_FILE || undefined),
);
const weatherDetector = new WeatherRateDetector(pipeline);
const weatherIngest = new WeatherIngest(weatherSource, weatherDetector, pipeline, {
  intervalMs: policy.weatherIntervalMs,
});
weatherIngest.markSeen(pipeline.events.all().map(e => e.eventId));

const app = express();
app.use(cors());
app.use(express.json());

const server = createServer(app);
const wss = new WebSocketServer({ server, path: '/ws' });

// Broadcast to all WS clients
function broadcast(data: unknown) {
  const msg = JSON.stringify(data);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) client.send(msg);
  });
}

pipeline.on('alert', (alert: Alert) => broadcast({ type: 'alert', alert }));
pipeline.on('diagnostic', (diagnostic: Diagnostic) => broadcast({ type: 'diagnostic', diagnostic }));

function loopHealth(s: LoopStatus): ComponentHealth {
  return {
    name: s.name,
    status: !s.running ? 'down' : s.failures > 0 && s.lastError ? 'degraded' : 'up',
    lastCheck: s.lastCycleAt ?? Date.now(),
    details: { cycles: s.cycles, failures: s.failures },
    ...(s.lastError ? { error: s.lastError } : {}),
  };
}

app.get('/api/health', (_req, res) => {
  const components: ComponentHealth[] = [
    loopHealth(gpsFeed.loop.status()),
    loopHealth(cyberFeed.loop.status()),
    loopHealth(weatherIngest.loop.status()),
    {
      name: 'weather-source',
      status: weatherSource.mode === 'live' ? 'up' : 'degraded',
      lastCheck: Date.now(),
      details: { mode: weatherSource.mode },
    },
  ];
  const status: HealthStatus = {
    status: components.some(c => c.status === 'down') ? 'unhealthy'
      : components.some(c => c.status === 'degraded') ? 'degraded' : 'healthy',
    version: VERSION,
    uptime: process.uptime(),
    timestamp: Date.now(),
    components,
  };
  res.json(status);
});

app.use('/api', createAlertsRouter(pipeline));

gpsFeed.start();
cyberFeed.start();
weatherIngest.start();

server.listen(PORT, '0.0.0.0', () => {
  console.log(`🛰️  SkyFuse v${VERSION} listening on :${PORT}`);
});

let shuttingDown = false;
async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`🛑 ${signal} received, stopping producers`);
  try {
    await Promise.all([gpsFeed.stop(), cyberFeed.stop(), weatherIngest.stop()]);
    persistence.stop();
    db.close();
  } catch (err) {
    console.error('Shutdown error:', errorMessage(err));
  }
  wss.close();
  server.close(() => process.exit(0));
}

process.on('SIGINT', () => { void shutdown('SIGINT'); });
process.on('SIGTERM', () => { void shutdown('SIGTERM'); });
