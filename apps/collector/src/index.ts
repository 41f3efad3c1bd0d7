import { config } from 'dotenv';
import type { FastifyInstance } from 'fastify';
import type { VendorAdapter } from '@growatt-dashboard/integrations-core';
import { GrowattAdapter, MockGrowattAdapter } from '@growatt-dashboard/integrations-growatt';
import { type CollectorConfig, loadConfig } from './config.js';
import { describeError } from './errors.js';
import { buildHealthServer } from './health.js';
import { runCollector } from './main.js';
import { CollectorStatus } from './status.js';
import { SqliteMetricStore } from './store.js';

config();

let settings: CollectorConfig;
try {
  settings = loadConfig();
} catch (error) {
  console.error('✗ Configuration error:', describeError(error));
  process.exit(1);
}

const { plant, runtime } = settings;

console.log('============================================');
console.log('Growatt Dashboard Collector');
console.log('============================================');
console.log('Config file:', runtime.CONFIG_PATH);
console.log('Database:', runtime.DATABASE_PATH);
console.log('Account:', plant.username);
console.log('Plant:', plant.plant_id, `(${plant.timezone})`);
console.log('Start date:', plant.start_date);
console.log('Poll interval:', `${runtime.POLL_INTERVAL_SECONDS}s`);
console.log('Mock Mode:', runtime.INTEGRATION_MOCK_MODE);
console.log('============================================\n');

const controller = new AbortController();
let healthServer: FastifyInstance | null = null;

function createAdapter(): VendorAdapter {
  if (runtime.INTEGRATION_MOCK_MODE) {
    return new MockGrowattAdapter(runtime.FIXTURES_PATH);
  }
  return new GrowattAdapter({
    baseUrl: runtime.GROWATT_BASE_URL,
    timeoutMs: runtime.REQUEST_TIMEOUT_MS,
  });
}

async function start(): Promise<number> {
  const status = new CollectorStatus();
  const store = new SqliteMetricStore(runtime.DATABASE_PATH);

  try {
    if (runtime.HEALTH_PORT) {
      healthServer = buildHealthServer(status, { logger: true });
      await healthServer.listen({ port: runtime.HEALTH_PORT, host: '0.0.0.0' });
      console.log(`✓ Health endpoint on http://localhost:${runtime.HEALTH_PORT}/health`);
    }

    return await runCollector({
      config: settings,
      adapter: createAdapter(),
      store,
      signal: controller.signal,
      status,
    });
  } finally {
    if (healthServer) {
      await healthServer.close();
    }
    store.close();
  }
}

// ============================================================================
// GRACEFUL SHUTDOWN
// ============================================================================

function shutdown(signal: string): void {
  console.log(`\n${signal} received, shutting down gracefully...`);
  controller.abort();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

start()
  .then((code) => {
    if (code === 0) {
      console.log('✓ Shutdown complete');
    }
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error('✗ Error starting collector:', describeError(error));
    process.exit(1);
  });
