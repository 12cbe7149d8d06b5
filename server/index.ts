import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createDashboardApp } from './app';
import { loadDashboardConfig, resolveConfigPath } from './lib/config';
import { createNewRunHandler } from './lib/newRunHandler';
import { createNotificationQueue } from './lib/notificationQueue';
import { createScenarioIndex } from './lib/scenarioIndex';
import { bulkLoad } from './lib/statsDirectory';
import { startStatsWatcher, type StatsWatcher } from './lib/statsWatcher';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const projectRoot = path.resolve(__dirname, '..');

const host = process.env.DASHBOARD_HOST?.trim() || 'localhost';
const corsOrigin = process.env.DASHBOARD_CORS_ORIGIN?.trim() ?? '';
const configPath = resolveConfigPath();
const config = loadDashboardConfig(configPath);
const statsDir = path.resolve(config.statsDir);
let liveConfig = config;

console.log(`[dashboard-api] config: ${configPath}`);
console.log(
  `[dashboard-api] statsDir=${statsDir}, port=${config.port}, pollingIntervalMs=${config.pollingIntervalMs}, ` +
    `sensRoundDecimalPlaces=${config.sensRoundDecimalPlaces}`
);

const index = createScenarioIndex();
const queue = createNotificationQueue();
const bulkLoadSummary = bulkLoad(statsDir, index, { sensRoundDecimalPlaces: config.sensRoundDecimalPlaces });

const handler = createNewRunHandler({
  index,
  queue,
  sensRoundDecimalPlaces: config.sensRoundDecimalPlaces,
  debounceMs: () => liveConfig.newFileDebounceMs
});

let watcher: StatsWatcher | null = null;
try {
  watcher = startStatsWatcher(statsDir, handler);
} catch (error) {
  console.error(`[stats-watcher] failed to watch ${statsDir}: ${(error as Error).message}`);
}

const app = createDashboardApp({
  index,
  queue,
  config: { ...config, statsDir },
  configPath,
  bulkLoadSummary,
  isWatching: () => watcher !== null,
  corsOrigin,
  clientDir: path.join(projectRoot, 'dist', 'client'),
  onConfigUpdated: (next) => {
    liveConfig = next;
  }
});

const server = app.listen(config.port, host, () => {
  console.log(`[dashboard-api] listening on ${host}:${config.port}`);
});

const shutdown = (signal: NodeJS.Signals) => {
  console.log(`[dashboard-api] ${signal} received; shutting down`);
  server.close();
  const closing = watcher ? watcher.close() : Promise.resolve();
  watcher = null;
  closing
    .then(() => handler.idle())
    .catch((error: unknown) => {
      console.error(`[dashboard-api] shutdown error: ${String(error)}`);
    })
    .finally(() => {
      process.exit(0);
    });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
