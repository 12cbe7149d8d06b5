import fs from 'node:fs';
import express from 'express';
import { toLocalDate } from '../shared/format';
import type {
  BulkLoadSummary,
  ConfigUpdateResponse,
  DashboardConfig,
  HealthPayload,
  NotificationsPayload,
  ScenarioStatsPayload,
  ScenariosPayload,
  SensitivityViewPayload,
  TimeViewPayload
} from '../shared/types';
import { requiresRestart, saveDashboardConfig, validateDashboardConfig } from './lib/config';
import type { NotificationQueue } from './lib/notificationQueue';
import { getSensitivityView, getTimeView, toDaySeries, toSensitivitySeries, type RunViewFilter } from './lib/runQueries';
import type { ScenarioIndex } from './lib/scenarioIndex';
import { getUniqueScenarioNames } from './lib/statsDirectory';

export interface DashboardAppOptions {
  index: ScenarioIndex;
  queue: NotificationQueue;
  config: DashboardConfig;
  configPath: string;
  bulkLoadSummary?: BulkLoadSummary | null;
  isWatching?: () => boolean;
  corsOrigin?: string;
  clientDir?: string;
  now?: () => Date;
  onConfigUpdated?: (config: DashboardConfig) => void;
}

export function defaultOldestDate(withinNDays: number, now: Date): string {
  return toLocalDate(new Date(now.getFullYear(), now.getMonth(), now.getDate() - withinNDays));
}

export function createDashboardApp(options: DashboardAppOptions): express.Express {
  const { index, queue, configPath } = options;
  const startupConfig = options.config;
  const now = options.now ?? (() => new Date());
  const isWatching = options.isWatching ?? (() => false);
  const corsOrigin = options.corsOrigin?.trim() ?? '';
  let config = startupConfig;

  const app = express();
  app.use(express.json());
  app.use((req, res, next) => {
    if (!corsOrigin) {
      next();
      return;
    }

    const requestOrigin = req.get('origin');
    if (requestOrigin && requestOrigin === corsOrigin) {
      res.setHeader('Access-Control-Allow-Origin', corsOrigin);
      res.setHeader('Access-Control-Allow-Methods', 'GET,PUT,OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
      res.setHeader('Vary', 'Origin');
    }

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  });

  const readViewFilter = (req: express.Request): RunViewFilter => {
    const rawTopN = String(req.query.topN ?? '').trim();
    const topN = rawTopN ? Number(rawTopN) : config.topNScores;
    const rawOldest = String(req.query.oldestDate ?? '').trim();
    const oldestDate = rawOldest || defaultOldestDate(config.withinNDays, now());
    return { topN, oldestDate };
  };

  const requireKnownScenario = (scenario: string, res: express.Response): boolean => {
    if (index.isKnown(scenario)) {
      return true;
    }
    res.status(404).json({ error: `No run data found for scenario: ${scenario}` });
    return false;
  };

  app.get('/healthz', (_req, res) => {
    const payload: HealthPayload = {
      ok: true,
      watching: isWatching(),
      scenarioCount: index.size,
      pendingNotifications: queue.size,
      bulkLoad: options.bulkLoadSummary ?? null
    };
    res.json(payload);
  });

  app.get('/api/config', (_req, res) => {
    res.json(config);
  });

  app.put('/api/config', (req, res) => {
    let next: DashboardConfig;
    try {
      next = validateDashboardConfig(req.body ?? {}, config);
    } catch (error) {
      res.status(400).json({ error: (error as Error).message });
      return;
    }

    try {
      saveDashboardConfig(configPath, next);
    } catch (error) {
      console.error(`[dashboard-api] failed to save config: ${(error as Error).message}`);
      res.status(500).json({ error: 'Failed to save configuration.' });
      return;
    }

    config = next;
    options.onConfigUpdated?.(next);
    const payload: ConfigUpdateResponse = {
      config,
      restartRequired: requiresRestart(startupConfig, next)
    };
    res.json(payload);
  });

  app.get('/api/scenarios', (_req, res) => {
    const payload: ScenariosPayload = { scenarios: getUniqueScenarioNames(startupConfig.statsDir) };
    res.json(payload);
  });

  app.get('/api/scenarios/:scenario/stats', (req, res) => {
    const scenario = String(req.params.scenario ?? '');
    if (!requireKnownScenario(scenario, res)) {
      return;
    }

    try {
      const payload: ScenarioStatsPayload = {
        scenario,
        stats: index.getStats(scenario),
        highScore: index.getHighScore(scenario)
      };
      res.json(payload);
    } catch (error) {
      console.error(`[dashboard-api] stats lookup failed for ${scenario}: ${(error as Error).message}`);
      res.status(500).json({ error: (error as Error).message });
    }
  });

  app.get('/api/scenarios/:scenario/sensitivity', (req, res) => {
    const scenario = String(req.params.scenario ?? '');
    if (!requireKnownScenario(scenario, res)) {
      return;
    }

    try {
      const filter = readViewFilter(req);
      const payload: SensitivityViewPayload = {
        scenario,
        topN: filter.topN,
        oldestDate: filter.oldestDate,
        series: toSensitivitySeries(getSensitivityView(index, scenario, filter))
      };
      res.json(payload);
    } catch (error) {
      res.status(400).json({ error: (error as Error).message });
    }
  });

  app.get('/api/scenarios/:scenario/time', (req, res) => {
    const scenario = String(req.params.scenario ?? '');
    if (!requireKnownScenario(scenario, res)) {
      return;
    }

    try {
      const filter = readViewFilter(req);
      const payload: TimeViewPayload = {
        scenario,
        topN: filter.topN,
        oldestDate: filter.oldestDate,
        series: toDaySeries(getTimeView(index, scenario, filter))
      };
      res.json(payload);
    } catch (error) {
      res.status(400).json({ error: (error as Error).message });
    }
  });

  app.get('/api/notifications', (_req, res) => {
    const payload: NotificationsPayload = { notifications: queue.drain() };
    res.json(payload);
  });

  if (options.clientDir && fs.existsSync(options.clientDir)) {
    const clientDir = options.clientDir;
    app.use(express.static(clientDir));
    app.get('*', (_req, res) => {
      res.sendFile('index.html', { root: clientDir });
    });
  }

  return app;
}
