import fs from 'node:fs';
import path from 'node:path';
import type { DashboardConfig } from '../../shared/types';

export const DEFAULT_CONFIG_FILE_NAME = 'dashboard.properties';

export const DEFAULT_DASHBOARD_CONFIG: DashboardConfig = {
  statsDir: './stats',
  pollingIntervalMs: 1000,
  port: 8787,
  sensRoundDecimalPlaces: 2,
  newFileDebounceMs: 1000,
  topNScores: 5,
  withinNDays: 30
};

type NumericConfigField = Exclude<keyof DashboardConfig, 'statsDir'>;

interface NumericFieldRule {
  key: string;
  min: number;
  max: number;
}

const NUMERIC_FIELD_RULES: Record<NumericConfigField, NumericFieldRule> = {
  pollingIntervalMs: { key: 'POLLING_INTERVAL_MS', min: 1, max: 3_600_000 },
  port: { key: 'PORT', min: 1, max: 65_535 },
  sensRoundDecimalPlaces: { key: 'SENS_ROUND_DECIMAL_PLACES', min: 0, max: 10 },
  newFileDebounceMs: { key: 'NEW_FILE_DEBOUNCE_MS', min: 0, max: 60_000 },
  topNScores: { key: 'TOP_N_SCORES', min: 1, max: 1000 },
  withinNDays: { key: 'WITHIN_N_DAYS', min: 1, max: 36_500 }
};

const NUMERIC_FIELDS: NumericConfigField[] = [
  'pollingIntervalMs',
  'port',
  'sensRoundDecimalPlaces',
  'newFileDebounceMs',
  'topNScores',
  'withinNDays'
];
const STATS_DIR_KEY = 'STATS_DIR';

// Fields that bind the index and watcher when the process starts.
const RESTART_FIELDS: Array<keyof DashboardConfig> = ['statsDir', 'port', 'sensRoundDecimalPlaces'];

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.DASHBOARD_CONFIG_PATH?.trim();
  return path.resolve(override || DEFAULT_CONFIG_FILE_NAME);
}

export function parseConfigFile(configPath: string): Map<string, string> {
  const out = new Map<string, string>();
  const lines = fs.readFileSync(configPath, 'utf-8').split(/\r?\n/);

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const match = /^([A-Z0-9_]+)\s*=\s*(.+)$/.exec(trimmed);
    if (!match) {
      continue;
    }

    const key = match[1];
    const raw = match[2].trim();
    const value = raw.replace(/^"|"$/g, '');
    out.set(key, value);
  }

  return out;
}

export function getIntegerConfigValue(config: Map<string, string>, key: string): number {
  const raw = config.get(key);
  if (raw === undefined) {
    throw new Error(`Missing config key: ${key}`);
  }
  if (!/^[+-]?\d+$/.test(raw.trim())) {
    throw new Error(`Config key ${key} is not an integer: ${raw}`);
  }
  return Number.parseInt(raw, 10);
}

function assertFieldInRange(field: NumericConfigField, value: unknown): number {
  const rule = NUMERIC_FIELD_RULES[field];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new Error(`${rule.key} must be an integer.`);
  }
  if (value < rule.min || value > rule.max) {
    throw new Error(`${rule.key} must be between ${rule.min} and ${rule.max}, got ${value}.`);
  }
  return value;
}

export function validateDashboardConfig(
  input: Partial<Record<keyof DashboardConfig, unknown>>,
  base: DashboardConfig = DEFAULT_DASHBOARD_CONFIG
): DashboardConfig {
  const next: DashboardConfig = { ...base };

  if (input.statsDir !== undefined) {
    if (typeof input.statsDir !== 'string' || !input.statsDir.trim()) {
      throw new Error(`${STATS_DIR_KEY} must be a non-empty path.`);
    }
    next.statsDir = input.statsDir.trim();
  }

  for (const field of NUMERIC_FIELDS) {
    const value = input[field];
    if (value !== undefined) {
      next[field] = assertFieldInRange(field, value);
    }
  }

  return next;
}

export function loadDashboardConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): DashboardConfig {
  const input: Partial<Record<keyof DashboardConfig, unknown>> = {};

  if (fs.existsSync(configPath)) {
    const entries = parseConfigFile(configPath);
    const statsDir = entries.get(STATS_DIR_KEY);
    if (statsDir !== undefined) {
      input.statsDir = statsDir;
    }
    for (const field of NUMERIC_FIELDS) {
      const key = NUMERIC_FIELD_RULES[field].key;
      if (entries.has(key)) {
        input[field] = getIntegerConfigValue(entries, key);
      }
    }
  } else {
    console.warn(`[config] ${configPath} not found; using defaults`);
  }

  const envStatsDir = env.DASHBOARD_STATS_DIR?.trim();
  if (envStatsDir) {
    input.statsDir = envStatsDir;
  }
  const envPort = env.PORT?.trim();
  if (envPort) {
    input.port = getIntegerConfigValue(new Map([['PORT', envPort]]), 'PORT');
  }

  return validateDashboardConfig(input);
}

export function serializeDashboardConfig(config: DashboardConfig): string {
  const lines = ['# Aim stats dashboard configuration', `${STATS_DIR_KEY} = "${config.statsDir}"`];
  for (const field of NUMERIC_FIELDS) {
    lines.push(`${NUMERIC_FIELD_RULES[field].key} = ${config[field]}`);
  }
  return `${lines.join('\n')}\n`;
}

export function saveDashboardConfig(configPath: string, config: DashboardConfig): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, serializeDashboardConfig(config), 'utf-8');
}

export function requiresRestart(previous: DashboardConfig, next: DashboardConfig): boolean {
  return RESTART_FIELDS.some((field) => previous[field] !== next[field]);
}
