import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, test } from 'node:test';
import {
  DEFAULT_DASHBOARD_CONFIG,
  getIntegerConfigValue,
  loadDashboardConfig,
  parseConfigFile,
  requiresRestart,
  resolveConfigPath,
  saveDashboardConfig,
  serializeDashboardConfig,
  validateDashboardConfig
} from '../server/lib/config.js';
import { makeTempDir } from './fixtures.js';

let dir = '';

beforeEach(() => {
  dir = makeTempDir('aim-config-');
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

test('parses key/value lines and skips comments', () => {
  const configPath = path.join(dir, 'dashboard.properties');
  fs.writeFileSync(
    configPath,
    ['# comment', '', 'STATS_DIR = "C:/Games/stats"', 'TOP_N_SCORES=8', 'not a setting'].join('\n'),
    'utf-8'
  );

  const entries = parseConfigFile(configPath);
  assert.equal(entries.get('STATS_DIR'), 'C:/Games/stats');
  assert.equal(getIntegerConfigValue(entries, 'TOP_N_SCORES'), 8);
  assert.equal(entries.size, 2);
  assert.throws(() => getIntegerConfigValue(entries, 'PORT'), /Missing config key: PORT/);
  assert.throws(
    () => getIntegerConfigValue(new Map([['PORT', '80.5']]), 'PORT'),
    /Config key PORT is not an integer: 80.5/
  );
});

test('missing file falls back to defaults with env overrides', () => {
  const config = loadDashboardConfig(path.join(dir, 'absent.properties'), {
    DASHBOARD_STATS_DIR: '/data/stats',
    PORT: '9000'
  });
  assert.deepEqual(config, { ...DEFAULT_DASHBOARD_CONFIG, statsDir: '/data/stats', port: 9000 });
});

test('file values override defaults', () => {
  const configPath = path.join(dir, 'dashboard.properties');
  fs.writeFileSync(configPath, 'STATS_DIR = "./runs"\nWITHIN_N_DAYS = 7\nSENS_ROUND_DECIMAL_PLACES = 3\n', 'utf-8');

  const config = loadDashboardConfig(configPath, {});
  assert.equal(config.statsDir, './runs');
  assert.equal(config.withinNDays, 7);
  assert.equal(config.sensRoundDecimalPlaces, 3);
  assert.equal(config.pollingIntervalMs, DEFAULT_DASHBOARD_CONFIG.pollingIntervalMs);
});

test('out-of-range values are rejected', () => {
  assert.throws(() => validateDashboardConfig({ port: 70000 }), /PORT must be between 1 and 65535, got 70000\./);
  assert.throws(() => validateDashboardConfig({ topNScores: '5' }), /TOP_N_SCORES must be an integer\./);
  assert.throws(() => validateDashboardConfig({ statsDir: '  ' }), /STATS_DIR must be a non-empty path\./);
  assert.deepEqual(validateDashboardConfig({ topNScores: 10 }), { ...DEFAULT_DASHBOARD_CONFIG, topNScores: 10 });
});

test('saved config reads back unchanged', () => {
  const configPath = path.join(dir, 'nested', 'dashboard.properties');
  const config = { ...DEFAULT_DASHBOARD_CONFIG, statsDir: '/data/stats', topNScores: 12 };
  saveDashboardConfig(configPath, config);

  assert.equal(
    serializeDashboardConfig(config),
    [
      '# Aim stats dashboard configuration',
      'STATS_DIR = "/data/stats"',
      'POLLING_INTERVAL_MS = 1000',
      'PORT = 8787',
      'SENS_ROUND_DECIMAL_PLACES = 2',
      'NEW_FILE_DEBOUNCE_MS = 1000',
      'TOP_N_SCORES = 12',
      'WITHIN_N_DAYS = 30',
      ''
    ].join('\n')
  );
  assert.deepEqual(loadDashboardConfig(configPath, {}), config);
});

test('restart is needed only for startup-bound settings', () => {
  assert.equal(requiresRestart(DEFAULT_DASHBOARD_CONFIG, { ...DEFAULT_DASHBOARD_CONFIG, topNScores: 9 }), false);
  assert.equal(requiresRestart(DEFAULT_DASHBOARD_CONFIG, { ...DEFAULT_DASHBOARD_CONFIG, newFileDebounceMs: 5000 }), false);
  assert.equal(requiresRestart(DEFAULT_DASHBOARD_CONFIG, { ...DEFAULT_DASHBOARD_CONFIG, port: 9000 }), true);
  assert.equal(resolveConfigPath({ DASHBOARD_CONFIG_PATH: '/etc/aim/dashboard.properties' }), '/etc/aim/dashboard.properties');
});
