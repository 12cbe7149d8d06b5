import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  getSensitivityView,
  getTimeView,
  normalizeOldestDate,
  toDaySeries,
  toSensitivitySeries
} from '../server/lib/runQueries.js';
import { createScenarioIndex } from '../server/lib/scenarioIndex.js';
import type { RunRecord } from '../shared/types.js';
import { makeRun } from './fixtures.js';

function scoresOf(view: Map<string, RunRecord[]>): Record<string, number[]> {
  return Object.fromEntries([...view.entries()].map(([key, runs]) => [key, runs.map((run) => run.score)]));
}

function buildIndex(runs: RunRecord[]) {
  const index = createScenarioIndex();
  for (const run of runs) {
    index.ingest(run);
  }
  return index;
}

test('sensitivity view keeps the best qualifying runs per bucket', () => {
  const runs = [
    makeRun({ timestamp: '2025-01-10T10:00:00', score: 50 }),
    makeRun({ timestamp: '2025-01-11T10:00:00', score: 70 }),
    makeRun({ timestamp: '2025-01-12T10:00:00', score: 60 })
  ];
  const forward = buildIndex(runs);
  const reversed = buildIndex([...runs].reverse());
  const filter = { topN: 2, oldestDate: '2025-01-01' };

  assert.deepEqual(scoresOf(getSensitivityView(forward, '1w4ts', filter)), { '30.0 cm/360': [70, 60] });
  assert.deepEqual(scoresOf(getSensitivityView(reversed, '1w4ts', filter)), { '30.0 cm/360': [70, 60] });
});

test('runs older than the oldest date are excluded even when they score highest', () => {
  const index = buildIndex([
    makeRun({ timestamp: '2024-12-31T23:59:59', score: 99 }),
    makeRun({ timestamp: '2025-01-10T10:00:00', score: 50 }),
    makeRun({ timestamp: '2025-01-11T10:00:00', score: 70 }),
    makeRun({ timestamp: '2025-01-12T10:00:00', score: 60 })
  ]);

  assert.deepEqual(scoresOf(getSensitivityView(index, '1w4ts', { topN: 2, oldestDate: '2025-01-01' })), {
    '30.0 cm/360': [70, 60]
  });
});

test('buckets with no qualifying runs are omitted and an all-old scenario is empty', () => {
  const index = buildIndex([
    makeRun({ timestamp: '2024-06-01T10:00:00', score: 80, horizontalSensitivity: 25 }),
    makeRun({ timestamp: '2025-02-01T10:00:00', score: 75, horizontalSensitivity: 35 })
  ]);

  assert.deepEqual(scoresOf(getSensitivityView(index, '1w4ts', { topN: 5, oldestDate: '2025-01-01' })), {
    '35.0 cm/360': [75]
  });
  assert.equal(getSensitivityView(index, '1w4ts', { topN: 5, oldestDate: '2025-03-01' }).size, 0);
});

test('sensitivity view buckets are in numeric key order', () => {
  const index = buildIndex([
    makeRun({ score: 10, horizontalSensitivity: 25 }),
    makeRun({ score: 20, horizontalSensitivity: 5 })
  ]);
  const series = toSensitivitySeries(getSensitivityView(index, '1w4ts', { topN: 1, oldestDate: '2024-01-01' }));
  assert.deepEqual(
    series.map((entry) => entry.sensitivityKey),
    ['5.0 cm/360', '25.0 cm/360']
  );
});

test('time view groups qualifying runs by day across sensitivities', () => {
  const index = buildIndex([
    makeRun({ timestamp: '2025-01-02T09:00:00', score: 40, horizontalSensitivity: 25 }),
    makeRun({ timestamp: '2025-01-02T21:00:00', score: 90, horizontalSensitivity: 35 }),
    makeRun({ timestamp: '2025-01-02T12:00:00', score: 60, horizontalSensitivity: 25 }),
    makeRun({ timestamp: '2025-01-01T08:00:00', score: 55 }),
    makeRun({ timestamp: '2024-12-20T08:00:00', score: 100 })
  ]);

  const view = getTimeView(index, '1w4ts', { topN: 2, oldestDate: '2025-01-01' });
  assert.deepEqual(scoresOf(view), { '2025-01-01': [55], '2025-01-02': [90, 60] });
  assert.deepEqual(
    toDaySeries(view).map((entry) => entry.date),
    ['2025-01-01', '2025-01-02']
  );
});

test('time view breaks score ties by the earlier run', () => {
  const index = buildIndex([
    makeRun({ timestamp: '2025-01-02T18:00:00', score: 70, horizontalSensitivity: 25 }),
    makeRun({ timestamp: '2025-01-02T07:00:00', score: 70, horizontalSensitivity: 35 })
  ]);
  const view = getTimeView(index, '1w4ts', { topN: 1, oldestDate: '2025-01-01' });
  assert.deepEqual(
    view.get('2025-01-02')?.map((run) => run.timestamp),
    ['2025-01-02T07:00:00']
  );
});

test('view filters validate their arguments', () => {
  const index = buildIndex([makeRun()]);
  assert.throws(
    () => getSensitivityView(index, '1w4ts', { topN: 0, oldestDate: '2025-01-01' }),
    /topN must be a positive integer, got 0/
  );
  assert.throws(
    () => getTimeView(index, '1w4ts', { topN: 1.5, oldestDate: '2025-01-01' }),
    /topN must be a positive integer, got 1.5/
  );
  assert.throws(() => normalizeOldestDate('01/02/2025'), /oldestDate must be YYYY-MM-DD/);
  assert.equal(normalizeOldestDate(' 2025-01-02 '), '2025-01-02T00:00:00');
  assert.equal(normalizeOldestDate('2025-01-02T13:30:00'), '2025-01-02T13:30:00');
});
