import { buildSensitivityKey, compareSensitivityKeys } from '../../shared/format';
import type { RunRecord, ScenarioStats } from '../../shared/types';

interface ScenarioEntry {
  stats: ScenarioStats;
  // Each bucket stays sorted by ascending score.
  runsBySensitivity: Map<string, RunRecord[]>;
}

export interface ScenarioIndex {
  isKnown(scenarioName: string): boolean;
  hasSensitivity(scenarioName: string, sensitivityKey: string): boolean;
  getStats(scenarioName: string): ScenarioStats;
  getRunsBySensitivity(scenarioName: string): Map<string, RunRecord[]>;
  getHighScore(scenarioName: string): number;
  rankAmongPeers(scenarioName: string, sensitivityKey: string, score: number): number;
  ingest(run: RunRecord): void;
  scenarioNames(): string[];
  readonly size: number;
}

export function sensitivityKeyOf(run: RunRecord): string {
  return buildSensitivityKey(run.horizontalSensitivity, run.sensitivityScale);
}

// First index whose score is strictly greater than the given score.
export function upperBoundByScore(runs: RunRecord[], score: number): number {
  let low = 0;
  let high = runs.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (runs[mid].score <= score) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

export function createScenarioIndex(): ScenarioIndex {
  const entries = new Map<string, ScenarioEntry>();

  const requireEntry = (scenarioName: string): ScenarioEntry => {
    const entry = entries.get(scenarioName);
    if (!entry) {
      throw new Error(`Unknown scenario: ${scenarioName}`);
    }
    return entry;
  };

  const isKnown = (scenarioName: string) => entries.has(scenarioName);

  const hasSensitivity = (scenarioName: string, sensitivityKey: string) =>
    entries.get(scenarioName)?.runsBySensitivity.has(sensitivityKey) ?? false;

  const getStats = (scenarioName: string): ScenarioStats => {
    const { stats } = requireEntry(scenarioName);
    return { ...stats };
  };

  const getRunsBySensitivity = (scenarioName: string): Map<string, RunRecord[]> => {
    const entry = requireEntry(scenarioName);
    const keys = [...entry.runsBySensitivity.keys()].sort(compareSensitivityKeys);
    return new Map(keys.map((key) => [key, [...(entry.runsBySensitivity.get(key) ?? [])]]));
  };

  const getHighScore = (scenarioName: string): number => {
    const entry = requireEntry(scenarioName);
    let highScore = Number.NEGATIVE_INFINITY;
    for (const runs of entry.runsBySensitivity.values()) {
      const best = runs[runs.length - 1];
      if (best && best.score > highScore) {
        highScore = best.score;
      }
    }
    return highScore;
  };

  const rankAmongPeers = (scenarioName: string, sensitivityKey: string, score: number): number => {
    const runs = entries.get(scenarioName)?.runsBySensitivity.get(sensitivityKey);
    if (!runs) {
      return 1;
    }
    return 1 + runs.length - upperBoundByScore(runs, score);
  };

  const ingest = (run: RunRecord): void => {
    const sensitivityKey = sensitivityKeyOf(run);
    const entry = entries.get(run.scenarioName);
    if (!entry) {
      entries.set(run.scenarioName, {
        stats: { lastPlayed: run.timestamp, runCount: 1 },
        runsBySensitivity: new Map([[sensitivityKey, [run]]])
      });
      return;
    }

    entry.stats.runCount += 1;
    if (run.timestamp > entry.stats.lastPlayed) {
      entry.stats.lastPlayed = run.timestamp;
    }

    const bucket = entry.runsBySensitivity.get(sensitivityKey);
    if (!bucket) {
      entry.runsBySensitivity.set(sensitivityKey, [run]);
      return;
    }
    bucket.splice(upperBoundByScore(bucket, run.score), 0, run);
  };

  const scenarioNames = () => [...entries.keys()].sort();

  return {
    isKnown,
    hasSensitivity,
    getStats,
    getRunsBySensitivity,
    getHighScore,
    rankAmongPeers,
    ingest,
    scenarioNames,
    get size() {
      return entries.size;
    }
  };
}
