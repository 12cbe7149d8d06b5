import type { DaySeries, RunRecord, SensitivitySeries } from '../../shared/types';
import type { ScenarioIndex } from './scenarioIndex';

const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DATE_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/;

export interface RunViewFilter {
  topN: number;
  oldestDate: string;
}

function assertTopN(topN: number): void {
  if (!Number.isInteger(topN) || topN < 1) {
    throw new Error(`topN must be a positive integer, got ${topN}`);
  }
}

// Date-only bounds start at midnight of that day.
export function normalizeOldestDate(oldestDate: string): string {
  const trimmed = oldestDate.trim();
  if (DATE_ONLY_PATTERN.test(trimmed)) {
    return `${trimmed}T00:00:00`;
  }
  if (DATE_TIME_PATTERN.test(trimmed)) {
    return trimmed;
  }
  throw new Error(`oldestDate must be YYYY-MM-DD or YYYY-MM-DDTHH:mm:ss, got ${oldestDate}`);
}

export function runDay(run: RunRecord): string {
  return run.timestamp.slice(0, 10);
}

// Walks a score-ascending bucket from its best run downward.
function takeTopQualifying(runs: RunRecord[], topN: number, oldest: string): RunRecord[] {
  const selected: RunRecord[] = [];
  for (let i = runs.length - 1; i >= 0 && selected.length < topN; i -= 1) {
    const run = runs[i];
    if (run.timestamp < oldest) {
      continue;
    }
    selected.push(run);
  }
  return selected;
}

export function getSensitivityView(
  index: ScenarioIndex,
  scenarioName: string,
  { topN, oldestDate }: RunViewFilter
): Map<string, RunRecord[]> {
  assertTopN(topN);
  const oldest = normalizeOldestDate(oldestDate);
  const view = new Map<string, RunRecord[]>();

  for (const [sensitivityKey, runs] of index.getRunsBySensitivity(scenarioName)) {
    const selected = takeTopQualifying(runs, topN, oldest);
    if (selected.length > 0) {
      view.set(sensitivityKey, selected);
    }
  }

  return view;
}

export function getTimeView(
  index: ScenarioIndex,
  scenarioName: string,
  { topN, oldestDate }: RunViewFilter
): Map<string, RunRecord[]> {
  assertTopN(topN);
  const oldest = normalizeOldestDate(oldestDate);
  const byDay = new Map<string, RunRecord[]>();

  for (const runs of index.getRunsBySensitivity(scenarioName).values()) {
    for (const run of runs) {
      if (run.timestamp < oldest) {
        continue;
      }
      const day = runDay(run);
      const dayRuns = byDay.get(day);
      if (dayRuns) {
        dayRuns.push(run);
      } else {
        byDay.set(day, [run]);
      }
    }
  }

  const view = new Map<string, RunRecord[]>();
  for (const day of [...byDay.keys()].sort()) {
    const dayRuns = byDay.get(day) ?? [];
    dayRuns.sort((a, b) => b.score - a.score || a.timestamp.localeCompare(b.timestamp));
    view.set(day, dayRuns.slice(0, topN));
  }
  return view;
}

export function toSensitivitySeries(view: Map<string, RunRecord[]>): SensitivitySeries[] {
  return [...view.entries()].map(([sensitivityKey, runs]) => ({ sensitivityKey, runs }));
}

export function toDaySeries(view: Map<string, RunRecord[]>): DaySeries[] {
  return [...view.entries()].map(([date, runs]) => ({ date, runs }));
}
