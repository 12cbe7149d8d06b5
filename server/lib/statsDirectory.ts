import fs from 'node:fs';
import path from 'node:path';
import type { BulkLoadSummary } from '../../shared/types';
import { isRunFileName, parseRunFile, type RunParseOptions } from './runParser';
import type { ScenarioIndex } from './scenarioIndex';

// Regular files with the run extension directly inside the directory; no recursion.
export function listCandidateFiles(statsDir: string): Set<string> {
  const files = new Set<string>();
  for (const entry of fs.readdirSync(statsDir, { withFileTypes: true })) {
    if (entry.isFile() && isRunFileName(entry.name)) {
      files.add(path.join(statsDir, entry.name));
    }
  }
  return files;
}

export function scenarioNameFromFileName(fileName: string): string {
  return path.basename(fileName).split('-')[0].trim();
}

export function getUniqueScenarioNames(statsDir: string): string[] {
  let files: Set<string>;
  try {
    files = listCandidateFiles(statsDir);
  } catch (error) {
    console.warn(`[stats-index] cannot list scenarios in ${statsDir}: ${(error as Error).message}`);
    return [];
  }

  const names = new Set<string>();
  for (const filePath of files) {
    const name = scenarioNameFromFileName(filePath);
    if (name) {
      names.add(name);
    }
  }
  return [...names].sort();
}

export function bulkLoad(statsDir: string, index: ScenarioIndex, options: RunParseOptions = {}): BulkLoadSummary {
  const startedAt = performance.now();
  const summary: BulkLoadSummary = {
    directory: statsDir,
    fileCount: 0,
    loadedCount: 0,
    failedCount: 0,
    elapsedMs: 0
  };

  let files: Set<string>;
  try {
    files = listCandidateFiles(statsDir);
  } catch (error) {
    console.error(`[stats-index] cannot read stats directory ${statsDir}: ${(error as Error).message}`);
    summary.elapsedMs = Math.round(performance.now() - startedAt);
    return summary;
  }

  summary.fileCount = files.size;
  for (const filePath of [...files].sort()) {
    const result = parseRunFile(filePath, options);
    if (!result.ok) {
      summary.failedCount += 1;
      console.warn(`[stats-index] skipped ${path.basename(filePath)}: ${result.reason}`);
      continue;
    }
    index.ingest(result.run);
    summary.loadedCount += 1;
  }

  summary.elapsedMs = Math.round(performance.now() - startedAt);
  console.log(
    `[stats-index] loaded ${summary.loadedCount}/${summary.fileCount} run files from ${statsDir} in ${summary.elapsedMs} ms`
  );
  return summary;
}
