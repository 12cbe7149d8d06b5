import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { ordinal } from '../../shared/format';
import type { NewResultNotification, RunRecord } from '../../shared/types';
import type { NotificationQueue } from './notificationQueue';
import { isRunFileName, parseRunFile } from './runParser';
import { sensitivityKeyOf, type ScenarioIndex } from './scenarioIndex';

export const DEFAULT_NEW_FILE_DEBOUNCE_MS = 1000;
export const HIGH_SCORE_THRESHOLD_RATIO = 0.95;

export type NewRunOutcome =
  | { status: 'ignored'; filePath: string }
  | { status: 'parse_failed'; filePath: string; reason: string }
  | { status: 'ingested'; filePath: string; run: RunRecord; notification: NewResultNotification };

export interface NewRunHandlerOptions {
  index: ScenarioIndex;
  queue: NotificationQueue;
  sensRoundDecimalPlaces: number;
  // A function is read on every event so a saved setting applies without a restart.
  debounceMs?: number | (() => number);
  now?: () => Date;
  debug?: boolean;
}

export interface NewRunHandler {
  handleCreatedFile(filePath: string): Promise<NewRunOutcome>;
  idle(): Promise<void>;
}

function logThresholdTelemetry(run: RunRecord, highScore: number): void {
  if (!Number.isFinite(highScore) || highScore === 0) {
    return;
  }
  const threshold = HIGH_SCORE_THRESHOLD_RATIO * highScore;
  const pctDiff = (run.score / highScore - 1) * 100;
  console.log(
    `[stats-watcher] score ${run.score} is ${pctDiff.toFixed(2)}% from high score ${highScore} ` +
      `(threshold ${threshold.toFixed(2)}: ${run.score > threshold ? 'passed' : 'not reached'})`
  );
}

export function createNewRunHandler(options: NewRunHandlerOptions): NewRunHandler {
  const { index, queue, sensRoundDecimalPlaces } = options;
  const configuredDebounce = options.debounceMs ?? DEFAULT_NEW_FILE_DEBOUNCE_MS;
  const readDebounceMs = typeof configuredDebounce === 'function' ? configuredDebounce : () => configuredDebounce;
  const now = options.now ?? (() => new Date());
  const debug = options.debug ?? process.env.DASHBOARD_DEBUG === 'true';

  // Events are applied one at a time so the index has a single writer.
  let tail: Promise<unknown> = Promise.resolve();

  const processFile = async (filePath: string): Promise<NewRunOutcome> => {
    if (!isRunFileName(filePath)) {
      return { status: 'ignored', filePath };
    }

    const debounceMs = readDebounceMs();
    if (debounceMs > 0) {
      await delay(debounceMs);
    }

    const result = parseRunFile(filePath, { sensRoundDecimalPlaces });
    if (!result.ok) {
      console.warn(`[stats-watcher] failed to read new run ${path.basename(filePath)}: ${result.reason}`);
      return { status: 'parse_failed', filePath, reason: result.reason };
    }

    const { run } = result;
    const sensitivityKey = sensitivityKeyOf(run);
    const notification: NewResultNotification = {
      createdAt: now().toISOString(),
      rankAmongPeers: 1,
      scenarioName: run.scenarioName,
      score: run.score,
      sensitivityKey
    };

    if (!index.isKnown(run.scenarioName)) {
      if (debug) {
        console.log(`[stats-watcher] new scenario: ${run.scenarioName}`);
      }
    } else if (!index.hasSensitivity(run.scenarioName, sensitivityKey)) {
      if (debug) {
        console.log(`[stats-watcher] new sensitivity for ${run.scenarioName}: ${sensitivityKey}`);
      }
    } else {
      const highScore = index.getHighScore(run.scenarioName);
      notification.rankAmongPeers = index.rankAmongPeers(run.scenarioName, sensitivityKey, run.score);
      notification.previousHighScore = highScore;
      if (debug) {
        console.log(
          `[stats-watcher] ${sensitivityKey} has a new ${ordinal(notification.rankAmongPeers)} place score: ${run.score}`
        );
        logThresholdTelemetry(run, highScore);
      }
    }

    queue.enqueue(notification);
    index.ingest(run);
    return { status: 'ingested', filePath, run, notification };
  };

  const handleCreatedFile = (filePath: string): Promise<NewRunOutcome> => {
    const next = tail.then(async (): Promise<NewRunOutcome> => {
      try {
        return await processFile(filePath);
      } catch (error) {
        const reason = (error as Error).message;
        console.error(`[stats-watcher] unexpected failure handling ${filePath}: ${reason}`);
        return { status: 'parse_failed', filePath, reason };
      }
    });
    tail = next;
    return next;
  };

  const idle = async () => {
    await tail;
  };

  return { handleCreatedFile, idle };
}
