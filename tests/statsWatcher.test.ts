import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { test } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';
import { createNewRunHandler } from '../server/lib/newRunHandler.js';
import { createNotificationQueue } from '../server/lib/notificationQueue.js';
import { createScenarioIndex } from '../server/lib/scenarioIndex.js';
import { startStatsWatcher } from '../server/lib/statsWatcher.js';
import { buildRunCsv, makeTempDir, runFileName } from './fixtures.js';

async function waitFor(predicate: () => boolean, timeoutMs: number): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      assert.fail(`Condition not met within ${timeoutMs} ms`);
    }
    await delay(25);
  }
}

test('a run file written in two steps is ingested once after the delay; directories are ignored', async () => {
  const dir = makeTempDir('aim-watch-');
  const index = createScenarioIndex();
  const queue = createNotificationQueue();
  const handler = createNewRunHandler({ index, queue, sensRoundDecimalPlaces: 2, debounceMs: 400, debug: false });
  const watcher = startStatsWatcher(dir, handler);

  try {
    await watcher.ready;
    fs.mkdirSync(path.join(dir, 'archive.csv'));

    const filePath = path.join(dir, runFileName('1w4ts', '2025.01.01-10.00.00'));
    const text = buildRunCsv();
    const splitAt = Math.floor(text.length / 2);
    fs.writeFileSync(filePath, text.slice(0, splitAt), 'utf-8');
    await delay(50);
    fs.appendFileSync(filePath, text.slice(splitAt), 'utf-8');

    await waitFor(() => index.isKnown('1w4ts'), 5000);
    await delay(500);
    await handler.idle();

    assert.equal(index.getStats('1w4ts').runCount, 1);
    const notifications = queue.drain();
    assert.equal(notifications.length, 1);
    assert.equal(notifications[0]?.score, 123.45);
    assert.equal(notifications[0]?.sensitivityKey, '2.35 Overwatch');
  } finally {
    await watcher.close();
    await handler.idle();
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
