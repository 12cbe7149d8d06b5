import chokidar, { type FSWatcher } from 'chokidar';
import type { NewRunHandler } from './newRunHandler';

export interface StatsWatcher {
  // Resolves once the initial scan is done; files created after this are reported.
  ready: Promise<void>;
  close(): Promise<void>;
}

export function startStatsWatcher(statsDir: string, handler: NewRunHandler): StatsWatcher {
  const watcher: FSWatcher = chokidar.watch(statsDir, {
    ignoreInitial: true,
    persistent: true,
    followSymlinks: false,
    depth: 0
  });

  // "add" only fires for files; directories arrive as "addDir" and are not subscribed.
  watcher.on('add', (filePath: string) => {
    void handler.handleCreatedFile(filePath);
  });
  watcher.on('error', (error: unknown) => {
    console.error(`[stats-watcher] watcher error on ${statsDir}: ${String(error)}`);
  });

  const ready = new Promise<void>((resolve) => {
    watcher.once('ready', () => {
      console.log(`[stats-watcher] monitoring directory: ${statsDir}`);
      resolve();
    });
  });

  return {
    ready,
    close: async () => {
      await watcher.close();
    }
  };
}
