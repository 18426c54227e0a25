import { watch, type FSWatcher } from 'chokidar';
import type { NamespaceEngine } from './namespace/engine.js';

let watcher: FSWatcher | null = null;

/**
 * Watch the sort file so hand edits show up on the next listing, without
 * waiting for the mtime debounce
 */
export function startRuleFileWatcher(engine: NamespaceEngine, filePath: string): void {
  if (watcher) {
    return;
  }

  watcher = watch(filePath, {
    persistent: true,
    ignoreInitial: true,
    awaitWriteFinish: {
      stabilityThreshold: 500,
      pollInterval: 100,
    },
  });

  const onChange = (event: string) => (changed: string) => {
    console.log(`[Watcher] Sort file ${event}: ${changed}`);
    engine.invalidateRules();
  };

  watcher.on('add', onChange('created'));
  watcher.on('change', onChange('changed'));
  watcher.on('unlink', onChange('removed'));

  watcher.on('error', (error) => {
    console.error('[Watcher] Error:', error);
  });

  console.log(`[Watcher] Watching: ${filePath}`);
}

export async function stopRuleFileWatcher(): Promise<void> {
  if (watcher) {
    const current = watcher;
    watcher = null;
    await current.close();
    console.log('[Watcher] Stopped');
  }
}
