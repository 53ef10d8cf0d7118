import fs from 'node:fs';
import { logger } from './logger.js';

export const DEFAULT_DEBOUNCE_MS = 100;

export interface Debouncer {
  trigger(): void;
  cancel(): void;
}

/** Bursts of trigger() calls collapse into one fn() call `ms` after the last. */
export function createDebouncer(fn: () => void, ms: number): Debouncer {
  let timer: ReturnType<typeof setTimeout> | undefined;
  return {
    trigger() {
      if (timer) clearTimeout(timer);
      timer = setTimeout(() => {
        timer = undefined;
        fn();
      }, ms);
    },
    cancel() {
      if (timer) clearTimeout(timer);
      timer = undefined;
    },
  };
}

export interface ProjectWatcher {
  /** Directories actually being watched. */
  readonly dirs: string[];
  close(): void;
}

export interface WatchOptions {
  debounceMs?: number;
}

/**
 * Watch directory trees and call onChange once per burst of events.
 * Directories that do not exist are skipped.
 */
export function watchProject(
  dirs: string[],
  onChange: () => void,
  options: WatchOptions = {}
): ProjectWatcher {
  const debouncer = createDebouncer(onChange, options.debounceMs ?? DEFAULT_DEBOUNCE_MS);
  const watchers: fs.FSWatcher[] = [];
  const watched: string[] = [];

  for (const dir of dirs) {
    if (!fs.existsSync(dir)) continue;
    const watcher = fs.watch(dir, { recursive: true }, () => debouncer.trigger());
    watcher.on('error', (err) => logger.error(`Watch error in ${dir}`, err));
    watchers.push(watcher);
    watched.push(dir);
  }

  return {
    dirs: watched,
    close() {
      debouncer.cancel();
      for (const watcher of watchers) watcher.close();
    },
  };
}
