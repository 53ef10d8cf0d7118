import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createDebouncer, watchProject, type ProjectWatcher } from './watcher.js';

describe('createDebouncer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('collapses a burst into one call after the quiet period', () => {
    const fn = vi.fn();
    const debouncer = createDebouncer(fn, 100);

    debouncer.trigger();
    vi.advanceTimersByTime(60);
    debouncer.trigger();
    vi.advanceTimersByTime(60);
    expect(fn).not.toHaveBeenCalled();

    vi.advanceTimersByTime(40);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('fires again for a later burst', () => {
    const fn = vi.fn();
    const debouncer = createDebouncer(fn, 50);

    debouncer.trigger();
    vi.advanceTimersByTime(50);
    debouncer.trigger();
    vi.advanceTimersByTime(50);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('drops a pending call on cancel', () => {
    const fn = vi.fn();
    const debouncer = createDebouncer(fn, 50);

    debouncer.trigger();
    debouncer.cancel();
    vi.advanceTimersByTime(100);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('watchProject', () => {
  let root: string;
  let watcher: ProjectWatcher | null;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'tessel-watch-'));
    watcher = null;
  });

  afterEach(() => {
    watcher?.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('skips directories that do not exist', () => {
    fs.mkdirSync(path.join(root, 'routes'));
    watcher = watchProject([path.join(root, 'routes'), path.join(root, 'api')], () => {});
    expect(watcher.dirs).toEqual([path.join(root, 'routes')]);
  });

  it('reports changes in nested directories', async () => {
    const nested = path.join(root, 'routes', 'posts');
    fs.mkdirSync(nested, { recursive: true });
    const onChange = vi.fn();
    watcher = watchProject([path.join(root, 'routes')], onChange, { debounceMs: 20 });

    fs.writeFileSync(path.join(nested, 'index.html'), '<p>new</p>');
    await vi.waitFor(() => expect(onChange).toHaveBeenCalled(), { timeout: 2000 });
  });
});
