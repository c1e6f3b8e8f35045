import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { FileWatcher, type FileWatcherCallbacks } from '../daemon/file-watcher.js';
import type { FileEvent } from '../daemon/types.js';
import { DEFAULT_IGNORED_PATTERNS } from '../daemon/types.js';

describe('FileWatcher', () => {
  let tmpDir: string;
  let events: FileEvent[];
  let callbacks: FileWatcherCallbacks;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-sync-watcher-test-'));
    events = [];
    callbacks = {
      onEvent: (e: FileEvent): void => {
        events.push(e);
      },
      onError: (_err: Error): void => {
        /* noop */
      },
      onReady: (): void => {
        /* noop */
      },
    };
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function makeWatcher(roots: string[] = [tmpDir]): FileWatcher {
    return new FileWatcher({ roots, ignoredPatterns: [...DEFAULT_IGNORED_PATTERNS], writeStabilityMs: 100 }, callbacks);
  }

  it('should start and stop without errors', async () => {
    const watcher = makeWatcher();

    await watcher.start();
    expect(watcher.isWatching).toBe(true);
    expect(watcher.watchedPaths).toEqual([tmpDir]);

    await watcher.stop();
    expect(watcher.isWatching).toBe(false);
    expect(watcher.watchedPaths).toEqual([]);
  });

  it('should settle a pending start when stopped before the initial scan ends', async () => {
    const watcher = makeWatcher();

    const starting = watcher.start();
    await watcher.stop();
    await starting;

    expect(watcher.isWatching).toBe(false);
    expect(watcher.watchedPaths).toEqual([]);
  });

  it('should not report files that existed before start', async () => {
    fs.writeFileSync(path.join(tmpDir, 'old.jpg'), 'old');
    const watcher = makeWatcher();

    await watcher.start();
    await new Promise((resolve) => setTimeout(resolve, 300));
    await watcher.stop();

    expect(events).toEqual([]);
  });

  it('should report a new file once it is written', async () => {
    const watcher = makeWatcher();
    await watcher.start();

    const photo = path.join(tmpDir, 'new.jpg');
    fs.writeFileSync(photo, 'jpeg-bytes');

    await vi.waitFor(() => expect(events.map((e) => e.absolutePath)).toEqual([photo]), { timeout: 5_000 });
    expect(events[0]?.type).toBe('add');

    await watcher.stop();
  });

  it('should report files in subdirectories created later', async () => {
    const watcher = makeWatcher();
    await watcher.start();

    const dir = path.join(tmpDir, '2024', 'may');
    fs.mkdirSync(dir, { recursive: true });
    await new Promise((resolve) => setTimeout(resolve, 200));
    const photo = path.join(dir, 'nested.jpg');
    fs.writeFileSync(photo, 'jpeg-bytes');

    await vi.waitFor(() => expect(events.map((e) => e.absolutePath)).toContain(photo), { timeout: 5_000 });

    await watcher.stop();
  });

  it('should ignore temporary files', async () => {
    const watcher = makeWatcher();
    await watcher.start();

    fs.writeFileSync(path.join(tmpDir, 'download.jpg.part'), 'partial');
    fs.writeFileSync(path.join(tmpDir, 'real.jpg'), 'jpeg-bytes');

    await vi.waitFor(() => expect(events.map((e) => e.absolutePath)).toContain(path.join(tmpDir, 'real.jpg')), {
      timeout: 5_000,
    });
    expect(events.map((e) => path.basename(e.absolutePath))).toEqual(['real.jpg']);

    await watcher.stop();
  });

  it('should record directories already covered by a root without re-adding them', async () => {
    const watcher = makeWatcher();
    await watcher.start();

    const sub = path.join(tmpDir, 'sub');
    watcher.add(sub);
    watcher.add(sub);

    expect(watcher.watchedPaths).toEqual([tmpDir, sub]);

    await watcher.stop();
  });

  it('should forget a removed root and everything below it', async () => {
    const other = fs.mkdtempSync(path.join(os.tmpdir(), 'media-sync-watcher-other-'));
    try {
      const watcher = makeWatcher([tmpDir, other]);
      await watcher.start();
      watcher.add(path.join(tmpDir, 'sub'));

      watcher.remove(tmpDir);

      expect(watcher.watchedPaths).toEqual([other]);
      await watcher.stop();
    } finally {
      fs.rmSync(other, { recursive: true, force: true });
    }
  });
});
