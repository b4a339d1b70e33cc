import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs/promises';
import { unlinkSync } from 'fs';
import path from 'path';
import { setTimeout as delay } from 'timers/promises';
import { watch } from '../filewatch/watch.js';
import { createChokidarNotifier } from '../filewatch/notifier.js';
import type { WatchOptions } from '../filewatch/types.js';
import { FileNotFoundError, WatcherSetupError } from '../utils/errors.js';
import { LogLevel, log } from '../utils/logger.js';
import { FakeNotifier } from './helpers/fake-notifier.js';
import { countSignals, settlesWithin, waitFor } from './helpers/signals.js';
import { createTempDir, createVolumeLayout, swapVolume } from './helpers/temp-dir.js';

log.setLevel(LogLevel.SILENT);

// Real notifiers must not keep the test process alive
const realNotifier: WatchOptions = {
  pollIntervalMs: 50,
  createNotifier: (filePath) => createChokidarNotifier(filePath, { persistent: false })
};

test('watch rejects a missing file with FileNotFoundError', async () => {
  const dir = await createTempDir();
  try {
    const missing = path.join(dir.root, 'missing.txt');
    await assert.rejects(watch(new AbortController().signal, missing), (error: unknown) => {
      assert.ok(error instanceof FileNotFoundError);
      assert.equal(error.filePath, missing);
      assert.equal(error.message, `file does not exist: ${missing}`);
      return true;
    });
  } finally {
    await dir.cleanup();
  }
});

test('watch rejects a path under a regular file with FileNotFoundError', async () => {
  const dir = await createTempDir({ 'metrics.txt': 'a' });
  try {
    await assert.rejects(
      watch(new AbortController().signal, path.join(dir.root, 'metrics.txt', 'child')),
      FileNotFoundError
    );
  } finally {
    await dir.cleanup();
  }
});

test('watch wraps notifier failures in WatcherSetupError', async () => {
  const dir = await createTempDir({ 'metrics.txt': 'a' });
  const cause = new Error('inotify limit reached');
  const notifier = new FakeNotifier(cause);
  try {
    await assert.rejects(
      watch(new AbortController().signal, path.join(dir.root, 'metrics.txt'), { createNotifier: () => notifier }),
      (error: unknown) => {
        assert.ok(error instanceof WatcherSetupError);
        assert.equal(error.cause, cause);
        return true;
      }
    );
    assert.equal(notifier.closeCalls, 1);
  } finally {
    await dir.cleanup();
  }
});

test('watch yields exactly one signal per change event', async () => {
  const dir = await createTempDir({ 'metrics.txt': 'a' });
  const controller = new AbortController();
  const notifier = new FakeNotifier();
  try {
    const handle = await watch(controller.signal, path.join(dir.root, 'metrics.txt'), {
      createNotifier: () => notifier
    });
    const signals = countSignals(handle);

    // permission change, then content write
    notifier.emit({ type: 'change' });
    notifier.emit({ type: 'change' });
    await waitFor(() => signals.count === 2);

    controller.abort();
    assert.equal(await signals.finished, 2);
    assert.equal(notifier.closeCalls, 1);
  } finally {
    controller.abort();
    await dir.cleanup();
  }
});

test('watch closes without signals when the file is removed', async () => {
  const dir = await createTempDir({ 'metrics.txt': 'a' });
  const controller = new AbortController();
  const notifier = new FakeNotifier();
  try {
    const handle = await watch(controller.signal, path.join(dir.root, 'metrics.txt'), {
      createNotifier: () => notifier
    });
    const signals = countSignals(handle);

    notifier.emit({ type: 'unlink' });

    assert.equal(await signals.finished, 0);
    assert.equal(controller.signal.aborted, false);
    assert.equal(notifier.closeCalls, 1);
  } finally {
    controller.abort();
    await dir.cleanup();
  }
});

test('watch closes and releases everything on abort', async () => {
  const dir = await createTempDir({ 'metrics.txt': 'a' });
  const controller = new AbortController();
  const notifier = new FakeNotifier();
  try {
    const handle = await watch(controller.signal, path.join(dir.root, 'metrics.txt'), {
      createNotifier: () => notifier
    });
    assert.equal(handle.isClosed, false);

    controller.abort();

    assert.equal(handle.isClosed, true);
    assert.equal(notifier.closeCalls, 1);
    assert.equal((await handle.receive()).done, true);
  } finally {
    await dir.cleanup();
  }
});

test('watch with an already aborted signal returns a closed handle', async () => {
  const dir = await createTempDir({ 'metrics.txt': 'a' });
  const controller = new AbortController();
  controller.abort();
  const notifier = new FakeNotifier();
  try {
    const handle = await watch(controller.signal, path.join(dir.root, 'metrics.txt'), {
      createNotifier: () => notifier
    });

    assert.equal(handle.isClosed, true);
    assert.equal(notifier.closeCalls, 1);
  } finally {
    await dir.cleanup();
  }
});

test('watch closes when an ancestor symlink is repointed', async () => {
  const dir = await createTempDir();
  const controller = new AbortController();
  const notifier = new FakeNotifier();
  try {
    const filePath = await createVolumeLayout(dir.root, 'requests 1\n');
    const handle = await watch(controller.signal, filePath, {
      pollIntervalMs: 20,
      createNotifier: () => notifier
    });
    const signals = countSignals(handle);

    await swapVolume(dir.root, 'datav2', 'requests 2\n');

    assert.equal(await settlesWithin(signals.finished, 2000), true);
    assert.equal(await signals.finished, 0);
    assert.equal(controller.signal.aborted, false);
    assert.equal(notifier.closeCalls, 1);
  } finally {
    controller.abort();
    await dir.cleanup();
  }
});

test('symlink drift closes the handle without delivering a pending change', async () => {
  const dir = await createTempDir();
  const controller = new AbortController();
  const notifier = new FakeNotifier();
  try {
    const filePath = await createVolumeLayout(dir.root, 'requests 1\n');
    const handle = await watch(controller.signal, filePath, {
      pollIntervalMs: 20,
      createNotifier: () => notifier
    });

    // Nobody receives yet, so this signal is still in flight at drift time
    notifier.emit({ type: 'change' });
    await swapVolume(dir.root, 'datav2', 'requests 2\n');

    assert.equal(await settlesWithin(handle.closed, 2000), true);
    assert.equal((await handle.receive()).done, true);
    assert.equal(controller.signal.aborted, false);
  } finally {
    controller.abort();
    await dir.cleanup();
  }
});

test('watch rejects when the file is removed while the notifier starts', { timeout: 15000 }, async () => {
  const dir = await createTempDir({ 'metrics.txt': 'requests 1\n' });
  const filePath = path.join(dir.root, 'metrics.txt');
  try {
    await assert.rejects(
      watch(new AbortController().signal, filePath, {
        createNotifier: (watchedPath) => {
          unlinkSync(watchedPath);
          return createChokidarNotifier(watchedPath, { persistent: false });
        }
      }),
      FileNotFoundError
    );
  } finally {
    await dir.cleanup();
  }
});

test('watch signals a real write to the file', { timeout: 15000 }, async () => {
  const dir = await createTempDir({ 'metrics.txt': 'requests 1\n' });
  const controller = new AbortController();
  try {
    const filePath = path.join(dir.root, 'metrics.txt');
    const handle = await watch(controller.signal, filePath, realNotifier);
    const signals = countSignals(handle);

    await delay(50);
    await fs.writeFile(filePath, 'requests 2\n');
    await waitFor(() => signals.count >= 1);

    controller.abort();
    assert.ok((await signals.finished) >= 1);
  } finally {
    controller.abort();
    await dir.cleanup();
  }
});

test('watch closes when the real file is removed', { timeout: 15000 }, async () => {
  const dir = await createTempDir({ 'metrics.txt': 'requests 1\n' });
  const controller = new AbortController();
  try {
    const filePath = path.join(dir.root, 'metrics.txt');
    const handle = await watch(controller.signal, filePath, realNotifier);

    await fs.unlink(filePath);

    assert.equal(await settlesWithin(handle.closed, 5000), true);
    assert.equal(controller.signal.aborted, false);
  } finally {
    controller.abort();
    await dir.cleanup();
  }
});

test('watch closes when the real file is renamed away', { timeout: 15000 }, async () => {
  const dir = await createTempDir({ 'metrics.txt': 'requests 1\n' });
  const controller = new AbortController();
  try {
    const filePath = path.join(dir.root, 'metrics.txt');
    const handle = await watch(controller.signal, filePath, realNotifier);

    await fs.rename(filePath, path.join(dir.root, 'metrics.txt.old'));

    assert.equal(await settlesWithin(handle.closed, 5000), true);
  } finally {
    controller.abort();
    await dir.cleanup();
  }
});

test('watch closes when a mounted volume is swapped', { timeout: 15000 }, async () => {
  const dir = await createTempDir();
  const controller = new AbortController();
  try {
    const filePath = await createVolumeLayout(dir.root, 'requests 1\n');
    const handle = await watch(controller.signal, filePath, realNotifier);

    await swapVolume(dir.root, 'datav2', 'requests 2\n');

    assert.equal(await settlesWithin(handle.closed, 5000), true);
    assert.equal(await fs.readFile(filePath, 'utf8'), 'requests 2\n');
  } finally {
    controller.abort();
    await dir.cleanup();
  }
});

test('watch can be set up and cancelled repeatedly', { timeout: 15000 }, async () => {
  const dir = await createTempDir({ 'metrics.txt': 'requests 1\n' });
  try {
    const filePath = path.join(dir.root, 'metrics.txt');

    for (let i = 0; i < 5; i++) {
      const controller = new AbortController();
      const handle = await watch(controller.signal, filePath, realNotifier);
      const signals = countSignals(handle);

      controller.abort();
      assert.equal(await signals.finished, 0);
    }
  } finally {
    await dir.cleanup();
  }
});
