import { describe, it, expect } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ShutdownSignal } from '../../../src/app/stream/shutdown-signal.js';
import {
  ShutdownMarkerWatcher,
  removeShutdownMarker,
  writeShutdownMarker,
} from '../../../src/infra/shutdown/marker-watcher.js';
import { ShutdownPathError } from '../../../src/domain/stream/errors.js';

const quiet = { info: () => undefined, warn: () => undefined };

function markerPath(): string {
  return path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'streamer-marker-')), 'run', 'shutdown.request');
}

describe('ShutdownMarkerWatcher', () => {
  it('turns a marker into a marker shutdown request', () => {
    const marker = markerPath();
    const signal = new ShutdownSignal();
    const watcher = new ShutdownMarkerWatcher({ markerPath: marker, signal, pollMs: 1000, now: () => 77, logger: quiet });

    expect(watcher.check()).toBe(false);

    writeShutdownMarker(marker, { requestedAt: 70, requestedBy: 1234 });
    expect(watcher.check()).toBe(true);

    expect(fs.existsSync(marker)).toBe(false);
    expect(signal.consume()).toEqual({ reason: 'marker', requestedAt: 77 });
  });

  it('clears a stale marker when it starts', () => {
    const marker = markerPath();
    writeShutdownMarker(marker, { requestedAt: 1 });
    const signal = new ShutdownSignal();
    const watcher = new ShutdownMarkerWatcher({ markerPath: marker, signal, pollMs: 1000, logger: quiet });

    watcher.start();
    try {
      expect(watcher.isWatching()).toBe(true);
      expect(fs.existsSync(marker)).toBe(false);
      expect(signal.isPending()).toBe(false);
    } finally {
      watcher.stop();
    }
    expect(watcher.isWatching()).toBe(false);
  });
});

describe('removeShutdownMarker', () => {
  it('reports whether there was anything to remove', () => {
    const marker = markerPath();
    writeShutdownMarker(marker, { requestedAt: 1 });

    expect(JSON.parse(fs.readFileSync(marker, 'utf-8'))).toEqual({ requestedAt: 1 });
    expect(removeShutdownMarker(marker)).toBe(true);
    expect(removeShutdownMarker(marker)).toBe(false);
  });

  it('raises ShutdownPathError when the marker cannot be written', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'streamer-marker-'));
    const blocker = path.join(dir, 'not-a-directory');
    fs.writeFileSync(blocker, '');

    expect(() => writeShutdownMarker(path.join(blocker, 'shutdown.request'), { requestedAt: 1 })).toThrow(
      ShutdownPathError
    );
  });
});
