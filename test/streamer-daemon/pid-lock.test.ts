import { describe, test, expect } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  acquireStreamerLock,
  isProcessRunning,
  readStreamerLock,
  releaseStreamerLock,
} from '../../src/streamer-daemon/pid-lock.js';

function lockPath(): string {
  return path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'streamer-lock-')), 'streamer.pid');
}

describe('streamer pid lock', () => {
  test('writes the lock for this process', () => {
    const file = lockPath();

    const lock = acquireStreamerLock(file, { dataDir: '/data', mode: 'foreground' }, 1234);

    expect(lock).toEqual({ pid: process.pid, startedAt: 1234, dataDir: '/data', mode: 'foreground' });
    expect(readStreamerLock(file)).toEqual(lock);
  });

  test('refuses a lock held by another live process', () => {
    const file = lockPath();
    fs.writeFileSync(
      file,
      JSON.stringify({ pid: process.ppid, startedAt: 1, dataDir: '/data', mode: 'background' })
    );

    expect(() => acquireStreamerLock(file, { dataDir: '/data', mode: 'foreground' })).toThrow(
      `[StreamerLock] Another streamer is already running (PID: ${process.ppid}).`
    );
  });

  test('replaces a stale lock with the current pid', () => {
    const file = lockPath();
    fs.writeFileSync(file, JSON.stringify({ pid: 999999, startedAt: 1, dataDir: '/data', mode: 'background' }));

    acquireStreamerLock(file, { dataDir: '/data', mode: 'foreground' });

    expect(readStreamerLock(file)?.pid).toBe(process.pid);
  });

  test('ignores pid files it cannot read', () => {
    const file = lockPath();
    fs.writeFileSync(file, JSON.stringify({ pid: 'soon' }));
    expect(readStreamerLock(file)).toBeNull();
  });

  test('only releases its own lock', () => {
    const own = lockPath();
    acquireStreamerLock(own, { dataDir: '/data', mode: 'foreground' });
    releaseStreamerLock(own);
    expect(fs.existsSync(own)).toBe(false);

    const foreign = lockPath();
    fs.writeFileSync(
      foreign,
      JSON.stringify({ pid: process.ppid, startedAt: 1, dataDir: '/data', mode: 'background' })
    );
    releaseStreamerLock(foreign);
    expect(fs.existsSync(foreign)).toBe(true);
  });

  test('sees this process as running', () => {
    expect(isProcessRunning(process.pid)).toBe(true);
  });
});
