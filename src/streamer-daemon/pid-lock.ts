import * as fs from 'fs';
import * as path from 'path';

export interface StreamerLock {
  pid: number;
  startedAt: number;
  dataDir: string;
  mode: 'foreground' | 'background';
}

export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

function isStreamerLock(value: unknown): value is StreamerLock {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'pid' in value &&
    typeof value.pid === 'number' &&
    'startedAt' in value &&
    typeof value.startedAt === 'number' &&
    'dataDir' in value &&
    typeof value.dataDir === 'string' &&
    'mode' in value &&
    (value.mode === 'foreground' || value.mode === 'background')
  );
}

/**
 * Parsed pid file, or null when it is missing or unreadable.
 */
export function readStreamerLock(lockPath: string): StreamerLock | null {
  if (!fs.existsSync(lockPath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(lockPath, 'utf-8'));
    return isStreamerLock(parsed) ? parsed : null;
  } catch (error) {
    console.warn('[StreamerLock] Ignoring unreadable pid file', { path: lockPath, error });
    return null;
  }
}

export function acquireStreamerLock(
  lockPath: string,
  info: Omit<StreamerLock, 'pid' | 'startedAt'>,
  now: number = Date.now()
): StreamerLock {
  const existing = readStreamerLock(lockPath);
  if (existing && existing.pid !== process.pid && isProcessRunning(existing.pid)) {
    throw new Error(`[StreamerLock] Another streamer is already running (PID: ${existing.pid}).`);
  }

  fs.mkdirSync(path.dirname(lockPath), { recursive: true, mode: 0o700 });

  const lock: StreamerLock = { pid: process.pid, startedAt: now, ...info };
  fs.writeFileSync(lockPath, JSON.stringify(lock, null, 2));
  return lock;
}

/**
 * Removes the pid file if it belongs to this process.
 */
export function releaseStreamerLock(lockPath: string): void {
  const existing = readStreamerLock(lockPath);
  if (existing && existing.pid !== process.pid) {
    return;
  }
  if (fs.existsSync(lockPath)) {
    fs.unlinkSync(lockPath);
  }
}
