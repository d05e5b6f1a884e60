import * as path from 'path';

export interface StreamerPaths {
  dataDir: string;
  pidFile: string;
  logFile: string;
  shutdownMarker: string;
  summariesDir: string;
  archiveDb: string;
}

/**
 * Files the running streamer and the `stop`/`status` commands agree on.
 */
export function resolveStreamerPaths(dataDir: string): StreamerPaths {
  return {
    dataDir,
    pidFile: path.join(dataDir, 'streamer.pid'),
    logFile: path.join(dataDir, 'streamer.log'),
    shutdownMarker: path.join(dataDir, 'shutdown.request'),
    summariesDir: path.join(dataDir, 'summaries'),
    archiveDb: path.join(dataDir, 'archive.db'),
  };
}
