import { describe, test, expect } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_COMMENT_FILTER_CONFIG } from '../../src/app/stream/comment-filter.js';
import { normalizeConfig } from '../../src/infra/config/runtime-config.js';
import { resolveStreamerPaths } from '../../src/infra/config/streamer-paths.js';
import { openStreamArchive } from '../../src/infra/persistence/database.js';
import { writeShutdownMarker } from '../../src/infra/shutdown/marker-watcher.js';
import { EXIT_FORCED, StreamerDaemon, exitCodeFor } from '../../src/streamer-daemon/daemon.js';
import { createStreamerRuntime } from '../../src/streamer-daemon/runtime.js';
import { StateInvariantError } from '../../src/domain/stream/errors.js';
import { StaticTemplates, createFakeCollaborators, createRecordingLogger } from '../helpers/stream-fixtures.js';

function createSession() {
  const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'streamer-daemon-'));
  const config = normalizeConfig({
    paths: { dataDir },
    stream: { pollIntervalMs: 5, cadenceMs: 1000 },
    shutdown: { markerPollMs: 5 },
  });
  const collaborators = createFakeCollaborators();
  const exits: number[] = [];
  const daemon = new StreamerDaemon({
    config,
    paths: resolveStreamerPaths(dataDir),
    filterConfig: DEFAULT_COMMENT_FILTER_CONFIG,
    templates: new StaticTemplates(),
    seed: 'daemon-test',
    collaborators,
    logger: createRecordingLogger(),
    exit: (code) => exits.push(code),
  });
  return { daemon, collaborators, exits, paths: resolveStreamerPaths(dataDir) };
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('StreamerDaemon', () => {
  test('runs a session until the shutdown marker appears', async () => {
    const { daemon, collaborators, paths } = createSession();

    const running = daemon.run();
    expect(fs.existsSync(paths.pidFile)).toBe(true);
    await delay(20);
    writeShutdownMarker(paths.shutdownMarker, { requestedAt: Date.now() });
    const report = await running;

    expect(report.exitCode).toBe(0);
    expect(report.result).toMatchObject({ outcome: 'graceful', shutdownReason: 'marker', farewell: 'reply 3' });
    expect(collaborators.speech.spoken).toEqual(['reply 1', 'reply 2', 'reply 3']);
    expect(fs.existsSync(paths.pidFile)).toBe(false);
    expect(fs.readdirSync(paths.summariesDir)).toHaveLength(1);

    const { db, archive } = openStreamArchive(paths.archiveDb);
    try {
      expect(archive.listSummaries().map((summary) => summary.text)).toEqual(['reply 4']);
      expect(archive.getSessionEntries(report.archivedSessionId ?? '').map((entry) => entry.kind)).toEqual([
        'greeting',
        'monologue',
        'farewell',
      ]);
    } finally {
      db.close();
    }
  });

  test('aborts on the second interrupt', async () => {
    const { daemon, collaborators, exits, paths } = createSession();
    collaborators.speech.hang = true;

    const running = daemon.run();
    await delay(20);
    daemon.interrupt();
    await delay(20);
    daemon.interrupt();
    const report = await running;

    expect(report.exitCode).toBe(EXIT_FORCED);
    expect(report.result).toEqual({ outcome: 'aborted' });
    expect(exits).toEqual([EXIT_FORCED]);
    expect(collaborators.speech.stopCalls).toBe(1);
    expect(fs.existsSync(paths.pidFile)).toBe(false);
  });
});

describe('exitCodeFor', () => {
  test('maps each outcome to its exit code', () => {
    expect(exitCodeFor({ outcome: 'graceful', shutdownReason: 'signal', summaryTaskId: null, farewell: 'bye' })).toBe(0);
    expect(exitCodeFor({ outcome: 'fatal', error: new StateInvariantError('broken') })).toBe(1);
    expect(exitCodeFor({ outcome: 'aborted' })).toBe(130);
  });
});

describe('createStreamerRuntime', () => {
  test('queues the initial theme and wires every handler', () => {
    const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'streamer-runtime-'));
    const runtime = createStreamerRuntime({
      config: normalizeConfig({ paths: { dataDir }, dailySummary: { enabled: true } }),
      paths: resolveStreamerPaths(dataDir),
      filterConfig: DEFAULT_COMMENT_FILTER_CONFIG,
      templates: new StaticTemplates(),
      collaborators: createFakeCollaborators(),
      theme: { content: 'Retro consoles', source: 'theme.txt' },
      logger: createRecordingLogger(),
    });

    expect(runtime.queue.drain().map((event) => event.kind)).toEqual(['theme_requested']);
    expect(runtime.registry.list().map((entry) => entry.kind).sort()).toEqual([
      'comment_received',
      'comment_response_requested',
      'monologue_tick',
      'prepare_daily_summary',
      'prepare_greeting',
      'prepare_memory_digest',
      'prepare_stream_summary',
      'theme_requested',
    ]);
    expect(runtime.memory).not.toBeNull();
    expect(runtime.chatPoller).toBeNull();
    expect(runtime.dailySchedule).not.toBeNull();
  });
});
