import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const APP_DIR_NAME = 'monologue-streamer';

function resolveHomeDir(env: NodeJS.ProcessEnv): string {
  const homeFromEnv = env.HOME;
  if (typeof homeFromEnv === 'string' && homeFromEnv.trim()) {
    return homeFromEnv;
  }
  return os.homedir();
}

function ensureDir(dir: string): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  return dir;
}

/**
 * `$STREAMER_CONFIG_DIR`, else `$XDG_CONFIG_HOME/monologue-streamer`,
 * else `~/.config/monologue-streamer`. Created on first use.
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.STREAMER_CONFIG_DIR;
  if (typeof override === 'string' && override.trim()) {
    return ensureDir(override);
  }

  const xdgConfigHome = env.XDG_CONFIG_HOME;
  const baseDir =
    typeof xdgConfigHome === 'string' && xdgConfigHome.trim()
      ? xdgConfigHome
      : path.join(resolveHomeDir(env), '.config');

  return ensureDir(path.join(baseDir, APP_DIR_NAME));
}

/**
 * Default location for runtime data (pid file, marker, summaries, logs).
 */
export function getDefaultDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdgStateHome = env.XDG_STATE_HOME;
  const baseDir =
    typeof xdgStateHome === 'string' && xdgStateHome.trim()
      ? xdgStateHome
      : path.join(resolveHomeDir(env), '.local', 'state');
  return path.join(baseDir, APP_DIR_NAME);
}

/**
 * Directory holding files shipped next to the sources (prompt templates,
 * default word lists). Works from `src/` under ts-jest and from `dist/`.
 */
export function resolveBundledDir(moduleDir: string, ...segments: string[]): string {
  const relativeFromSrc = path.join(...segments);
  const candidates = [
    path.join(moduleDir, ...segments.slice(-1)),
    path.join(process.cwd(), 'src', relativeFromSrc),
    path.join(process.cwd(), 'dist', relativeFromSrc),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return candidates[0];
}
