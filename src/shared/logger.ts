/**
 * Leveled console logger.
 *
 * Reads `LOG_LEVEL` from the environment (populated from `.env` by dotenv at
 * the entry point) and gates output accordingly. Levels: silent, error, warn,
 * info, debug.
 *
 * Usage:
 *   import { createLogger } from '../shared/logger.js';
 *   const log = createLogger('registry');
 *   log.info('Backend github connected');  // [2026-02-21 12:00:00] [INFO ] [registry] Backend github connected
 *   log.debug('Frame', frame);              // only shown when LOG_LEVEL=debug
 *
 * The threshold is resolved lazily so that the environment is fully loaded
 * before the first message is emitted.
 */

// ── Log levels (lower = more severe) ────────────────────────────────────

const LEVELS = { silent: -1, error: 0, warn: 1, info: 2, debug: 3 } as const;
type LevelName = keyof typeof LEVELS;
type EmitLevel = Exclude<LevelName, 'silent'>;

const COLORS: Record<EmitLevel, string> = {
  error: '\x1b[31m',
  warn: '\x1b[33m',
  info: '\x1b[32m',
  debug: '\x1b[34m',
};
const RESET = '\x1b[0m';

function isLevelName(value: string): value is LevelName {
  return value in LEVELS;
}

// ── Resolve effective level lazily ──────────────────────────────────────

let resolvedThreshold: number | null = null;

function threshold(): number {
  if (resolvedThreshold === null) {
    const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
    resolvedThreshold = isLevelName(env) ? LEVELS[env] : LEVELS.info;
  }
  return resolvedThreshold;
}

// ── Formatting ──────────────────────────────────────────────────────────

function timestamp(): string {
  const d = new Date();
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

function formatMessage(level: EmitLevel, mod: string, msg: string): string {
  const tag = level.toUpperCase().padEnd(5);
  return `[${timestamp()}] [${COLORS[level]}${tag}${RESET}] [${mod}] ${msg}`;
}

// ── Logger interface ────────────────────────────────────────────────────

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger with a fixed module label.
 *
 * @param module - Short identifier for the module (e.g., 'router', 'http', 'backend:github').
 */
export function createLogger(module: string): Logger {
  const emit = (level: EmitLevel, message: string, args: unknown[]) => {
    if (LEVELS[level] > threshold()) return;
    const formatted = formatMessage(level, module, message);
    if (level === 'error') {
      console.error(formatted, ...args);
    } else if (level === 'warn') {
      console.warn(formatted, ...args);
    } else {
      console.log(formatted, ...args);
    }
  };

  return {
    error: (message: string, ...args: unknown[]) => emit('error', message, args),
    warn: (message: string, ...args: unknown[]) => emit('warn', message, args),
    info: (message: string, ...args: unknown[]) => emit('info', message, args),
    debug: (message: string, ...args: unknown[]) => emit('debug', message, args),
  };
}
