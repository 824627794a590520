import { createWriteStream, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { format } from 'node:util';

type MirrorLevel = 'debug' | 'info' | 'warn' | 'error';
type ConsoleMethod = (...args: unknown[]) => void;

function expandHome(path: string): string {
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

function serializeLine(level: MirrorLevel, args: unknown[]): string {
  return `[${new Date().toISOString()}] ${level.toUpperCase()}: ${format(...args)}\n`;
}

export type UnifiedLoggingHandle = {
  filePath: string;
  uninstall: () => void;
};

export const DEFAULT_LOG_FILE = '~/.tradewatch/logs/tradewatch.log';

/**
 * Mirror all console output (log/warn/error/debug) into a single file.
 * Logger writes through console.*, so its lines land here too.
 */
export function installConsoleFileMirror(params: { filePath: string }): UnifiedLoggingHandle {
  const filePath = expandHome(params.filePath);
  mkdirSync(dirname(filePath), { recursive: true });
  const stream = createWriteStream(filePath, { flags: 'a' });

  const original: Record<MirrorLevel, ConsoleMethod> = {
    info: console.log.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
    debug: console.debug.bind(console),
  };

  const mirrored = (level: MirrorLevel): ConsoleMethod => (...args: unknown[]) => {
    stream.write(serializeLine(level, args));
    original[level](...args);
  };

  console.log = mirrored('info');
  console.warn = mirrored('warn');
  console.error = mirrored('error');
  console.debug = mirrored('debug');

  const onUnhandledRejection = (reason: unknown) => {
    console.error('unhandledRejection', reason);
  };
  process.on('unhandledRejection', onUnhandledRejection);

  return {
    filePath,
    uninstall: () => {
      console.log = original.info;
      console.warn = original.warn;
      console.error = original.error;
      console.debug = original.debug;
      process.off('unhandledRejection', onUnhandledRejection);
      stream.end();
    },
  };
}

/** Installs the mirror when TRADEWATCH_LOG_FILE or TRADEWATCH_LOG_MIRROR=1 is set. */
export function installConsoleFileMirrorFromEnv(
  env: NodeJS.ProcessEnv = process.env
): UnifiedLoggingHandle | null {
  const explicitPath = String(env.TRADEWATCH_LOG_FILE ?? '').trim();
  const enabled = String(env.TRADEWATCH_LOG_MIRROR ?? '').trim() === '1' || explicitPath.length > 0;
  if (!enabled) {
    return null;
  }
  return installConsoleFileMirror({ filePath: explicitPath || DEFAULT_LOG_FILE });
}
