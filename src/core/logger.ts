import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { getTraceContext } from './trace-context.js';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Maximum number of log files to keep */
  maxFiles: number;
  /** Log level */
  level: pino.Level;
  /** Pretty console output (development) */
  pretty: boolean;
  /** Also write a log file under logDir */
  toFile: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
  toFile: true,
};

const LOG_PREFIX = 'agent-';

function generateLogFilename(): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return `${LOG_PREFIX}${timestamp}.log`;
}

/**
 * Remove empty log files and keep only the newest maxFiles.
 */
export function pruneLogFiles(logDir: string, maxFiles: number): string[] {
  if (!fs.existsSync(logDir)) {
    return [];
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(LOG_PREFIX) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const stale = [
    ...files.filter((f) => f.size === 0),
    ...files
      .filter((f) => f.size > 0)
      .sort((a, b) => b.mtime - a.mtime)
      .slice(maxFiles),
  ];

  const removed: string[] = [];
  for (const file of stale) {
    try {
      fs.unlinkSync(file.path);
      removed.push(file.path);
    } catch (error) {
      // Logger is not up yet; a file we cannot remove is simply kept.
      process.emitWarning(
        `Could not remove old log file ${file.path}: ` +
          (error instanceof Error ? error.message : String(error))
      );
    }
  }
  return removed;
}

/**
 * Pino mixin injecting the active trace context into every entry.
 * Explicit fields passed to a log call win over these.
 */
function createTraceMixin(): () => Record<string, unknown> {
  return () => {
    const ctx = getTraceContext();
    if (!ctx) return {};

    const result: Record<string, unknown> = { traceId: ctx.traceId };
    if (ctx.correlationId) result['correlationId'] = ctx.correlationId;
    if (ctx.spanId) result['spanId'] = ctx.spanId;
    return result;
  };
}

/**
 * Create the application logger.
 *
 * Console output goes through pino-pretty in development and raw JSON to
 * stdout otherwise; a plain-text copy is written to a timestamped file.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty, toFile } = { ...DEFAULT_CONFIG, ...config };

  const targets: pino.TransportTargetOptions[] = [
    pretty
      ? { target: 'pino-pretty', level, options: { colorize: true } }
      : { target: 'pino/file', level, options: { destination: 1 } },
  ];

  if (toFile) {
    fs.mkdirSync(logDir, { recursive: true });
    pruneLogFiles(logDir, maxFiles);
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(logDir, generateLogFilename()),
        mkdir: true,
        colorize: false,
      },
    });
  }

  return pino({
    level,
    transport: { targets },
    mixin: createTraceMixin(),
  });
}
