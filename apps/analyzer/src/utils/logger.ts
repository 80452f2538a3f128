import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { ConfigurationError } from './errors.js';

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: string;
  directory: string;
  maxFileSize: string;
  maxFiles: number;
}

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const SIZE_UNITS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
};

/**
 * `<timestamp> [component:matchId] level: message {meta}`
 */
export function formatConsoleLine(info: Record<string, unknown>): string {
  const { timestamp, level, message, component, matchId, ...rest } = info;
  const scope = matchId === undefined ? String(component) : `${String(component)}:${String(matchId)}`;
  const meta = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  return `${String(timestamp)} [${scope}] ${String(level)}: ${String(message)}${meta}`;
}

/**
 * Logger for one process step (`match-processor`, `analyzer`, ...). JSON lines
 * go to `<directory>/<component>.log`, a readable line to the console.
 */
export function createLogger(component: string, config: LoggerConfig): winston.Logger {
  fs.mkdirSync(config.directory, { recursive: true });

  return winston.createLogger({
    levels,
    level: config.level,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { component },
    transports: [
      new winston.transports.File({
        filename: path.join(config.directory, `${component}.log`),
        maxsize: parseSize(config.maxFileSize),
        maxFiles: config.maxFiles,
      }),
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf((info) => formatConsoleLine(info))
        ),
      }),
    ],
  });
}

/**
 * Child logger whose every entry carries the match being analyzed
 */
export function createMatchLogger(parent: winston.Logger, matchId: string): winston.Logger {
  return parent.child({ matchId });
}

/**
 * Logger used when a caller supplies none; library code stays quiet by default
 */
export function createSilentLogger(): winston.Logger {
  return winston.createLogger({ levels, silent: true });
}

/**
 * Parse size string (e.g., "10MB") to bytes
 */
export function parseSize(sizeStr: string): number {
  const match = sizeStr.match(/^(\d+)(B|KB|MB|GB)$/i);
  if (!match) {
    throw new ConfigurationError(`Invalid size format: ${sizeStr}`);
  }

  const [, value, unit] = match;
  return parseInt(value, 10) * SIZE_UNITS[unit.toUpperCase()];
}
