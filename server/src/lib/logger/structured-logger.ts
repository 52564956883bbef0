/**
 * Structured Logger with Pino
 *
 * Features:
 * - Fast JSON logging with Pino
 * - Pretty console output in DEV
 * - Optional daily rotated log files (LOG_TO_FILE=true)
 * - Automatic secret redaction
 * - Request tracking via child loggers
 */

import { pino, multistream, type Logger as PinoLogger, type StreamEntry } from 'pino';
import * as rfs from 'rotating-file-stream';
import { PinoPretty } from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

function createFileStream(): rfs.RotatingFileStream {
  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  return rfs.createStream('server.log', {
    interval: '1d',
    path: logsDir,
    maxFiles: config.rotateDays,
    compress: 'gzip',
  });
}

const streams: StreamEntry[] = [];

if (config.console) {
  streams.push({
    level: config.level === 'silent' ? 'fatal' : config.level,
    stream: config.pretty
      ? PinoPretty({
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        })
      : process.stdout,
  });
}

if (config.toFile) {
  streams.push({
    level: config.level === 'silent' ? 'fatal' : config.level,
    stream: createFileStream(),
  });
}

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  multistream(streams)
);

export type Logger = PinoLogger;
