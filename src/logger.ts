import pino from 'pino';
import { settings } from './config.js';

const streams = pino.multistream([{ level: 'trace', stream: process.stdout }]);

export const logger = pino(
  {
    level: settings.log.level,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  streams,
);

const fileTargets = new Set<string>();

/** Adds an append-mode log file next to stdout. Repeated calls for one path are ignored. */
export function enableFileLogging(filePath: string): void {
  if (fileTargets.has(filePath)) return;
  fileTargets.add(filePath);
  streams.add({
    level: 'trace',
    stream: pino.destination({ dest: filePath, append: true, mkdir: true, sync: true }),
  });
  logger.debug({ filePath }, 'File logging enabled');
}

if (settings.log.file) {
  enableFileLogging(settings.log.file);
}

export function createChildLogger(module: string) {
  return logger.child({ module });
}
