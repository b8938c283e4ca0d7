/**
 * Structured logger (pino)
 */

import pino from 'pino';
import { config } from '../config/index.js';

function createDestination(): pino.DestinationStream {
  if (!config.logging.file) {
    return pino.destination(1);
  }

  // Entries pass everything through; the logger level does the filtering
  return pino.multistream([
    { level: 'trace', stream: pino.destination(1) },
    {
      level: 'trace',
      stream: pino.destination({ dest: config.logging.file, mkdir: true, sync: false }),
    },
  ]);
}

export const logger = pino(
  {
    name: config.app.name,
    level: config.logging.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      error: pino.stdSerializers.err,
    },
  },
  createDestination()
);

export type Logger = typeof logger;
