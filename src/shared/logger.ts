/**
 * Named pino loggers writing to stderr, so stdout stays free for help text.
 */

import pino from 'pino';
import { resolveLogLevel } from './config.js';

const destination = pino.destination({ dest: 2, sync: true });

export function createLogger(name: string): pino.Logger {
  return pino({ name: `ttlint:${name}`, level: resolveLogLevel(process.env) }, destination);
}
