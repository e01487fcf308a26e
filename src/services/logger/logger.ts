import pino from 'pino';
import type { Logger } from 'pino';
import { config } from '../../config/index.js';

// stdout carries the ordered result stream, so logs go to stderr
const destination = pino.destination(2);

export function createLogger(name: string): Logger {
  return pino({ name, level: config.LOG_LEVEL }, destination);
}

export type { Logger };
