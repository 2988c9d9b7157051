import pino from 'pino';
import type { Logger } from '../../src/core/logging/index.js';

/**
 * Real pino logger that writes nothing. Components take a full Logger, so tests hand them this.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
