import pino, { type BaseLogger, type Bindings } from 'pino';

// satisfied by Fastify's request/app loggers and by plain pino instances
export interface Logger extends BaseLogger {
  child(bindings: Bindings): Logger;
}

// for tests and embedded use
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
