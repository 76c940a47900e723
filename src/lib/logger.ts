import pino, { type Logger } from 'pino';

export type { Logger };

// Fastify logs requests with its own pino instance; this one is for the pipeline.
export function createLogger(level = 'info', name = 'bhasha'): Logger {
  return pino({
    name,
    level: process.env.NODE_ENV === 'test' ? 'silent' : level,
  });
}
