import type { AppConfigInput } from './schema';

export const config: AppConfigInput = {
  circuit: {
    awaitTimeoutMs: 1000,
    maxEventsPerDrain: 10000,
  },

  storage: {
    generationBits: 31,
  },

  server: {
    port: 3001,
    corsOrigin: '*',
  },

  runtime: {
    logLevel: 'info',
  },
};
