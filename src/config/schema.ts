import { z } from 'zod';

export const CircuitConfigSchema = z.object({
  awaitTimeoutMs: z.number().int().min(1).max(60000).describe('How long the event loop waits for a new event before idling (1-60000 ms)'),
  maxEventsPerDrain: z.number().int().min(1).default(10000).describe('Upper bound of events handled by a single drain() call'),
}).strict();

export const StorageConfigSchema = z.object({
  generationBits: z.number().int().min(2).max(31).describe('Width of the per-slot generation counter (2-31 bits)'),
}).strict();

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).describe('Default HTTP port, overridden by the PORT env variable'),
  corsOrigin: z.string().min(1).default('*').describe('Allowed CORS origin'),
}).strict();

export const RuntimeConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).describe('Logging level'),
}).strict();

export const AppConfigSchema = z.object({
  circuit: CircuitConfigSchema,
  storage: StorageConfigSchema,
  server: ServerConfigSchema,
  runtime: RuntimeConfigSchema,
}).strict();

export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type AppConfig = z.output<typeof AppConfigSchema>;
export type LogLevel = AppConfig['runtime']['logLevel'];

export interface DerivedConfig {
  /** Largest generation a table slot may reach before it is retired */
  maxGeneration: number;
}

export interface ValidatedConfig {
  circuit: AppConfig['circuit'];
  storage: AppConfig['storage'];
  server: AppConfig['server'];
  runtime: AppConfig['runtime'];
  derived: DerivedConfig;
}
