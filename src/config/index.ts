/**
 * Config: bundled defaults from `config.ts`, overridden by environment
 * variables and validated against `AppConfigSchema`.
 *
 *   PORT                      server.port
 *   CORS_ORIGIN               server.corsOrigin
 *   LOG_LEVEL                 runtime.logLevel
 *   CIRCUIT_AWAIT_TIMEOUT_MS  circuit.awaitTimeoutMs
 *   STORAGE_GENERATION_BITS   storage.generationBits
 *
 * Unset or blank variables keep the bundled value.
 */

import { type ZodIssue } from 'zod';
import { config as defaults } from './config';
import { AppConfigSchema, type ValidatedConfig } from './schema';

export type {
  AppConfig,
  AppConfigInput,
  DerivedConfig,
  LogLevel,
  ValidatedConfig,
} from './schema';

export type Environment = Readonly<Record<string, string | undefined>>;

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(['Invalid configuration:', ...issues.map((issue) => `  ${issue}`)].join('\n'));
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function describeIssue(issue: ZodIssue): string {
  return `${issue.path.join('.') || 'config'}: ${issue.message}`;
}

/** Validate a raw config object, attach derived values and freeze every section. */
export function validateConfig(input: unknown): ValidatedConfig {
  const result = AppConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(describeIssue));
  }

  const { circuit, storage, server, runtime } = result.data;
  return Object.freeze({
    circuit: Object.freeze(circuit),
    storage: Object.freeze(storage),
    server: Object.freeze(server),
    runtime: Object.freeze(runtime),
    derived: Object.freeze({ maxGeneration: 2 ** storage.generationBits - 1 }),
  });
}

/** The bundled configuration with environment overrides applied. */
export function withEnvironment(env: Environment): unknown {
  const text = (name: string): string | undefined => {
    const raw = env[name];
    return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
  };
  const number = (name: string): number | undefined => {
    const raw = text(name);
    return raw === undefined ? undefined : Number(raw);
  };

  return {
    circuit: {
      ...defaults.circuit,
      awaitTimeoutMs: number('CIRCUIT_AWAIT_TIMEOUT_MS') ?? defaults.circuit.awaitTimeoutMs,
    },
    storage: {
      ...defaults.storage,
      generationBits: number('STORAGE_GENERATION_BITS') ?? defaults.storage.generationBits,
    },
    server: {
      ...defaults.server,
      port: number('PORT') ?? defaults.server.port,
      corsOrigin: text('CORS_ORIGIN') ?? defaults.server.corsOrigin,
    },
    runtime: {
      ...defaults.runtime,
      logLevel: text('LOG_LEVEL') ?? defaults.runtime.logLevel,
    },
  };
}

export function loadConfig(env: Environment = process.env): ValidatedConfig {
  return validateConfig(withEnvironment(env));
}
