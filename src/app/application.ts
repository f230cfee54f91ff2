/**
 * Application: explicit context owning the Storage, the Circuit, the
 * circuit registry Facts resolve through, and the error sink.
 *
 * Facts created through `createFact(name, ...)` are kept in a directory so
 * that outside callers (the HTTP gateway) can address them by name.
 */

import { type Storage, DEFAULT_MAX_GENERATION } from '../data';
import { type Schema } from '../value';
import { type Logger, createLogger } from '../log';
import {
  type Circuit,
  type CircuitError,
  type CircuitLayout,
  type CircuitRegistry,
  type EmitterOptions,
  type Fact,
  createCircuit,
  createCircuitRegistry,
  createCircuitStorage,
  createPrinter,
} from '../circuit';

// ── Types ───────────────────────────────────────────────────────────

export interface ApplicationOptions {
  /** Largest generation a table slot may reach before it is retired */
  maxGeneration?: number;
  /** Receives every error that made the Circuit roll back an event */
  onError?: (error: CircuitError) => void;
  logger?: Logger;
}

export interface NamedFactOptions extends EmitterOptions {
  /** Connect a logging Receiver to the Fact */
  print?: boolean;
}

export interface FactEntry {
  name: string;
  fact: Fact;
  createdAt: number;
}

export interface Application {
  readonly storage: Storage<CircuitLayout>;
  readonly circuit: Circuit;
  readonly registry: CircuitRegistry;

  /** The single sink for errors raised while handling events. */
  handleError(error: CircuitError): void;
  getErrorCount(): number;
  getLastError(): CircuitError | null;

  /** Create a named Fact. Throws if the name is taken. Not callable while an event is handled. */
  createFact(name: string, schema: Schema, options?: NamedFactOptions): Fact;
  getFact(name: string): Fact | null;
  /** Remove a named Fact. Returns false if there is none by that name. */
  removeFact(name: string): boolean;
  listFacts(): FactEntry[];

  /** Close the Circuit and forget all named Facts. */
  shutdown(): void;
}

// ── Factory ─────────────────────────────────────────────────────────

export function createApplication(options: ApplicationOptions = {}): Application {
  const log = options.logger ?? createLogger('Application');
  const storage = createCircuitStorage(options.maxGeneration ?? DEFAULT_MAX_GENERATION);
  const registry = createCircuitRegistry();
  const facts: Map<string, FactEntry> = new Map();

  let errorCount = 0;
  let lastError: CircuitError | null = null;

  const application: Application = {
    storage,
    registry,
    circuit: createCircuit({
      storage,
      registry,
      errorSink: { handleError: (error) => application.handleError(error) },
    }),

    handleError(error: CircuitError): void {
      errorCount++;
      lastError = error;

      if (options.onError) {
        options.onError(error);
      } else {
        log.error(`Event rolled back: ${error.toString()}`);
      }
    },

    getErrorCount(): number {
      return errorCount;
    },

    getLastError(): CircuitError | null {
      return lastError;
    },

    createFact(name: string, schema: Schema, factOptions: NamedFactOptions = {}): Fact {
      if (facts.has(name)) {
        throw new Error(`A Fact named "${name}" already exists`);
      }

      const { circuit } = application;
      const fact = circuit.createFact(schema, { blockable: factOptions.blockable });

      if (factOptions.print) {
        const printer = createPrinter(circuit, schema, name);
        circuit.createConnection(fact.getHandle(), printer);
        circuit.applyTopologyChanges();
      }

      facts.set(name, { name, fact, createdAt: Date.now() });
      log.info(`Created Fact "${name}"`);
      return fact;
    },

    getFact(name: string): Fact | null {
      return facts.get(name)?.fact ?? null;
    },

    removeFact(name: string): boolean {
      const entry = facts.get(name);
      if (entry === undefined) return false;

      entry.fact.remove();
      facts.delete(name);
      log.info(`Removed Fact "${name}"`);
      return true;
    },

    listFacts(): FactEntry[] {
      return [...facts.values()];
    },

    shutdown(): void {
      application.circuit.close();
      facts.clear();
    },
  };

  return application;
}
