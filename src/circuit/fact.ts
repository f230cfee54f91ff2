/**
 * Fact: producer-side facade over one Emitter.
 *
 * Facts may be called from anywhere: HTTP handlers, timers, other services.
 * They never touch Storage. Every call is turned into an Event and queued on
 * the Circuit, which is looked up by id so a Fact outliving its Circuit
 * degrades to a logged no-op.
 */

import { type Handle, NULL_HANDLE, isNullHandle, formatHandle } from '../data';
import { type Schema, type Value, schemasEqual, formatSchema } from '../value';
import { createLogger } from '../log';
import { type CircuitRegistry, type FactTarget } from './registry';
import { CircuitError } from './types';

const log = createLogger('Fact');

// ── Types ───────────────────────────────────────────────────────────

export interface FactLink {
  readonly registry: CircuitRegistry;
  readonly circuitId: number;
}

export interface Fact {
  /** Queue a value. Returns WRONG_VALUE_SCHEMA if the value does not fit. */
  emitValue(value: Value): CircuitError | null;
  emitFailure(error: Error): void;
  emitCompletion(): void;
  /** Give up ownership of the Emitter. Later calls on this Fact do nothing. */
  remove(): void;

  isValid(): boolean;
  getHandle(): Handle;
  getSchema(): Schema;
}

// ── Factory ─────────────────────────────────────────────────────────

export function bindFact(link: FactLink, emitter: Handle, schema: Schema): Fact {
  let handle = emitter;

  function target(action: string): FactTarget | null {
    if (isNullHandle(handle)) {
      log.warn(`Cannot ${action}: the Fact has been removed`);
      return null;
    }

    const circuit = link.registry.lookup(link.circuitId);
    if (circuit === null) {
      log.warn(`Cannot ${action}: Circuit ${link.circuitId} is gone`);
      return null;
    }

    if (!circuit.isEmitterValid(handle)) {
      log.warn(`Cannot ${action}: Emitter ${formatHandle(handle)} is no longer valid`);
      return null;
    }

    return circuit;
  }

  return {
    emitValue(value: Value): CircuitError | null {
      if (!schemasEqual(value.schema, schema)) {
        const error = new CircuitError(
          'WRONG_VALUE_SCHEMA',
          handle,
          `Fact expects ${formatSchema(schema)}, got ${formatSchema(value.schema)}`,
        );
        log.warn(error.message);
        return error;
      }

      target('emit a value')?.enqueue({ kind: 'value', emitter: handle, value });
      return null;
    },

    emitFailure(error: Error): void {
      target('emit a failure')?.enqueue({ kind: 'failure', emitter: handle, error });
    },

    emitCompletion(): void {
      target('complete')?.enqueue({ kind: 'completion', emitter: handle });
    },

    remove(): void {
      if (isNullHandle(handle)) return;

      const circuit = link.registry.lookup(link.circuitId);
      if (circuit !== null && circuit.isEmitterValid(handle)) {
        circuit.enqueue({ kind: 'release', emitter: handle });
      }
      handle = NULL_HANDLE;
    },

    isValid(): boolean {
      if (isNullHandle(handle)) return false;
      const circuit = link.registry.lookup(link.circuitId);
      return circuit !== null && circuit.isEmitterValid(handle);
    },

    getHandle(): Handle {
      return handle;
    },

    getSchema(): Schema {
      return schema;
    },
  };
}
