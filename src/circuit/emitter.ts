/**
 * Emitter state machine: value, failure and completion propagation over
 * rows of the `emitters` Table.
 *
 *   IDLE ⇄ EMITTING
 *   IDLE → FAILING → FAILED
 *   IDLE → COMPLETING → COMPLETED   (COMPLETED may re-enter COMPLETING)
 *
 * Receivers are reached only through a SignalDispatcher, so this module
 * never touches the `receivers` Table itself.
 */

import { type Handle, type Table, formatHandle } from '../data';
import { type Schema, type Value, schemasEqual, formatSchema } from '../value';
import {
  type EmitterColumns,
  type EmitterOptions,
  type FailureSignal,
  type CompletionSignal,
  EmitterStatus,
  CircuitError,
  ValueSignal,
  FLAG_BLOCKABLE,
  FLAG_HAS_EMITTED,
  flagsWithStatus,
  statusFromFlags,
  isCompleted,
  invariant,
} from './types';

// ── Types ───────────────────────────────────────────────────────────

/** Delivers one signal to one Receiver. Returns the Receiver's error, if any. */
export interface SignalDispatcher {
  value(receiver: Handle, signal: ValueSignal): CircuitError | null;
  failure(receiver: Handle, signal: FailureSignal): CircuitError | null;
  completion(receiver: Handle, signal: CompletionSignal): CircuitError | null;
}

export type EmitterTable = Table<EmitterColumns>;

// ── Row helpers ─────────────────────────────────────────────────────

export function emitterColumns(schema: Schema, options: EmitterOptions = {}, refcount = 1): EmitterColumns {
  return {
    schema,
    value: undefined,
    downstream: Object.freeze([]),
    refcount,
    flags: flagsWithStatus(options.blockable ? FLAG_BLOCKABLE : 0, EmitterStatus.IDLE),
  };
}

export function getStatus(table: EmitterTable, emitter: Handle): EmitterStatus {
  return statusFromFlags(table.get(emitter).flags);
}

export function setStatus(table: EmitterTable, emitter: Handle, status: EmitterStatus): void {
  table.set(emitter, 'flags', flagsWithStatus(table.get(emitter).flags, status));
}

export function isBlockable(table: EmitterTable, emitter: Handle): boolean {
  return (table.get(emitter).flags & FLAG_BLOCKABLE) !== 0;
}

export function hasEmitted(table: EmitterTable, emitter: Handle): boolean {
  return (table.get(emitter).flags & FLAG_HAS_EMITTED) !== 0;
}

// ── Emission ────────────────────────────────────────────────────────

/**
 * Emit a value to every downstream Receiver in connection order.
 *
 * Returns NO_DAG without touching the row if the Emitter is already
 * emitting, which means the value came back to it through a cycle.
 */
export function emitValue(
  table: EmitterTable,
  emitter: Handle,
  value: Value,
  dispatch: SignalDispatcher,
): CircuitError | null {
  const row = table.get(emitter);
  invariant(
    schemasEqual(row.schema, value.schema),
    `Emitter ${formatHandle(emitter)} expects ${formatSchema(row.schema)}, got ${formatSchema(value.schema)}`,
  );

  const status = statusFromFlags(row.flags);
  if (isCompleted(status)) return null;
  if (row.downstream.length === 0) return null;

  if (status !== EmitterStatus.IDLE) {
    return new CircuitError('NO_DAG', emitter, `Cycle detected: Emitter ${formatHandle(emitter)} is already emitting`);
  }

  table.update(emitter, {
    value,
    flags: flagsWithStatus(row.flags | FLAG_HAS_EMITTED, EmitterStatus.EMITTING),
  });

  const blockable = (row.flags & FLAG_BLOCKABLE) !== 0;
  const signal = new ValueSignal(emitter, value, blockable);

  try {
    for (const receiver of row.downstream) {
      const error = dispatch.value(receiver, signal);
      if (error !== null) return error;

      if (blockable && signal.isBlocked()) break;
      if (!table.isHandleValid(emitter) || isCompleted(getStatus(table, emitter))) return null;
    }
  } finally {
    if (table.isHandleValid(emitter) && getStatus(table, emitter) === EmitterStatus.EMITTING) {
      setStatus(table, emitter, EmitterStatus.IDLE);
    }
  }

  return null;
}

export function emitFailure(
  table: EmitterTable,
  emitter: Handle,
  error: Error,
  dispatch: SignalDispatcher,
): CircuitError | null {
  const status = getStatus(table, emitter);
  if (isCompleted(status) || status === EmitterStatus.FAILING || status === EmitterStatus.COMPLETING) return null;

  setStatus(table, emitter, EmitterStatus.FAILING);

  const signal: FailureSignal = Object.freeze({ emitter, error });
  for (const receiver of table.get(emitter).downstream) {
    const result = dispatch.failure(receiver, signal);
    if (result !== null) return result;
  }

  setStatus(table, emitter, EmitterStatus.FAILED);
  return null;
}

/**
 * Complete the Emitter. Calling this on a COMPLETED Emitter re-announces
 * the completion to whoever is downstream now; a FAILED Emitter stays silent.
 */
export function emitCompletion(
  table: EmitterTable,
  emitter: Handle,
  dispatch: SignalDispatcher,
): CircuitError | null {
  const status = getStatus(table, emitter);
  if (status === EmitterStatus.FAILED || status === EmitterStatus.FAILING || status === EmitterStatus.COMPLETING) {
    return null;
  }

  setStatus(table, emitter, EmitterStatus.COMPLETING);

  const signal: CompletionSignal = Object.freeze({ emitter });
  for (const receiver of table.get(emitter).downstream) {
    const result = dispatch.completion(receiver, signal);
    if (result !== null) return result;
  }

  setStatus(table, emitter, EmitterStatus.COMPLETED);
  return null;
}
