/**
 * Circuit: event queue, transactional event handling and deferred
 * topology changes over the Application's Storage.
 *
 * Each event is handled synchronously against a snapshot of Storage:
 *   1. Dispatch the event through the Emitter state machine
 *   2. On error: restore the snapshot, drop queued topology changes and
 *      hand the error to the error sink
 *   3. Otherwise apply the queued topology changes in FIFO order
 *
 * Producers only ever call `enqueue` (through Facts). `awaitEvent`,
 * `handleEvent` and everything reached from Receiver callbacks belong to
 * the single logic consumer.
 */

import {
  type Handle,
  type Storage,
  type StorageData,
  type Table,
  createStorage,
  emptyTableData,
  containsHandle,
  withHandle,
  withoutHandle,
  formatHandle,
} from '../data';
import { type Schema, type Value, schemasEqual, formatSchema } from '../value';
import { type Logger, createLogger } from '../log';
import {
  type CircuitContext,
  type CircuitEvent,
  type CircuitLayout,
  type CompletionSignal,
  type EmitterColumns,
  type EmitterOptions,
  type FailureSignal,
  type ReceiverCallbacks,
  type ReceiverColumns,
  type ReceiverResult,
  type TopologyChange,
  type ValueSignal,
  CircuitError,
  EmitterStatus,
  isActive,
  isCompleted,
  isCircuitError,
  invariant,
} from './types';
import { type SignalDispatcher, emitterColumns, emitValue, emitFailure, emitCompletion, getStatus, hasEmitted } from './emitter';
import { type Operator, type OperatorOptions, createOperator, removeOperator } from './operators';
import { type CircuitRegistry, type FactTarget } from './registry';
import { type Fact, bindFact } from './fact';

// ── Types ───────────────────────────────────────────────────────────

export interface ErrorSink {
  handleError(error: CircuitError): void;
}

export interface CircuitOptions {
  storage: Storage<CircuitLayout>;
  registry: CircuitRegistry;
  errorSink: ErrorSink;
  logger?: Logger;
}

export interface TableStats {
  size: number;
  live: number;
  free: number;
  retired: number;
}

export interface CircuitStats {
  id: number;
  closed: boolean;
  emitters: TableStats;
  receivers: TableStats;
  queuedEvents: number;
  eventsHandled: number;
  eventsRolledBack: number;
  storageVersion: number;
}

export interface Circuit extends CircuitContext, FactTarget {
  readonly emitters: Table<EmitterColumns>;
  readonly receivers: Table<ReceiverColumns>;

  /** Create an Emitter owned by a new Fact. */
  createFact(schema: Schema, options?: EmitterOptions): Fact;
  createOperator(options: OperatorOptions): Operator;
  /** Remove the Operator's Receiver and release its Emitter. */
  removeOperator(operator: Operator): void;

  /** Resolve with the next event, or null after `timeoutMs`. Single consumer. */
  awaitEvent(timeoutMs: number): Promise<CircuitEvent | null>;
  pollEvent(): CircuitEvent | null;
  /** Wake a pending awaitEvent with null. */
  interrupt(): void;
  queueLength(): number;

  handleEvent(event: CircuitEvent): void;
  applyTopologyChanges(): void;
  isHandlingEvent(): boolean;

  getDownstream(emitter: Handle): readonly Handle[];
  getUpstream(receiver: Handle): readonly Handle[];
  stats(): CircuitStats;

  close(): void;
  isClosed(): boolean;
}

interface Waiter {
  resolve(event: CircuitEvent | null): void;
  timer: ReturnType<typeof setTimeout>;
}

// ── Storage ─────────────────────────────────────────────────────────

export function createCircuitStorage(maxGeneration: number): Storage<CircuitLayout> {
  const initial: StorageData<CircuitLayout> = {
    emitters: emptyTableData(),
    receivers: emptyTableData(),
  };
  return createStorage(initial, { maxGeneration });
}

function describeThrown(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Factory ─────────────────────────────────────────────────────────

export function createCircuit(options: CircuitOptions): Circuit {
  const { storage, registry, errorSink } = options;
  const log = options.logger ?? createLogger('Circuit');
  const id = registry.nextId();

  const emitters = storage.table('emitters');
  const receivers = storage.table('receivers');

  const queue: CircuitEvent[] = [];
  let waiter: Waiter | null = null;

  let topologyChanges: TopologyChange[] = [];
  let pendingReceiverRemovals: Handle[] = [];

  let handling = false;
  let closed = false;
  let eventsHandled = 0;
  let eventsRolledBack = 0;

  // ── Receiver dispatch ───────────────────────────────────────────

  function invoke<S extends { readonly emitter: Handle }>(
    receiver: Handle,
    signal: S,
    pick: (callbacks: ReceiverCallbacks) => ((signal: S, context: CircuitContext) => ReceiverResult) | undefined,
  ): CircuitError | null {
    if (!receivers.isHandleValid(receiver)) return null;

    const { callbacks, label } = receivers.get(receiver);
    const callback = pick(callbacks);
    if (callback === undefined) return null;

    try {
      const result = callback.call(callbacks, signal, circuit);
      return isCircuitError(result) ? result : null;
    } catch (err) {
      return new CircuitError(
        'USER_CODE_EXCEPTION',
        signal.emitter,
        `Receiver "${label}" (${formatHandle(receiver)}) threw: ${describeThrown(err)}`,
        err,
      );
    }
  }

  const dispatcher: SignalDispatcher = {
    value: (receiver: Handle, signal: ValueSignal) => invoke(receiver, signal, (callbacks) => callbacks.onValue),
    failure: (receiver: Handle, signal: FailureSignal) => invoke(receiver, signal, (callbacks) => callbacks.onFailure),
    completion: (receiver: Handle, signal: CompletionSignal) =>
      invoke(receiver, signal, (callbacks) => callbacks.onCompletion),
  };

  // ── Edges ───────────────────────────────────────────────────────

  /** Disconnect every downstream Receiver of a terminated Emitter. */
  function detachDownstream(emitter: Handle): void {
    const row = emitters.get(emitter);
    if (row.downstream.length === 0) return;

    for (const receiver of row.downstream) {
      if (!receivers.isHandleValid(receiver)) continue;
      receivers.update(receiver, { upstream: withoutHandle(receivers.get(receiver).upstream, emitter) });
    }

    emitters.update(emitter, {
      downstream: Object.freeze([]),
      refcount: row.refcount - row.downstream.length,
    });
  }

  function failEmitter(emitter: Handle, error: Error): CircuitError | null {
    const result = emitFailure(emitters, emitter, error, dispatcher);
    if (result !== null) return result;
    if (emitters.isHandleValid(emitter) && isCompleted(getStatus(emitters, emitter))) detachDownstream(emitter);
    return null;
  }

  function completeEmitter(emitter: Handle): CircuitError | null {
    const result = emitCompletion(emitters, emitter, dispatcher);
    if (result !== null) return result;
    if (emitters.isHandleValid(emitter) && isCompleted(getStatus(emitters, emitter))) detachDownstream(emitter);
    return null;
  }

  function reclaimIfUnused(emitter: Handle): void {
    if (!emitters.isHandleValid(emitter)) return;

    const row = emitters.get(emitter);
    if (isCompleted(getStatus(emitters, emitter)) && row.downstream.length === 0 && row.refcount === 0) {
      emitters.removeRow(emitter);
      log.debug(`Reclaimed Emitter ${formatHandle(emitter)}`);
    }
  }

  function connect(emitter: Handle, receiver: Handle): void {
    const row = emitters.get(emitter);
    const status = getStatus(emitters, emitter);
    invariant(!isActive(status), `Cannot connect to Emitter ${formatHandle(emitter)} while it is active`);

    if (containsHandle(row.downstream, receiver)) return;

    if (status === EmitterStatus.FAILED) {
      log.debug(`Not connecting ${formatHandle(receiver)} to failed Emitter ${formatHandle(emitter)}`);
      return;
    }

    const receiverRow = receivers.get(receiver);
    if (!schemasEqual(row.schema, receiverRow.schema)) {
      log.warn(
        `Not connecting ${formatHandle(receiver)} (${formatSchema(receiverRow.schema)}) ` +
          `to Emitter ${formatHandle(emitter)} (${formatSchema(row.schema)}): schema mismatch`,
      );
      return;
    }

    emitters.update(emitter, {
      downstream: withHandle(row.downstream, receiver),
      refcount: row.refcount + 1,
    });
    receivers.update(receiver, { upstream: withHandle(receiverRow.upstream, emitter) });

    // Late subscribers learn about the completion through a later event, never synchronously.
    if (status === EmitterStatus.COMPLETED) {
      enqueue({ kind: 'completion', emitter });
    }
  }

  function disconnect(emitter: Handle, receiver: Handle): void {
    const row = emitters.get(emitter);
    if (!containsHandle(row.downstream, receiver)) return;

    emitters.update(emitter, {
      downstream: withoutHandle(row.downstream, receiver),
      refcount: row.refcount - 1,
    });
    receivers.update(receiver, { upstream: withoutHandle(receivers.get(receiver).upstream, emitter) });
  }

  // ── Event dispatch ──────────────────────────────────────────────

  function dispatchEvent(event: CircuitEvent): CircuitError | null {
    const { emitter } = event;

    switch (event.kind) {
      case 'value':
        invariant(
          schemasEqual(emitters.get(emitter).schema, event.value.schema),
          `Value event for ${formatHandle(emitter)} carries ${formatSchema(event.value.schema)}`,
        );
        return emitValue(emitters, emitter, event.value, dispatcher);

      case 'failure':
        return failEmitter(emitter, event.error);

      case 'completion': {
        const error = completeEmitter(emitter);
        if (error !== null) return error;
        reclaimIfUnused(emitter);
        return null;
      }

      case 'release': {
        const { refcount } = emitters.get(emitter);
        if (refcount > 0) {
          emitters.set(emitter, 'refcount', refcount - 1);
        } else {
          log.warn(`Release of Emitter ${formatHandle(emitter)} that has no owner left`);
        }

        if (!isCompleted(getStatus(emitters, emitter))) {
          const error = completeEmitter(emitter);
          if (error !== null) return error;
        }
        reclaimIfUnused(emitter);
        return null;
      }
    }
  }

  function rollback(restorationPoint: StorageData<CircuitLayout>): void {
    storage.setData(restorationPoint);
    topologyChanges = [];
    pendingReceiverRemovals = [];
    eventsRolledBack++;
  }

  // ── Queue ───────────────────────────────────────────────────────

  function enqueue(event: CircuitEvent): void {
    if (closed) {
      log.warn(`Circuit ${id} is closed, dropping ${event.kind} event for ${formatHandle(event.emitter)}`);
      return;
    }

    if (waiter !== null) {
      const pending = waiter;
      waiter = null;
      clearTimeout(pending.timer);
      pending.resolve(event);
      return;
    }

    queue.push(event);
  }

  // ── Circuit ─────────────────────────────────────────────────────

  const circuit: Circuit = {
    id,
    emitters,
    receivers,

    // ── Context ───────────────────────────────────────────────────

    emitValue(emitter: Handle, value: Value): CircuitError | null {
      if (!emitters.isHandleValid(emitter)) {
        log.warn(`Cannot emit from invalid Emitter ${formatHandle(emitter)}`);
        return null;
      }
      const { schema } = emitters.get(emitter);
      if (!schemasEqual(schema, value.schema)) {
        return new CircuitError(
          'WRONG_VALUE_SCHEMA',
          emitter,
          `Emitter ${formatHandle(emitter)} expects ${formatSchema(schema)}, got ${formatSchema(value.schema)}`,
        );
      }
      return emitValue(emitters, emitter, value, dispatcher);
    },

    emitFailure(emitter: Handle, error: Error): CircuitError | null {
      if (!emitters.isHandleValid(emitter)) {
        log.warn(`Cannot fail invalid Emitter ${formatHandle(emitter)}`);
        return null;
      }
      return failEmitter(emitter, error);
    },

    emitCompletion(emitter: Handle): CircuitError | null {
      if (!emitters.isHandleValid(emitter)) {
        log.warn(`Cannot complete invalid Emitter ${formatHandle(emitter)}`);
        return null;
      }
      return completeEmitter(emitter);
    },

    createConnection(emitter: Handle, receiver: Handle): void {
      const change: TopologyChange = { emitter, receiver, kind: 'CREATE_CONNECTION' };
      topologyChanges.push(Object.freeze(change));
    },

    removeConnection(emitter: Handle, receiver: Handle): void {
      const change: TopologyChange = { emitter, receiver, kind: 'REMOVE_CONNECTION' };
      topologyChanges.push(Object.freeze(change));
    },

    createEmitter(schema: Schema, emitterOptions: EmitterOptions = {}): Handle {
      return emitters.addRow(emitterColumns(schema, emitterOptions));
    },

    createReceiver(schema: Schema, callbacks: ReceiverCallbacks, label = 'receiver'): Handle {
      return receivers.addRow({ schema, upstream: Object.freeze([]), callbacks, label });
    },

    getValue(emitter: Handle): Value | undefined {
      if (!emitters.isHandleValid(emitter) || !hasEmitted(emitters, emitter)) return undefined;
      return emitters.get(emitter).value;
    },

    getStatus(emitter: Handle): EmitterStatus {
      return getStatus(emitters, emitter);
    },

    // ── Owners ────────────────────────────────────────────────────

    createFact(schema: Schema, emitterOptions: EmitterOptions = {}): Fact {
      const emitter = circuit.createEmitter(schema, emitterOptions);
      log.debug(`Created Fact ${formatHandle(emitter)} (${formatSchema(schema)})`);
      return bindFact({ registry, circuitId: id }, emitter, schema);
    },

    createOperator(operatorOptions: OperatorOptions): Operator {
      return createOperator(circuit, operatorOptions);
    },

    removeOperator(operator: Operator): void {
      removeOperator(circuit, operator);
    },

    removeReceiver(receiver: Handle): void {
      if (!receivers.isHandleValid(receiver)) return;
      for (const emitter of receivers.get(receiver).upstream) {
        circuit.removeConnection(emitter, receiver);
      }
      pendingReceiverRemovals.push(receiver);
    },

    releaseEmitter(emitter: Handle): void {
      if (emitters.isHandleValid(emitter)) enqueue({ kind: 'release', emitter });
    },

    // ── Queue ─────────────────────────────────────────────────────

    isEmitterValid(emitter: Handle): boolean {
      return emitters.isHandleValid(emitter);
    },

    enqueue,

    awaitEvent(timeoutMs: number): Promise<CircuitEvent | null> {
      invariant(waiter === null, 'awaitEvent called while another consumer is waiting');

      const next = queue.shift();
      if (next !== undefined) return Promise.resolve(next);
      if (closed) return Promise.resolve(null);

      return new Promise((resolve) => {
        const timer = setTimeout(() => {
          waiter = null;
          resolve(null);
        }, timeoutMs);
        waiter = { resolve, timer };
      });
    },

    pollEvent(): CircuitEvent | null {
      return queue.shift() ?? null;
    },

    interrupt(): void {
      if (waiter === null) return;
      const pending = waiter;
      waiter = null;
      clearTimeout(pending.timer);
      pending.resolve(null);
    },

    queueLength(): number {
      return queue.length;
    },

    // ── Handling ──────────────────────────────────────────────────

    handleEvent(event: CircuitEvent): void {
      invariant(topologyChanges.length === 0, 'Topology changes are pending at the start of an event');

      if (!emitters.isHandleValid(event.emitter)) {
        log.debug(`Ignoring ${event.kind} event for invalid Emitter ${formatHandle(event.emitter)}`);
        return;
      }

      const restorationPoint = storage.getData();
      let error: CircuitError | null = null;

      handling = true;
      try {
        error = dispatchEvent(event);
      } catch (err) {
        rollback(restorationPoint);
        throw err;
      } finally {
        handling = false;
      }

      eventsHandled++;

      if (error !== null) {
        rollback(restorationPoint);
        log.debug(`Rolled back ${event.kind} event: ${error.toString()}`);
        errorSink.handleError(error);
        return;
      }

      circuit.applyTopologyChanges();
    },

    applyTopologyChanges(): void {
      invariant(!handling, 'Topology changes cannot be applied while an event is being handled');

      const changes = topologyChanges;
      topologyChanges = [];
      const candidates: Handle[] = [];

      for (const change of changes) {
        if (!emitters.isHandleValid(change.emitter) || !receivers.isHandleValid(change.receiver)) {
          log.debug(
            `Skipping ${change.kind} ${formatHandle(change.emitter)} -> ${formatHandle(change.receiver)}: invalid endpoint`,
          );
          continue;
        }

        if (change.kind === 'CREATE_CONNECTION') {
          connect(change.emitter, change.receiver);
        } else {
          disconnect(change.emitter, change.receiver);
          candidates.push(change.emitter);
        }
      }

      for (const emitter of candidates) reclaimIfUnused(emitter);

      const removals = pendingReceiverRemovals;
      pendingReceiverRemovals = [];
      for (const receiver of removals) {
        if (receivers.isHandleValid(receiver) && receivers.get(receiver).upstream.length === 0) {
          receivers.removeRow(receiver);
        }
      }
    },

    isHandlingEvent(): boolean {
      return handling;
    },

    // ── Inspection ────────────────────────────────────────────────

    getDownstream(emitter: Handle): readonly Handle[] {
      return emitters.get(emitter).downstream;
    },

    getUpstream(receiver: Handle): readonly Handle[] {
      return receivers.get(receiver).upstream;
    },

    stats(): CircuitStats {
      return {
        id,
        closed,
        emitters: tableStats(emitters),
        receivers: tableStats(receivers),
        queuedEvents: queue.length,
        eventsHandled,
        eventsRolledBack,
        storageVersion: storage.getVersion(),
      };
    },

    close(): void {
      if (closed) return;
      closed = true;
      registry.unregister(id);
      circuit.interrupt();
      log.info(`Circuit ${id} closed with ${queue.length} queued event(s)`);
    },

    isClosed(): boolean {
      return closed;
    },
  };

  registry.register(circuit);
  return circuit;
}

function tableStats<C>(table: Table<C>): TableStats {
  return {
    size: table.size(),
    live: table.liveCount(),
    free: table.freeCount(),
    retired: table.retiredCount(),
  };
}
