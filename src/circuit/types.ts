/**
 * Circuit types: row layouts, events, signals and errors shared by the
 * emitter state machine, the Circuit and Facts.
 */

import { type Handle, formatHandle } from '../data';
import { type Schema, type Value } from '../value';

// ── Emitter status ──────────────────────────────────────────────────

export const EmitterStatus = {
  IDLE: 0,
  EMITTING: 1,
  FAILED: 2,
  FAILING: 3,
  COMPLETED: 4,
  COMPLETING: 5,
} as const;

export type EmitterStatus = (typeof EmitterStatus)[keyof typeof EmitterStatus];

const STATUS_NAMES: Record<EmitterStatus, string> = {
  0: 'IDLE',
  1: 'EMITTING',
  2: 'FAILED',
  3: 'FAILING',
  4: 'COMPLETED',
  5: 'COMPLETING',
};

/** EMITTING, FAILING and COMPLETING are active; the rest are passive. */
export function isActive(status: EmitterStatus): boolean {
  return status === EmitterStatus.EMITTING || status === EmitterStatus.FAILING || status === EmitterStatus.COMPLETING;
}

/** FAILED and COMPLETED are terminal. */
export function isCompleted(status: EmitterStatus): boolean {
  return status === EmitterStatus.FAILED || status === EmitterStatus.COMPLETED;
}

export function formatStatus(status: EmitterStatus): string {
  return STATUS_NAMES[status];
}

const STATUSES: readonly EmitterStatus[] = Object.values(EmitterStatus);

export function toEmitterStatus(bits: number): EmitterStatus {
  const status = STATUSES.find((candidate) => candidate === bits);
  if (status === undefined) {
    throw new InvariantError(`Unknown emitter status bits: ${bits}`);
  }
  return status;
}

// ── Flags ───────────────────────────────────────────────────────────

export const FLAG_BLOCKABLE = 1 << 0;
export const FLAG_HAS_EMITTED = 1 << 1;
export const STATUS_SHIFT = 2;
export const STATUS_MASK = 0b111 << STATUS_SHIFT;

export function statusFromFlags(flags: number): EmitterStatus {
  return toEmitterStatus((flags & STATUS_MASK) >> STATUS_SHIFT);
}

export function flagsWithStatus(flags: number, status: EmitterStatus): number {
  return (flags & ~STATUS_MASK) | (status << STATUS_SHIFT);
}

// ── Rows ────────────────────────────────────────────────────────────

export interface EmitterColumns {
  readonly schema: Schema;
  /** Last emitted value, undefined until the first emission */
  readonly value: Value | undefined;
  /** Connected Receivers in connection order */
  readonly downstream: readonly Handle[];
  /** Owner (Fact or Operator) plus one per connected Receiver */
  readonly refcount: number;
  readonly flags: number;
}

export interface ReceiverColumns {
  readonly schema: Schema;
  readonly upstream: readonly Handle[];
  readonly callbacks: ReceiverCallbacks;
  readonly label: string;
}

export type CircuitLayout = {
  emitters: EmitterColumns;
  receivers: ReceiverColumns;
};

// ── Errors ──────────────────────────────────────────────────────────

export type CircuitErrorKind = 'NO_DAG' | 'WRONG_VALUE_SCHEMA' | 'USER_CODE_EXCEPTION';

/**
 * Error produced while handling an event. Returned, never thrown: the
 * Circuit rolls back and hands it to the Application's error sink.
 */
export class CircuitError extends Error {
  readonly kind: CircuitErrorKind;
  readonly emitter: Handle;

  constructor(kind: CircuitErrorKind, emitter: Handle, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'CircuitError';
    this.kind = kind;
    this.emitter = emitter;
  }

  toString(): string {
    return `${this.kind} at ${formatHandle(this.emitter)}: ${this.message}`;
  }
}

export function isCircuitError(value: unknown): value is CircuitError {
  return value instanceof CircuitError;
}

/** A broken internal invariant. Always a bug in the runtime. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) throw new InvariantError(message);
}

// ── Events ──────────────────────────────────────────────────────────

export type CircuitEvent =
  | { readonly kind: 'value'; readonly emitter: Handle; readonly value: Value }
  | { readonly kind: 'failure'; readonly emitter: Handle; readonly error: Error }
  | { readonly kind: 'completion'; readonly emitter: Handle }
  | { readonly kind: 'release'; readonly emitter: Handle };

export type TopologyChangeKind = 'CREATE_CONNECTION' | 'REMOVE_CONNECTION';

export interface TopologyChange {
  readonly emitter: Handle;
  readonly receiver: Handle;
  readonly kind: TopologyChangeKind;
}

// ── Signals ─────────────────────────────────────────────────────────

export type ValueSignalStatus = 'UNBLOCKABLE' | 'UNHANDLED' | 'ACCEPTED' | 'BLOCKED';

/** Value handed to each Receiver in turn. Blockable signals can be stopped. */
export class ValueSignal {
  readonly emitter: Handle;
  readonly value: Value;
  private current: ValueSignalStatus;

  constructor(emitter: Handle, value: Value, blockable: boolean) {
    this.emitter = emitter;
    this.value = value;
    this.current = blockable ? 'UNHANDLED' : 'UNBLOCKABLE';
  }

  get status(): ValueSignalStatus {
    return this.current;
  }

  isBlockable(): boolean {
    return this.current !== 'UNBLOCKABLE';
  }

  accept(): void {
    if (this.current === 'UNHANDLED') this.current = 'ACCEPTED';
  }

  block(): void {
    if (this.current === 'UNHANDLED' || this.current === 'ACCEPTED') this.current = 'BLOCKED';
  }

  isBlocked(): boolean {
    return this.current === 'BLOCKED';
  }
}

export interface FailureSignal {
  readonly emitter: Handle;
  readonly error: Error;
}

export interface CompletionSignal {
  readonly emitter: Handle;
}

// ── Receiver callbacks ──────────────────────────────────────────────

export type ReceiverResult = CircuitError | void;

export interface ReceiverCallbacks {
  onValue?(signal: ValueSignal, context: CircuitContext): ReceiverResult;
  onFailure?(signal: FailureSignal, context: CircuitContext): ReceiverResult;
  onCompletion?(signal: CompletionSignal, context: CircuitContext): ReceiverResult;
}

export interface EmitterOptions {
  /** Whether Receivers may block a value from reaching later Receivers */
  blockable?: boolean;
}

/**
 * What Receiver callbacks may do while an event is being handled.
 * Emissions run synchronously; connection changes are deferred until the
 * event has been handled successfully.
 */
export interface CircuitContext {
  emitValue(emitter: Handle, value: Value): CircuitError | null;
  emitFailure(emitter: Handle, error: Error): CircuitError | null;
  emitCompletion(emitter: Handle): CircuitError | null;

  createConnection(emitter: Handle, receiver: Handle): void;
  removeConnection(emitter: Handle, receiver: Handle): void;

  /** Create an Emitter owned by the caller (refcount 1). */
  createEmitter(schema: Schema, options?: EmitterOptions): Handle;
  createReceiver(schema: Schema, callbacks: ReceiverCallbacks, label?: string): Handle;
  /** Disconnect a Receiver from all its Emitters and delete it once the changes are applied. */
  removeReceiver(receiver: Handle): void;
  /** Drop the caller's ownership of an Emitter created with createEmitter. Takes effect in a later event. */
  releaseEmitter(emitter: Handle): void;

  getValue(emitter: Handle): Value | undefined;
  getStatus(emitter: Handle): EmitterStatus;
}
