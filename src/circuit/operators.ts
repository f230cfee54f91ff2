/**
 * Operators: Receivers that own an Emitter and forward what they receive.
 */

import { type Handle, formatHandle } from '../data';
import { type Schema, type Value, formatSchema } from '../value';
import { type Logger, createLogger } from '../log';
import { type CircuitContext, type EmitterOptions, type ReceiverResult } from './types';

// ── Types ───────────────────────────────────────────────────────────

/** Maps an input value to the value to emit, or null to drop it. */
export type Transform = (value: Value) => Value | null;

export interface OperatorOptions extends EmitterOptions {
  input: Schema;
  output: Schema;
  transform: Transform;
  label?: string;
  /** Accept every value that is forwarded, so blockable upstreams see it as handled */
  accept?: boolean;
}

export interface Operator {
  readonly receiver: Handle;
  readonly emitter: Handle;
}

// ── Factories ───────────────────────────────────────────────────────

export function createOperator(context: CircuitContext, options: OperatorOptions): Operator {
  const emitter = context.createEmitter(options.output, { blockable: options.blockable });

  const receiver = context.createReceiver(
    options.input,
    {
      onValue(signal, ctx): ReceiverResult {
        const output = options.transform(signal.value);
        if (output === null) return;
        if (options.accept) signal.accept();
        return ctx.emitValue(emitter, output) ?? undefined;
      },
      onFailure(signal, ctx): ReceiverResult {
        return ctx.emitFailure(emitter, signal.error) ?? undefined;
      },
      onCompletion(_signal, ctx): ReceiverResult {
        return ctx.emitCompletion(emitter) ?? undefined;
      },
    },
    options.label ?? `operator(${formatSchema(options.input)} -> ${formatSchema(options.output)})`,
  );

  return Object.freeze({ receiver, emitter });
}

/**
 * Undo createOperator: the Receiver is disconnected and deleted with the next
 * topology application, and the Emitter completes and is reclaimed once its
 * release event is handled and nothing else references it.
 */
export function removeOperator(context: CircuitContext, operator: Operator): void {
  context.removeReceiver(operator.receiver);
  context.releaseEmitter(operator.emitter);
}

/** Operator that passes every value through unchanged. */
export function createRelay(context: CircuitContext, schema: Schema, options: EmitterOptions = {}): Operator {
  return createOperator(context, {
    ...options,
    input: schema,
    output: schema,
    transform: (value) => value,
    label: `relay(${formatSchema(schema)})`,
  });
}

/** Receiver that logs every signal it gets. */
export function createPrinter(
  context: CircuitContext,
  schema: Schema,
  name: string,
  logger: Logger = createLogger('Printer'),
): Handle {
  return context.createReceiver(
    schema,
    {
      onValue(signal): void {
        logger.info(`${name} <- ${JSON.stringify(signal.value.data)} from ${formatHandle(signal.emitter)}`);
      },
      onFailure(signal): void {
        logger.info(`${name} <- failure from ${formatHandle(signal.emitter)}: ${signal.error.message}`);
      },
      onCompletion(signal): void {
        logger.info(`${name} <- completion from ${formatHandle(signal.emitter)}`);
      },
    },
    `printer(${name})`,
  );
}
