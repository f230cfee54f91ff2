export {
  type EmitterColumns,
  type ReceiverColumns,
  type CircuitLayout,
  type CircuitErrorKind,
  type CircuitEvent,
  type TopologyChange,
  type TopologyChangeKind,
  type ValueSignalStatus,
  type FailureSignal,
  type CompletionSignal,
  type ReceiverResult,
  type ReceiverCallbacks,
  type EmitterOptions,
  type CircuitContext,
  EmitterStatus,
  isActive,
  isCompleted,
  formatStatus,
  CircuitError,
  isCircuitError,
  InvariantError,
  invariant,
  ValueSignal,
} from './types';
export {
  type SignalDispatcher,
  type EmitterTable,
  emitterColumns,
  emitValue,
  emitFailure,
  emitCompletion,
  getStatus,
  hasEmitted,
  isBlockable,
} from './emitter';
export {
  type Transform,
  type OperatorOptions,
  type Operator,
  createOperator,
  removeOperator,
  createRelay,
  createPrinter,
} from './operators';
export { type FactTarget, type CircuitRegistry, createCircuitRegistry } from './registry';
export { type FactLink, type Fact, bindFact } from './fact';
export {
  type ErrorSink,
  type CircuitOptions,
  type TableStats,
  type CircuitStats,
  type Circuit,
  createCircuitStorage,
  createCircuit,
} from './circuit';
