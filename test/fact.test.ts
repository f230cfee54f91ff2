import { createHandle, NULL_HANDLE } from '../src/data';
import { NUMBER_SCHEMA, numberValue, stringValue } from '../src/value';
import {
  bindFact,
  createCircuitRegistry,
  type CircuitEvent,
  type CircuitRegistry,
  type Fact,
  type FactTarget,
} from '../src/circuit';

const EMITTER = createHandle('emitters', 0, 1);

interface Harness {
  registry: CircuitRegistry;
  target: FactTarget;
  events: CircuitEvent[];
  setValid(valid: boolean): void;
  fact: Fact;
}

function setup(): Harness {
  const registry = createCircuitRegistry();
  const events: CircuitEvent[] = [];
  let valid = true;
  const target: FactTarget = {
    id: registry.nextId(),
    isEmitterValid: () => valid,
    enqueue: (event) => {
      events.push(event);
    },
  };
  registry.register(target);

  return {
    registry,
    target,
    events,
    setValid: (next) => {
      valid = next;
    },
    fact: bindFact({ registry, circuitId: target.id }, EMITTER, NUMBER_SCHEMA),
  };
}

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => { });
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('Fact', () => {
  it('queues value, failure and completion events', () => {
    const { fact, events } = setup();
    const error = new Error('bad reading');

    expect(fact.emitValue(numberValue(3))).toBeNull();
    fact.emitFailure(error);
    fact.emitCompletion();

    expect(events).toEqual([
      { kind: 'value', emitter: EMITTER, value: numberValue(3) },
      { kind: 'failure', emitter: EMITTER, error },
      { kind: 'completion', emitter: EMITTER },
    ]);
  });

  it('returns WRONG_VALUE_SCHEMA instead of queueing a mismatched value', () => {
    const { fact, events } = setup();

    const error = fact.emitValue(stringValue('three'));

    expect(error?.kind).toBe('WRONG_VALUE_SCHEMA');
    expect(error?.message).toBe('Fact expects number, got string');
    expect(events).toEqual([]);
  });

  it('exposes its handle and schema', () => {
    const { fact } = setup();

    expect(fact.getHandle()).toBe(EMITTER);
    expect(fact.getSchema()).toBe(NUMBER_SCHEMA);
    expect(fact.isValid()).toBe(true);
  });
});

describe('Fact.remove', () => {
  it('posts a single release event and invalidates the Fact', () => {
    const { fact, events } = setup();

    fact.remove();
    fact.remove();

    expect(events).toEqual([{ kind: 'release', emitter: EMITTER }]);
    expect(fact.getHandle()).toBe(NULL_HANDLE);
    expect(fact.isValid()).toBe(false);
  });

  it('turns later calls into logged no-ops', () => {
    const { fact, events } = setup();
    fact.remove();

    fact.emitValue(numberValue(1));
    fact.emitCompletion();

    expect(events).toHaveLength(1);
    expect(console.warn).toHaveBeenCalledWith('[Fact] Cannot emit a value: the Fact has been removed');
    expect(console.warn).toHaveBeenCalledWith('[Fact] Cannot complete: the Fact has been removed');
  });
});

describe('Fact without a target', () => {
  it('does nothing once the Circuit is gone', () => {
    const { fact, events, registry, target } = setup();
    registry.unregister(target.id);

    fact.emitCompletion();
    fact.remove();

    expect(events).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith('[Fact] Cannot complete: Circuit 1 is gone');
  });

  it('does nothing once the Emitter is invalid', () => {
    const { fact, events, setValid } = setup();
    setValid(false);

    fact.emitFailure(new Error('late'));

    expect(events).toEqual([]);
    expect(fact.isValid()).toBe(false);
    expect(console.warn).toHaveBeenCalledWith('[Fact] Cannot emit a failure: Emitter emitters#0@1 is no longer valid');
  });
});

describe('CircuitRegistry', () => {
  it('rejects a second registration under the same id', () => {
    const { registry, target } = setup();

    expect(() => registry.register(target)).toThrow('Circuit 1 is already registered');
    expect(registry.size()).toBe(1);
  });
});
