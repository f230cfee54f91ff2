/**
 * CircuitRegistry: id → Circuit lookup used by Facts.
 *
 * A Fact keeps only the id of its Circuit and asks the registry for it on
 * every call, so a closed Circuit is simply absent.
 */

import { type Handle } from '../data';
import { type CircuitEvent } from './types';

/** The part of a Circuit a Fact talks to. */
export interface FactTarget {
  readonly id: number;
  isEmitterValid(emitter: Handle): boolean;
  enqueue(event: CircuitEvent): void;
}

export interface CircuitRegistry {
  /** Reserve an id for a Circuit about to be registered. */
  nextId(): number;
  register(target: FactTarget): void;
  unregister(id: number): void;
  lookup(id: number): FactTarget | null;
  size(): number;
}

export function createCircuitRegistry(): CircuitRegistry {
  const targets = new Map<number, FactTarget>();
  let lastId = 0;

  return {
    nextId(): number {
      lastId++;
      return lastId;
    },

    register(target: FactTarget): void {
      if (targets.has(target.id)) {
        throw new Error(`Circuit ${target.id} is already registered`);
      }
      targets.set(target.id, target);
    },

    unregister(id: number): void {
      targets.delete(id);
    },

    lookup(id: number): FactTarget | null {
      return targets.get(id) ?? null;
    },

    size(): number {
      return targets.size;
    },
  };
}
