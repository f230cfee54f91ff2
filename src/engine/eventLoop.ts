/**
 * EventLoop: single consumer driving a Circuit.
 *
 * Each iteration:
 *   1. Awaits the next event (up to `awaitTimeoutMs`)
 *   2. Hands it to `circuit.handleEvent`
 *   3. Notifies registered observers
 *
 * `drain()` does the same synchronously for everything already queued,
 * which is what tests and shutdown use.
 */

import { type Circuit, type CircuitEvent } from '../circuit';
import { type Logger, createLogger } from '../log';

// ── Types ───────────────────────────────────────────────────────────

export interface EventLoopConfig {
  /** How long one wait for an event may last, in milliseconds */
  awaitTimeoutMs: number;
  /** Upper bound on events handled by one drain() call */
  maxEventsPerDrain: number;
}

export interface EventLoopStats {
  /** Events passed to handleEvent */
  eventsHandled: number;
  /** Events whose handling threw (runtime bugs, never Receiver errors) */
  eventsFailed: number;
  /** Waits that ended without an event */
  idleTimeouts: number;
  /** Epoch millis of the last start(), or null if never started */
  startedAt: number | null;
}

/** Called after every handled event, in registration order. */
export type EventObserver = (event: CircuitEvent) => void;

export interface EventLoop {
  /** Register an observer. Returns an unregister function. */
  registerObserver(name: string, observer: EventObserver): () => void;
  /** Start the loop. No-op if already running. */
  start(): void;
  /** Stop the loop and wait for the current iteration to finish. */
  stop(): Promise<void>;
  isRunning(): boolean;
  /** Handle queued events synchronously. Returns how many were handled. */
  drain(): number;
  getStats(): EventLoopStats;
}

// ── Event Loop ──────────────────────────────────────────────────────

export function createEventLoop(
  circuit: Circuit,
  config: EventLoopConfig,
  logger: Logger = createLogger('EventLoop'),
): EventLoop {
  const { awaitTimeoutMs, maxEventsPerDrain } = config;

  if (!Number.isFinite(awaitTimeoutMs) || awaitTimeoutMs <= 0) {
    throw new Error(`awaitTimeoutMs must be a positive finite number, got ${awaitTimeoutMs}`);
  }

  let running = false;
  let finished: Promise<void> = Promise.resolve();
  const observers: Map<string, EventObserver> = new Map();
  const stats: EventLoopStats = {
    eventsHandled: 0,
    eventsFailed: 0,
    idleTimeouts: 0,
    startedAt: null,
  };

  function handle(event: CircuitEvent): void {
    stats.eventsHandled++;

    try {
      circuit.handleEvent(event);
    } catch (err) {
      stats.eventsFailed++;
      logger.error(`Handling ${event.kind} event failed:`, err);
      return;
    }

    for (const [name, observer] of observers) {
      try {
        observer(event);
      } catch (err) {
        logger.error(`Observer "${name}" threw after ${event.kind} event:`, err);
      }
    }
  }

  async function run(): Promise<void> {
    while (running) {
      const event = await circuit.awaitEvent(awaitTimeoutMs);
      if (event === null) {
        if (circuit.isClosed()) {
          running = false;
          logger.info(`Circuit ${circuit.id} was closed, stopping after ${stats.eventsHandled} event(s)`);
          break;
        }
        if (running) stats.idleTimeouts++;
        continue;
      }
      handle(event);
    }
  }

  return {
    registerObserver(name: string, observer: EventObserver): () => void {
      if (observers.has(name)) {
        throw new Error(`Observer "${name}" is already registered`);
      }
      observers.set(name, observer);
      return () => {
        observers.delete(name);
      };
    },

    start(): void {
      if (running) return;
      running = true;
      stats.startedAt = Date.now();

      logger.info(`Starting loop for Circuit ${circuit.id}: await timeout ${awaitTimeoutMs}ms`);
      logger.info(`Registered observers: ${observers.size > 0 ? [...observers.keys()].join(', ') : '(none)'}`);

      finished = run().catch((err: unknown) => {
        running = false;
        logger.error('Loop terminated unexpectedly:', err);
      });
    },

    async stop(): Promise<void> {
      if (!running) return;
      running = false;
      circuit.interrupt();
      await finished;

      logger.info(`Stopped after ${stats.eventsHandled} event(s), ${circuit.queueLength()} still queued`);
    },

    isRunning(): boolean {
      return running;
    },

    drain(): number {
      let handled = 0;
      while (handled < maxEventsPerDrain) {
        const event = circuit.pollEvent();
        if (event === null) break;
        handle(event);
        handled++;
      }
      return handled;
    },

    getStats(): EventLoopStats {
      return { ...stats };
    },
  };
}
