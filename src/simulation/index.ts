/**
 * In-process stand-ins for time and remote operations.
 *
 * Used by tests and by callers that want to rehearse a wait without a
 * network or real timers.
 * @module simulation
 */

import type { Clock } from '../poller/clock.js';
import type { OperationHandle, OperationResource } from '../types/operation.js';
import type { GetOperationFn } from '../types/poll.js';

/**
 * Clock on virtual time. Sleeping advances the time instantly.
 */
export class SimulatedClock implements Clock {
  private current: number;
  /** Every requested sleep, in order */
  readonly sleeps: number[] = [];

  constructor(startMs = 0) {
    this.current = startMs;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    if (signal?.aborted) {
      return;
    }
    this.current += Math.max(0, ms);
  }

  /**
   * Moves time forward without a sleep, e.g. to model a slow status call.
   */
  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * One scripted response: a snapshot to return or a value to throw.
 */
export type ScriptStep = { snapshot: unknown } | { error: unknown };

/**
 * Options for a scripted source.
 */
export interface ScriptedSourceOptions {
  /** Called with the 1-based call number before each step is served */
  onCall?: (callNumber: number, handle: OperationHandle) => void;
}

/**
 * Serves a fixed sequence of snapshots or errors as a status function.
 * After the last step the last step repeats.
 */
export class ScriptedOperationSource {
  private readonly steps: readonly ScriptStep[];
  private readonly options: ScriptedSourceOptions;
  /** Handles passed to each call, in order */
  readonly calls: OperationHandle[] = [];

  constructor(steps: readonly ScriptStep[], options: ScriptedSourceOptions = {}) {
    if (steps.length === 0) {
      throw new Error('ScriptedOperationSource needs at least one step');
    }
    this.steps = steps;
    this.options = options;
  }

  /**
   * Scripts a sequence of snapshots.
   */
  static of(...snapshots: unknown[]): ScriptedOperationSource {
    return new ScriptedOperationSource(snapshots.map((snapshot) => ({ snapshot })));
  }

  get callCount(): number {
    return this.calls.length;
  }

  readonly getFn: GetOperationFn = async (handle) => {
    this.calls.push(handle);
    this.options.onCall?.(this.calls.length, handle);
    const step = this.steps[Math.min(this.calls.length, this.steps.length) - 1];
    if (step === undefined) {
      throw new Error('ScriptedOperationSource ran out of steps');
    }
    if ('error' in step) {
      throw step.error;
    }
    return step.snapshot;
  };
}

/**
 * Snapshot of a running operation.
 */
export function runningSnapshot(metadata?: unknown): OperationResource {
  return metadata === undefined ? { done: false } : { done: false, metadata };
}

/**
 * Snapshot of an operation that succeeded.
 */
export function succeededSnapshot(response?: unknown): OperationResource {
  return response === undefined ? { done: true } : { done: true, response };
}

/**
 * Snapshot of an operation that failed.
 */
export function failedSnapshot(code: number, message: string, details?: unknown[]): OperationResource {
  return { done: true, error: details === undefined ? { code, message } : { code, message, details } };
}
