/**
 * @file helpers.ts
 * @description Event factories and timing utilities shared by tasks and pipelines.
 */

import { ErrorEvent, LogEvent } from "./events.js";
import type { EventMetadata } from "./events.js";

/**
 * Source of millisecond timestamps.
 */
export type Clock = () => number;

/**
 * Creates an info log event
 */
export function info(message: string, metadata: EventMetadata & { details?: Record<string, unknown> } = {}): LogEvent {
  return new LogEvent("info", message, metadata);
}

/**
 * Creates a warning log event
 */
export function warning(message: string, metadata: EventMetadata & { details?: Record<string, unknown> } = {}): LogEvent {
  return new LogEvent("warn", message, metadata);
}

/**
 * Creates a debug log event
 */
export function debug(message: string, metadata: EventMetadata & { details?: Record<string, unknown> } = {}): LogEvent {
  return new LogEvent("debug", message, metadata);
}

/**
 * Creates an error event for a failure
 */
export function error(err: unknown, metadata: EventMetadata = {}): ErrorEvent {
  return new ErrorEvent(err, metadata);
}

/**
 * Performance statistics object
 */
export interface PerformanceStats {
  count: number;
  total: number;
  average: number;
  minimum: number;
  maximum: number;
}

/**
 * Performance timer class for measuring operation durations
 */
export class PerformanceTimer {
  /**
   * Name of the operation being timed
   */
  readonly name: string;

  /**
   * Array of duration measurements
   */
  measurements: number[] = [];

  /**
   * Start time in milliseconds
   */
  startTime: number | null = null;

  readonly #clock: Clock;

  constructor(name: string, clock: Clock = Date.now) {
    this.name = name;
    this.#clock = clock;
  }

  /**
   * Whether the timer is currently running
   */
  get isRunning(): boolean {
    return this.startTime !== null;
  }

  /**
   * Starts the timer and returns the start timestamp
   */
  start(): number {
    this.startTime = this.#clock();
    return this.startTime;
  }

  /**
   * Stops the timer, records the measurement and returns it
   */
  stop(): number {
    if (this.startTime === null) {
      throw new Error(`Timer '${this.name}' is not running`);
    }

    const duration = this.#clock() - this.startTime;
    this.measurements.push(duration);
    this.startTime = null;
    return duration;
  }

  /**
   * Gets performance statistics
   */
  getStats(): PerformanceStats {
    if (this.measurements.length === 0) {
      return {
        count: 0,
        total: 0,
        average: 0,
        minimum: 0,
        maximum: 0,
      };
    }

    const total = this.measurements.reduce((sum, duration) => sum + duration, 0);
    const average = total / this.measurements.length;

    return {
      count: this.measurements.length,
      total: round(total),
      average: round(average),
      minimum: round(Math.min(...this.measurements)),
      maximum: round(Math.max(...this.measurements)),
    };
  }

  /**
   * Creates a log event carrying the statistics
   */
  performanceStats(metadata: EventMetadata = {}): LogEvent {
    const stats = this.getStats();

    return new LogEvent(
      "debug",
      `Performance: ${this.name} - ${stats.count} operations, avg: ${stats.average}ms, min: ${stats.minimum}ms, max: ${stats.maximum}ms, total: ${stats.total}ms`,
      { ...metadata, details: { operation: this.name, ...stats } },
    );
  }

  /**
   * Resets the timer, clearing all measurements
   */
  reset(): PerformanceTimer {
    this.measurements = [];
    this.startTime = null;
    return this;
  }
}

/**
 * Creates a new performance timer
 */
export function createPerformanceTimer(name: string, clock?: Clock): PerformanceTimer {
  return new PerformanceTimer(name, clock);
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}
