/**
 * Sink Interface & Registry
 *
 * Sinks are the output destinations for log events.
 * The SinkRegistry manages multiple sinks and dispatches events to each.
 */

import { LogLevel, type LogEvent } from './types';

/**
 * LogSink interface - all sinks implement this.
 *
 * Sinks receive LogEvent objects and write them to their destination
 * (stdout, a file descriptor, a test buffer, etc.)
 */
export interface LogSink {
  /** Unique name for this sink (used for registration/unregistration) */
  name: string;

  /** Minimum log level this sink will accept. Events below this are filtered out. */
  minLevel: LogLevel;

  /**
   * Write a log event to this sink.
   * Can be sync or async - async writes are tracked for flushing.
   * Throwing (or rejecting) reports a failure for this event only.
   */
  write(event: LogEvent): void | Promise<void>;

  /**
   * Optional: Flush any buffered output.
   */
  flush?(): Promise<void>;

  /**
   * Optional: Clean up resources when sink is unregistered.
   */
  destroy?(): void;
}

/**
 * A sink that failed to take an event.
 */
export interface SinkFailure {
  sink: string;
  error: unknown;
}

export type SinkErrorHandler = (failure: SinkFailure) => void;

export interface SinkRegistryOptions {
  /**
   * Called for every failed write, sync or async.
   * Defaults to console.error (never the logger itself, to avoid recursion).
   */
  onSinkError?: SinkErrorHandler;
}

function reportToConsole({ sink, error }: SinkFailure): void {
  console.error(`[SinkRegistry] Sink "${sink}" write failed:`, error);
}

/**
 * SinkRegistry - manages multiple sinks and dispatches log events.
 *
 * - Logger produces LogEvent objects
 * - SinkRegistry dispatches to registered sinks
 * - A failing sink never stops the others and never throws into the producer
 */
export class SinkRegistry {
  private sinks: LogSink[] = [];
  private readonly pending = new Set<Promise<void>>();
  private readonly onSinkError: SinkErrorHandler;

  constructor(options: SinkRegistryOptions = {}) {
    this.onSinkError = options.onSinkError ?? reportToConsole;
  }

  /**
   * Register a new sink.
   * Sinks are invoked in registration order.
   */
  register(sink: LogSink): void {
    // Prevent duplicate registration
    if (this.sinks.some((s) => s.name === sink.name)) {
      console.warn(`Sink "${sink.name}" is already registered, skipping.`);
      return;
    }
    this.sinks.push(sink);
  }

  /**
   * Unregister a sink by name.
   * Calls destroy() on the sink if available.
   */
  unregister(name: string): void {
    const index = this.sinks.findIndex((s) => s.name === name);
    if (index !== -1) {
      const [sink] = this.sinks.splice(index, 1);
      sink.destroy?.();
    }
  }

  /**
   * Get a registered sink by name.
   */
  getSink(name: string): LogSink | undefined {
    return this.sinks.find((s) => s.name === name);
  }

  /**
   * Get all registered sink names.
   */
  getSinkNames(): string[] {
    return this.sinks.map((s) => s.name);
  }

  /**
   * Dispatch a log event to all registered sinks.
   * Filters by each sink's minLevel.
   *
   * @returns the synchronous failures for this event; async failures go to onSinkError
   */
  dispatch(event: LogEvent): SinkFailure[] {
    const failures: SinkFailure[] = [];

    for (const sink of this.sinks) {
      // Skip if event level is below sink's minimum
      if (event.level < sink.minLevel) {
        continue;
      }

      try {
        const result = sink.write(event);

        // Track async writes for flushing until they settle
        if (result instanceof Promise) {
          const tracked: Promise<void> = result.then(
            () => {
              this.pending.delete(tracked);
            },
            (error: unknown) => {
              this.pending.delete(tracked);
              this.onSinkError({ sink: sink.name, error });
            }
          );
          this.pending.add(tracked);
        }
      } catch (error) {
        const failure = { sink: sink.name, error };
        failures.push(failure);
        this.onSinkError(failure);
      }
    }

    return failures;
  }

  /**
   * Wait for pending async writes and call flush() on each sink.
   * Call this before process exit.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);

    const flushPromises = this.sinks.map(async (sink) => {
      if (!sink.flush) {
        return;
      }
      try {
        await sink.flush();
      } catch (error) {
        console.error(`[SinkRegistry] Sink "${sink.name}" flush failed:`, error);
      }
    });

    await Promise.all(flushPromises);
  }

  /**
   * Unregister all sinks and clean up.
   */
  destroy(): void {
    for (const sink of this.sinks) {
      sink.destroy?.();
    }
    this.sinks = [];
    this.pending.clear();
  }
}
