/**
 * Cloud Logging Sink
 *
 * Writes one provider-formatted JSON document per event (NDJSON), ready for
 * a Cloud Logging agent to pick up from stdout.
 *
 * Each line goes to the writer in a single call, so lines from concurrent
 * producers never interleave. A writer that returns a promise is given one
 * line at a time: later lines wait until the previous write settles.
 */

import { formatEventLine, type DocumentOptions } from '../document';
import { SinkWriteError } from '../errors';
import type { LogSink } from '../sinks';
import { LogLevel, type LogEvent } from '../types';

/**
 * Receives complete, newline-terminated lines. May throw or reject.
 */
export type LineWriter = (line: string) => void | Promise<void>;

export interface CloudLoggingSinkOptions extends DocumentOptions {
  /** Sink name used for registration. Defaults to 'cloud-logging'. */
  name?: string;
  /** Minimum log level to output. Defaults to TRACE (all events). */
  minLevel?: LogLevel;
  /**
   * Custom writer function. Defaults to `streamWriter(process.stdout)`.
   * Use this to write to a file or a test buffer.
   */
  writer?: LineWriter;
}

/**
 * The part of a writable stream the sink needs.
 */
export interface LineStream {
  write(chunk: string, callback: (error?: Error | null) => void): boolean;
}

/**
 * Writer for a stream. Each write settles when the stream's callback fires,
 * so a failure such as EPIPE rejects that line's write instead of surfacing
 * only as an 'error' event, and the next line waits until the stream has
 * taken this one. The stream's own 'error' event is left to the application.
 */
export function streamWriter(stream: LineStream): LineWriter {
  return (line) =>
    new Promise<void>((resolve, reject) => {
      stream.write(line, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
}

export class CloudLoggingSink implements LogSink {
  readonly name: string;
  readonly minLevel: LogLevel;

  private readonly writer: LineWriter;
  private readonly documentOptions: DocumentOptions;
  private inFlight: Promise<void> | undefined;

  constructor(options: CloudLoggingSinkOptions = {}) {
    this.name = options.name ?? 'cloud-logging';
    this.minLevel = options.minLevel ?? LogLevel.TRACE;
    this.writer = options.writer ?? streamWriter(process.stdout);
    this.documentOptions = {
      traceCorrelation: options.traceCorrelation ?? { mode: 'disabled' },
      includeSourceLocation: options.includeSourceLocation ?? true,
      includeTarget: options.includeTarget ?? false,
    };
  }

  /**
   * Format an event and hand the line to the writer.
   *
   * @throws SinkWriteError when a synchronous writer fails
   */
  write(event: LogEvent): void | Promise<void> {
    const line = formatEventLine(event, this.documentOptions);

    if (this.inFlight) {
      const previous = this.inFlight;
      return this.track(previous.then(() => this.writer(line)));
    }

    let result: void | Promise<void>;
    try {
      result = this.writer(line);
    } catch (error) {
      throw new SinkWriteError(this.name, error);
    }

    if (result instanceof Promise) {
      return this.track(result);
    }
  }

  /**
   * Wait until every queued line has been handed off.
   */
  async flush(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  private track(write: Promise<void>): Promise<void> {
    const outcome = write.then(
      () => undefined,
      (error: unknown) => {
        throw new SinkWriteError(this.name, error);
      }
    );

    // The queue only orders writes; each failure is reported through `outcome`
    const settled = outcome.then(
      () => undefined,
      () => undefined
    );
    this.inFlight = settled;
    void settled.then(() => {
      if (this.inFlight === settled) {
        this.inFlight = undefined;
      }
    });

    return outcome;
  }
}
