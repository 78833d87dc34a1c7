/**
 * Sink Implementations
 *
 * Re-exports all sink implementations for convenient importing.
 */

export { ConsoleSink, type ConsoleSinkOptions } from './console-sink';
export {
  CloudLoggingSink,
  streamWriter,
  type CloudLoggingSinkOptions,
  type LineStream,
  type LineWriter,
} from './cloud-logging-sink';
