/**
 * Callsite capture for `logging.googleapis.com/sourceLocation`.
 */

import { dirname, sep } from 'path';
import type { JsonObject, SourceLocation } from './types';

export const SOURCE_LOCATION_KEY = 'logging.googleapis.com/sourceLocation';

// "    at fn (/path/file.ts:12:5)" or "    at /path/file.ts:12:5"
const FRAME = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/;

function parseFrame(line: string): SourceLocation | undefined {
  const match = FRAME.exec(line);
  if (!match) {
    return undefined;
  }
  const [, rawFile, rawLine] = match;
  return { file: rawFile.replace(/^file:\/\//, ''), line: Number(rawLine) };
}

/**
 * The directory holding this module, read from the module's own stack frame.
 * Frames below it belong to the library.
 */
function ownDirectory(): string | undefined {
  const frame = new Error().stack?.split('\n')[1];
  const location = frame === undefined ? undefined : parseFrame(frame);
  return location && dirname(location.file);
}

const LIBRARY_DIR = ownDirectory();

function isInside(file: string, directory: string | undefined): boolean {
  return directory !== undefined && file.startsWith(directory + sep);
}

/**
 * Parse a V8 stack and return the first frame that is not inside
 * `libraryDir` or Node's internals.
 */
export function parseCallsite(
  stack: string | undefined,
  libraryDir: string | undefined = LIBRARY_DIR
): SourceLocation | undefined {
  if (!stack) {
    return undefined;
  }

  for (const line of stack.split('\n').slice(1)) {
    const location = parseFrame(line);
    if (!location || isInside(location.file, libraryDir) || location.file.startsWith('node:')) {
      continue;
    }
    return location;
  }
  return undefined;
}

/**
 * Directory the library is loaded from, if it could be determined.
 */
export function libraryDirectory(): string | undefined {
  return LIBRARY_DIR;
}

/**
 * Capture the location of the code that called into the logger.
 */
export function captureSourceLocation(): SourceLocation | undefined {
  return parseCallsite(new Error().stack);
}

/**
 * Render a source location. The provider schema carries the line as a string.
 */
export function sourceLocationFields(source: SourceLocation | undefined): JsonObject {
  if (!source) {
    return {};
  }
  const location: JsonObject = { file: source.file };
  if (source.line !== undefined) {
    location.line = String(source.line);
  }
  return { [SOURCE_LOCATION_KEY]: location };
}
