import { fileURLToPath } from "node:url";

/**
 * Where an assertion was written. Diagnostic only: nothing compares or
 * stores contexts beyond the call they annotate.
 */
export type SourceContext = {
  readonly file: string;
  readonly line: number;
};

const UNKNOWN_CONTEXT: SourceContext = Object.freeze({
  file: "<unknown>",
  line: 0,
});

const FRAME_LOCATION = /(?:\(|\s)((?:file:\/\/)?[^\s()]+):(\d+):(\d+)\)?\s*$/;

export function sourceContext(file: string, line: number): SourceContext {
  return Object.freeze({ file, line });
}

export function formatSourceContext(context: SourceContext): string {
  return `${context.file}, line ${context.line}`;
}

function toPath(location: string): string {
  if (!location.startsWith("file://")) {
    return location;
  }

  try {
    return fileURLToPath(location);
  } catch {
    return location;
  }
}

/**
 * Reads the `skip`-th `at ...` frame of a V8 stack trace. Frame 0 is the
 * function that created the error.
 */
export function contextFromStack(stack: string, skip: number): SourceContext {
  const frames = stack
    .split("\n")
    .filter((line) => /^\s*at\s/.test(line));
  const frame = frames[skip];
  if (frame === undefined) {
    return UNKNOWN_CONTEXT;
  }

  const match = frame.match(FRAME_LOCATION);
  if (!match) {
    return UNKNOWN_CONTEXT;
  }

  return sourceContext(toPath(match[1]), Number.parseInt(match[2], 10));
}

/**
 * Captures the file and line of the caller, so tests never spell out their
 * own location. `depth` skips further frames for wrappers around `here`.
 */
export function here(depth = 0): SourceContext {
  const stack = new Error().stack ?? "";
  return contextFromStack(stack, 1 + depth);
}
