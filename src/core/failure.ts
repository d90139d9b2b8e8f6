import { typeName } from "./typeName.ts";

export type AssertionFailureCode =
  | "NOT_EQUAL"
  | "EQUAL"
  | "NOT_LESS"
  | "NOT_LESS_OR_EQUAL"
  | "DID_NOT_THROW"
  | "WRONG_EXCEPTION"
  | "WRONG_NON_EXCEPTION"
  | "RETURNED_PROMISE";

export type AssertionError = {
  name: "AssertionError";
  code: AssertionFailureCode;
  message: string;
};

export class AssertionFailure extends Error {
  detail: AssertionError;

  constructor(detail: AssertionError) {
    super(detail.message);
    this.name = detail.name;
    this.detail = detail;
  }
}

export function assertionFailure(
  code: AssertionFailureCode,
  message: string,
): AssertionFailure {
  return new AssertionFailure({ name: "AssertionError", code, message });
}

/**
 * Every value a test body can throw, reduced to what a report can say about
 * it: an `Error` carries a message, anything else does not.
 */
export type Failure =
  | { kind: "described"; typeName: string; message: string; error: Error }
  | { kind: "opaque"; value: unknown };

function readMessage(error: Error): string {
  const message: unknown = Reflect.get(error, "message");
  return typeof message === "string" ? message : String(message);
}

/**
 * Never throws. A value that cannot be inspected (a revoked proxy, a
 * throwing `message`) is opaque.
 */
export function classifyFailure(error: unknown): Failure {
  try {
    if (error instanceof Error) {
      return {
        kind: "described",
        typeName: typeName(error),
        message: readMessage(error),
        error,
      };
    }
  } catch {
    return { kind: "opaque", value: error };
  }

  return { kind: "opaque", value: error };
}

/** A class whose instances a `throws` check accepts. */
export type FailureKind<E = unknown> = abstract new (...args: never[]) => E;

export function matchesKind(error: unknown, kind: FailureKind): boolean {
  try {
    return error instanceof kind;
  } catch {
    return false;
  }
}
