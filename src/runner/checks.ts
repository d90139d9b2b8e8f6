import {
  assertionFailure,
  classifyFailure,
  type FailureKind,
  matchesKind,
} from "../core/failure.ts";

/**
 * Return type of a body given to the synchronous `run` and `throws`: any
 * promise-like result is rejected at compile time. Bodies typed as
 * returning `unknown` are still checked at run time with `isThenable`.
 */
export type SyncReturn<R> = R extends PromiseLike<unknown> ? never : R;

export function isThenable(value: unknown): value is PromiseLike<unknown> {
  if ((typeof value !== "object" && typeof value !== "function") || value === null) {
    return false;
  }

  try {
    return typeof Reflect.get(value, "then") === "function";
  } catch {
    return false;
  }
}

/** Values the ordering helpers accept: anything `<` compares by value. */
export type Ordered = number | bigint | string | { valueOf(): number };

export function checkEqual<T>(a: T, b: T): void {
  if (!(a === b)) {
    throw assertionFailure("NOT_EQUAL", "Arguments are not equal!");
  }
}

export function checkNotEqual<T>(a: T, b: T): void {
  if (!(a !== b)) {
    throw assertionFailure("EQUAL", "Arguments are equal!");
  }
}

export function checkLess<T extends Ordered>(a: T, b: T): void {
  if (!(a < b)) {
    throw assertionFailure(
      "NOT_LESS",
      "The first argument is not less than the second!",
    );
  }
}

export function checkLessOrEqual<T extends Ordered>(a: T, b: T): void {
  if (!(a <= b)) {
    throw assertionFailure(
      "NOT_LESS_OR_EQUAL",
      "The first argument is not less than or equal to the second!",
    );
  }
}

function rejectWrongKind(error: unknown, kind: FailureKind): void {
  if (matchesKind(error, kind)) {
    return;
  }

  const failure = classifyFailure(error);
  if (failure.kind === "described") {
    throw assertionFailure(
      "WRONG_EXCEPTION",
      `Test throws a wrong exception (${failure.typeName}): ${failure.message}`,
    );
  }

  throw assertionFailure(
    "WRONG_NON_EXCEPTION",
    "Test throws a wrong non-exception!",
  );
}

function didNotThrow(): Error {
  return assertionFailure("DID_NOT_THROW", "Test did not throw!");
}

/**
 * A promise returned by `body` is handed back unsettled, so the caller can
 * fail the test and watch for its rejection.
 */
export function checkThrows<Args extends unknown[]>(
  kind: FailureKind,
  body: (...args: Args) => unknown,
  args: Args,
): PromiseLike<unknown> | undefined {
  let result: unknown;
  try {
    result = body(...args);
  } catch (error) {
    rejectWrongKind(error, kind);
    return undefined;
  }

  if (isThenable(result)) {
    return result;
  }

  throw didNotThrow();
}

export async function checkThrowsAsync<Args extends unknown[]>(
  kind: FailureKind,
  body: (...args: Args) => unknown,
  args: Args,
): Promise<void> {
  try {
    await body(...args);
  } catch (error) {
    rejectWrongKind(error, kind);
    return;
  }

  throw didNotThrow();
}
