import {
  assertionFailure,
  classifyFailure,
  type Failure,
  type FailureKind,
} from "../core/failure.ts";
import { type DiagnosticSink, stdoutSink } from "../core/sink.ts";
import { formatSourceContext, type SourceContext } from "../core/sourceContext.ts";
import { logArguments } from "../render/logArguments.ts";
import {
  checkEqual,
  checkLess,
  checkLessOrEqual,
  checkNotEqual,
  checkThrows,
  checkThrowsAsync,
  isThenable,
  type Ordered,
  type SyncReturn,
} from "./checks.ts";

function returnedPromise(): Error {
  return assertionFailure(
    "RETURNED_PROMISE",
    "Test returned a promise; use runAsync or throwsAsync!",
  );
}

export type RunSummary = {
  succeeded: number;
  failed: number;
  total: number;
};

/**
 * Runs test cases and counts their outcomes. A test fails by throwing
 * anything; the message of a thrown `Error` and the arguments given to the
 * test are written to the sink. Nothing a test throws escapes the runner.
 *
 * Not safe to share between concurrent async tests that write to the same
 * sink: their reports may interleave.
 */
export class Runner {
  private successes = 0;

  private failures = 0;

  private readonly out: DiagnosticSink;

  constructor(sink: DiagnosticSink = stdoutSink) {
    this.out = sink;
  }

  /** The sink failures are written to. Callers may add their own notes. */
  get sink(): DiagnosticSink {
    return this.out;
  }

  get successCount(): number {
    return this.successes;
  }

  get failureCount(): number {
    return this.failures;
  }

  get total(): number {
    return this.successes + this.failures;
  }

  /**
   * Calls `body(...args)`. The return value is ignored, except that a
   * returned promise fails the test: its outcome is unknown until it
   * settles, so such bodies belong in `runAsync`. A later rejection of that
   * promise is written to the sink as a late rejection.
   *
   * @returns false if the body threw or returned a promise, true otherwise
   */
  run<Args extends unknown[], R>(
    context: SourceContext,
    body: (...args: Args) => SyncReturn<R>,
    ...args: Args
  ): boolean {
    return this.execute(context, body, args);
  }

  /** `run` for bodies that return a promise; a rejection counts as a throw. */
  async runAsync<Args extends unknown[]>(
    context: SourceContext,
    body: (...args: Args) => unknown,
    ...args: Args
  ): Promise<boolean> {
    try {
      await body(...args);
    } catch (error) {
      this.recordFailure(context, classifyFailure(error), args);
      return false;
    }

    this.successes += 1;
    return true;
  }

  /** Passes when `a === b`. */
  equal<T>(context: SourceContext, a: T, b: T): boolean {
    return this.run(context, checkEqual<T>, a, b);
  }

  /** Passes when `a !== b`. */
  notequal<T>(context: SourceContext, a: T, b: T): boolean {
    return this.run(context, checkNotEqual<T>, a, b);
  }

  /** Passes when `a < b`. A throwing `valueOf` fails the test. */
  less<T extends Ordered>(context: SourceContext, a: T, b: T): boolean {
    return this.run(context, checkLess<T>, a, b);
  }

  /** Passes when `a <= b`. */
  lequal<T extends Ordered>(context: SourceContext, a: T, b: T): boolean {
    return this.run(context, checkLessOrEqual<T>, a, b);
  }

  /**
   * Passes when `body(...args)` throws an instance of `kind`, subclasses
   * included.
   */
  throws<Args extends unknown[], R>(
    context: SourceContext,
    kind: FailureKind,
    body: (...args: Args) => SyncReturn<R>,
    ...args: Args
  ): boolean {
    return this.execute(
      context,
      (...callArgs: Args) => checkThrows(kind, body, callArgs),
      args,
    );
  }

  throwsAsync<Args extends unknown[]>(
    context: SourceContext,
    kind: FailureKind,
    body: (...args: Args) => unknown,
    ...args: Args
  ): Promise<boolean> {
    return this.runAsync(
      context,
      (...callArgs: Args) => checkThrowsAsync(kind, body, callArgs),
      ...args,
    );
  }

  summary(): RunSummary {
    return {
      succeeded: this.successes,
      failed: this.failures,
      total: this.total,
    };
  }

  writeSummary(): RunSummary {
    const summary = this.summary();
    this.out.write(`${summary.succeeded} passed, ${summary.failed} failed\n`);
    return summary;
  }

  private execute<Args extends unknown[]>(
    context: SourceContext,
    body: (...args: Args) => unknown,
    args: Args,
  ): boolean {
    let result: unknown;
    try {
      result = body(...args);
    } catch (error) {
      this.recordFailure(context, classifyFailure(error), args);
      return false;
    }

    if (isThenable(result)) {
      this.recordFailure(context, classifyFailure(returnedPromise()), args);
      this.watchLateRejection(context, result);
      return false;
    }

    this.successes += 1;
    return true;
  }

  private watchLateRejection(
    context: SourceContext,
    result: PromiseLike<unknown>,
  ): void {
    void Promise.resolve(result).then(undefined, (error: unknown) => {
      this.out.write(`Late rejection: ${formatSourceContext(context)}\n`);
      this.writeMessage(classifyFailure(error));
      this.out.write("\n");
    });
  }

  private writeMessage(failure: Failure): void {
    if (failure.kind === "described") {
      this.out.write(`Message: "${failure.message}"\n`);
    } else {
      this.out.write("(no message)\n");
    }
  }

  private recordFailure(
    context: SourceContext,
    failure: Failure,
    args: readonly unknown[],
  ): void {
    this.out.write(`Test failed: ${formatSourceContext(context)}\n`);
    this.writeMessage(failure);

    if (args.length === 0) {
      this.out.write("(no arguments)\n\n");
    } else {
      this.out.write("Arguments:\n");
      logArguments(this.out, args);
    }

    this.failures += 1;
  }
}
