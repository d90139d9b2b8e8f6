import type { DiagnosticSink } from "../core/sink.ts";
import { renderValue } from "./renderValue.ts";

/** One rendered line per argument, in order, then a closing newline. */
export function logArguments(
  sink: DiagnosticSink,
  args: readonly unknown[],
): void {
  for (const arg of args) {
    sink.write(`${renderValue(arg)}\n`);
  }

  sink.write("\n");
}
