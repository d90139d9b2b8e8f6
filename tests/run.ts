import "./core/source-context.test.ts";
import "./core/failure.test.ts";
import "./core/sink.test.ts";
import "./render/render-value.test.ts";
import "./render/log-arguments.test.ts";
import "./runner/run.test.ts";
import "./runner/comparisons.test.ts";
import "./runner/throws.test.ts";
import "./runner/async.test.ts";
import "./runner/summary.test.ts";
import { run } from "./harness.ts";

await run();
