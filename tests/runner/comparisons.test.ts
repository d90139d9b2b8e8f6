import { MemorySink } from "../../src/core/sink.ts";
import { sourceContext } from "../../src/core/sourceContext.ts";
import { Runner } from "../../src/runner/runner.ts";
import { assertEqual, test } from "../harness.ts";

test("equal passes for equal values and reports both operands otherwise", () => {
  const sink = new MemorySink();
  const runner = new Runner(sink);

  assertEqual(runner.equal(sourceContext("calc.ts", 12), 2 + 2, 4), true);
  assertEqual(runner.successCount, 1);
  assertEqual(runner.failureCount, 0);

  assertEqual(runner.equal(sourceContext("calc.ts", 13), 2 + 2, 5), false);
  assertEqual(runner.successCount, 1);
  assertEqual(runner.failureCount, 1);
  assertEqual(
    sink.text(),
    'Test failed: calc.ts, line 13\nMessage: "Arguments are not equal!"\nArguments:\n"4" (number)\n"5" (number)\n\n',
  );
});

test("equal compares objects by identity", () => {
  const runner = new Runner(new MemorySink());
  const shared = { id: 1 };

  assertEqual(runner.equal(sourceContext("ids.ts", 1), shared, shared), true);
  assertEqual(runner.equal(sourceContext("ids.ts", 2), shared, { id: 1 }), false);
});

test("notequal passes only for different values", () => {
  const sink = new MemorySink();
  const runner = new Runner(sink);

  assertEqual(runner.notequal(sourceContext("calc.ts", 20), 1, 2), true);
  assertEqual(runner.notequal(sourceContext("calc.ts", 21), 1, 1), false);
  assertEqual(
    sink.text(),
    'Test failed: calc.ts, line 21\nMessage: "Arguments are equal!"\nArguments:\n"1" (number)\n"1" (number)\n\n',
  );
});

test("less and lequal follow the ordering of their operands", () => {
  const sink = new MemorySink();
  const runner = new Runner(sink);

  assertEqual(runner.less(sourceContext("order.ts", 1), 1, 2), true);
  assertEqual(runner.less(sourceContext("order.ts", 2), 2, 1), false);
  assertEqual(runner.less(sourceContext("order.ts", 3), 2, 2), false);
  assertEqual(runner.lequal(sourceContext("order.ts", 4), 2, 2), true);
  assertEqual(runner.lequal(sourceContext("order.ts", 5), 3, 2), false);
  assertEqual(runner.less(sourceContext("order.ts", 6), "apple", "banana"), true);
  assertEqual(runner.less(sourceContext("order.ts", 7), 1n, 2n), true);
  assertEqual(runner.lequal(sourceContext("order.ts", 8), new Date(0), new Date(0)), true);

  assertEqual(runner.successCount, 5);
  assertEqual(runner.failureCount, 3);
  assertEqual(
    sink.lines()[1],
    'Message: "The first argument is not less than the second!"',
  );
  assertEqual(
    sink.text().split("\n").filter((line) => line.startsWith("Message:")).pop(),
    'Message: "The first argument is not less than or equal to the second!"',
  );
});

test("a comparison that throws is an ordinary failure", () => {
  const sink = new MemorySink();
  const runner = new Runner(sink);
  const unordered = {
    valueOf(): number {
      throw new Error("no order");
    },
  };

  assertEqual(runner.less(sourceContext("order.ts", 30), unordered, unordered), false);
  assertEqual(runner.failureCount, 1);
  assertEqual(
    sink.text(),
    'Test failed: order.ts, line 30\nMessage: "no order"\nArguments:\n[Can\'t print] (Object)\n[Can\'t print] (Object)\n\n',
  );
});
