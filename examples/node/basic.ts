import { here, Runner } from "../../src/index.ts";

const runner = new Runner();

function parsePort(text: string): number {
  const port = Number.parseInt(text, 10);
  if (Number.isNaN(port) || port < 1 || port > 65535) {
    throw new RangeError(`invalid port: ${text}`);
  }

  return port;
}

runner.equal(here(), parsePort("8080"), 8080);
runner.less(here(), parsePort("80"), 1024);
runner.throws(here(), RangeError, parsePort, "http");

// Fails on purpose to show the report format.
runner.equal(here(), parsePort("443"), 80);

runner.run(here(), (text: string) => {
  if (parsePort(text) !== 22) {
    throw new Error("expected the ssh port");
  }
}, "22");

const summary = runner.writeSummary();
console.log(JSON.stringify(summary, null, 2));
