import { stdout } from "node:process";

/**
 * Anything that accepts diagnostic text. `process.stdout` and any Node
 * writable stream qualify. The runner only writes; it never ends or closes
 * the sink.
 */
export type DiagnosticSink = {
  write(text: string): unknown;
};

export const stdoutSink: DiagnosticSink = {
  write: (text) => stdout.write(text),
};

export class MemorySink implements DiagnosticSink {
  private chunks: string[] = [];

  write(text: string): boolean {
    this.chunks.push(text);
    return true;
  }

  text(): string {
    return this.chunks.join("");
  }

  lines(): string[] {
    const text = this.text();
    if (text.length === 0) {
      return [];
    }

    return text.replace(/\n$/, "").split("\n");
  }

  clear(): void {
    this.chunks = [];
  }
}
