import type { LineSource } from "../core/types";

/** Lines already held in memory; exhausted once drained. */
export class ArrayLineSource implements LineSource {
  private next = 0;

  constructor(private readonly lines: readonly string[]) {}

  get exhausted(): boolean {
    return this.next >= this.lines.length;
  }

  nextLine(): string | null {
    return this.exhausted ? null : this.lines[this.next++] ?? null;
  }
}

const TERMINATORS = /\r\n|\r|\n/;

/**
 * Reassembles lines from arbitrarily split text chunks. Accepts `\n`,
 * `\r\n` and bare `\r`; blank lines are dropped.
 */
export class BufferedLineSource implements LineSource {
  private pending = "";
  private ready: string[] = [];
  private ended = false;

  get exhausted(): boolean {
    return this.ended && this.ready.length === 0;
  }

  push(chunk: string): void {
    if (this.ended) throw new Error("push after end");
    const parts = (this.pending + chunk).split(TERMINATORS);
    // a chunk ending in \r may be the first half of \r\n
    this.pending = parts.pop() ?? "";
    if (this.pending === "" && chunk.endsWith("\r")) this.pending = "\r";
    this.enqueue(parts);
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.enqueue([this.pending === "\r" ? "" : this.pending]);
    this.pending = "";
  }

  nextLine(): string | null {
    return this.ready.shift() ?? null;
  }

  private enqueue(lines: string[]): void {
    for (const line of lines) {
      if (line.length > 0) this.ready.push(line);
    }
  }
}
