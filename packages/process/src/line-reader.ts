export type ReadLineResult =
  | { kind: "line"; line: string }
  | { kind: "timeout" }
  | { kind: "end" }
  | { kind: "aborted" };

export interface LineSource {
  /** Resolves with the next line, or when `deadline` (epoch ms) passes, the stream ends or `signal` aborts. */
  readLine: (deadline: number, signal?: AbortSignal) => Promise<ReadLineResult>;
}

export interface LineReaderOptions {
  /** Quiet period after which an unterminated fragment (an interactive prompt) is released as a line. */
  partialLineFlushMs?: number;
  /** Oldest lines are discarded once this many are waiting for a reader. */
  maxBufferedLines?: number;
}

const DEFAULT_PARTIAL_LINE_FLUSH_MS = 150;
const DEFAULT_MAX_BUFFERED_LINES = 1000;

const LINE_BREAK_PATTERN = /\r?\n/;

type Waiter = (result: ReadLineResult) => void;

/**
 * Turns arbitrarily chunked text into lines for a single consumer. Blank lines
 * are dropped; a trailing fragment is held until its line break arrives or the
 * output goes quiet.
 */
export class LineReader implements LineSource {
  private readonly partialLineFlushMs: number;
  private readonly maxBufferedLines: number;

  private readonly lines: string[] = [];
  private partial = "";
  private ended = false;
  private discarded = 0;
  private flushTimer: ReturnType<typeof setTimeout> | undefined;
  private waiter: Waiter | undefined;

  constructor(options: LineReaderOptions = {}) {
    this.partialLineFlushMs = options.partialLineFlushMs ?? DEFAULT_PARTIAL_LINE_FLUSH_MS;
    this.maxBufferedLines = options.maxBufferedLines ?? DEFAULT_MAX_BUFFERED_LINES;
  }

  get discardedCount(): number {
    return this.discarded;
  }

  push(chunk: string): void {
    if (this.ended || chunk.length === 0) {
      return;
    }

    const parts = `${this.partial}${chunk}`.split(LINE_BREAK_PATTERN);
    this.partial = parts.pop() ?? "";
    for (const part of parts) {
      this.enqueue(part);
    }

    this.schedulePartialFlush();
  }

  end(): void {
    if (this.ended) {
      return;
    }

    this.clearFlushTimer();
    this.flushPartial();
    this.ended = true;

    const waiter = this.waiter;
    if (waiter) {
      waiter({ kind: "end" });
    }
  }

  readLine(deadline: number, signal?: AbortSignal): Promise<ReadLineResult> {
    const next = this.lines.shift();
    if (next !== undefined) {
      return Promise.resolve({ kind: "line", line: next });
    }

    if (this.ended) {
      return Promise.resolve({ kind: "end" });
    }

    if (signal?.aborted) {
      return Promise.resolve({ kind: "aborted" });
    }

    if (this.waiter) {
      return Promise.reject(new Error("LineReader already has a pending reader"));
    }

    const remainingMs = deadline - Date.now();
    if (remainingMs <= 0) {
      return Promise.resolve({ kind: "timeout" });
    }

    return new Promise<ReadLineResult>((resolve) => {
      const finish: Waiter = (result) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.waiter = undefined;
        resolve(result);
      };

      const onAbort = () => {
        finish({ kind: "aborted" });
      };

      const timer = setTimeout(() => {
        finish({ kind: "timeout" });
      }, remainingMs);

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiter = finish;
    });
  }

  private enqueue(raw: string): void {
    const line = raw.replace(/\r+$/, "");
    if (line.trim().length === 0) {
      return;
    }

    const waiter = this.waiter;
    if (waiter) {
      waiter({ kind: "line", line });
      return;
    }

    this.lines.push(line);
    if (this.lines.length > this.maxBufferedLines) {
      this.lines.shift();
      this.discarded += 1;
    }
  }

  private schedulePartialFlush(): void {
    this.clearFlushTimer();
    if (this.partial.length === 0) {
      return;
    }

    this.flushTimer = setTimeout(() => {
      this.flushTimer = undefined;
      this.flushPartial();
    }, this.partialLineFlushMs);
  }

  private flushPartial(): void {
    if (this.partial.length === 0) {
      return;
    }

    const fragment = this.partial;
    this.partial = "";
    this.enqueue(fragment);
  }

  private clearFlushTimer(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = undefined;
    }
  }
}
