import type { LineSource } from "./line-reader";

export interface AnchorPattern {
  name: string;
  regex: RegExp;
}

export type ExpectResult =
  | { kind: "match"; name: string; line: string }
  | { kind: "timeout" }
  | { kind: "streamEnded" }
  | { kind: "aborted" };

export interface ExpectOptions {
  signal?: AbortSignal;
  onUnmatched?: (line: string) => void;
}

// Stateful flags would make `test` depend on the previous call.
const toAnchorRegex = (regex: RegExp): RegExp => {
  const flags = regex.flags.replace(/[giy]/g, "");
  return new RegExp(regex.source, `${flags}i`);
};

/**
 * Reads lines until one matches. Lines are taken in arrival order and each
 * is tested against every pattern in list order, so the earliest matching
 * line wins and the earlier pattern breaks a tie on the same line.
 */
export const expectPatterns = async (
  source: LineSource,
  patterns: readonly AnchorPattern[],
  timeoutMs: number,
  options: ExpectOptions = {}
): Promise<ExpectResult> => {
  const compiled = patterns.map((pattern) => ({ name: pattern.name, regex: toAnchorRegex(pattern.regex) }));
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    const result = await source.readLine(deadline, options.signal);
    if (result.kind === "timeout" || result.kind === "aborted") {
      return { kind: result.kind };
    }

    if (result.kind === "end") {
      return { kind: "streamEnded" };
    }

    const matched = compiled.find((pattern) => pattern.regex.test(result.line));
    if (matched) {
      return { kind: "match", name: matched.name, line: result.line };
    }

    options.onUnmatched?.(result.line);
  }
};
