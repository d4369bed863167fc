export type ChallengeWaitResult =
  | { kind: "response"; code: string }
  | { kind: "timeout" }
  | { kind: "aborted" };

/** One-shot handoff of a verification code from the presentation side to the handshake. */
export class ChallengeGate {
  private deliver: ((code: string) => void) | undefined;

  get pending(): boolean {
    return this.deliver !== undefined;
  }

  wait(timeoutMs: number, signal?: AbortSignal): Promise<ChallengeWaitResult> {
    if (this.deliver) {
      return Promise.reject(new Error("ChallengeGate is already waiting"));
    }

    if (signal?.aborted) {
      return Promise.resolve({ kind: "aborted" });
    }

    return new Promise<ChallengeWaitResult>((resolve) => {
      const settle = (result: ChallengeWaitResult): void => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.deliver = undefined;
        resolve(result);
      };
      const onAbort = (): void => settle({ kind: "aborted" });
      const timer = setTimeout(() => settle({ kind: "timeout" }), timeoutMs);

      signal?.addEventListener("abort", onAbort, { once: true });
      this.deliver = (code) => settle({ kind: "response", code });
    });
  }

  /** False when nothing is waiting; the code is then discarded. */
  resolve(code: string): boolean {
    const deliver = this.deliver;
    if (!deliver) {
      return false;
    }
    deliver(code);
    return true;
  }
}
