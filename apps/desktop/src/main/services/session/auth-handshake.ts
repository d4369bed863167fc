import {
  ProcessNotRunningError,
  expectPatterns,
  type AnchorPattern,
  type ExpectResult,
  type ProcessHandle
} from "../../../../../../packages/process/src/index";
import type { ChallengeWaitResult } from "./challenge-gate";

const DEFAULT_USERNAME_PROMPT_TIMEOUT_MS = 60_000;
const DEFAULT_PASSWORD_PROMPT_TIMEOUT_MS = 60_000;
const DEFAULT_RESULT_TIMEOUT_MS = 30_000;
const DEFAULT_CHALLENGE_TIMEOUT_MS = 120_000;

export const USERNAME_PROMPT: AnchorPattern = { name: "usernamePrompt", regex: /Enter Auth Username.*:/i };
export const PASSWORD_PROMPT: AnchorPattern = { name: "passwordPrompt", regex: /Enter Auth Password.*:/i };
export const CHALLENGE_PROMPT: AnchorPattern = { name: "challenge", regex: /CHALLENGE:/i };
export const AUTH_FAILURE: AnchorPattern = { name: "failure", regex: /AUTH_FAILED/i };
export const CONNECT_SUCCESS: AnchorPattern = { name: "success", regex: /Initialization Sequence Completed/i };

export type HandshakeStage =
  | "awaitingUsernamePrompt"
  | "awaitingPasswordPrompt"
  | "awaitingChallengeOrResult"
  | "awaitingChallengeResponse"
  | "awaitingFinalResult";

export type HandshakeOutcome =
  | { kind: "success" }
  | { kind: "authFailed"; line: string }
  | { kind: "promptTimeout"; stage: HandshakeStage }
  | { kind: "challengeTimeout" }
  | { kind: "processDied"; stage: HandshakeStage }
  | { kind: "aborted" };

export interface HandshakeTiming {
  usernamePromptMs: number;
  passwordPromptMs: number;
  resultMs: number;
  challengeMs: number;
}

export type HandshakeProcess = Pick<ProcessHandle, "readLine" | "writeLine" | "isAlive" | "onExit">;

export interface AuthHandshakeLogger {
  info: (message: string, metadata?: Record<string, unknown>) => void;
  debug: (message: string, metadata?: Record<string, unknown>) => void;
}

export interface AuthHandshakeOptions {
  process: HandshakeProcess;
  credentials: { username: string; password: string };
  /** Asks the user for a second-factor code; the signal aborts when the session stops or the process exits. */
  requestChallenge: (prompt: string, timeoutMs: number, signal: AbortSignal) => Promise<ChallengeWaitResult>;
  signal?: AbortSignal;
  logger: AuthHandshakeLogger;
  onStage?: (stage: HandshakeStage) => void;
  timing?: Partial<HandshakeTiming>;
}

export const resolveHandshakeTiming = (timing: Partial<HandshakeTiming> = {}): HandshakeTiming => ({
  usernamePromptMs: timing.usernamePromptMs ?? DEFAULT_USERNAME_PROMPT_TIMEOUT_MS,
  passwordPromptMs: timing.passwordPromptMs ?? DEFAULT_PASSWORD_PROMPT_TIMEOUT_MS,
  resultMs: timing.resultMs ?? DEFAULT_RESULT_TIMEOUT_MS,
  challengeMs: timing.challengeMs ?? DEFAULT_CHALLENGE_TIMEOUT_MS
});

type Step = { done: true; outcome: HandshakeOutcome } | { done: false; name: string; line: string };

/**
 * Drives the client's login dialogue: username, password, an optional
 * challenge code, then waits for the failure or success anchor.
 */
export const runAuthHandshake = async (options: AuthHandshakeOptions): Promise<HandshakeOutcome> => {
  const { process: child, credentials, signal, logger } = options;
  const timing = resolveHandshakeTiming(options.timing);

  const onUnmatched = (line: string): void => {
    logger.debug("[Handshake] output", { line });
  };

  const expect = async (
    stage: HandshakeStage,
    patterns: readonly AnchorPattern[],
    timeoutMs: number
  ): Promise<Step> => {
    options.onStage?.(stage);
    const result: ExpectResult = await expectPatterns(child, patterns, timeoutMs, { signal, onUnmatched });

    switch (result.kind) {
      case "match":
        return { done: false, name: result.name, line: result.line };
      case "aborted":
        return { done: true, outcome: { kind: "aborted" } };
      case "streamEnded":
        return { done: true, outcome: { kind: "processDied", stage } };
      case "timeout":
        return {
          done: true,
          outcome: child.isAlive() ? { kind: "promptTimeout", stage } : { kind: "processDied", stage }
        };
    }
  };

  // The process may exit between the prompt and the write.
  const send = (stage: HandshakeStage, text: string): HandshakeOutcome | undefined => {
    try {
      child.writeLine(text);
      return undefined;
    } catch (error) {
      if (error instanceof ProcessNotRunningError) {
        return { kind: "processDied", stage };
      }
      throw error;
    }
  };

  const usernameStep = await expect("awaitingUsernamePrompt", [USERNAME_PROMPT], timing.usernamePromptMs);
  if (usernameStep.done) {
    return usernameStep.outcome;
  }
  const usernameFailure = send("awaitingUsernamePrompt", credentials.username);
  if (usernameFailure) {
    return usernameFailure;
  }

  const passwordStep = await expect("awaitingPasswordPrompt", [PASSWORD_PROMPT], timing.passwordPromptMs);
  if (passwordStep.done) {
    return passwordStep.outcome;
  }
  const passwordFailure = send("awaitingPasswordPrompt", credentials.password);
  if (passwordFailure) {
    return passwordFailure;
  }

  let resultStep = await expect(
    "awaitingChallengeOrResult",
    [CHALLENGE_PROMPT, AUTH_FAILURE, CONNECT_SUCCESS],
    timing.resultMs
  );
  if (resultStep.done) {
    return resultStep.outcome;
  }

  if (resultStep.name === CHALLENGE_PROMPT.name) {
    options.onStage?.("awaitingChallengeResponse");
    logger.info("[Handshake] challenge requested");

    const reply = await waitForChallenge(options, resultStep.line, timing.challengeMs);
    if (reply.kind === "timeout") {
      return { kind: "challengeTimeout" };
    }
    if (reply.kind === "aborted") {
      return signal?.aborted ? { kind: "aborted" } : { kind: "processDied", stage: "awaitingChallengeResponse" };
    }

    const codeFailure = send("awaitingChallengeResponse", reply.code.trim());
    if (codeFailure) {
      return codeFailure;
    }

    resultStep = await expect("awaitingFinalResult", [AUTH_FAILURE, CONNECT_SUCCESS], timing.resultMs);
    if (resultStep.done) {
      return resultStep.outcome;
    }
  }

  return resultStep.name === AUTH_FAILURE.name ? { kind: "authFailed", line: resultStep.line } : { kind: "success" };
};

const waitForChallenge = async (
  options: AuthHandshakeOptions,
  prompt: string,
  timeoutMs: number
): Promise<ChallengeWaitResult> => {
  const { process: child, signal } = options;
  const challengeAbort = new AbortController();
  const cancel = (): void => challengeAbort.abort();

  signal?.addEventListener("abort", cancel, { once: true });
  const unsubscribe = child.onExit(cancel);
  if (signal?.aborted || !child.isAlive()) {
    cancel();
  }

  try {
    return await options.requestChallenge(prompt, timeoutMs, challengeAbort.signal);
  } finally {
    signal?.removeEventListener("abort", cancel);
    unsubscribe();
  }
};
