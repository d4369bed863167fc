import fs from "node:fs/promises";
import {
  canStartSession,
  createFailedState,
  createSessionState,
  isSessionActive,
  type FailureReason,
  type SessionConfig,
  type SessionEvent,
  type SessionState
} from "../../../../../../packages/core/src/index";
import type {
  ProcessExitInfo,
  ProcessHandle,
  ProcessLauncher,
  ReadLineResult
} from "../../../../../../packages/process/src/index";
import {
  ContractValidationError,
  challengeResponseSchema,
  normalizeError,
  parsePayload,
  sessionStartSchema
} from "../../../../../../packages/shared/src/index";
import { SerialExecutor } from "../serial-executor";
import { runAuthHandshake, type HandshakeOutcome, type HandshakeTiming } from "./auth-handshake";
import { ChallengeGate, type ChallengeWaitResult } from "./challenge-gate";

const DEFAULT_STOP_GRACE_MS = 10_000;
const DEFAULT_LIVENESS_POLL_MS = 1000;

export type SessionControllerErrorCode = "AlreadyActive" | "EmptyChallenge" | "NotAwaitingChallenge" | "InvalidConfig";

export class SessionControllerError extends Error {
  constructor(
    readonly code: SessionControllerErrorCode,
    message: string
  ) {
    super(message);
    this.name = "SessionControllerError";
  }
}

export interface SessionControllerLogger {
  info: (message: string, metadata?: Record<string, unknown>) => void;
  warn: (message: string, metadata?: Record<string, unknown>) => void;
  debug: (message: string, metadata?: Record<string, unknown>) => void;
}

/** The part of the traffic sampler a session drives. */
export interface SessionTrafficSampler {
  start: () => Promise<void>;
  stop: () => void;
}

export interface SessionControllerOptions {
  launcher: ProcessLauncher;
  publish: (event: SessionEvent) => void;
  sampler: SessionTrafficSampler;
  resolveTunnelAddress: () => string;
  logger: SessionControllerLogger;
  transcriptPath?: string;
  fileExists?: (filePath: string) => Promise<boolean>;
  now?: () => Date;
  timing?: {
    handshake?: Partial<HandshakeTiming>;
    stopGraceMs?: number;
    livenessPollMs?: number;
  };
}

interface ActiveSession {
  generation: number;
  handle: ProcessHandle;
  /** Aborted by stop: cancels any wait the handshake or the watchdog is in. */
  abort: AbortController;
  exitInfo: ProcessExitInfo | undefined;
  unsubscribeExit: () => void;
}

const isRegularFile = async (filePath: string): Promise<boolean> => {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
};

const FAILURE_BY_OUTCOME: Record<Exclude<HandshakeOutcome["kind"], "success" | "aborted">, FailureReason> = {
  authFailed: "AuthFailed",
  promptTimeout: "PromptTimeout",
  challengeTimeout: "ChallengeTimeout",
  processDied: "ProcessDied"
};

const describeOutcome = (outcome: HandshakeOutcome): string => {
  switch (outcome.kind) {
    case "authFailed":
      return "Authentication failed. Please check your credentials.";
    case "promptTimeout":
      return `No response from the VPN client (${outcome.stage})`;
    case "challengeTimeout":
      return "No verification code was entered in time";
    case "processDied":
      return `The VPN client exited during login (${outcome.stage})`;
    case "success":
    case "aborted":
      return "";
  }
};

const describeExit = (info: ProcessExitInfo | undefined): string => {
  if (!info) {
    return "OpenVPN process terminated unexpectedly.";
  }
  const detail = info.signal ? `signal ${info.signal}` : `exit code ${String(info.code)}`;
  return `OpenVPN process terminated unexpectedly (${detail}).`;
};

/**
 * Owns the one VPN session of the application. Public methods are serialized;
 * the handshake and the liveness watchdog run in the background and report
 * back through the same queue, so state only changes inside it.
 */
export class SessionController {
  private readonly stopGraceMs: number;
  private readonly livenessPollMs: number;
  private readonly fileExists: (filePath: string) => Promise<boolean>;
  private readonly now: () => Date;
  private readonly executor = new SerialExecutor();
  private readonly challengeGate = new ChallengeGate();

  private state: SessionState = createSessionState("idle");
  private generation = 0;
  private session: ActiveSession | undefined;

  constructor(private readonly options: SessionControllerOptions) {
    this.stopGraceMs = options.timing?.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
    this.livenessPollMs = options.timing?.livenessPollMs ?? DEFAULT_LIVENESS_POLL_MS;
    this.fileExists = options.fileExists ?? isRegularFile;
    this.now = options.now ?? (() => new Date());
  }

  get currentState(): SessionState {
    return this.state;
  }

  /**
   * Validates, spawns the client and returns once the handshake is under way.
   * Rejects only for caller errors and spawn failures; the handshake result
   * arrives as `stateChanged` events.
   */
  start(config: SessionConfig): Promise<void> {
    return this.executor.run(async () => {
      if (!canStartSession(this.state)) {
        throw new SessionControllerError("AlreadyActive", `A session is already ${this.state.status}`);
      }

      const validated = this.validateConfig(config);
      if (!(await this.fileExists(validated.configFilePath))) {
        throw new SessionControllerError(
          "InvalidConfig",
          `Session start: configFilePath: config file not found: ${validated.configFilePath}`
        );
      }

      const generation = this.bumpGeneration();
      this.transition(createSessionState("starting"));
      this.options.logger.info("[Session] starting", {
        executablePath: validated.executablePath,
        configFilePath: validated.configFilePath,
        username: validated.username
      });

      let handle: ProcessHandle;
      try {
        handle = await this.options.launcher.spawn(
          validated.executablePath,
          ["--config", validated.configFilePath],
          { transcriptPath: this.options.transcriptPath }
        );
      } catch (error) {
        const message = normalizeError(error);
        this.options.logger.warn("[Session] spawn failed", { reason: message });
        this.transition(createFailedState("SpawnFailed", message));
        throw error;
      }

      const session: ActiveSession = {
        generation,
        handle,
        abort: new AbortController(),
        exitInfo: undefined,
        unsubscribeExit: () => undefined
      };
      session.unsubscribeExit = handle.onExit((info) => {
        session.exitInfo = info;
      });
      this.session = session;

      void this.runHandshake(session, { username: validated.username, password: validated.password });
    });
  }

  /** Hands the verification code to the waiting handshake. */
  supplyChallengeResponse(code: string): Promise<void> {
    return this.executor.run(async () => {
      let trimmed: string;
      try {
        trimmed = parsePayload(challengeResponseSchema, code, "Verification code");
      } catch (error) {
        throw new SessionControllerError("EmptyChallenge", normalizeError(error));
      }

      if (this.state.status !== "awaitingChallenge" || !this.challengeGate.resolve(trimmed)) {
        throw new SessionControllerError("NotAwaitingChallenge", "No verification code is being requested");
      }

      this.transition(createSessionState("starting"));
    });
  }

  /** Ends the session. A no-op when nothing is running. */
  stop(): Promise<void> {
    return this.executor.run(async () => {
      const session = this.session;
      if (!session || !isSessionActive(this.state)) {
        return;
      }

      this.bumpGeneration();
      this.transition(createSessionState("disconnecting"));
      this.options.logger.info("[Session] stopping", { pid: session.handle.pid });

      session.abort.abort();
      await this.releaseSession(session);
      this.transition(createSessionState("disconnected"));
      this.options.logger.info("[Session] disconnected");
    });
  }

  private validateConfig(config: SessionConfig): SessionConfig {
    try {
      return parsePayload(sessionStartSchema, config, "Session start");
    } catch (error) {
      if (error instanceof ContractValidationError) {
        throw new SessionControllerError("InvalidConfig", error.message);
      }
      throw error;
    }
  }

  private bumpGeneration(): number {
    this.generation += 1;
    return this.generation;
  }

  private isGenerationActive(generation: number): boolean {
    return generation === this.generation && isSessionActive(this.state);
  }

  private transition(next: SessionState): void {
    this.state = next;
    this.options.publish({ type: "stateChanged", state: next, at: this.now().toISOString() });
  }

  private async runHandshake(
    session: ActiveSession,
    credentials: { username: string; password: string }
  ): Promise<void> {
    let outcome: HandshakeOutcome | undefined;
    let failure: string | undefined;
    try {
      outcome = await runAuthHandshake({
        process: session.handle,
        credentials,
        signal: session.abort.signal,
        logger: this.options.logger,
        timing: this.options.timing?.handshake,
        onStage: (stage) => {
          this.options.logger.debug("[Session] handshake stage", { stage });
        },
        requestChallenge: (prompt, timeoutMs, signal) =>
          this.requestChallenge(session.generation, prompt, timeoutMs, signal)
      });
    } catch (error) {
      failure = normalizeError(error);
    }

    try {
      await this.executor.run(() => this.completeHandshake(session, outcome, failure));
    } catch (error) {
      this.options.logger.warn("[Session] failed to settle handshake", { reason: normalizeError(error) });
    }
  }

  private async requestChallenge(
    generation: number,
    prompt: string,
    timeoutMs: number,
    signal: AbortSignal
  ): Promise<ChallengeWaitResult> {
    const accepted = await this.executor.run(async () => {
      if (!this.isGenerationActive(generation) || signal.aborted) {
        return false;
      }
      this.transition(createSessionState("awaitingChallenge"));
      this.options.publish({ type: "challengeRequested", prompt });
      return true;
    });

    if (!accepted) {
      return { kind: "aborted" };
    }
    return this.challengeGate.wait(timeoutMs, signal);
  }

  private async completeHandshake(
    session: ActiveSession,
    outcome: HandshakeOutcome | undefined,
    failure: string | undefined
  ): Promise<void> {
    if (!this.isGenerationActive(session.generation)) {
      return;
    }

    if (!outcome) {
      await this.failHandshake(session, "HandshakeError", failure ?? "");
      return;
    }

    switch (outcome.kind) {
      case "aborted":
        return;
      case "success":
        this.transition(createSessionState("connected"));
        this.options.logger.info("[Session] connected", { pid: session.handle.pid });
        await this.startSampler();
        this.options.publish({ type: "vpnAssignedAddress", address: this.lookupTunnelAddress() });
        void this.watchProcess(session);
        return;
      default:
        await this.failHandshake(session, FAILURE_BY_OUTCOME[outcome.kind], describeOutcome(outcome));
    }
  }

  private async failHandshake(session: ActiveSession, reason: FailureReason, message: string): Promise<void> {
    this.bumpGeneration();
    this.options.logger.warn("[Session] handshake failed", { reason, message });
    await this.releaseSession(session);
    this.transition(createFailedState(reason, message));
  }

  private async startSampler(): Promise<void> {
    try {
      await this.options.sampler.start();
    } catch (error) {
      this.options.logger.warn("[Session] traffic sampler failed to start", { reason: normalizeError(error) });
    }
  }

  private lookupTunnelAddress(): string {
    try {
      return this.options.resolveTunnelAddress();
    } catch (error) {
      this.options.logger.debug("[Session] tunnel address unavailable", { reason: normalizeError(error) });
      return "";
    }
  }

  /** Drains output while connected and notices the process going away within one poll interval. */
  private async watchProcess(session: ActiveSession): Promise<void> {
    const { handle, abort } = session;

    while (this.isGenerationActive(session.generation)) {
      let result: ReadLineResult;
      try {
        result = await handle.readLine(Date.now() + this.livenessPollMs, abort.signal);
      } catch (error) {
        this.options.logger.warn("[Session] output watch stopped", { reason: normalizeError(error) });
        return;
      }
      if (result.kind === "aborted") {
        return;
      }
      if (result.kind === "line") {
        this.options.logger.debug("[Session] output", { line: result.line });
        continue;
      }
      if (result.kind === "timeout" && handle.isAlive()) {
        continue;
      }

      try {
        await this.executor.run(() => this.failUnexpectedly(session));
      } catch (error) {
        this.options.logger.warn("[Session] failed to settle process exit", { reason: normalizeError(error) });
      }
      return;
    }
  }

  private async failUnexpectedly(session: ActiveSession): Promise<void> {
    if (!this.isGenerationActive(session.generation) || this.state.status !== "connected") {
      return;
    }

    this.bumpGeneration();
    const message = describeExit(session.exitInfo);
    this.options.logger.warn("[Session] process terminated unexpectedly", {
      pid: session.handle.pid,
      code: session.exitInfo?.code,
      signal: session.exitInfo?.signal
    });
    await this.releaseSession(session);
    this.transition(createFailedState("ProcessTerminatedUnexpectedly", message));
  }

  /** Stops the sampler and the process; safe on an already dead process. */
  private async releaseSession(session: ActiveSession): Promise<void> {
    if (this.session === session) {
      this.session = undefined;
    }
    this.options.sampler.stop();
    session.abort.abort();
    try {
      await session.handle.terminate(this.stopGraceMs);
    } finally {
      session.unsubscribeExit();
    }
  }
}
