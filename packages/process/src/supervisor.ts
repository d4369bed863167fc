import { spawn, type ChildProcess } from "node:child_process";
import fs from "node:fs";
import type { Readable } from "node:stream";
import { LineReader, type LineReaderOptions, type LineSource, type ReadLineResult } from "./line-reader";

const FORCE_KILL_WAIT_MS = 2000;

export type SpawnErrorCode = "ExecutableNotFound" | "PermissionDenied" | "OSError";

export class SpawnError extends Error {
  constructor(
    readonly code: SpawnErrorCode,
    message: string,
    readonly executablePath: string
  ) {
    super(message);
    this.name = "SpawnError";
  }
}

export class ProcessNotRunningError extends Error {
  constructor(message = "process is not running") {
    super(message);
    this.name = "ProcessNotRunningError";
  }
}

export interface ProcessExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/** Liveness and write capability over one external process; reads go through {@link LineSource}. */
export interface ProcessHandle extends LineSource {
  readonly pid: number | undefined;
  isAlive: () => boolean;
  writeLine: (text: string) => void;
  /** SIGINT first, SIGKILL once `graceMs` passes. No-op when already exited. */
  terminate: (graceMs: number) => Promise<void>;
  onExit: (listener: (info: ProcessExitInfo) => void) => () => void;
}

export interface SpawnProcessOptions {
  /** Copy of the merged output, truncated when the process starts. */
  transcriptPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface ProcessLauncher {
  spawn: (executablePath: string, args: string[], options?: SpawnProcessOptions) => Promise<ProcessHandle>;
}

export interface ProcessSupervisorLogger {
  info: (message: string, metadata?: Record<string, unknown>) => void;
  warn: (message: string, metadata?: Record<string, unknown>) => void;
  debug: (message: string, metadata?: Record<string, unknown>) => void;
}

export interface ProcessSupervisorOptions {
  logger: ProcessSupervisorLogger;
  reader?: LineReaderOptions;
}

const toSpawnError = (error: unknown, executablePath: string): SpawnError => {
  const code = error instanceof Error && "code" in error ? error.code : undefined;
  const message = error instanceof Error ? error.message : String(error);

  if (code === "ENOENT") {
    return new SpawnError("ExecutableNotFound", `VPN client not found: ${executablePath}`, executablePath);
  }

  if (code === "EACCES" || code === "EPERM") {
    return new SpawnError("PermissionDenied", `VPN client is not executable: ${executablePath}`, executablePath);
  }

  return new SpawnError("OSError", `Failed to launch VPN client: ${message}`, executablePath);
};

const waitForSpawn = async (child: ChildProcess): Promise<void> => {
  await new Promise<void>((resolve, reject) => {
    const onSpawn = () => {
      cleanup();
      resolve();
    };

    const onError = (error: Error) => {
      cleanup();
      reject(error);
    };

    const cleanup = () => {
      child.off("spawn", onSpawn);
      child.off("error", onError);
    };

    child.once("spawn", onSpawn);
    child.once("error", onError);
  });
};

class ChildProcessHandle implements ProcessHandle {
  private readonly reader: LineReader;
  private readonly exitListeners = new Set<(info: ProcessExitInfo) => void>();
  private readonly exited: Promise<void>;
  private exitInfo: ProcessExitInfo | undefined;
  private openStreams = 2;

  constructor(
    private readonly child: ChildProcess,
    private readonly logger: ProcessSupervisorLogger,
    readerOptions: LineReaderOptions | undefined,
    private readonly transcript: fs.WriteStream | undefined
  ) {
    this.reader = new LineReader(readerOptions);

    this.exited = new Promise<void>((resolve) => {
      child.once("exit", (code, signal) => {
        const info: ProcessExitInfo = { code, signal };
        this.exitInfo = info;
        this.logger.info("[Process] exited", { pid: child.pid, code, signal });
        for (const listener of this.exitListeners) {
          listener(info);
        }
        this.exitListeners.clear();
        resolve();
      });
    });

    child.on("error", (error) => {
      this.logger.warn("[Process] child process error", { pid: child.pid, reason: error.message });
    });

    child.stdin?.on("error", (error) => {
      this.logger.debug("[Process] stdin closed", { pid: child.pid, reason: error.message });
    });

    this.attachOutput(child.stdout);
    this.attachOutput(child.stderr);
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isAlive(): boolean {
    return this.exitInfo === undefined && this.child.exitCode === null && this.child.signalCode === null;
  }

  writeLine(text: string): void {
    const stdin = this.child.stdin;
    if (!this.isAlive() || !stdin || !stdin.writable) {
      throw new ProcessNotRunningError();
    }

    stdin.write(`${text}\n`);
  }

  readLine(deadline: number, signal?: AbortSignal): Promise<ReadLineResult> {
    return this.reader.readLine(deadline, signal);
  }

  async terminate(graceMs: number): Promise<void> {
    if (!this.isAlive()) {
      return;
    }

    this.child.kill("SIGINT");
    if (await this.waitForExit(graceMs)) {
      return;
    }

    this.logger.warn("[Process] graceful stop timed out, killing", { pid: this.child.pid, graceMs });
    this.child.kill("SIGKILL");
    await this.waitForExit(FORCE_KILL_WAIT_MS);
  }

  onExit(listener: (info: ProcessExitInfo) => void): () => void {
    if (this.exitInfo) {
      listener(this.exitInfo);
      return () => undefined;
    }

    this.exitListeners.add(listener);
    return () => {
      this.exitListeners.delete(listener);
    };
  }

  private attachOutput(stream: Readable | null): void {
    if (!stream) {
      this.onStreamClosed();
      return;
    }

    stream.setEncoding("utf8");
    stream.on("data", (chunk: string) => {
      this.transcript?.write(chunk);
      this.reader.push(chunk);
    });
    stream.once("close", () => {
      this.onStreamClosed();
    });
  }

  private onStreamClosed(): void {
    this.openStreams -= 1;
    if (this.openStreams > 0) {
      return;
    }

    this.reader.end();
    this.transcript?.end();
  }

  private async waitForExit(timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      return await Promise.race([
        this.exited.then(() => true),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(false), timeoutMs);
        })
      ]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }
}

export class ProcessSupervisor implements ProcessLauncher {
  private readonly live = new Set<ProcessHandle>();

  constructor(private readonly options: ProcessSupervisorOptions) {}

  /** Number of spawned processes that have not exited yet. */
  get liveCount(): number {
    return this.live.size;
  }

  async spawn(
    executablePath: string,
    args: string[],
    options: SpawnProcessOptions = {}
  ): Promise<ProcessHandle> {
    const { logger } = this.options;
    logger.info("[Process] spawning", { executablePath, args });

    let child: ChildProcess;
    try {
      child = spawn(executablePath, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ["pipe", "pipe", "pipe"],
        // New session on POSIX: no controlling terminal, so console prompts go to the pipes.
        detached: process.platform !== "win32",
        windowsHide: true
      });
      await waitForSpawn(child);
    } catch (error) {
      const spawnError = toSpawnError(error, executablePath);
      logger.warn("[Process] spawn failed", { executablePath, code: spawnError.code, reason: spawnError.message });
      throw spawnError;
    }

    const transcript = options.transcriptPath ? this.openTranscript(options.transcriptPath) : undefined;
    const handle = new ChildProcessHandle(child, logger, this.options.reader, transcript);
    this.live.add(handle);
    handle.onExit(() => {
      this.live.delete(handle);
    });

    logger.info("[Process] spawned", { pid: child.pid });
    return handle;
  }

  private openTranscript(transcriptPath: string): fs.WriteStream {
    const stream = fs.createWriteStream(transcriptPath, { flags: "w", mode: 0o600 });
    stream.on("error", (error) => {
      this.options.logger.warn("[Process] transcript unavailable", { transcriptPath, reason: error.message });
    });
    return stream;
  }
}
