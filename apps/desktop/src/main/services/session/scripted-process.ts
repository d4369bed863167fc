import {
  LineReader,
  ProcessNotRunningError,
  SpawnError,
  type ProcessExitInfo,
  type ProcessHandle,
  type ProcessLauncher,
  type ReadLineResult,
  type SpawnProcessOptions
} from "../../../../../../packages/process/src/index";

export type ScriptedReply = (text: string, process: ScriptedProcess) => void;

/** In-process stand-in for the VPN client used by tests: output is pushed by hand, writes trigger `onWrite`. */
export class ScriptedProcess implements ProcessHandle {
  readonly pid = 4242;
  readonly written: string[] = [];
  terminateCalls = 0;

  private readonly reader = new LineReader({ partialLineFlushMs: 10 });
  private readonly exitListeners = new Set<(info: ProcessExitInfo) => void>();
  private exitInfo: ProcessExitInfo | undefined;

  constructor(private readonly onWrite: ScriptedReply = () => undefined) {}

  emit(text: string): void {
    this.reader.push(text);
  }

  isAlive(): boolean {
    return this.exitInfo === undefined;
  }

  readLine(deadline: number, signal?: AbortSignal): Promise<ReadLineResult> {
    return this.reader.readLine(deadline, signal);
  }

  writeLine(text: string): void {
    if (!this.isAlive()) {
      throw new ProcessNotRunningError();
    }
    this.written.push(text);
    this.onWrite(text, this);
  }

  async terminate(): Promise<void> {
    this.terminateCalls += 1;
    this.exit({ code: 0, signal: "SIGINT" });
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

  /** Simulates the process going away on its own. */
  exit(info: ProcessExitInfo = { code: 1, signal: null }): void {
    if (this.exitInfo) {
      return;
    }
    this.exitInfo = info;
    this.reader.end();
    for (const listener of this.exitListeners) {
      listener(info);
    }
    this.exitListeners.clear();
  }
}

export interface SpawnRecord {
  executablePath: string;
  args: string[];
  options: SpawnProcessOptions | undefined;
}

export class ScriptedLauncher implements ProcessLauncher {
  readonly spawns: SpawnRecord[] = [];
  readonly processes: ScriptedProcess[] = [];
  spawnError: SpawnError | undefined;

  constructor(private readonly createProcess: () => ScriptedProcess) {}

  get liveCount(): number {
    return this.processes.filter((process) => process.isAlive()).length;
  }

  async spawn(executablePath: string, args: string[], options?: SpawnProcessOptions): Promise<ProcessHandle> {
    this.spawns.push({ executablePath, args, options });
    if (this.spawnError) {
      throw this.spawnError;
    }
    const process = this.createProcess();
    this.processes.push(process);
    return process;
  }
}
