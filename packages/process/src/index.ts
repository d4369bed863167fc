export { LineReader } from "./line-reader";
export type { LineReaderOptions, LineSource, ReadLineResult } from "./line-reader";
export { expectPatterns } from "./pattern-watcher";
export type { AnchorPattern, ExpectOptions, ExpectResult } from "./pattern-watcher";
export { ProcessNotRunningError, ProcessSupervisor, SpawnError } from "./supervisor";
export type {
  ProcessExitInfo,
  ProcessHandle,
  ProcessLauncher,
  ProcessSupervisorLogger,
  ProcessSupervisorOptions,
  SpawnErrorCode,
  SpawnProcessOptions
} from "./supervisor";
