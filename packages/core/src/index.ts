export type Theme = "dark" | "light";

export type FailureReason =
  | "SpawnFailed"
  | "AuthFailed"
  | "PromptTimeout"
  | "ChallengeTimeout"
  | "ProcessDied"
  | "ProcessTerminatedUnexpectedly"
  | "HandshakeError";

export type SessionStatus =
  | "idle"
  | "starting"
  | "awaitingChallenge"
  | "connected"
  | "disconnecting"
  | "failed"
  | "disconnected";

export type SessionState =
  | { readonly status: "idle" }
  | { readonly status: "starting" }
  | { readonly status: "awaitingChallenge" }
  | { readonly status: "connected" }
  | { readonly status: "disconnecting" }
  | { readonly status: "failed"; readonly reason: FailureReason; readonly message: string }
  | { readonly status: "disconnected" };

/** Inputs for one start attempt; frozen once the session begins. */
export interface SessionConfig {
  configFilePath: string;
  username: string;
  password: string;
  executablePath: string;
}

export interface TrafficSample {
  sentDeltaBytes: number;
  recvDeltaBytes: number;
  timestamp: string;
}

export interface NetworkCounters {
  bytesSent: number;
  bytesRecv: number;
}

export type SessionEvent =
  | { type: "stateChanged"; state: SessionState; at: string }
  | { type: "challengeRequested"; prompt: string }
  | { type: "trafficUpdated"; sample: TrafficSample }
  | { type: "vpnAssignedAddress"; address: string }
  | { type: "warning"; source: string; message: string };

/** Decrypted, in-memory view of the persisted state file. */
export interface AppSettings {
  showSplash: boolean;
  theme: Theme;
  rememberCredentials: boolean;
  savedUsername: string;
  savedPassword: string;
}

export const DEFAULT_APP_SETTINGS: Readonly<AppSettings> = Object.freeze({
  showSplash: true,
  theme: "dark",
  rememberCredentials: false,
  savedUsername: "",
  savedPassword: ""
});

/** States in which a session owns a live process. */
const ACTIVE_STATUSES: ReadonlySet<SessionStatus> = new Set<SessionStatus>([
  "starting",
  "awaitingChallenge",
  "connected",
  "disconnecting"
]);

export const isSessionActive = (state: SessionState): boolean => ACTIVE_STATUSES.has(state.status);

export const canStartSession = (state: SessionState): boolean =>
  state.status === "idle" || state.status === "disconnected" || state.status === "failed";

export const createSessionState = (
  status: Exclude<SessionStatus, "failed">
): SessionState => Object.freeze({ status });

export const createFailedState = (reason: FailureReason, message: string): SessionState =>
  Object.freeze({ status: "failed", reason, message });

const FAILURE_LABELS: Record<FailureReason, string> = {
  SpawnFailed: "could not launch the VPN client",
  AuthFailed: "authentication failed",
  PromptTimeout: "the VPN client stopped responding during login",
  ChallengeTimeout: "no verification code was supplied in time",
  ProcessDied: "the VPN client exited during login",
  ProcessTerminatedUnexpectedly: "the VPN client terminated unexpectedly",
  HandshakeError: "login could not be completed"
};

export const describeSessionState = (state: SessionState): string => {
  switch (state.status) {
    case "idle":
      return "Idle";
    case "starting":
      return "Connecting...";
    case "awaitingChallenge":
      return "Waiting for verification code";
    case "connected":
      return "Connected";
    case "disconnecting":
      return "Disconnecting...";
    case "disconnected":
      return "Disconnected";
    case "failed": {
      const label = FAILURE_LABELS[state.reason];
      return state.message ? `Failed: ${label} (${state.message})` : `Failed: ${label}`;
    }
  }
};

export const formatMegabytes = (bytes: number): string => {
  const safe = Number.isFinite(bytes) && bytes > 0 ? bytes : 0;
  return `${(safe / (1024 * 1024)).toFixed(2)} MB`;
};
