import type { SessionConfig, SessionEvent } from "../../../../../../packages/core/src/index";
import { SpawnError } from "../../../../../../packages/process/src/index";
import { ScriptedLauncher, ScriptedProcess, type ScriptedReply } from "./scripted-process";
import { SessionController, SessionControllerError } from "./session-controller";

const assertTrue = (value: unknown, message: string): void => {
  if (!value) {
    throw new Error(message);
  }
};

const assertEqual = <T>(actual: T, expected: T, message: string): void => {
  if (actual !== expected) {
    throw new Error(`${message}: expected "${String(expected)}", got "${String(actual)}"`);
  }
};

const wait = async (ms: number): Promise<void> => {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
};

const waitUntil = async (condition: () => boolean, message: string, timeoutMs = 2000): Promise<void> => {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`timed out waiting: ${message}`);
    }
    await wait(5);
  }
};

const captureError = async (action: () => Promise<unknown>): Promise<unknown> => {
  try {
    await action();
  } catch (error) {
    return error;
  }
  return undefined;
};

const errorCode = (error: unknown): string => (error instanceof SessionControllerError ? error.code : "none");

const silentLogger = {
  info: () => undefined,
  warn: () => undefined,
  debug: () => undefined
};

const validConfig: SessionConfig = {
  configFilePath: "/etc/openvpn/client.ovpn",
  username: "alice",
  password: "secret",
  executablePath: "/usr/sbin/openvpn"
};

/** Prompts for username and password; `afterPassword` and `afterCode` script the rest. */
const openvpnScript =
  (afterPassword: ScriptedReply, afterCode?: ScriptedReply) => (): ScriptedProcess => {
    const process = new ScriptedProcess((text, p) => {
      if (text === "alice") {
        p.emit("Enter Auth Password:");
      } else if (text === "secret") {
        afterPassword(text, p);
      } else {
        afterCode?.(text, p);
      }
    });
    process.emit("Enter Auth Username:");
    return process;
  };

const connectsDirectly = openvpnScript((_text, p) => p.emit("Initialization Sequence Completed\n"));

const createHarness = (createProcess: () => ScriptedProcess, overrides: { fileExists?: boolean; challengeMs?: number } = {}) => {
  const events: SessionEvent[] = [];
  const sampler = { starts: 0, stops: 0 };
  const launcher = new ScriptedLauncher(createProcess);
  const controller = new SessionController({
    launcher,
    publish: (event) => events.push(event),
    sampler: {
      start: async () => {
        sampler.starts += 1;
      },
      stop: () => {
        sampler.stops += 1;
      }
    },
    resolveTunnelAddress: () => "10.8.0.6",
    logger: silentLogger,
    transcriptPath: "/tmp/tunnelpilot-test/session-transcript.log",
    fileExists: async () => overrides.fileExists ?? true,
    timing: {
      handshake: {
        usernamePromptMs: 2000,
        passwordPromptMs: 2000,
        resultMs: 2000,
        challengeMs: overrides.challengeMs ?? 2000
      },
      stopGraceMs: 100,
      livenessPollMs: 50
    }
  });

  const statuses = (): string[] =>
    events.flatMap((event) => (event.type === "stateChanged" ? [event.state.status] : []));

  return { controller, launcher, events, sampler, statuses };
};

await (async () => {
  const { controller, launcher, events } = createHarness(connectsDirectly);
  const invalid: SessionConfig[] = [
    { ...validConfig, username: "" },
    { ...validConfig, username: "   " },
    { ...validConfig, password: "" },
    { ...validConfig, configFilePath: "" },
    { ...validConfig, configFilePath: "None" },
    { ...validConfig, configFilePath: "None. Choose a ovpn file..." }
  ];

  for (const config of invalid) {
    const error = await captureError(() => controller.start(config));
    assertEqual(errorCode(error), "InvalidConfig", `invalid config rejected: ${JSON.stringify(config)}`);
  }
  assertEqual(launcher.spawns.length, 0, "nothing is spawned for invalid input");
  assertEqual(events.length, 0, "no state change for invalid input");
  assertEqual(controller.currentState.status, "idle", "controller stays idle");

  const passwordError = await captureError(() => controller.start({ ...validConfig, password: "" }));
  assertEqual(
    passwordError instanceof Error ? passwordError.message : "",
    "Session start: password: password is required",
    "validation message names the field"
  );
})();

await (async () => {
  const { controller, launcher } = createHarness(connectsDirectly, { fileExists: false });
  const error = await captureError(() => controller.start(validConfig));
  assertEqual(errorCode(error), "InvalidConfig", "missing config file is rejected");
  assertEqual(launcher.spawns.length, 0, "nothing is spawned for a missing config file");
})();

await (async () => {
  const { controller, launcher, events, sampler, statuses } = createHarness(
    openvpnScript(
      (_text, p) => p.emit("CHALLENGE: Enter code\n"),
      (_text, p) => p.emit("Initialization Sequence Completed\n")
    )
  );

  await controller.start(validConfig);
  assertEqual(launcher.spawns.length, 1, "one process is spawned");
  assertEqual(launcher.spawns[0]?.executablePath, "/usr/sbin/openvpn", "configured executable is used");
  assertEqual(launcher.spawns[0]?.args.join(" "), "--config /etc/openvpn/client.ovpn", "config file is passed");
  assertEqual(
    launcher.spawns[0]?.options?.transcriptPath,
    "/tmp/tunnelpilot-test/session-transcript.log",
    "transcript path is passed to the launcher"
  );

  await waitUntil(() => controller.currentState.status === "awaitingChallenge", "challenge state");
  const challenge = events.find((event) => event.type === "challengeRequested");
  assertEqual(challenge?.type === "challengeRequested" ? challenge.prompt : "", "CHALLENGE: Enter code", "challenge event");

  const emptyError = await captureError(() => controller.supplyChallengeResponse("   "));
  assertEqual(errorCode(emptyError), "EmptyChallenge", "blank code is rejected");
  assertEqual(controller.currentState.status, "awaitingChallenge", "blank code leaves the challenge open");

  await controller.supplyChallengeResponse("123456");
  await waitUntil(() => controller.currentState.status === "connected", "connected state");

  const process = launcher.processes[0];
  assertEqual(process?.written.join(","), "alice,secret,123456", "dialogue answers are sent in order");
  assertEqual(statuses().join(","), "starting,awaitingChallenge,starting,connected", "state sequence");
  assertEqual(sampler.starts, 1, "traffic sampler starts on connect");
  const address = events.find((event) => event.type === "vpnAssignedAddress");
  assertEqual(address?.type === "vpnAssignedAddress" ? address.address : "", "10.8.0.6", "tunnel address is published");

  const secondStart = await captureError(() => controller.start(validConfig));
  assertEqual(errorCode(secondStart), "AlreadyActive", "second start is rejected");
  assertEqual(launcher.spawns.length, 1, "no second process is spawned");
  assertEqual(launcher.liveCount, 1, "exactly one live process");

  const lateCode = await captureError(() => controller.supplyChallengeResponse("999999"));
  assertEqual(errorCode(lateCode), "NotAwaitingChallenge", "code outside a challenge is rejected");

  await controller.stop();
  const afterFirstStop = events.length;
  await controller.stop();
  assertEqual(controller.currentState.status, "disconnected", "stop leaves the session disconnected");
  assertEqual(events.length, afterFirstStop, "second stop publishes nothing");
  assertEqual(process?.isAlive(), false, "process is terminated on stop");
  assertEqual(launcher.liveCount, 0, "no live process after stop");
  assertTrue(sampler.stops >= 1, "traffic sampler stops with the session");
  assertEqual(statuses().slice(-2).join(","), "disconnecting,disconnected", "stop transitions");
})();

await (async () => {
  const { controller, launcher, sampler } = createHarness(
    openvpnScript((_text, p) => p.emit("AUTH: Received control message: AUTH_FAILED\n"))
  );

  await controller.start(validConfig);
  await waitUntil(() => controller.currentState.status === "failed", "failed state");

  const state = controller.currentState;
  assertEqual(state.status === "failed" ? state.reason : "", "AuthFailed", "failure reason");
  assertEqual(launcher.processes[0]?.isAlive(), false, "process is terminated after auth failure");
  assertEqual(launcher.processes[0]?.terminateCalls, 1, "terminate was requested");
  assertEqual(sampler.starts, 0, "sampler never started");

  await controller.start(validConfig);
  assertEqual(launcher.spawns.length, 2, "a failed session can be retried");
  await controller.stop();
})();

await (async () => {
  const { controller, launcher, sampler } = createHarness(connectsDirectly);
  await controller.start(validConfig);
  await waitUntil(() => controller.currentState.status === "connected", "connected state");

  const startedAt = Date.now();
  launcher.processes[0]?.exit({ code: 1, signal: null });
  await waitUntil(() => controller.currentState.status === "failed", "crash detected", 1000);
  assertTrue(Date.now() - startedAt <= 500, "crash is noticed within the liveness window");

  const state = controller.currentState;
  assertEqual(state.status === "failed" ? state.reason : "", "ProcessTerminatedUnexpectedly", "crash reason");
  assertEqual(
    state.status === "failed" ? state.message : "",
    "OpenVPN process terminated unexpectedly (exit code 1).",
    "crash message"
  );
  assertTrue(sampler.stops >= 1, "sampler stops after a crash");

  await controller.stop();
  assertEqual(controller.currentState.status, "failed", "stop after a crash is a no-op");
})();

await (async () => {
  const { controller, launcher } = createHarness(connectsDirectly);
  launcher.spawnError = new SpawnError("ExecutableNotFound", "VPN client not found: /usr/sbin/openvpn", "/usr/sbin/openvpn");

  const error = await captureError(() => controller.start(validConfig));
  assertTrue(error instanceof SpawnError, "spawn error reaches the caller");
  const state = controller.currentState;
  assertEqual(state.status === "failed" ? state.reason : "", "SpawnFailed", "spawn failure state");
  assertEqual(state.status === "failed" ? state.message : "", "VPN client not found: /usr/sbin/openvpn", "spawn failure message");
})();

await (async () => {
  const { controller, launcher } = createHarness(() => new ScriptedProcess());
  await controller.start(validConfig);
  await controller.stop();
  assertEqual(controller.currentState.status, "disconnected", "stop during login disconnects");
  assertEqual(launcher.processes[0]?.isAlive(), false, "process is terminated");

  await wait(50);
  assertEqual(controller.currentState.status, "disconnected", "cancelled handshake reports nothing afterwards");
})();

await (async () => {
  const { controller, launcher } = createHarness(
    openvpnScript((_text, p) => p.emit("CHALLENGE: Enter code\n"))
  );
  await controller.start(validConfig);
  await waitUntil(() => controller.currentState.status === "awaitingChallenge", "challenge state");
  await controller.stop();
  assertEqual(controller.currentState.status, "disconnected", "stop while waiting for a code");
  assertEqual(launcher.processes[0]?.isAlive(), false, "process is terminated");
})();

await (async () => {
  const events: SessionEvent[] = [];
  const launcher = new ScriptedLauncher(() => new ScriptedProcess());
  const controller = new SessionController({
    launcher,
    publish: (event) => events.push(event),
    sampler: { start: async () => undefined, stop: () => undefined },
    resolveTunnelAddress: () => "",
    logger: silentLogger,
    fileExists: async () => true,
    timing: { handshake: { usernamePromptMs: 50 }, stopGraceMs: 100 }
  });

  await controller.start(validConfig);
  await waitUntil(() => controller.currentState.status === "failed", "prompt timeout");
  const state = controller.currentState;
  assertEqual(state.status === "failed" ? state.reason : "", "PromptTimeout", "missing prompt fails the session");
  assertEqual(launcher.processes[0]?.isAlive(), false, "process is terminated after a timeout");
})();

await (async () => {
  const { controller, launcher, sampler } = createHarness(
    openvpnScript((_text, p) => p.emit("CHALLENGE: Enter code\n")),
    { challengeMs: 50 }
  );
  await controller.start(validConfig);
  await waitUntil(() => controller.currentState.status === "failed", "challenge expiry");

  const state = controller.currentState;
  assertEqual(state.status === "failed" ? state.reason : "", "ChallengeTimeout", "unanswered challenge fails the session");
  assertEqual(launcher.processes[0]?.isAlive(), false, "process is terminated after the challenge expires");
  assertEqual(sampler.starts, 0, "sampler never started");

  const lateCode = await captureError(() => controller.supplyChallengeResponse("123456"));
  assertEqual(errorCode(lateCode), "NotAwaitingChallenge", "code after expiry is rejected");
})();

await (async () => {
  const { controller, launcher, sampler } = createHarness(() => {
    const process = new ScriptedProcess(() => {
      throw new Error("stdin pipe broken");
    });
    process.emit("Enter Auth Username:");
    return process;
  });
  await controller.start(validConfig);
  await waitUntil(() => controller.currentState.status === "failed", "handshake error");

  const state = controller.currentState;
  assertEqual(state.status === "failed" ? state.reason : "", "HandshakeError", "unexpected error fails the session");
  assertEqual(state.status === "failed" ? state.message : "", "stdin pipe broken", "error message is kept");
  assertEqual(launcher.processes[0]?.isAlive(), false, "process is terminated after an unexpected error");
  assertEqual(launcher.liveCount, 0, "no live process after an unexpected error");
  assertEqual(sampler.starts, 0, "sampler never started");

  await controller.start(validConfig);
  assertEqual(launcher.spawns.length, 2, "session can be retried after an unexpected error");
  await controller.stop();
})();
