import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import {
  describeSessionState,
  formatMegabytes,
  type SessionEvent
} from "../../../../packages/core/src/index";
import { normalizeError } from "../../../../packages/shared/src/index";
import { resolveRuntimeConfig } from "./config";
import { configureLogFile, logger } from "./logger";
import { createPrompt, type Prompt } from "./prompt";
import { createServiceContainer, type ServiceContainer } from "./services/container";

const USAGE = "Usage: tunnelpilot --config <file.ovpn> [--username <name>] [--remember | --forget]";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const appRoot = path.resolve(__dirname, "..", "..");

const renderEvent = (event: SessionEvent): void => {
  switch (event.type) {
    case "stateChanged":
      console.log(`[${event.at}] ${describeSessionState(event.state)}`);
      return;
    case "trafficUpdated":
      console.log(
        `Sent: ${formatMegabytes(event.sample.sentDeltaBytes)}  Received: ${formatMegabytes(event.sample.recvDeltaBytes)}`
      );
      return;
    case "vpnAssignedAddress":
      console.log(event.address ? `VPN IP: ${event.address}` : "VPN IP: unavailable");
      return;
    case "challengeRequested":
      console.log(event.prompt);
      return;
    case "warning":
      console.warn(`Warning (${event.source}): ${event.message}`);
      return;
  }
};

/** Presentation loop: the only reader of the event channel. */
const runEventLoop = async (services: ServiceContainer, prompt: Prompt): Promise<boolean> => {
  for (;;) {
    const event = await services.events.next();
    if (!event) {
      return false;
    }

    renderEvent(event);

    if (event.type === "challengeRequested") {
      const code = await prompt.ask("Verification code: ");
      if (code === undefined) {
        continue;
      }
      try {
        await services.supplyChallengeResponse(code);
      } catch (error) {
        console.error(normalizeError(error));
      }
      continue;
    }

    if (event.type === "stateChanged") {
      if (event.state.status === "failed") {
        return false;
      }
      if (event.state.status === "disconnected") {
        return true;
      }
    }
  }
};

const main = async (): Promise<number> => {
  const { values } = parseArgs({
    options: {
      config: { type: "string", short: "c" },
      username: { type: "string", short: "u" },
      remember: { type: "boolean" },
      forget: { type: "boolean" },
      help: { type: "boolean", short: "h" }
    }
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const config = resolveRuntimeConfig({
    env: process.env,
    platform: process.platform,
    appRoot,
    fileExists: (filePath) => fs.existsSync(filePath)
  });
  configureLogFile(config.configDir);
  logger.info("[App] starting", { configDir: config.configDir, executablePath: config.executablePath });

  const services = createServiceContainer({ config, logger });
  const settings = await services.loadSettings();
  const prompt = createPrompt({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY === true });

  const shutdown = (): void => {
    prompt.cancel();
    services.stopSession().catch((error: unknown) => {
      logger.warn("[App] stop failed", { reason: normalizeError(error) });
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  prompt.onInterrupt(shutdown);

  try {
    const username = values.username ?? (settings.savedUsername || (await prompt.ask("Username: ")));
    if (username === undefined) {
      return 1;
    }
    const savedPassword = username === settings.savedUsername ? settings.savedPassword : "";
    const password = savedPassword || (await prompt.askSecret("Password: "));
    if (password === undefined) {
      return 1;
    }
    const rememberCredentials = values.remember ? true : values.forget ? false : settings.rememberCredentials;

    try {
      await services.startSession({
        configFilePath: values.config ? path.resolve(values.config) : "",
        username,
        password,
        rememberCredentials
      });
    } catch (error) {
      console.error(normalizeError(error));
      if (!values.config) {
        console.error(USAGE);
      }
      return 1;
    }

    return (await runEventLoop(services, prompt)) ? 0 : 1;
  } finally {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
    prompt.close();
    await services.dispose();
  }
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.warn("[App] fatal error", { reason: normalizeError(error) });
    console.error(normalizeError(error));
    process.exitCode = 1;
  });
