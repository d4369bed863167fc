import os from "node:os";
import type { AppSettings, SessionEvent, SessionState } from "../../../../../packages/core/src/index";
import { ProcessSupervisor } from "../../../../../packages/process/src/index";
import {
  FileKeyStore,
  KeyringKeyStore,
  SecretVault,
  resolveKeyAccount,
  type KeyStore
} from "../../../../../packages/security/src/index";
import { normalizeError } from "../../../../../packages/shared/src/index";
import { SettingsStore } from "../../../../../packages/storage/src/index";
import type { RuntimeConfig } from "../config";
import { EventChannel } from "./event-channel";
import { createNetworkCounterReader } from "./monitor/network-counter-source";
import { TrafficSampler } from "./monitor/traffic-sampler";
import { resolveTunnelAddress } from "./monitor/tunnel-address";
import { SessionController } from "./session/session-controller";

const EVENT_CHANNEL_CAPACITY = 256;

export interface ContainerLogger {
  info: (message: string, metadata?: Record<string, unknown>) => void;
  warn: (message: string, metadata?: Record<string, unknown>) => void;
  debug: (message: string, metadata?: Record<string, unknown>) => void;
}

export interface CreateServiceContainerOptions {
  config: RuntimeConfig;
  logger: ContainerLogger;
  platform?: NodeJS.Platform;
}

export interface StartSessionInput {
  configFilePath: string;
  username: string;
  password: string;
  rememberCredentials: boolean;
}

export interface ServiceContainer {
  /** Drained by the presentation loop only. */
  events: EventChannel<SessionEvent>;
  keyStoreKind: KeyStore["kind"];
  getSessionState: () => SessionState;
  loadSettings: () => Promise<AppSettings>;
  saveSettings: (settings: AppSettings) => Promise<void>;
  startSession: (input: StartSessionInput) => Promise<void>;
  supplyChallengeResponse: (code: string) => Promise<void>;
  stopSession: () => Promise<void>;
  dispose: () => Promise<void>;
}

const selectKeyStore = (config: RuntimeConfig, logger: ContainerLogger): KeyStore => {
  if (config.keyStore === "file") {
    return new FileKeyStore(config.keyFilePath);
  }

  const keychain = KeyringKeyStore.load();
  if (keychain) {
    return keychain;
  }

  if (config.keyStore === "keychain") {
    throw new Error("OS keychain is not available: no @napi-rs/keyring binding for this platform");
  }

  logger.warn("[Security] OS keyring unavailable, storing the vault key in a file", { filePath: config.keyFilePath });
  return new FileKeyStore(config.keyFilePath);
};

export const createServiceContainer = (options: CreateServiceContainerOptions): ServiceContainer => {
  const { config, logger } = options;
  const platform = options.platform ?? process.platform;

  const keyStore = selectKeyStore(config, logger);
  const vault = new SecretVault({
    keyStore,
    account: resolveKeyAccount(config.keyScope, { username: os.userInfo().username, hostname: os.hostname() })
  });
  const settingsStore = new SettingsStore({ filePath: config.settingsPath, cipher: vault, logger });

  const events = new EventChannel<SessionEvent>({
    capacity: EVENT_CHANNEL_CAPACITY,
    isDroppable: (event) => event.type === "trafficUpdated",
    onOverflow: (dropped) => {
      logger.warn("[Events] queue full, dropped event", { type: dropped.type });
    }
  });
  const publish = (event: SessionEvent): void => {
    events.post(event);
  };

  const sampler = new TrafficSampler({
    readCounters: createNetworkCounterReader(platform),
    emit: publish,
    logger
  });

  const controller = new SessionController({
    launcher: new ProcessSupervisor({ logger }),
    publish,
    sampler,
    resolveTunnelAddress: () => resolveTunnelAddress(config.tunnelInterface),
    logger,
    transcriptPath: config.transcriptPath
  });

  let settings: AppSettings | undefined;

  const loadSettings = async (): Promise<AppSettings> => {
    settings = await settingsStore.load();
    return settings;
  };

  const rememberChoice = async (input: StartSessionInput): Promise<void> => {
    try {
      const current = settings ?? (await loadSettings());
      settings = await settingsStore.applyCredentialChoice(current, {
        remember: input.rememberCredentials,
        username: input.username,
        password: input.password
      });
    } catch (error) {
      logger.warn("[Settings] failed to save credential preference", { reason: normalizeError(error) });
    }
  };

  logger.info("[Container] ready", { keyStore: keyStore.kind, configDir: config.configDir });

  return {
    events,
    keyStoreKind: keyStore.kind,
    getSessionState: () => controller.currentState,
    loadSettings,
    saveSettings: async (next) => {
      await settingsStore.save(next);
      settings = next;
    },
    startSession: async (input) => {
      await controller.start({
        configFilePath: input.configFilePath,
        username: input.username,
        password: input.password,
        executablePath: config.executablePath
      });
      await rememberChoice(input);
    },
    supplyChallengeResponse: (code) => controller.supplyChallengeResponse(code),
    stopSession: () => controller.stop(),
    dispose: async () => {
      await controller.stop();
      sampler.stop();
      events.close();
    }
  };
};
