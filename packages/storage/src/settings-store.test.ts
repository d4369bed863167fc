import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { DEFAULT_APP_SETTINGS } from "../../core/src/index";
import { SecretVault, type KeyStore } from "../../security/src/index";
import { SettingsStore } from "./index";

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

const createMemoryKeyStore = (): KeyStore => {
  const entries = new Map<string, string>();
  return {
    kind: "file",
    getSecret: async (service, account) => entries.get(`${service}:${account}`),
    setSecret: async (service, account, value) => {
      entries.set(`${service}:${account}`, value);
    },
    deleteSecret: async (service, account) => {
      entries.delete(`${service}:${account}`);
    }
  };
};

const silentLogger = {
  warn: () => undefined,
  debug: () => undefined
};

const readJson = async (filePath: string): Promise<Record<string, unknown>> => {
  const parsed: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("settings file should hold an object");
  }
  return Object.fromEntries(Object.entries(parsed));
};

const dir = await fs.mkdtemp(path.join(os.tmpdir(), "tunnelpilot-settings-"));

try {
  const filePath = path.join(dir, "config", "config.json");
  const vault = new SecretVault({ keyStore: createMemoryKeyStore(), account: "user:alice" });
  const store = new SettingsStore({ filePath, cipher: vault, logger: silentLogger });

  await (async () => {
    const settings = await store.load();
    assertEqual(settings.showSplash, true, "missing file: splash default");
    assertEqual(settings.theme, "dark", "missing file: theme default");
    assertEqual(settings.rememberCredentials, false, "missing file: remember default");
    assertEqual(settings.savedUsername, "", "missing file: no username");
  })();

  await (async () => {
    const next = await store.applyCredentialChoice(
      { ...DEFAULT_APP_SETTINGS, theme: "light" },
      { remember: true, username: "alice", password: "secret" }
    );
    assertEqual(next.savedUsername, "alice", "choice keeps plaintext in memory");

    const onDisk = await readJson(filePath);
    assertEqual(onDisk["remember_credentials"], true, "remember flag persisted");
    assertEqual(onDisk["theme"], "light", "theme persisted");
    assertTrue(typeof onDisk["saved_username"] === "string" && onDisk["saved_username"].startsWith("v1."), "username stored encrypted");
    assertTrue(onDisk["saved_password"] !== "secret", "password never stored in plaintext");

    const loaded = await store.load();
    assertEqual(loaded.savedUsername, "alice", "username decrypted on load");
    assertEqual(loaded.savedPassword, "secret", "password decrypted on load");
    assertEqual(loaded.theme, "light", "theme loaded");
  })();

  await (async () => {
    const loaded = await store.load();
    await store.applyCredentialChoice(loaded, { remember: false, username: "alice", password: "secret" });
    const onDisk = await readJson(filePath);
    assertEqual(onDisk["remember_credentials"], false, "remember flag cleared");
    assertEqual(onDisk["saved_username"], "", "username cleared");
    assertEqual(onDisk["saved_password"], "", "password cleared");
  })();

  await (async () => {
    const otherVault = new SecretVault({ keyStore: createMemoryKeyStore(), account: "user:alice" });
    const foreign = new SettingsStore({ filePath, cipher: otherVault, logger: silentLogger });
    await foreign.save({ ...DEFAULT_APP_SETTINGS, theme: "light", rememberCredentials: true, savedUsername: "alice", savedPassword: "secret" });

    const loaded = await store.load();
    assertEqual(loaded.savedUsername, "", "undecryptable username reads as absent");
    assertEqual(loaded.savedPassword, "", "undecryptable password reads as absent");
    assertEqual(loaded.theme, "light", "other fields survive");
    assertEqual(loaded.rememberCredentials, true, "remember flag survives");
  })();

  await (async () => {
    await fs.writeFile(filePath, "{ broken");
    const corrupt = await store.load();
    assertEqual(corrupt.theme, "dark", "corrupt JSON falls back to defaults");

    await fs.writeFile(filePath, "[]");
    const wrongShape = await store.load();
    assertEqual(wrongShape.showSplash, true, "non-object falls back to defaults");

    await fs.writeFile(filePath, JSON.stringify({ theme: "light", show_splash: "yes" }));
    const partial = await store.load();
    assertEqual(partial.theme, "light", "valid field kept");
    assertEqual(partial.showSplash, true, "invalid field defaulted");
  })();
} finally {
  await fs.rm(dir, { recursive: true, force: true });
}
