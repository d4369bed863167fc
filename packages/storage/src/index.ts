import fs from "node:fs/promises";
import path from "node:path";
import type { AppSettings } from "../../core/src/index";
import { DEFAULT_APP_SETTINGS } from "../../core/src/index";
import { settingsFileSchema, type SettingsFile } from "../../shared/src/index";

/** Encrypts saved credentials; the secret vault in production. */
export interface CredentialCipher {
  encrypt: (plaintext: string) => Promise<string>;
  decrypt: (token: string) => Promise<string>;
}

export interface SettingsStoreLogger {
  warn: (message: string, metadata?: Record<string, unknown>) => void;
  debug: (message: string, metadata?: Record<string, unknown>) => void;
}

export interface SettingsStoreOptions {
  filePath: string;
  cipher: CredentialCipher;
  logger: SettingsStoreLogger;
}

export interface CredentialChoice {
  remember: boolean;
  username: string;
  password: string;
}

const cloneDefaultSettings = (): AppSettings => ({ ...DEFAULT_APP_SETTINGS });

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export class SettingsStore {
  constructor(private readonly options: SettingsStoreOptions) {}

  get filePath(): string {
    return this.options.filePath;
  }

  /** Never throws: unreadable files and undecryptable credentials fall back to defaults. */
  async load(): Promise<AppSettings> {
    const file = await this.readFile();
    if (!file) {
      return cloneDefaultSettings();
    }

    return {
      showSplash: file.show_splash,
      theme: file.theme,
      rememberCredentials: file.remember_credentials,
      savedUsername: await this.decryptField("saved_username", file.saved_username),
      savedPassword: await this.decryptField("saved_password", file.saved_password)
    };
  }

  async save(settings: AppSettings): Promise<void> {
    const { cipher } = this.options;
    const remember = settings.rememberCredentials;
    const data: SettingsFile = {
      show_splash: settings.showSplash,
      theme: settings.theme,
      remember_credentials: remember,
      saved_username: remember ? await cipher.encrypt(settings.savedUsername) : "",
      saved_password: remember ? await cipher.encrypt(settings.savedPassword) : ""
    };

    const filePath = this.options.filePath;
    await fs.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
    const tempPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, `${JSON.stringify(data, null, 4)}\n`, { mode: 0o600 });
    await fs.rename(tempPath, filePath);
  }

  /** Records the "remember credentials" choice made on a start attempt and persists it. */
  async applyCredentialChoice(current: AppSettings, choice: CredentialChoice): Promise<AppSettings> {
    const next: AppSettings = choice.remember
      ? { ...current, rememberCredentials: true, savedUsername: choice.username, savedPassword: choice.password }
      : { ...current, rememberCredentials: false, savedUsername: "", savedPassword: "" };
    await this.save(next);
    return next;
  }

  private async readFile(): Promise<SettingsFile | undefined> {
    const { filePath, logger } = this.options;

    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (!isMissingFileError(error)) {
        logger.warn("[Settings] failed to read settings, using defaults", {
          filePath,
          reason: error instanceof Error ? error.message : String(error)
        });
      }
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      logger.warn("[Settings] settings file is not valid JSON, using defaults", { filePath });
      return undefined;
    }

    const result = settingsFileSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn("[Settings] settings file has an unexpected shape, using defaults", { filePath });
      return undefined;
    }

    return result.data;
  }

  private async decryptField(field: string, token: string): Promise<string> {
    if (!token) {
      return "";
    }

    try {
      return await this.options.cipher.decrypt(token);
    } catch (error) {
      this.options.logger.debug("[Settings] saved credential unreadable, ignoring", {
        field,
        reason: error instanceof Error ? error.name : String(error)
      });
      return "";
    }
  }
}
