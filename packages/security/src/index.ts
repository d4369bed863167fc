import { createRequire } from "node:module";
import { randomBytes, createCipheriv, createDecipheriv } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

const require = createRequire(import.meta.url);

// ─── Keyring (Optional) ─────────────────────────────────────────────────────

export interface KeyringEntry {
  getPassword: () => string | null | undefined;
  setPassword: (password: string) => void;
  deletePassword: () => unknown;
}

/** The part of `@napi-rs/keyring` the key store uses. */
export interface KeyringBinding {
  Entry: new (service: string, account: string) => KeyringEntry;
}

const loadKeyring = (): KeyringBinding | undefined => {
  try {
    return require("@napi-rs/keyring") as KeyringBinding;
  } catch {
    return undefined;
  }
};

// ─── Crypto Primitives ──────────────────────────────────────────────────────

const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const ALGORITHM = "aes-256-gcm";
const TOKEN_VERSION = "v1";

export interface EncryptResult {
  ciphertextB64: string;
  ivB64: string;
  tagB64: string;
}

export const encryptAesGcm = (
  plaintext: string,
  key: Buffer,
  aad?: string
): EncryptResult => {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  if (aad) {
    cipher.setAAD(Buffer.from(aad, "utf8"));
  }
  const encrypted = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
  const tag = cipher.getAuthTag();

  return {
    ciphertextB64: encrypted.toString("base64"),
    ivB64: iv.toString("base64"),
    tagB64: tag.toString("base64")
  };
};

export const decryptAesGcm = (
  ciphertextB64: string,
  ivB64: string,
  tagB64: string,
  key: Buffer,
  aad?: string
): string => {
  const iv = Buffer.from(ivB64, "base64");
  const tag = Buffer.from(tagB64, "base64");
  const ciphertext = Buffer.from(ciphertextB64, "base64");

  const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  if (aad) {
    decipher.setAAD(Buffer.from(aad, "utf8"));
  }
  decipher.setAuthTag(tag);
  const decrypted = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  return decrypted.toString("utf8");
};

/** Token layout: `v1.<iv>.<tag>.<ciphertext>`, each part base64. */
export const formatSecretToken = (result: EncryptResult): string =>
  [TOKEN_VERSION, result.ivB64, result.tagB64, result.ciphertextB64].join(".");

export const parseSecretToken = (token: string): EncryptResult | undefined => {
  const parts = token.trim().split(".");
  if (parts.length !== 4 || parts[0] !== TOKEN_VERSION) {
    return undefined;
  }

  const [, ivB64 = "", tagB64 = "", ciphertextB64 = ""] = parts;
  if (Buffer.from(ivB64, "base64").length !== IV_LENGTH || Buffer.from(tagB64, "base64").length !== AUTH_TAG_LENGTH) {
    return undefined;
  }

  return { ivB64, tagB64, ciphertextB64 };
};

export class DecryptError extends Error {
  constructor(message = "stored secret could not be decrypted") {
    super(message);
    this.name = "DecryptError";
  }
}

// ─── Key Stores ─────────────────────────────────────────────────────────────

export type KeyStoreKind = "keychain" | "file";

/** Platform secret store holding the vault key. */
export interface KeyStore {
  readonly kind: KeyStoreKind;
  getSecret: (service: string, account: string) => Promise<string | undefined>;
  setSecret: (service: string, account: string, value: string) => Promise<void>;
  deleteSecret: (service: string, account: string) => Promise<void>;
}

export class KeyringKeyStore implements KeyStore {
  readonly kind = "keychain";

  constructor(private readonly keyring: KeyringBinding) {}

  /** Undefined when no native keyring binding exists for this platform. */
  static load(): KeyringKeyStore | undefined {
    const keyring = loadKeyring();
    return keyring ? new KeyringKeyStore(keyring) : undefined;
  }

  async getSecret(service: string, account: string): Promise<string | undefined> {
    return this.entry(service, account).getPassword() ?? undefined;
  }

  async setSecret(service: string, account: string, value: string): Promise<void> {
    this.entry(service, account).setPassword(value);
  }

  async deleteSecret(service: string, account: string): Promise<void> {
    this.entry(service, account).deletePassword();
  }

  private entry(service: string, account: string): KeyringEntry {
    return new this.keyring.Entry(service, account);
  }
}

const isRecordOfStrings = (value: unknown): value is Record<string, string> =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  Object.values(value).every((item) => typeof item === "string");

/**
 * Owner-only JSON file used where no OS keychain is available. An unreadable
 * file reads as empty.
 */
export class FileKeyStore implements KeyStore {
  readonly kind = "file";

  constructor(private readonly filePath: string) {}

  async getSecret(service: string, account: string): Promise<string | undefined> {
    const entries = await this.readEntries();
    return entries[`${service}:${account}`];
  }

  async setSecret(service: string, account: string, value: string): Promise<void> {
    const entries = await this.readEntries();
    entries[`${service}:${account}`] = value;
    await this.writeEntries(entries);
  }

  async deleteSecret(service: string, account: string): Promise<void> {
    const entries = await this.readEntries();
    delete entries[`${service}:${account}`];
    await this.writeEntries(entries);
  }

  private async readEntries(): Promise<Record<string, string>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch {
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return isRecordOfStrings(parsed) ? { ...parsed } : {};
    } catch {
      return {};
    }
  }

  private async writeEntries(entries: Record<string, string>): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(entries, null, 2), { mode: 0o600 });
    await fs.rename(tempPath, this.filePath);
  }
}

// ─── Secret Vault ───────────────────────────────────────────────────────────

export const VAULT_SERVICE = "tunnelpilot";

export type KeyScope = "user" | "machine";

export const resolveKeyAccount = (
  scope: KeyScope,
  identity: { username: string; hostname: string }
): string => (scope === "user" ? `user:${identity.username}` : `machine:${identity.hostname}`);

export interface SecretVaultOptions {
  keyStore: KeyStore;
  account: string;
  service?: string;
}

export class SecretVault {
  private readonly service: string;
  private keyPromise: Promise<Buffer> | undefined;

  constructor(private readonly options: SecretVaultOptions) {
    this.service = options.service ?? VAULT_SERVICE;
  }

  get keyStoreKind(): KeyStoreKind {
    return this.options.keyStore.kind;
  }

  /** Reads the key from the store, creating and storing it on first use. */
  getOrCreateKey(): Promise<Buffer> {
    if (!this.keyPromise) {
      this.keyPromise = this.loadOrCreateKey().catch((error: unknown) => {
        this.keyPromise = undefined;
        throw error;
      });
    }
    return this.keyPromise;
  }

  async encrypt(plaintext: string): Promise<string> {
    const key = await this.getOrCreateKey();
    return formatSecretToken(encryptAesGcm(plaintext, key, this.aad()));
  }

  async decrypt(token: string): Promise<string> {
    const parsed = parseSecretToken(token);
    if (!parsed) {
      throw new DecryptError("stored secret has an unknown format");
    }

    const key = await this.getOrCreateKey();
    try {
      return decryptAesGcm(parsed.ciphertextB64, parsed.ivB64, parsed.tagB64, key, this.aad());
    } catch {
      throw new DecryptError();
    }
  }

  private aad(): string {
    return `${this.service}-credential:${this.options.account}`;
  }

  private async loadOrCreateKey(): Promise<Buffer> {
    const { keyStore, account } = this.options;
    const stored = await keyStore.getSecret(this.service, account);
    if (stored !== undefined) {
      const key = Buffer.from(stored, "base64");
      if (key.length !== KEY_LENGTH) {
        throw new Error("Stored vault key is malformed");
      }
      return key;
    }

    const key = randomBytes(KEY_LENGTH);
    await keyStore.setSecret(this.service, account, key.toString("base64"));
    return key;
  }
}
