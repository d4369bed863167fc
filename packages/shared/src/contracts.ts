import { ZodError, z } from "zod";
import { DEFAULT_APP_SETTINGS } from "../../core/src/index";

const trimToOptionalString = (value: unknown): unknown => {
  if (typeof value !== "string") {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const trimToString = (value: unknown): string => {
  if (typeof value !== "string") {
    return "";
  }

  return value.trim();
};

/** Hint text the desktop UI shows in place of a chosen .ovpn file. */
export const CONFIG_PATH_PLACEHOLDER_PREFIX = "None. Choose";

export const isPlaceholderConfigPath = (value: string): boolean => {
  const trimmed = value.trim();
  return trimmed === "None" || trimmed.startsWith(CONFIG_PATH_PLACEHOLDER_PREFIX);
};

export const sessionStartSchema = z.object({
  configFilePath: z.preprocess(
    trimToString,
    z
      .string()
      .min(1, "config file is required")
      .refine((value) => !isPlaceholderConfigPath(value), { message: "no config file selected" })
  ),
  username: z.preprocess(trimToString, z.string().min(1, "username is required")),
  password: z.string({ required_error: "password is required" }).min(1, "password is required"),
  executablePath: z.preprocess(trimToString, z.string().min(1, "VPN client executable is required"))
});

export type SessionStartInput = z.infer<typeof sessionStartSchema>;

export const challengeResponseSchema = z.preprocess(
  trimToString,
  z.string().min(1, "verification code cannot be empty")
);

/** On-disk shape of config.json; every field falls back to its default on its own. */
export const settingsFileSchema = z.object({
  show_splash: z.boolean().catch(DEFAULT_APP_SETTINGS.showSplash),
  theme: z.enum(["dark", "light"]).catch(DEFAULT_APP_SETTINGS.theme),
  remember_credentials: z.boolean().catch(DEFAULT_APP_SETTINGS.rememberCredentials),
  saved_username: z.string().catch(""),
  saved_password: z.string().catch("")
});

export type SettingsFile = z.infer<typeof settingsFileSchema>;

export const keyScopeSchema = z.enum(["user", "machine"]);
export const keyStoreSelectionSchema = z.enum(["auto", "keychain", "file"]);

export type KeyScope = z.infer<typeof keyScopeSchema>;
export type KeyStoreSelection = z.infer<typeof keyStoreSelectionSchema>;

export const runtimeEnvSchema = z.object({
  TUNNELPILOT_CONFIG_DIR: z.preprocess(trimToOptionalString, z.string().optional()),
  TUNNELPILOT_OPENVPN_PATH: z.preprocess(trimToOptionalString, z.string().optional()),
  TUNNELPILOT_KEY_SCOPE: z.preprocess(trimToOptionalString, keyScopeSchema.default("user")),
  TUNNELPILOT_KEY_STORE: z.preprocess(trimToOptionalString, keyStoreSelectionSchema.default("auto")),
  TUNNELPILOT_TUNNEL_INTERFACE: z.preprocess(trimToOptionalString, z.string().default("tun0")),
  TUNNELPILOT_TRANSCRIPT: z.preprocess(trimToOptionalString, z.enum(["on", "off"]).default("on"))
});

export type RuntimeEnv = z.infer<typeof runtimeEnvSchema>;

export const formatValidationError = (error: ZodError): string => {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "payload";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
};

export class ContractValidationError extends Error {
  constructor(
    message: string,
    readonly issues: ZodError["issues"]
  ) {
    super(message);
    this.name = "ContractValidationError";
  }
}

export const parsePayload = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
  actionLabel: string
): T => {
  const result = schema.safeParse(payload);
  if (result.success) {
    return result.data;
  }

  throw new ContractValidationError(
    `${actionLabel}: ${formatValidationError(result.error)}`,
    result.error.issues
  );
};

export const normalizeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === "string" && error ? error : "Unknown error";
};
