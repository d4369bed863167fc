import os from "node:os";
import path from "node:path";
import { parsePayload, runtimeEnvSchema, type KeyScope, type KeyStoreSelection } from "../../../../packages/shared/src/index";

const CONFIG_DIR_NAME = ".tunnelpilot";
const SYSTEM_EXECUTABLE_NAME = "openvpn";

export interface RuntimeConfig {
  configDir: string;
  executablePath: string;
  keyScope: KeyScope;
  keyStore: KeyStoreSelection;
  tunnelInterface: string;
  settingsPath: string;
  keyFilePath: string;
  /** Undefined when transcripts are switched off. */
  transcriptPath: string | undefined;
}

export interface ResolveRuntimeConfigInput {
  env: Record<string, string | undefined>;
  platform: NodeJS.Platform;
  appRoot: string;
  homeDir?: string;
  fileExists: (filePath: string) => boolean;
}

export const bundledExecutableName = (platform: NodeJS.Platform): string => {
  if (platform === "win32") {
    return "openvpn.exe";
  }
  if (platform === "darwin") {
    return "openvpn_macos";
  }
  return "openvpn";
};

const expandHome = (value: string, homeDir: string): string => {
  if (value === "~") {
    return homeDir;
  }
  if (value.startsWith("~/")) {
    return path.join(homeDir, value.slice(2));
  }
  return path.resolve(value);
};

export const resolveRuntimeConfig = (input: ResolveRuntimeConfigInput): RuntimeConfig => {
  const env = parsePayload(runtimeEnvSchema, input.env, "Runtime config");
  const homeDir = input.homeDir ?? os.homedir();

  const configDir = env.TUNNELPILOT_CONFIG_DIR
    ? expandHome(env.TUNNELPILOT_CONFIG_DIR, homeDir)
    : path.join(homeDir, CONFIG_DIR_NAME);

  let executablePath = env.TUNNELPILOT_OPENVPN_PATH;
  if (!executablePath) {
    const bundled = path.join(input.appRoot, "bin", bundledExecutableName(input.platform));
    executablePath = input.fileExists(bundled) ? bundled : SYSTEM_EXECUTABLE_NAME;
  }

  return {
    configDir,
    executablePath,
    keyScope: env.TUNNELPILOT_KEY_SCOPE,
    keyStore: env.TUNNELPILOT_KEY_STORE,
    tunnelInterface: env.TUNNELPILOT_TUNNEL_INTERFACE,
    settingsPath: path.join(configDir, "config.json"),
    keyFilePath: path.join(configDir, "vault-keys.json"),
    transcriptPath: env.TUNNELPILOT_TRANSCRIPT === "on" ? path.join(configDir, "session-transcript.log") : undefined
  };
};
