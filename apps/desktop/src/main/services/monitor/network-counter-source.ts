import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import { promisify } from "node:util";
import type { NetworkCounters } from "../../../../../../packages/core/src/index";
import { parseNetstatInterfaces, parseNetstatStatistics, parseProcNetDev } from "./network-counter-parser";

const execFileAsync = promisify(execFile);

const PROC_NET_DEV = "/proc/net/dev";
const COUNTER_EXEC_TIMEOUT_MS = 5000;

export type NetworkCounterReader = () => Promise<NetworkCounters>;

export interface NetworkCounterSourceDeps {
  readFile: (filePath: string) => Promise<string>;
  runCommand: (file: string, args: string[]) => Promise<string>;
}

const defaultDeps: NetworkCounterSourceDeps = {
  readFile: (filePath) => fs.readFile(filePath, "utf8"),
  runCommand: async (file, args) => {
    const { stdout } = await execFileAsync(file, args, {
      timeout: COUNTER_EXEC_TIMEOUT_MS,
      windowsHide: true,
      encoding: "utf8"
    });
    return stdout;
  }
};

const requireCounters = (counters: NetworkCounters | undefined, source: string): NetworkCounters => {
  if (!counters) {
    throw new Error(`Unrecognized network counter output from ${source}`);
  }
  return counters;
};

/** Cumulative byte counters across all non-loopback interfaces. */
export const createNetworkCounterReader = (
  platform: NodeJS.Platform,
  deps: NetworkCounterSourceDeps = defaultDeps
): NetworkCounterReader => {
  if (platform === "darwin") {
    return async () => requireCounters(parseNetstatInterfaces(await deps.runCommand("netstat", ["-ibn"])), "netstat -ibn");
  }

  if (platform === "win32") {
    return async () => requireCounters(parseNetstatStatistics(await deps.runCommand("netstat", ["-e"])), "netstat -e");
  }

  return async () => requireCounters(parseProcNetDev(await deps.readFile(PROC_NET_DEV)), PROC_NET_DEV);
};
