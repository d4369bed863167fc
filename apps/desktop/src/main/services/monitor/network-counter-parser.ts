import type { NetworkCounters } from "../../../../../../packages/core/src/index";

const normalizeLines = (stdout: string): string[] => {
  return stdout
    .replace(/\r\n/g, "\n")
    .replace(/\r(?!\n)/g, "\n")
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
};

const parseCounter = (value: string | undefined): number | undefined => {
  if (!value || !/^\d+$/.test(value)) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const isLoopback = (name: string): boolean => /^lo\d*$/i.test(name);

/**
 * Linux `/proc/net/dev`:
 * `eth0: <rx bytes> <rx packets> ... (8 receive columns) <tx bytes> ...`
 */
export const parseProcNetDev = (content: string): NetworkCounters | undefined => {
  let bytesSent = 0;
  let bytesRecv = 0;
  let interfaces = 0;

  for (const line of normalizeLines(content)) {
    const cut = line.indexOf(":");
    if (cut <= 0) {
      continue;
    }

    const name = line.slice(0, cut).trim();
    if (name.includes("|") || isLoopback(name)) {
      continue;
    }

    const fields = line.slice(cut + 1).trim().split(/\s+/);
    const recv = parseCounter(fields[0]);
    const sent = parseCounter(fields[8]);
    if (recv === undefined || sent === undefined) {
      continue;
    }

    bytesRecv += recv;
    bytesSent += sent;
    interfaces += 1;
  }

  return interfaces > 0 ? { bytesSent, bytesRecv } : undefined;
};

/**
 * macOS `netstat -ibn`. Every interface has one `<Link#n>` row carrying its
 * totals, followed by one row per address; the address column may be empty,
 * so the byte columns are taken from the end of the row.
 */
export const parseNetstatInterfaces = (stdout: string): NetworkCounters | undefined => {
  let bytesSent = 0;
  let bytesRecv = 0;
  let interfaces = 0;

  for (const line of normalizeLines(stdout)) {
    const parts = line.split(/\s+/);
    const name = (parts[0] ?? "").replace(/\*$/, "");
    if (!(parts[2] ?? "").startsWith("<Link#") || isLoopback(name)) {
      continue;
    }

    // ... Ibytes Opkts Oerrs Obytes Coll
    const recv = parseCounter(parts[parts.length - 5]);
    const sent = parseCounter(parts[parts.length - 2]);
    if (recv === undefined || sent === undefined) {
      continue;
    }

    bytesRecv += recv;
    bytesSent += sent;
    interfaces += 1;
  }

  return interfaces > 0 ? { bytesSent, bytesRecv } : undefined;
};

/** Windows `netstat -e`: the `Bytes` row holds received then sent totals. */
export const parseNetstatStatistics = (stdout: string): NetworkCounters | undefined => {
  for (const line of normalizeLines(stdout)) {
    const parts = line.split(/\s+/);
    if ((parts[0] ?? "").toLowerCase() !== "bytes") {
      continue;
    }

    const recv = parseCounter(parts[1]);
    const sent = parseCounter(parts[2]);
    if (recv !== undefined && sent !== undefined) {
      return { bytesSent: sent, bytesRecv: recv };
    }
  }

  return undefined;
};
