import os, { type NetworkInterfaceInfo } from "node:os";

export type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

const TUNNEL_INTERFACE_PATTERN = /^u?tun\d*$/i;

const firstIpv4 = (entries: NetworkInterfaceInfo[] | undefined): string | undefined =>
  entries?.find((entry) => entry.family === "IPv4" && !entry.internal)?.address;

/**
 * IPv4 address of the tunnel: the preferred interface first, then the first
 * `tun*` / `utun*` interface. Empty string when none has an address.
 */
export const resolveTunnelAddress = (
  preferredInterface: string,
  readInterfaces: () => InterfaceTable = os.networkInterfaces
): string => {
  const table = readInterfaces();

  const preferred = firstIpv4(table[preferredInterface]);
  if (preferred) {
    return preferred;
  }

  for (const name of Object.keys(table).sort()) {
    if (name === preferredInterface || !TUNNEL_INTERFACE_PATTERN.test(name)) {
      continue;
    }
    const address = firstIpv4(table[name]);
    if (address) {
      return address;
    }
  }

  return "";
};
