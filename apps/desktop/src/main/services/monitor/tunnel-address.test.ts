import type { NetworkInterfaceInfo } from "node:os";
import { resolveTunnelAddress, type InterfaceTable } from "./tunnel-address";

const assertEqual = <T>(actual: T, expected: T, message: string): void => {
  if (actual !== expected) {
    throw new Error(`${message}: expected ${String(expected)}, got ${String(actual)}`);
  }
};

const ipv4 = (address: string): NetworkInterfaceInfo => ({
  address,
  netmask: "255.255.255.0",
  family: "IPv4",
  mac: "00:00:00:00:00:00",
  internal: false,
  cidr: `${address}/24`
});

const ipv6 = (address: string): NetworkInterfaceInfo => ({
  address,
  netmask: "ffff:ffff:ffff:ffff::",
  family: "IPv6",
  mac: "00:00:00:00:00:00",
  internal: false,
  cidr: `${address}/64`,
  scopeid: 0
});

(() => {
  const table: InterfaceTable = {
    eth0: [ipv4("192.168.1.20")],
    tun1: [ipv4("10.9.0.6")],
    tun0: [ipv6("fd00::2"), ipv4("10.8.0.6")]
  };
  assertEqual(resolveTunnelAddress("tun0", () => table), "10.8.0.6", "preferred interface wins");
})();

(() => {
  const table: InterfaceTable = {
    eth0: [ipv4("192.168.1.20")],
    utun4: [ipv4("10.9.0.10")],
    utun3: [ipv6("fe80::1")]
  };
  assertEqual(resolveTunnelAddress("tun0", () => table), "10.9.0.10", "falls back to the first tunnel with IPv4");
})();

(() => {
  const table: InterfaceTable = { eth0: [ipv4("192.168.1.20")], tun0: [ipv6("fd00::2")] };
  assertEqual(resolveTunnelAddress("tun0", () => table), "", "no tunnel address yields an empty string");
})();
