// src/address.ts

import { BlockList, isIPv4 } from "net";

/**
 * An IPv4 address and a TCP port.
 */
export interface AddrPort {
  readonly address: string;
  readonly port: number;
}

/**
 * An IPv4 subnet in CIDR form.
 */
export interface Subnet {
  network: string;
  prefix: number;
}

/**
 * The carrier-grade NAT range (RFC 6598) private overlay networks hand out
 * addresses from.
 */
export const CGNAT_SUBNET: Subnet = { network: "100.64.0.0", prefix: 10 };

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port > 0 && port < 65536;
}

export function addrPort(address: string, port: number): AddrPort {
  return { address, port };
}

export function formatAddrPort(ap: AddrPort): string {
  return `${ap.address}:${ap.port}`;
}

/**
 * Parses "a.b.c.d:port". Returns undefined for anything else, including IPv6
 * literals and port 0.
 */
export function parseAddrPort(value: string): AddrPort | undefined {
  const sep = value.lastIndexOf(":");
  if (sep <= 0) {
    return undefined;
  }
  const address = value.slice(0, sep);
  const portText = value.slice(sep + 1);
  if (!isIPv4(address) || !/^\d{1,5}$/.test(portText)) {
    return undefined;
  }
  const port = Number(portText);
  if (!isValidPort(port)) {
    return undefined;
  }
  return { address, port };
}

export function sameAddrPort(a: AddrPort, b: AddrPort): boolean {
  return a.address === b.address && a.port === b.port;
}

/**
 * Returns the first IPv4 address in the list.
 */
export function findIPv4(addresses: readonly string[]): string | undefined {
  return addresses.find((address) => isIPv4(address));
}

/**
 * Membership test for the private network's address range.
 */
export class MemberRange {
  private readonly list = new BlockList();

  constructor(readonly subnet: Subnet = CGNAT_SUBNET) {
    this.list.addSubnet(subnet.network, subnet.prefix, "ipv4");
  }

  contains(address: string): boolean {
    return isIPv4(address) && this.list.check(address, "ipv4");
  }

  toString(): string {
    return `${this.subnet.network}/${this.subnet.prefix}`;
  }
}
