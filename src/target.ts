// src/target.ts

import { formatAddrPort } from "./address";
import { DiscoveryClient } from "./discovery_client";
import { InvalidArgumentError } from "./errors";

export const TARGET_SCHEME = "peerdisc";

/**
 * A service query in URL form: `peerdisc://name?label=value&...`.
 */
export interface Target {
  name: string;
  labels: Record<string, string>;
}

/**
 * Parses a target URL. Repeated label keys keep their first value.
 */
export function parseTarget(target: string): Target {
  let url: URL;
  try {
    url = new URL(target);
  } catch {
    throw new InvalidArgumentError(`Invalid target ${target}`, { target });
  }
  if (url.protocol !== `${TARGET_SCHEME}:`) {
    throw new InvalidArgumentError(
      `Unsupported scheme ${url.protocol} in ${target}, expected ${TARGET_SCHEME}://`,
      { target },
    );
  }

  const name = decodeURIComponent(url.host);
  if (!name) {
    throw new InvalidArgumentError(`Missing service name in ${target}`, {
      target,
    });
  }

  const labels: Record<string, string> = {};
  for (const key of url.searchParams.keys()) {
    if (!Object.prototype.hasOwnProperty.call(labels, key)) {
      labels[key] = url.searchParams.get(key) ?? "";
    }
  }
  return { name, labels };
}

/**
 * Resolves a target to the `address:port` of a matching service, for
 * connection factories that take a plain host and port.
 */
export async function resolveTarget(
  target: string | Target,
  client: DiscoveryClient,
): Promise<string> {
  const { name, labels } =
    typeof target === "string" ? parseTarget(target) : target;
  return formatAddrPort(await client.findService(name, labels));
}
