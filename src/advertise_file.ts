// src/advertise_file.ts

import { readFile } from "fs/promises";
import { formatIssues } from "./config";
import { InvalidArgumentError } from "./errors";
import { Registry } from "./registry";
import { Service, ServiceListSchema } from "./service";

/**
 * Reads a JSON array of services in wire form from `path`, or from stdin when
 * `path` is "-".
 */
export async function readAdvertiseFile(path: string): Promise<Service[]> {
  const source = path === "-" ? "/dev/stdin" : path;
  let text: string;
  try {
    text = await readFile(source, "utf8");
  } catch (err) {
    throw new InvalidArgumentError(
      `Can't read '${path}': ${err instanceof Error ? err.message : String(err)}`,
      { path },
    );
  }
  return parseAdvertiseFile(text);
}

export function parseAdvertiseFile(text: string): Service[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new InvalidArgumentError(
      `Error parsing config file: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  const parsed = ServiceListSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `Error parsing config file: ${formatIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}

/**
 * Advertises each service on `registry`: by port when it lives on the local
 * address, as a remote service otherwise.
 */
export function advertiseAll(
  registry: Registry,
  services: readonly Service[],
): Service[] {
  return services.map((s) =>
    s.addrPort.address === registry.localAddress
      ? registry.advertise(s.addrPort.port, s.name, s.labels)
      : registry.advertiseRemote(s.addrPort, s.name, s.labels),
  );
}
