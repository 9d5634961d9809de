// src/config.ts

import { z } from "zod";
import { CGNAT_SUBNET, Subnet, isValidPort } from "./address";
import { ConfigurationError, InvalidArgumentError } from "./errors";
import { LogLevel } from "./logger";

/**
 * Configuration shared by the registry and the discovery client.
 */
export interface DiscoveryConfig {
  /** Well-known discovery port every leader binds. Default: 28004 */
  port: number;

  /** Timeout for a single /services fetch or delegate registration (ms). Default: 2000 */
  requestTimeoutMs: number;

  /** How often a delegate probes its leader (ms). Default: 5000 */
  probeIntervalMs: number;

  /** Timeout for a single leader liveness probe (ms). Default: 1000 */
  probeTimeoutMs: number;

  /** Wait before retrying after a failed delegate attempt (ms). Default: 10000 */
  retryBackoffMs: number;

  /** Address range remote advertisements must fall into. Default: 100.64.0.0/10 */
  memberSubnet: Subnet;
}

export const DEFAULT_DISCOVERY_CONFIG: DiscoveryConfig = {
  port: 28004,
  requestTimeoutMs: 2000,
  probeIntervalMs: 5000,
  probeTimeoutMs: 1000,
  retryBackoffMs: 10000,
  memberSubnet: CGNAT_SUBNET,
};

/**
 * Fills in defaults for every setting `overrides` leaves out. Unrelated
 * properties on `overrides` are ignored.
 */
export function resolveConfig(
  overrides: Partial<DiscoveryConfig> = {},
): DiscoveryConfig {
  const d = DEFAULT_DISCOVERY_CONFIG;
  const port = overrides.port ?? d.port;
  if (!isValidPort(port)) {
    throw new InvalidArgumentError(
      `Invalid port ${port}: must be an integer between 1 and 65535`,
      { port },
    );
  }
  return {
    port,
    requestTimeoutMs: overrides.requestTimeoutMs ?? d.requestTimeoutMs,
    probeIntervalMs: overrides.probeIntervalMs ?? d.probeIntervalMs,
    probeTimeoutMs: overrides.probeTimeoutMs ?? d.probeTimeoutMs,
    retryBackoffMs: overrides.retryBackoffMs ?? d.retryBackoffMs,
    memberSubnet: overrides.memberSubnet ?? d.memberSubnet,
  };
}

export const PortSchema = z.coerce.number().int().min(1).max(65535);

const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error", "none"] as const;

const EnvSchema = z.object({
  PEERDISC_PORT: PortSchema.optional(),
  PEERDISC_LOG_LEVEL: z.enum(LOG_LEVEL_VALUES).optional(),
  PEERDISC_TAILSCALE_SOCKET: z.string().min(1).optional(),
});

/**
 * Settings that can be supplied through the environment.
 */
export interface EnvSettings {
  port?: number;
  logLevel?: LogLevel;
  tailscaleSocket?: string;
}

/**
 * Reads PEERDISC_* variables. Throws ConfigurationError naming the offending
 * variable when a value is malformed.
 */
export function loadEnvSettings(
  env: Record<string, string | undefined> = process.env,
): EnvSettings {
  const result = EnvSchema.safeParse({
    PEERDISC_PORT: env.PEERDISC_PORT || undefined,
    PEERDISC_LOG_LEVEL: env.PEERDISC_LOG_LEVEL || undefined,
    PEERDISC_TAILSCALE_SOCKET: env.PEERDISC_TAILSCALE_SOCKET || undefined,
  });
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  const parsed = result.data;
  return {
    port: parsed.PEERDISC_PORT,
    logLevel: parsed.PEERDISC_LOG_LEVEL,
    tailscaleSocket: parsed.PEERDISC_TAILSCALE_SOCKET,
  };
}

/**
 * Renders zod issues as `path: message`, joined with "; ".
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/**
 * Validates a port given on the command line.
 */
export function parsePortOption(value: number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = PortSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid value for --port: ${formatIssues(parsed.error)}`,
      { port: value },
    );
  }
  return parsed.data;
}
