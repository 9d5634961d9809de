// test/config.test.ts

import { describe, it, expect } from "vitest";
import {
  DEFAULT_DISCOVERY_CONFIG,
  loadEnvSettings,
  parsePortOption,
  resolveConfig,
} from "../src/config";
import { ConfigurationError, InvalidArgumentError } from "../src/errors";

describe("resolveConfig", () => {
  it("should use the defaults when nothing is overridden", () => {
    expect(resolveConfig()).toEqual({
      port: 28004,
      requestTimeoutMs: 2000,
      probeIntervalMs: 5000,
      probeTimeoutMs: 1000,
      retryBackoffMs: 10000,
      memberSubnet: { network: "100.64.0.0", prefix: 10 },
    });
  });

  it("should apply overrides and ignore unrelated properties", () => {
    const overrides = { port: 4000, probeIntervalMs: 50, verbose: true };

    const config = resolveConfig(overrides);

    expect(config).toEqual({
      ...DEFAULT_DISCOVERY_CONFIG,
      port: 4000,
      probeIntervalMs: 50,
    });
    expect(Object.keys(config)).not.toContain("verbose");
  });

  it("should reject ports outside 1..65535", () => {
    expect(() => resolveConfig({ port: 0 })).toThrow(InvalidArgumentError);
    expect(() => resolveConfig({ port: 65536 })).toThrow(
      "Invalid port 65536: must be an integer between 1 and 65535",
    );
    expect(() => resolveConfig({ port: Number.NaN })).toThrow(
      "Invalid port NaN: must be an integer between 1 and 65535",
    );
    expect(() => resolveConfig({ port: 80.5 })).toThrow(InvalidArgumentError);
  });
});

describe("parsePortOption", () => {
  it("should pass valid and absent ports through", () => {
    expect(parsePortOption(28004)).toBe(28004);
    expect(parsePortOption(undefined)).toBeUndefined();
  });

  it("should reject unusable ports", () => {
    expect(() => parsePortOption(Number.NaN)).toThrow(ConfigurationError);
    expect(() => parsePortOption(0)).toThrow(
      "Invalid value for --port: Number must be greater than or equal to 1",
    );
  });
});

describe("loadEnvSettings", () => {
  it("should read the PEERDISC_ variables", () => {
    expect(
      loadEnvSettings({
        PEERDISC_PORT: "4100",
        PEERDISC_LOG_LEVEL: "debug",
        PEERDISC_TAILSCALE_SOCKET: "/tmp/tailscaled.sock",
      }),
    ).toEqual({
      port: 4100,
      logLevel: "debug",
      tailscaleSocket: "/tmp/tailscaled.sock",
    });
  });

  it("should treat empty variables as unset", () => {
    expect(loadEnvSettings({ PEERDISC_PORT: "", HOME: "/root" })).toEqual({
      port: undefined,
      logLevel: undefined,
      tailscaleSocket: undefined,
    });
  });

  it("should reject malformed values with a readable message", () => {
    expect(() => loadEnvSettings({ PEERDISC_PORT: "http" })).toThrow(
      ConfigurationError,
    );
    expect(() => loadEnvSettings({ PEERDISC_PORT: "http" })).toThrow(
      /^PEERDISC_PORT: Expected number, received nan$/,
    );
    expect(() => loadEnvSettings({ PEERDISC_PORT: "70000" })).toThrow(
      /^PEERDISC_PORT: Number must be less than or equal to 65535$/,
    );
    expect(() => loadEnvSettings({ PEERDISC_LOG_LEVEL: "loud" })).toThrow(
      /^PEERDISC_LOG_LEVEL: /,
    );
  });
});
