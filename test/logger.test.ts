// test/logger.test.ts

import { describe, it, expect, afterEach } from "vitest";
import {
  LogEntry,
  Logger,
  createLogger,
  describeError,
  loggerConfig,
  noopLogHandler,
} from "../src/logger";

describe("Logger", () => {
  afterEach(() => {
    loggerConfig.configure({ level: "info", handler: noopLogHandler });
  });

  it("should drop entries below its level", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({}, { level: "warn", handler: (e) => entries.push(e) });

    logger.debug("debug");
    logger.info("info");
    logger.warn("warn");
    logger.error("error");

    expect(entries.map((e) => e.level)).toEqual(["warn", "error"]);
  });

  it("should log nothing at level none", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({}, { level: "none", handler: (e) => entries.push(e) });

    logger.error("error");

    expect(entries).toEqual([]);
  });

  it("should merge child and call context", () => {
    const entries: LogEntry[] = [];
    const logger = createLogger("Registry", "abc123", {
      level: "debug",
      handler: (e) => entries.push(e),
    });

    logger.child({ component: "ServiceDirectory" }).info("Advertising new service", {
      name: "web",
    });

    expect(entries[0].context).toEqual({
      component: "ServiceDirectory",
      registryId: "abc123",
      name: "web",
    });
  });

  it("should attach errors to error entries", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({}, { handler: (e) => entries.push(e) });
    const failure = new Error("bind failed");

    logger.error("Registry cannot participate in discovery", failure, {
      port: 28004,
    });

    expect(entries[0].error).toBe(failure);
    expect(entries[0].context).toEqual({ port: 28004 });
  });

  it("should fall back to the global configuration", () => {
    const entries: LogEntry[] = [];
    loggerConfig.configure({ level: "debug", handler: (e) => entries.push(e) });
    const logger = createLogger("DiscoveryClient");

    logger.debug("Error connecting to registry");

    expect(entries).toHaveLength(1);
    expect(entries[0].context.component).toBe("DiscoveryClient");
  });
});

describe("describeError", () => {
  it("should use the message of errors", () => {
    expect(describeError(new Error("refused"))).toBe("refused");
  });

  it("should stringify other values", () => {
    expect(describeError("boom")).toBe("boom");
    expect(describeError(7)).toBe("7");
  });
});
