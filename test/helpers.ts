// test/helpers.ts

import * as net from "net";
import { LogEntry, LogLevel, Logger } from "../src/logger";

/**
 * A logger that records every entry at or above `level`.
 */
export function captureLogger(level: LogLevel = "debug"): {
  logger: Logger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const logger = new Logger(
    {},
    { level, handler: (entry) => entries.push(entry) },
  );
  return { logger, entries };
}

// Helper to find an available TCP port
export async function findAvailableTcpPort(host = "127.0.0.1"): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.on("error", (err) => {
      server.close();
      reject(err);
    });
    server.listen(0, host, () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        server.close();
        reject(new Error("no port assigned"));
        return;
      }
      server.close(() => {
        resolve(address.port);
      });
    });
  });
}

/**
 * Polls `check` until it returns true or `timeoutMs` passes.
 */
export async function waitUntil(
  check: () => boolean | Promise<boolean>,
  timeoutMs = 5000,
  intervalMs = 20,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await check())) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}
