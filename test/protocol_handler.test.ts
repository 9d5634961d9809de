// test/protocol_handler.test.ts

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { FastifyInstance } from "fastify";
import { ProtocolEndpoint, ProtocolHandler } from "../src/protocol_handler";
import { ServiceDirectory } from "../src/service_directory";
import { InMemoryRegistryTransport } from "../src/in_memory_transport";
import { captureLogger } from "./helpers";

const LOCAL = "100.64.0.2";
const config = { requestTimeoutMs: 200 };

describe("ProtocolHandler", () => {
  let transport: InMemoryRegistryTransport;
  let directory: ServiceDirectory;
  let handler: ProtocolHandler;
  let app: FastifyInstance;

  beforeEach(() => {
    transport = new InMemoryRegistryTransport();
    directory = new ServiceDirectory(LOCAL);
    handler = new ProtocolHandler({ directory, transport, config });
    app = handler.createServer();
  });

  afterEach(async () => {
    await app.close();
  });

  describe("GET /services", () => {
    it("should return local services as JSON", async () => {
      directory.advertise(42, "foo", { env: "prod" });
      directory.advertise(43, "bar");

      const res = await app.inject({ method: "GET", url: "/services" });

      expect(res.statusCode).toBe(200);
      expect(res.headers["content-type"]).toBe("application/json; charset=utf-8");
      expect(res.json()).toEqual([
        { name: "foo", labels: { env: "prod" }, addrPort: "100.64.0.2:42" },
        { name: "bar", labels: {}, addrPort: "100.64.0.2:43" },
      ]);
    });

    it("should return an empty array when nothing is advertised", async () => {
      const res = await app.inject({ method: "GET", url: "/services" });

      expect(res.statusCode).toBe(200);
      expect(res.body).toBe("[]");
    });

    it("should reject other methods", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/services",
        headers: { "content-type": "application/json" },
        payload: "{}",
      });

      expect(res.statusCode).toBe(405);
    });

    it("should append delegate services after local ones", async () => {
      const delegateDirectory = new ServiceDirectory(LOCAL);
      delegateDirectory.advertise(24, "oof");
      transport.bind(
        { address: LOCAL, port: 4000 },
        new ProtocolHandler({ directory: delegateDirectory, transport, config }),
      );
      directory.advertise(42, "foo");
      directory.addDelegate({ address: LOCAL, port: 4000 });

      const res = await app.inject({ method: "GET", url: "/services" });

      expect(res.json()).toEqual([
        { name: "foo", labels: {}, addrPort: "100.64.0.2:42" },
        { name: "oof", labels: {}, addrPort: "100.64.0.2:24" },
      ]);
    });
  });

  describe("POST /add-delegate", () => {
    it("should register a delegate on the local address", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/add-delegate",
        payload: { addrPort: "100.64.0.2:4000" },
      });

      expect(res.statusCode).toBe(200);
      expect(directory.snapshot().delegates).toEqual([
        { address: LOCAL, port: 4000 },
      ]);
    });

    it("should accept repeated registrations once", async () => {
      for (let i = 0; i < 2; i++) {
        const res = await app.inject({
          method: "POST",
          url: "/add-delegate",
          payload: { addrPort: "100.64.0.2:4000" },
        });
        expect(res.statusCode).toBe(200);
      }

      expect(directory.snapshot().delegates).toHaveLength(1);
    });

    it("should accept bodies sent without a JSON content type", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/add-delegate",
        headers: { "content-type": "text/plain" },
        payload: '{"addrPort":"100.64.0.2:4001"}',
      });

      expect(res.statusCode).toBe(200);
      expect(directory.snapshot().delegates).toEqual([
        { address: LOCAL, port: 4001 },
      ]);
    });

    it("should refuse delegates from another host", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/add-delegate",
        payload: { addrPort: "100.64.0.3:4000" },
      });

      expect(res.statusCode).toBe(403);
      expect(directory.snapshot().delegates).toEqual([]);
    });

    it("should reject malformed JSON", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/add-delegate",
        headers: { "content-type": "application/json" },
        payload: "{not json",
      });

      expect(res.statusCode).toBe(400);
    });

    it("should reject malformed text bodies", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/add-delegate",
        headers: { "content-type": "text/plain" },
        payload: "addrPort=100.64.0.2:4000",
      });

      expect(res.statusCode).toBe(400);
    });

    it("should reject bodies without a valid address", async () => {
      const missing = await app.inject({
        method: "POST",
        url: "/add-delegate",
        payload: { address: "100.64.0.2", port: 4000 },
      });
      const invalid = await app.inject({
        method: "POST",
        url: "/add-delegate",
        payload: { addrPort: "localhost:4000" },
      });

      expect(missing.statusCode).toBe(400);
      expect(invalid.statusCode).toBe(400);
      expect(directory.snapshot().delegates).toEqual([]);
    });

    it("should reject other methods", async () => {
      const res = await app.inject({ method: "GET", url: "/add-delegate" });

      expect(res.statusCode).toBe(405);
    });
  });

  describe("GET /ping", () => {
    it("should answer with an empty 200", async () => {
      const res = await app.inject({ method: "GET", url: "/ping" });

      expect(res.statusCode).toBe(200);
      expect(res.body).toBe("");
    });
  });

  it("should return 404 for unknown paths", async () => {
    const res = await app.inject({ method: "GET", url: "/nope" });

    expect(res.statusCode).toBe(404);
  });

  describe("enumerate", () => {
    it("should evict a delegate that cannot be reached", async () => {
      const { logger, entries } = captureLogger();
      handler = new ProtocolHandler({ directory, transport, config, logger });
      directory.advertise(42, "foo");
      directory.addDelegate({ address: LOCAL, port: 4001 });

      const services = await handler.enumerate();

      expect(services.map((s) => s.name)).toEqual(["foo"]);
      expect(directory.snapshot().delegates).toEqual([]);
      const removal = entries.find(
        (e) => e.message === "Delegate went away, removing it",
      );
      expect(removal?.level).toBe("info");
      expect(removal?.context.delegate).toBe("100.64.0.2:4001");
    });

    it("should keep a delegate that answers with malformed data", async () => {
      const { logger, entries } = captureLogger();
      handler = new ProtocolHandler({ directory, transport, config, logger });
      const broken: ProtocolEndpoint = {
        handleGetServices: async () => ({ status: 200, body: "not json" }),
        handleAddDelegate: () => ({ status: 200 }),
        handlePing: () => ({ status: 200 }),
      };
      transport.bind({ address: LOCAL, port: 4002 }, broken);
      directory.addDelegate({ address: LOCAL, port: 4002 });

      const services = await handler.enumerate();

      expect(services).toEqual([]);
      expect(directory.snapshot().delegates).toEqual([
        { address: LOCAL, port: 4002 },
      ]);
      const warning = entries.find(
        (e) => e.message === "Error fetching services from delegate",
      );
      expect(warning?.level).toBe("warn");
    });

    it("should query delegates one at a time in registration order", async () => {
      const calls: string[] = [];
      const endpoint = (name: string, port: number): ProtocolEndpoint => ({
        handleGetServices: async () => {
          calls.push(`start ${name}`);
          await new Promise((resolve) => setTimeout(resolve, 20));
          calls.push(`end ${name}`);
          return {
            status: 200,
            body: JSON.stringify([
              { name, labels: {}, addrPort: `${LOCAL}:${port}` },
            ]),
          };
        },
        handleAddDelegate: () => ({ status: 200 }),
        handlePing: () => ({ status: 200 }),
      });
      transport.bind({ address: LOCAL, port: 5001 }, endpoint("one", 5001));
      transport.bind({ address: LOCAL, port: 5002 }, endpoint("two", 5002));
      directory.addDelegate({ address: LOCAL, port: 5001 });
      directory.addDelegate({ address: LOCAL, port: 5002 });

      const services = await handler.enumerate();

      expect(services.map((s) => s.name)).toEqual(["one", "two"]);
      expect(calls).toEqual(["start one", "end one", "start two", "end two"]);
    });
  });
});
