// test/tailscale_address_source.test.ts

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import Fastify, { FastifyInstance } from "fastify";
import { TailscaleAddressSource } from "../src/tailscale_address_source";
import { AddressSourceError } from "../src/errors";

describe("TailscaleAddressSource", () => {
  let dir: string;
  let socketPath: string;
  let daemon: FastifyInstance;
  let reply: { status: number; body: string };
  let hostHeader: string | undefined;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "peerdisc-ts-"));
    socketPath = path.join(dir, "tailscaled.sock");
    reply = { status: 200, body: "{}" };
    hostHeader = undefined;
    daemon = Fastify({ logger: false });
    daemon.get("/localapi/v0/status", async (request, res) => {
      hostHeader = request.headers.host;
      return res.code(reply.status).type("application/json").send(reply.body);
    });
    await daemon.listen({ path: socketPath });
  });

  afterEach(async () => {
    await daemon.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function respond(body: unknown, status = 200): void {
    reply = {
      status,
      body: typeof body === "string" ? body : JSON.stringify(body),
    };
  }

  it("should report the local IPv4 address and peers", async () => {
    respond({
      TailscaleIPs: ["fd7a:115c:a1e0::1", "100.64.0.1"],
      Peer: {
        "nodekey:a": {
          Online: true,
          TailscaleIPs: ["100.64.0.2", "fd7a:115c:a1e0::2"],
        },
        "nodekey:b": { Online: false, TailscaleIPs: ["100.64.0.3"] },
        "nodekey:c": { TailscaleIPs: ["100.64.0.4"] },
      },
    });
    const source = new TailscaleAddressSource({ socketPath });

    const status = await source.status();

    expect(status).toEqual({
      localAddress: "100.64.0.1",
      peers: [
        { address: "100.64.0.2", online: true },
        { address: "100.64.0.3", online: false },
        { address: "100.64.0.4", online: false },
      ],
    });
    expect(hostHeader).toBe("local-tailscaled.sock");
  });

  it("should skip peers without an IPv4 address", async () => {
    respond({
      TailscaleIPs: ["100.64.0.1"],
      Peer: {
        "nodekey:a": { Online: true, TailscaleIPs: ["fd7a:115c:a1e0::2"] },
        "nodekey:b": { Online: true, TailscaleIPs: null },
      },
    });
    const source = new TailscaleAddressSource({ socketPath });

    await expect(source.status()).resolves.toEqual({
      localAddress: "100.64.0.1",
      peers: [],
    });
  });

  it("should accept a status without peers", async () => {
    respond({ TailscaleIPs: ["100.64.0.1"], Peer: null });
    const source = new TailscaleAddressSource({ socketPath });

    await expect(source.status()).resolves.toEqual({
      localAddress: "100.64.0.1",
      peers: [],
    });
  });

  it("should fail when the local host has no IPv4 address", async () => {
    respond({ TailscaleIPs: ["fd7a:115c:a1e0::1"] });
    const source = new TailscaleAddressSource({ socketPath });

    const result = source.status();

    await expect(result).rejects.toThrow(AddressSourceError);
    await expect(result).rejects.toThrow(
      "Cannot find IPv4 Tailscale address for local host",
    );
  });

  it("should fail on a non-200 answer", async () => {
    respond({ error: "not running" }, 503);
    const source = new TailscaleAddressSource({ socketPath });

    await expect(source.status()).rejects.toThrow(
      "503 Service Unavailable while reading tailnet status",
    );
  });

  it("should fail on a body that is not JSON", async () => {
    respond("<html>");
    const source = new TailscaleAddressSource({ socketPath });

    await expect(source.status()).rejects.toThrow("Cannot decode tailnet status");
  });

  it("should fail on a body of the wrong shape", async () => {
    respond({ TailscaleIPs: "100.64.0.1" });
    const source = new TailscaleAddressSource({ socketPath });

    await expect(source.status()).rejects.toThrow("Cannot decode tailnet status");
  });

  it("should fail when the daemon socket is missing", async () => {
    const source = new TailscaleAddressSource({
      socketPath: path.join(dir, "missing.sock"),
    });

    const result = source.status();

    await expect(result).rejects.toThrow(AddressSourceError);
    await expect(result).rejects.toThrow("Error reading tailnet status");
  });
});
