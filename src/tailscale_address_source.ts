// src/tailscale_address_source.ts

import * as http from "http";
import { z } from "zod";
import { findIPv4 } from "./address";
import { AddressSource, NetworkStatus, PeerStatus } from "./address_source";
import { AddressSourceError } from "./errors";
import { describeError } from "./logger";

export const DEFAULT_TAILSCALE_SOCKET = "/var/run/tailscale/tailscaled.sock";

export interface TailscaleAddressSourceConfig {
  /** Path of tailscaled's local API socket. */
  socketPath: string;
  /** Timeout for the status request (ms). Default: 500 */
  timeoutMs: number;
}

const TailscaleStatusSchema = z.object({
  TailscaleIPs: z.array(z.string()).nullish(),
  Peer: z
    .record(
      z.object({
        Online: z.boolean().optional(),
        TailscaleIPs: z.array(z.string()).nullish(),
      }),
    )
    .nullish(),
});

/**
 * Reads the online address set of a Tailscale network from the local
 * tailscaled daemon. Talks to the daemon's socket API directly instead of
 * going through its client library, whose status types change between
 * releases.
 */
export class TailscaleAddressSource implements AddressSource {
  private readonly config: TailscaleAddressSourceConfig;

  constructor(config: Partial<TailscaleAddressSourceConfig> = {}) {
    this.config = {
      socketPath: config.socketPath ?? DEFAULT_TAILSCALE_SOCKET,
      timeoutMs: config.timeoutMs ?? 500,
    };
  }

  async status(): Promise<NetworkStatus> {
    const body = await this.fetchStatus();

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new AddressSourceError(
        "Cannot decode tailnet status",
        describeError(err),
      );
    }
    const parsed = TailscaleStatusSchema.safeParse(json);
    if (!parsed.success) {
      throw new AddressSourceError(
        "Cannot decode tailnet status",
        parsed.error.message,
      );
    }

    const localAddress = findIPv4(parsed.data.TailscaleIPs ?? []);
    if (!localAddress) {
      throw new AddressSourceError(
        "Cannot find IPv4 Tailscale address for local host",
      );
    }

    const peers: PeerStatus[] = [];
    for (const peer of Object.values(parsed.data.Peer ?? {})) {
      const address = findIPv4(peer.TailscaleIPs ?? []);
      if (address) {
        peers.push({ address, online: peer.Online === true });
      }
    }
    return { localAddress, peers };
  }

  private fetchStatus(): Promise<string> {
    return new Promise((resolve, reject) => {
      const req = http.request(
        {
          socketPath: this.config.socketPath,
          path: "/localapi/v0/status",
          method: "GET",
          headers: { Host: "local-tailscaled.sock" },
          timeout: this.config.timeoutMs,
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on("data", (chunk: Buffer) => chunks.push(chunk));
          res.on("error", (err) =>
            reject(
              new AddressSourceError(
                "Error reading tailnet status",
                err.message,
              ),
            ),
          );
          res.on("end", () => {
            if (res.statusCode !== 200) {
              reject(
                new AddressSourceError(
                  `${res.statusCode} ${res.statusMessage ?? ""} while reading tailnet status`.trim(),
                ),
              );
              return;
            }
            resolve(Buffer.concat(chunks).toString("utf8"));
          });
        },
      );
      req.on("timeout", () => {
        req.destroy(new Error(`timed out after ${this.config.timeoutMs}ms`));
      });
      req.on("error", (err) =>
        reject(
          new AddressSourceError("Error reading tailnet status", err.message),
        ),
      );
      req.end();
    });
  }
}
