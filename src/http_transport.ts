// src/http_transport.ts

import { AddrPort, formatAddrPort } from "./address";
import { PeerUnreachableError } from "./errors";
import { Service } from "./service";
import { RegistryTransport, decodeServiceList, expectOk } from "./transport";

interface HttpExchange {
  status: number;
  body: string;
}

/**
 * RegistryTransport over plain HTTP, the protocol registries serve.
 */
export class HttpRegistryTransport implements RegistryTransport {
  async getServices(target: AddrPort, timeoutMs: number): Promise<Service[]> {
    const res = await this.exchange(target, "/services", timeoutMs, {
      method: "GET",
    });
    expectOk(res.status, target, "/services");
    return decodeServiceList(res.body, target);
  }

  async addDelegate(
    leader: AddrPort,
    delegate: AddrPort,
    timeoutMs: number,
  ): Promise<void> {
    const res = await this.exchange(leader, "/add-delegate", timeoutMs, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ addrPort: formatAddrPort(delegate) }),
    });
    expectOk(res.status, leader, "/add-delegate");
  }

  async ping(target: AddrPort, timeoutMs: number): Promise<void> {
    const res = await this.exchange(target, "/ping", timeoutMs, {
      method: "GET",
    });
    expectOk(res.status, target, "/ping");
  }

  /**
   * Performs one request and reads the full body. Anything that goes wrong
   * before the body is complete counts as the peer being unreachable.
   */
  private async exchange(
    target: AddrPort,
    path: string,
    timeoutMs: number,
    init: RequestInit,
  ): Promise<HttpExchange> {
    const url = `http://${formatAddrPort(target)}${path}`;
    try {
      const res = await fetch(url, {
        ...init,
        signal: AbortSignal.timeout(timeoutMs),
      });
      const body = await res.text();
      return { status: res.status, body };
    } catch (err) {
      throw new PeerUnreachableError(
        formatAddrPort(target),
        connectivityCause(err),
      );
    }
  }
}

/**
 * fetch wraps socket errors in a generic "fetch failed" TypeError; surface the
 * underlying cause (ECONNREFUSED and friends) when there is one.
 */
function connectivityCause(err: unknown): Error {
  if (err instanceof Error) {
    return err.cause instanceof Error ? err.cause : err;
  }
  return new Error(String(err));
}
