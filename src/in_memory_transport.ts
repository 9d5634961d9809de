// src/in_memory_transport.ts

import { AddrPort, formatAddrPort } from "./address";
import { PeerUnreachableError } from "./errors";
import { ProtocolEndpoint, ProtocolResponse } from "./protocol_handler";
import { Service } from "./service";
import { RegistryTransport, decodeServiceList, expectOk } from "./transport";

/**
 * An in-memory implementation of RegistryTransport. Endpoints are bound to
 * addresses by hand; requests to an unbound address fail the way a refused
 * connection would, and bodies go through JSON just as they would on the wire.
 *
 * For multi-registry tests, bind every registry's ProtocolHandler into one
 * shared instance.
 */
export class InMemoryRegistryTransport implements RegistryTransport {
  private readonly endpoints = new Map<string, ProtocolEndpoint>();
  private readonly latencies = new Map<string, number>();

  bind(target: AddrPort, endpoint: ProtocolEndpoint): void {
    this.endpoints.set(formatAddrPort(target), endpoint);
  }

  unbind(target: AddrPort): void {
    this.endpoints.delete(formatAddrPort(target));
  }

  isBound(target: AddrPort): boolean {
    return this.endpoints.has(formatAddrPort(target));
  }

  /**
   * Delays every response from `target` by `ms`.
   */
  setLatency(target: AddrPort, ms: number): void {
    this.latencies.set(formatAddrPort(target), ms);
  }

  async getServices(target: AddrPort, timeoutMs: number): Promise<Service[]> {
    const res = await this.dispatch(target, timeoutMs, (endpoint) =>
      endpoint.handleGetServices(),
    );
    expectOk(res.status, target, "/services");
    return decodeServiceList(res.body ?? "", target);
  }

  async addDelegate(
    leader: AddrPort,
    delegate: AddrPort,
    timeoutMs: number,
  ): Promise<void> {
    const body = JSON.stringify({ addrPort: formatAddrPort(delegate) });
    const res = await this.dispatch(leader, timeoutMs, async (endpoint) =>
      endpoint.handleAddDelegate(body),
    );
    expectOk(res.status, leader, "/add-delegate");
  }

  async ping(target: AddrPort, timeoutMs: number): Promise<void> {
    const res = await this.dispatch(target, timeoutMs, async (endpoint) =>
      endpoint.handlePing(),
    );
    expectOk(res.status, target, "/ping");
  }

  private async dispatch(
    target: AddrPort,
    timeoutMs: number,
    call: (endpoint: ProtocolEndpoint) => Promise<ProtocolResponse>,
  ): Promise<ProtocolResponse> {
    const key = formatAddrPort(target);
    const endpoint = this.endpoints.get(key);
    if (!endpoint) {
      throw new PeerUnreachableError(key, new Error("connection refused"));
    }

    const latency = this.latencies.get(key) ?? 0;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new PeerUnreachableError(
              key,
              new Error(`timed out after ${timeoutMs}ms`),
            ),
          ),
        timeoutMs,
      );
    });

    try {
      return await Promise.race([
        delay(latency).then(() => call(endpoint)),
        deadline,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function delay(ms: number): Promise<void> {
  return ms > 0
    ? new Promise((resolve) => setTimeout(resolve, ms))
    : Promise.resolve();
}
