// src/transport.ts

import { AddrPort, formatAddrPort } from "./address";
import { ProtocolError } from "./errors";
import { Service, ServiceListSchema } from "./service";

/**
 * Client side of the registry wire protocol.
 *
 * Every method rejects with PeerUnreachableError when the peer cannot be
 * reached (refused, reset, timed out) and with ProtocolError when it answers
 * with something other than the protocol's success response.
 */
export interface RegistryTransport {
  /**
   * Fetches the services a registry advertises (GET /services).
   * @param target The registry's address and port.
   * @param timeoutMs Upper bound for the whole exchange.
   */
  getServices(target: AddrPort, timeoutMs: number): Promise<Service[]>;

  /**
   * Registers `delegate` with the leader at `leader` (POST /add-delegate).
   */
  addDelegate(
    leader: AddrPort,
    delegate: AddrPort,
    timeoutMs: number,
  ): Promise<void>;

  /**
   * Liveness probe (GET /ping).
   */
  ping(target: AddrPort, timeoutMs: number): Promise<void>;
}

/**
 * Validates a decoded /services payload.
 */
export function parseServiceList(payload: unknown, target: AddrPort): Service[] {
  const parsed = ServiceListSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ProtocolError(
      `Malformed service list from ${formatAddrPort(target)}: ${issue ? `${issue.path.join(".")} ${issue.message}` : parsed.error.message}`,
      formatAddrPort(target),
    );
  }
  return parsed.data;
}

/**
 * Throws ProtocolError unless a response carries status 200.
 */
export function expectOk(status: number, target: AddrPort, path: string): void {
  if (status !== 200) {
    throw new ProtocolError(
      `Unexpected status ${status} for ${path} from ${formatAddrPort(target)}`,
      formatAddrPort(target),
      status,
    );
  }
}

/**
 * Decodes and validates the body of a /services response.
 */
export function decodeServiceList(body: string, target: AddrPort): Service[] {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    throw new ProtocolError(
      `Invalid JSON in /services response from ${formatAddrPort(target)}`,
      formatAddrPort(target),
      200,
    );
  }
  return parseServiceList(payload, target);
}
