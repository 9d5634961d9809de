// src/discovery_client.ts

import { AddrPort, addrPort, formatAddrPort } from "./address";
import { AddressSource, onlineAddresses } from "./address_source";
import { DiscoveryConfig, resolveConfig } from "./config";
import {
  AddressSourceError,
  NoMatchingServiceError,
  PeerUnreachableError,
} from "./errors";
import { HttpRegistryTransport } from "./http_transport";
import { Logger, createLogger, describeError } from "./logger";
import { Labels, Service, serviceMatches } from "./service";
import { RegistryTransport } from "./transport";

export interface DiscoveryClientOptions {
  addressSource: AddressSource;
  transport?: RegistryTransport;
  config?: Partial<Pick<DiscoveryConfig, "port" | "requestTimeoutMs">>;
  logger?: Logger;
}

/**
 * Queries every registry on the network and merges what they advertise.
 *
 * @example
 * ```typescript
 * const client = new DiscoveryClient({ addressSource: new TailscaleAddressSource() });
 * const target = await client.findService("api", { env: "prod" });
 * ```
 */
export class DiscoveryClient {
  private readonly addressSource: AddressSource;
  private readonly transport: RegistryTransport;
  private readonly port: number;
  private readonly requestTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: DiscoveryClientOptions) {
    const config = resolveConfig(options.config);
    this.addressSource = options.addressSource;
    this.transport = options.transport ?? new HttpRegistryTransport();
    this.port = config.port;
    this.requestTimeoutMs = config.requestTimeoutMs;
    this.log = (options.logger ?? createLogger("DiscoveryClient")).child({
      component: "DiscoveryClient",
    });
  }

  /**
   * Lists the services of every registry on the network: the local host's
   * first, then each online peer's in the order the address source reports
   * them. Peers are queried concurrently; one that fails is left out.
   */
  async listServices(): Promise<Service[]> {
    const addresses = await this.listAddresses();
    const parts = await Promise.all(
      addresses.map((address) => this.fetchFrom(addrPort(address, this.port))),
    );
    return parts.flat();
  }

  /**
   * Returns the address of the first service, in listServices order, named
   * `name` whose labels include every entry of `labels`.
   */
  async findService(name: string, labels: Labels = {}): Promise<AddrPort> {
    const services = await this.listServices();
    const match = services.find((s) => serviceMatches(s, name, labels));
    if (!match) {
      throw new NoMatchingServiceError(name, { ...labels });
    }
    return match.addrPort;
  }

  private async listAddresses(): Promise<string[]> {
    try {
      return onlineAddresses(await this.addressSource.status());
    } catch (err) {
      if (err instanceof AddressSourceError) {
        throw err;
      }
      throw new AddressSourceError(
        "Cannot list network addresses",
        describeError(err),
      );
    }
  }

  private async fetchFrom(target: AddrPort): Promise<Service[]> {
    try {
      return await this.transport.getServices(target, this.requestTimeoutMs);
    } catch (err) {
      if (err instanceof PeerUnreachableError) {
        this.log.debug("Error connecting to registry", {
          target: formatAddrPort(target),
          error: err.message,
        });
      } else {
        this.log.warn("Error fetching services from registry", {
          target: formatAddrPort(target),
          error: describeError(err),
        });
      }
      return [];
    }
  }
}
