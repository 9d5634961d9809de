// src/registry.ts

import { v4 as uuidv4 } from "uuid";
import { AddrPort, MemberRange } from "./address";
import { AddressSource } from "./address_source";
import { Clock } from "./clock";
import { DiscoveryConfig, resolveConfig } from "./config";
import { DiscoveryClient } from "./discovery_client";
import { AddressSourceError } from "./errors";
import { ComponentHealth, HealthCheckable } from "./health";
import { HttpRegistryTransport } from "./http_transport";
import { Logger, createLogger, describeError } from "./logger";
import { ProtocolHandler } from "./protocol_handler";
import { RegistryController, RegistryState } from "./registry_controller";
import { Labels, Service } from "./service";
import { ServiceDirectory } from "./service_directory";
import { TailscaleAddressSource } from "./tailscale_address_source";
import { RegistryTransport } from "./transport";

/**
 * Options accepted by startRegistry and the module-level query helpers.
 */
export interface RegistryOptions extends Partial<DiscoveryConfig> {
  /** Where local and peer addresses come from. Default: tailscaled. */
  addressSource?: AddressSource;
  /** Wire protocol client. Default: HTTP. */
  transport?: RegistryTransport;
  clock?: Clock;
  logger?: Logger;
}

/**
 * A running local registry: the services this process advertises, served to
 * the rest of the network by whichever role the registry currently holds.
 */
export class Registry implements HealthCheckable {
  readonly id: string;
  readonly directory: ServiceDirectory;
  readonly controller: RegistryController;
  readonly handler: ProtocolHandler;

  constructor(
    id: string,
    directory: ServiceDirectory,
    handler: ProtocolHandler,
    controller: RegistryController,
  ) {
    this.id = id;
    this.directory = directory;
    this.handler = handler;
    this.controller = controller;
  }

  get localAddress(): string {
    return this.directory.localAddress;
  }

  get state(): RegistryState {
    return this.controller.state;
  }

  /**
   * Advertises a service listening on `port` of this host.
   */
  advertise(port: number, name: string, labels?: Labels | null): Service {
    return this.directory.advertise(port, name, labels);
  }

  /**
   * Advertises a service on another host of the private network.
   */
  advertiseRemote(
    target: AddrPort | string,
    name: string,
    labels?: Labels | null,
  ): Service {
    return this.directory.advertiseRemote(target, name, labels);
  }

  unlist(port: number): Service {
    return this.directory.unlist(port);
  }

  unlistRemote(target: AddrPort | string): Service {
    return this.directory.unlistRemote(target);
  }

  services(): readonly Service[] {
    return this.directory.services();
  }

  waitForState(
    states: RegistryState | RegistryState[],
    timeoutMs?: number,
  ): Promise<RegistryState> {
    return this.controller.waitForState(states, timeoutMs);
  }

  getHealth(): ComponentHealth {
    const health = this.controller.getHealth();
    return {
      ...health,
      name: "Registry",
      details: {
        ...health.details,
        registryId: this.id,
        services: this.directory.services().length,
      },
    };
  }

  async stop(): Promise<void> {
    await this.controller.stop();
  }
}

/**
 * Creates a registry for this host and starts competing for the well-known
 * port in the background. The local address is read once, here.
 */
export async function startRegistry(
  options: RegistryOptions = {},
): Promise<Registry> {
  const config = resolveConfig(options);
  const id = uuidv4().slice(0, 8);
  const logger = (options.logger ?? createLogger("Registry")).child({
    registryId: id,
  });
  const addressSource = options.addressSource ?? new TailscaleAddressSource();
  const transport = options.transport ?? new HttpRegistryTransport();

  let localAddress: string;
  try {
    localAddress = (await addressSource.status()).localAddress;
  } catch (err) {
    if (err instanceof AddressSourceError) {
      throw err;
    }
    throw new AddressSourceError(
      "Cannot determine local address",
      describeError(err),
    );
  }

  const directory = new ServiceDirectory(localAddress, {
    memberRange: new MemberRange(config.memberSubnet),
    logger,
  });
  const handler = new ProtocolHandler({ directory, transport, config, logger });
  const controller = new RegistryController({
    handler,
    transport,
    localAddress,
    config,
    clock: options.clock,
    logger,
  });

  const registry = new Registry(id, directory, handler, controller);
  controller.start();
  return registry;
}

function createClient(options: RegistryOptions): DiscoveryClient {
  return new DiscoveryClient({
    addressSource: options.addressSource ?? new TailscaleAddressSource(),
    transport: options.transport,
    config: resolveConfig(options),
    logger: options.logger,
  });
}

/**
 * Lists the services advertised by every registry on the network.
 */
export function listServices(options: RegistryOptions = {}): Promise<Service[]> {
  return createClient(options).listServices();
}

/**
 * Finds the first service named `name` carrying all of `labels`.
 */
export function findService(
  name: string,
  labels: Labels = {},
  options: RegistryOptions = {},
): Promise<AddrPort> {
  return createClient(options).findService(name, labels);
}
