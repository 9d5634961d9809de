// src/service_directory.ts

import {
  AddrPort,
  MemberRange,
  addrPort,
  formatAddrPort,
  isValidPort,
  parseAddrPort,
  sameAddrPort,
} from "./address";
import {
  DuplicateAddressError,
  InvalidArgumentError,
  NonLocalDelegateError,
  NonMemberAddressError,
  ServiceNotFoundError,
} from "./errors";
import { Logger, createLogger } from "./logger";
import { Service, createService, formatLabels } from "./service";

/**
 * Point-in-time copy of a directory's contents.
 */
export interface DirectorySnapshot {
  services: readonly Service[];
  delegates: readonly AddrPort[];
}

export interface ServiceDirectoryOptions {
  /** Address range remote advertisements must fall into. */
  memberRange?: MemberRange;
  logger?: Logger;
}

/**
 * In-memory list of the services one registry advertises, plus the delegate
 * registries on the same host whose services it reports while leading.
 *
 * The local address is fixed at construction: if the host later moves to a
 * different network, entries keep pointing at the address they were made for.
 *
 * Every method runs to completion without yielding, so each call is atomic
 * with respect to request handlers. Callers that go on to do network I/O work
 * from snapshot() rather than holding references into the directory.
 */
export class ServiceDirectory {
  readonly localAddress: string;
  private readonly memberRange: MemberRange;
  private readonly log: Logger;
  private localServices: Service[] = [];
  private delegates: AddrPort[] = [];

  constructor(localAddress: string, options: ServiceDirectoryOptions = {}) {
    this.localAddress = localAddress;
    this.memberRange = options.memberRange ?? new MemberRange();
    this.log = (options.logger ?? createLogger("ServiceDirectory")).child({
      component: "ServiceDirectory",
    });
  }

  /**
   * Advertises a service running on this host.
   */
  advertise(
    port: number,
    name: string,
    labels?: Record<string, string> | null,
  ): Service {
    if (!isValidPort(port)) {
      throw new InvalidArgumentError(`Invalid port ${port}`, { port });
    }
    return this.add(addrPort(this.localAddress, port), name, labels);
  }

  /**
   * Advertises a service on another host of the private network, for
   * services that cannot run a registry themselves.
   */
  advertiseRemote(
    target: AddrPort | string,
    name: string,
    labels?: Record<string, string> | null,
  ): Service {
    const ap = toAddrPort(target);
    if (!this.memberRange.contains(ap.address)) {
      throw new NonMemberAddressError(ap.address);
    }
    return this.add(ap, name, labels);
  }

  /**
   * Removes the service advertised at `port` on this host.
   */
  unlist(port: number): Service {
    return this.remove(addrPort(this.localAddress, port));
  }

  /**
   * Removes a service previously added with advertiseRemote.
   */
  unlistRemote(target: AddrPort | string): Service {
    return this.remove(toAddrPort(target));
  }

  services(): readonly Service[] {
    return [...this.localServices];
  }

  /**
   * Records a delegate registry. Returns false when it was already known.
   */
  addDelegate(delegate: AddrPort): boolean {
    if (delegate.address !== this.localAddress) {
      throw new NonLocalDelegateError(
        formatAddrPort(delegate),
        this.localAddress,
      );
    }
    if (this.delegates.some((d) => sameAddrPort(d, delegate))) {
      return false;
    }
    this.delegates.push({ address: delegate.address, port: delegate.port });
    return true;
  }

  /**
   * Forgets a delegate. Returns false when it was not registered.
   */
  removeDelegate(delegate: AddrPort): boolean {
    const before = this.delegates.length;
    this.delegates = this.delegates.filter((d) => !sameAddrPort(d, delegate));
    return this.delegates.length !== before;
  }

  snapshot(): DirectorySnapshot {
    return {
      services: [...this.localServices],
      delegates: this.delegates.map((d) => ({ ...d })),
    };
  }

  private add(
    ap: AddrPort,
    name: string,
    labels?: Record<string, string> | null,
  ): Service {
    if (this.localServices.some((s) => sameAddrPort(s.addrPort, ap))) {
      throw new DuplicateAddressError(formatAddrPort(ap));
    }
    const service = createService(name, ap, labels);
    this.localServices.push(service);
    this.log.info("Advertising new service", {
      name,
      labels: formatLabels(service.labels),
      address: formatAddrPort(ap),
    });
    return service;
  }

  private remove(ap: AddrPort): Service {
    const index = this.localServices.findIndex((s) =>
      sameAddrPort(s.addrPort, ap),
    );
    if (index < 0) {
      throw new ServiceNotFoundError(formatAddrPort(ap));
    }
    const [removed] = this.localServices.splice(index, 1);
    this.log.info("Unlisted service", {
      name: removed.name,
      address: formatAddrPort(ap),
    });
    return removed;
  }
}

function toAddrPort(target: AddrPort | string): AddrPort {
  if (typeof target !== "string") {
    if (!isValidPort(target.port)) {
      throw new InvalidArgumentError(`Invalid port ${target.port}`, {
        port: target.port,
      });
    }
    return target;
  }
  const parsed = parseAddrPort(target);
  if (!parsed) {
    throw new InvalidArgumentError(`Invalid address ${target}`, { target });
  }
  return parsed;
}
