// src/address_source.ts

/**
 * A peer host as reported by the network's status API.
 */
export interface PeerStatus {
  address: string;
  online: boolean;
}

/**
 * Reduced view of the private network: this host's address and its peers.
 */
export interface NetworkStatus {
  localAddress: string;
  peers: PeerStatus[];
}

/**
 * Source of the addresses discovery operates on. Implementations throw
 * AddressSourceError when the status cannot be determined.
 */
export interface AddressSource {
  status(): Promise<NetworkStatus>;
}

/**
 * Addresses to query for a status: the local host first, then every online
 * peer in the order the source reported them.
 */
export function onlineAddresses(status: NetworkStatus): string[] {
  return [
    status.localAddress,
    ...status.peers.filter((p) => p.online).map((p) => p.address),
  ];
}

/**
 * An address source over a fixed, mutable peer list. Useful for tests and for
 * networks whose membership is configured by hand.
 */
export class StaticAddressSource implements AddressSource {
  private readonly localAddress: string;
  private peers: PeerStatus[];

  constructor(localAddress: string, peers: Array<string | PeerStatus> = []) {
    this.localAddress = localAddress;
    this.peers = peers.map((p) =>
      typeof p === "string" ? { address: p, online: true } : { ...p },
    );
  }

  async status(): Promise<NetworkStatus> {
    return {
      localAddress: this.localAddress,
      peers: this.peers.map((p) => ({ ...p })),
    };
  }

  /**
   * Replaces the peer list.
   */
  setPeers(peers: Array<string | PeerStatus>): void {
    this.peers = peers.map((p) =>
      typeof p === "string" ? { address: p, online: true } : { ...p },
    );
  }

  setOnline(address: string, online: boolean): void {
    for (const peer of this.peers) {
      if (peer.address === address) {
        peer.online = online;
      }
    }
  }
}
