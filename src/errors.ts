// src/errors.ts

/**
 * Base error class for all peerdisc errors.
 */
export class PeerdiscError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "PeerdiscError";
  }
}

/**
 * Error thrown when a service is advertised at an address that is already
 * taken in the directory.
 */
export class DuplicateAddressError extends PeerdiscError {
  constructor(addrPort: string) {
    super(`Address ${addrPort} already registered`, "DUPLICATE_ADDRESS", {
      addrPort,
    });
    this.name = "DuplicateAddressError";
  }
}

/**
 * Error thrown when a remote advertisement names an address outside the
 * private network.
 */
export class NonMemberAddressError extends PeerdiscError {
  constructor(address: string) {
    super(
      `Address ${address} is not part of the private network`,
      "NON_MEMBER_ADDRESS",
      { address },
    );
    this.name = "NonMemberAddressError";
  }
}

/**
 * Error thrown when unlisting a service that is not advertised.
 */
export class ServiceNotFoundError extends PeerdiscError {
  constructor(addrPort: string) {
    super(`No service at ${addrPort}`, "SERVICE_NOT_FOUND", { addrPort });
    this.name = "ServiceNotFoundError";
  }
}

/**
 * Error thrown when findService has no candidate matching name and labels.
 */
export class NoMatchingServiceError extends PeerdiscError {
  constructor(name: string, labels: Record<string, string>) {
    super(`No matching service found for ${name}`, "NO_MATCHING_SERVICE", {
      name,
      labels,
    });
    this.name = "NoMatchingServiceError";
  }
}

/**
 * Error thrown when a delegate tries to register from another host.
 */
export class NonLocalDelegateError extends PeerdiscError {
  constructor(addrPort: string, localAddress: string) {
    super(
      `Delegate ${addrPort} is not on local address ${localAddress}`,
      "NON_LOCAL_DELEGATE",
      { addrPort, localAddress },
    );
    this.name = "NonLocalDelegateError";
  }
}

/**
 * Error thrown for arguments that can never be valid, such as port 0.
 */
export class InvalidArgumentError extends PeerdiscError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INVALID_ARGUMENT", context);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Error thrown for settings supplied on the command line or through the
 * environment that cannot be used.
 */
export class ConfigurationError extends PeerdiscError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INVALID_CONFIGURATION", context);
    this.name = "ConfigurationError";
  }
}

/**
 * Error thrown when a peer cannot be reached at the transport level
 * (connection refused or reset, timeout).
 */
export class PeerUnreachableError extends PeerdiscError {
  readonly originalCause?: Error;

  constructor(target: string, cause?: Error) {
    super(
      `Cannot reach ${target}${cause ? `: ${cause.message}` : ""}`,
      "PEER_UNREACHABLE",
      { target, cause: cause?.message },
    );
    this.name = "PeerUnreachableError";
    this.originalCause = cause;
  }
}

/**
 * Error thrown when a peer answered, but not with what the protocol expects.
 */
export class ProtocolError extends PeerdiscError {
  constructor(message: string, target: string, status?: number) {
    super(message, "PROTOCOL_ERROR", { target, status });
    this.name = "ProtocolError";
  }
}

/**
 * Error thrown when the set of network addresses cannot be determined.
 */
export class AddressSourceError extends PeerdiscError {
  constructor(message: string, cause?: string) {
    super(message, "ADDRESS_SOURCE_FAILED", { cause });
    this.name = "AddressSourceError";
  }
}

/**
 * Error thrown when the registry cannot listen on any port at all.
 */
export class BindError extends PeerdiscError {
  constructor(address: string, cause?: string) {
    super(
      `Couldn't bind to any port on ${address}${cause ? `: ${cause}` : ""}`,
      "BIND_FAILED",
      { address, cause },
    );
    this.name = "BindError";
  }
}

/**
 * Error thrown when waiting on the registry exceeds its deadline.
 */
export class TimeoutError extends PeerdiscError {
  constructor(operation: string, timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`, "TIMEOUT", {
      operation,
      timeoutMs,
    });
    this.name = "TimeoutError";
  }
}
