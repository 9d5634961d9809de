// src/registry_controller.ts

import { EventEmitter } from "events";
import { FastifyInstance } from "fastify";
import { AddrPort, addrPort, formatAddrPort } from "./address";
import { Clock, systemClock } from "./clock";
import { DiscoveryConfig } from "./config";
import { BindError, TimeoutError } from "./errors";
import { ComponentHealth, HealthCheckable } from "./health";
import { Logger, createLogger, describeError } from "./logger";
import { ProtocolHandler } from "./protocol_handler";
import { RegistryTransport } from "./transport";

/**
 * Lifecycle states of a registry.
 *
 * - unbound: about to (re)try the well-known port
 * - leader: serving on the well-known port; only left when stopped
 * - delegate-attempt: serving on an ephemeral port, registering with the leader
 * - delegate-serving: registered; watching the leader's liveness
 * - stopped: stop() completed
 * - failed: no port could be bound at all
 */
export type RegistryState =
  | "unbound"
  | "leader"
  | "delegate-attempt"
  | "delegate-serving"
  | "stopped"
  | "failed";

export interface RegistryControllerOptions {
  handler: ProtocolHandler;
  transport: RegistryTransport;
  localAddress: string;
  config: Pick<
    DiscoveryConfig,
    | "port"
    | "requestTimeoutMs"
    | "probeIntervalMs"
    | "probeTimeoutMs"
    | "retryBackoffMs"
  >;
  clock?: Clock;
  logger?: Logger;
}

interface BoundServer {
  server: FastifyInstance;
  addrPort: AddrPort;
}

/** What the election loop does after a delegate round ends. */
type DelegateOutcome = "retry" | "backoff" | "stopped";

type ServeExit = "stopped" | "closed";

/**
 * Decides whether this registry leads its host or delegates to the leader,
 * and keeps re-deciding as registries come and go.
 *
 * Leadership is whoever holds the well-known port: the OS arbitrates, so no
 * election messages are exchanged. A registry that loses the race serves on an
 * ephemeral port, registers with the leader, and probes it periodically; when
 * the leader disappears the delegate shuts down (draining in-flight requests)
 * and races for the port again.
 *
 * Events:
 * - 'state': (state, previous) on every transition
 * - 'fatal': (error) when no port could be bound; the loop does not retry
 *
 * @example
 * ```typescript
 * const controller = new RegistryController({ handler, transport, localAddress, config });
 * controller.on("fatal", (err) => process.exit(1));
 * controller.start();
 * await controller.waitForState(["leader", "delegate-serving"]);
 * ```
 */
export class RegistryController extends EventEmitter implements HealthCheckable {
  private readonly handler: ProtocolHandler;
  private readonly transport: RegistryTransport;
  private readonly localAddress: string;
  private readonly config: RegistryControllerOptions["config"];
  private readonly clock: Clock;
  private readonly log: Logger;

  private readonly abort = new AbortController();
  private loop?: Promise<void>;
  private _state: RegistryState = "unbound";
  private listenAddress?: AddrPort;
  private failure?: Error;

  constructor(options: RegistryControllerOptions) {
    super();
    this.handler = options.handler;
    this.transport = options.transport;
    this.localAddress = options.localAddress;
    this.config = options.config;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? createLogger("RegistryController")).child({
      component: "RegistryController",
    });
  }

  get state(): RegistryState {
    return this._state;
  }

  /**
   * Address the protocol server currently listens on, if any.
   */
  getListenAddress(): AddrPort | undefined {
    return this.listenAddress;
  }

  /**
   * The error that ended the loop, when the state is 'failed'.
   */
  getFailure(): Error | undefined {
    return this.failure;
  }

  isRunning(): boolean {
    return this.loop !== undefined && !this.isFinal(this._state);
  }

  /**
   * Starts the election loop in the background. Calling it again is a no-op.
   */
  start(): void {
    if (this.loop) {
      this.log.warn("RegistryController already started");
      return;
    }
    this.log.info("Starting registry", {
      address: this.localAddress,
      port: this.config.port,
    });
    this.loop = this.run().then(
      () => {
        this.setState("stopped");
      },
      (err: unknown) => {
        this.failure = err instanceof Error ? err : new Error(String(err));
        this.log.error("Registry cannot participate in discovery", this.failure);
        this.setState("failed");
        this.emit("fatal", this.failure);
      },
    );
  }

  /**
   * Stops the loop and closes the active server, letting in-flight requests
   * finish first.
   */
  async stop(): Promise<void> {
    this.abort.abort();
    if (this.loop) {
      await this.loop;
    } else {
      this.setState("stopped");
    }
  }

  /**
   * Resolves once the controller is in one of `states`. Rejects with the
   * fatal error if the loop fails first, or with TimeoutError.
   */
  waitForState(
    states: RegistryState | RegistryState[],
    timeoutMs = 10000,
  ): Promise<RegistryState> {
    const wanted = Array.isArray(states) ? states : [states];
    if (wanted.includes(this._state)) {
      return Promise.resolve(this._state);
    }

    return new Promise((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        this.removeListener("state", onState);
      };
      const onState = (state: RegistryState): void => {
        if (wanted.includes(state)) {
          cleanup();
          resolve(state);
        } else if (state === "failed") {
          cleanup();
          reject(this.failure ?? new Error("Registry failed"));
        }
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(
          new TimeoutError(`waiting for state ${wanted.join("|")}`, timeoutMs),
        );
      }, timeoutMs);
      this.on("state", onState);
    });
  }

  getHealth(): ComponentHealth {
    const details = {
      state: this._state,
      address: this.listenAddress
        ? formatAddrPort(this.listenAddress)
        : undefined,
    };
    switch (this._state) {
      case "leader":
      case "delegate-serving":
        return {
          name: "RegistryController",
          status: "healthy",
          message: `Serving as ${this._state === "leader" ? "leader" : "delegate"}`,
          details,
        };
      case "failed":
        return {
          name: "RegistryController",
          status: "unhealthy",
          message: this.failure?.message ?? "Registry failed",
          details,
        };
      case "stopped":
        return {
          name: "RegistryController",
          status: "unhealthy",
          message: "Registry stopped",
          details,
        };
      default:
        return {
          name: "RegistryController",
          status: "degraded",
          message: "Registry is not serving yet",
          details,
        };
    }
  }

  /**
   * The election loop. Returns when stopped; throws BindError when neither
   * the well-known port nor an ephemeral one can be bound.
   */
  private async run(): Promise<void> {
    const signal = this.abort.signal;

    while (!signal.aborted) {
      this.setState("unbound");

      const main = await this.listen(this.config.port);
      if (!(main instanceof Error)) {
        await this.runLeader(main, signal);
        continue;
      }
      if (isAddressInUse(main)) {
        this.log.debug("Well-known port held by another registry", {
          port: this.config.port,
        });
      } else {
        this.log.warn("Cannot bind well-known port", {
          port: this.config.port,
          error: main.message,
        });
      }

      const ephemeral = await this.listen(0);
      if (ephemeral instanceof Error) {
        throw new BindError(this.localAddress, ephemeral.message);
      }

      const outcome = await this.runDelegate(ephemeral, signal);
      if (outcome === "backoff" && !signal.aborted) {
        this.log.info("Waiting before restarting registry", {
          backoffMs: this.config.retryBackoffMs,
        });
        await this.clock.sleep(this.config.retryBackoffMs, signal);
      }
    }
  }

  /**
   * Serves on the well-known port until stopped. An unexpected server exit
   * returns to the loop, which races for the port again.
   */
  private async runLeader(bound: BoundServer, signal: AbortSignal): Promise<void> {
    this.listenAddress = bound.addrPort;
    this.setState("leader");
    this.log.info("Registry started as leader", {
      address: formatAddrPort(bound.addrPort),
    });

    const exit = await this.waitForExit(bound.server, signal);
    if (exit === "closed") {
      this.log.warn("Leader server exited unexpectedly");
    }
    await this.closeServer(bound.server);
    this.listenAddress = undefined;
  }

  /**
   * Registers with the leader and watches it. Returns how the loop should
   * continue: immediately when the leader went away, after a backoff when
   * registration failed or the server died.
   */
  private async runDelegate(
    bound: BoundServer,
    signal: AbortSignal,
  ): Promise<DelegateOutcome> {
    this.listenAddress = bound.addrPort;
    this.setState("delegate-attempt");
    const leader = addrPort(this.localAddress, this.config.port);

    try {
      await this.transport.addDelegate(
        leader,
        bound.addrPort,
        this.config.requestTimeoutMs,
      );
    } catch (err) {
      this.log.info("Cannot register with leader", {
        leader: formatAddrPort(leader),
        error: describeError(err),
      });
      await this.closeServer(bound.server);
      this.listenAddress = undefined;
      return signal.aborted ? "stopped" : "backoff";
    }

    this.setState("delegate-serving");
    this.log.info("Registry started as delegate", {
      address: formatAddrPort(bound.addrPort),
      leader: formatAddrPort(leader),
    });

    const outcome = await this.watchLeader(bound.server, leader, signal);
    this.listenAddress = undefined;
    return outcome;
  }

  /**
   * Probes the leader every probeIntervalMs while the delegate server runs.
   */
  private async watchLeader(
    server: FastifyInstance,
    leader: AddrPort,
    signal: AbortSignal,
  ): Promise<DelegateOutcome> {
    const wake = new AbortController();
    let exit: ServeExit | undefined;
    const currentExit = (): ServeExit | undefined => exit;

    const onAbort = (): void => {
      exit = exit ?? "stopped";
      wake.abort();
    };
    const onClose = (): void => {
      exit = exit ?? "closed";
      wake.abort();
    };
    const onError = (err: Error): void => {
      this.log.warn("Delegate server error", { error: err.message });
      onClose();
    };
    signal.addEventListener("abort", onAbort, { once: true });
    server.server.once("close", onClose);
    server.server.once("error", onError);
    if (signal.aborted) {
      onAbort();
    }

    try {
      while (currentExit() === undefined) {
        await this.clock.sleep(this.config.probeIntervalMs, wake.signal);
        if (currentExit() !== undefined) {
          break;
        }
        if (!(await this.leaderIsAlive(leader))) {
          this.log.info("Leader is unreachable. Stopping delegate.", {
            leader: formatAddrPort(leader),
          });
          await this.closeServer(server);
          return signal.aborted ? "stopped" : "retry";
        }
      }
    } finally {
      signal.removeEventListener("abort", onAbort);
      server.server.removeListener("close", onClose);
      server.server.removeListener("error", onError);
    }

    await this.closeServer(server);
    if (currentExit() === "stopped") {
      return "stopped";
    }
    this.log.warn("Delegate server exited unexpectedly");
    return "backoff";
  }

  private async leaderIsAlive(leader: AddrPort): Promise<boolean> {
    try {
      await this.transport.ping(leader, this.config.probeTimeoutMs);
      return true;
    } catch (err) {
      this.log.debug("Leader probe failed", {
        leader: formatAddrPort(leader),
        error: describeError(err),
      });
      return false;
    }
  }

  /**
   * Resolves when the server closes or errors, or the loop is stopped.
   */
  private waitForExit(
    server: FastifyInstance,
    signal: AbortSignal,
  ): Promise<ServeExit> {
    return new Promise((resolve) => {
      const finish = (exit: ServeExit): void => {
        signal.removeEventListener("abort", onAbort);
        server.server.removeListener("close", onClose);
        server.server.removeListener("error", onError);
        resolve(exit);
      };
      const onAbort = (): void => finish("stopped");
      const onClose = (): void => finish("closed");
      const onError = (err: Error): void => {
        this.log.warn("Leader server error", { error: err.message });
        finish("closed");
      };
      signal.addEventListener("abort", onAbort, { once: true });
      server.server.once("close", onClose);
      server.server.once("error", onError);
      if (signal.aborted) {
        onAbort();
      }
    });
  }

  /**
   * Binds a fresh protocol server to `port` on the local address.
   */
  private async listen(port: number): Promise<BoundServer | Error> {
    const server = this.handler.createServer();
    try {
      await server.listen({ host: this.localAddress, port });
    } catch (err) {
      await this.closeServer(server);
      return err instanceof Error ? err : new Error(String(err));
    }

    const address = server.server.address();
    if (address === null || typeof address === "string") {
      await this.closeServer(server);
      return new Error(`Unexpected listener address: ${String(address)}`);
    }
    return { server, addrPort: addrPort(this.localAddress, address.port) };
  }

  private async closeServer(server: FastifyInstance): Promise<void> {
    if (!server.server.listening) {
      return;
    }
    try {
      await server.close();
    } catch (err) {
      this.log.warn("Error closing protocol server", {
        error: describeError(err),
      });
    }
  }

  private setState(state: RegistryState): void {
    const previous = this._state;
    if (previous === state) {
      return;
    }
    if (this.isFinal(previous)) {
      return;
    }
    this._state = state;
    this.log.debug("State changed", { from: previous, to: state });
    this.emit("state", state, previous);
  }

  private isFinal(state: RegistryState): boolean {
    return state === "stopped" || state === "failed";
  }
}

function isAddressInUse(err: unknown): boolean {
  return (
    typeof err === "object" && err !== null && "code" in err && err.code === "EADDRINUSE"
  );
}
