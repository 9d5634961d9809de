// src/protocol_handler.ts

import Fastify, { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { AddrPort, formatAddrPort } from "./address";
import { DiscoveryConfig } from "./config";
import { NonLocalDelegateError, PeerUnreachableError } from "./errors";
import { Logger, createLogger, describeError } from "./logger";
import { ServiceDirectory } from "./service_directory";
import { AddDelegateRequestSchema, Service, toWireService } from "./service";
import { RegistryTransport } from "./transport";

/**
 * Transport-neutral result of a protocol operation.
 */
export interface ProtocolResponse {
  status: number;
  /** Serialised JSON body, if any. */
  body?: string;
}

/**
 * The three operations a registry serves to its peers.
 */
export interface ProtocolEndpoint {
  handleGetServices(): Promise<ProtocolResponse>;
  handleAddDelegate(body: unknown): ProtocolResponse;
  handlePing(): ProtocolResponse;
}

export interface ProtocolHandlerOptions {
  directory: ServiceDirectory;
  transport: RegistryTransport;
  config: Pick<DiscoveryConfig, "requestTimeoutMs">;
  logger?: Logger;
}

/**
 * Serves the registry protocol for one directory: service enumeration
 * (including the services of registered delegates), delegate registration
 * and liveness.
 */
export class ProtocolHandler implements ProtocolEndpoint {
  private readonly directory: ServiceDirectory;
  private readonly transport: RegistryTransport;
  private readonly requestTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: ProtocolHandlerOptions) {
    this.directory = options.directory;
    this.transport = options.transport;
    this.requestTimeoutMs = options.config.requestTimeoutMs;
    this.log = (options.logger ?? createLogger("ProtocolHandler")).child({
      component: "ProtocolHandler",
    });
  }

  /**
   * Local services followed by each delegate's services. Delegates are
   * queried one after another against a snapshot taken up front; a delegate
   * that cannot be reached is dropped from the directory.
   */
  async enumerate(): Promise<Service[]> {
    const { services, delegates } = this.directory.snapshot();
    const result: Service[] = [...services];

    for (const delegate of delegates) {
      try {
        const part = await this.transport.getServices(
          delegate,
          this.requestTimeoutMs,
        );
        result.push(...part);
      } catch (err) {
        if (err instanceof PeerUnreachableError) {
          this.log.info("Delegate went away, removing it", {
            delegate: formatAddrPort(delegate),
            error: err.message,
          });
          this.directory.removeDelegate(delegate);
        } else {
          this.log.warn("Error fetching services from delegate", {
            delegate: formatAddrPort(delegate),
            error: describeError(err),
          });
        }
      }
    }
    return result;
  }

  async handleGetServices(): Promise<ProtocolResponse> {
    const services = await this.enumerate();
    let body: string;
    try {
      body = JSON.stringify(services.map(toWireService));
    } catch (err) {
      this.log.error(
        "Error generating JSON",
        err instanceof Error ? err : undefined,
      );
      return { status: 500 };
    }
    return { status: 200, body };
  }

  handleAddDelegate(body: unknown): ProtocolResponse {
    let payload = body;
    if (typeof payload === "string") {
      try {
        payload = JSON.parse(payload);
      } catch (err) {
        this.log.warn("Malformed add-delegate request", {
          error: describeError(err),
        });
        return { status: 400 };
      }
    }

    const parsed = AddDelegateRequestSchema.safeParse(payload);
    if (!parsed.success) {
      this.log.warn("Malformed add-delegate request", {
        error: parsed.error.issues[0]?.message ?? parsed.error.message,
      });
      return { status: 400 };
    }

    const delegate: AddrPort = parsed.data.addrPort;
    try {
      if (this.directory.addDelegate(delegate)) {
        this.log.info("Adding delegate", { delegate: formatAddrPort(delegate) });
      }
    } catch (err) {
      if (err instanceof NonLocalDelegateError) {
        this.log.warn("add-delegate request for non-local address", {
          delegate: formatAddrPort(delegate),
        });
        return { status: 403 };
      }
      throw err;
    }
    return { status: 200 };
  }

  handlePing(): ProtocolResponse {
    return { status: 200 };
  }

  /**
   * Builds a fastify server exposing the protocol. The caller owns listening
   * and closing.
   */
  createServer(): FastifyInstance {
    const app = Fastify({ logger: false });

    // Peers are not required to label their bodies; hand raw text through and
    // let handleAddDelegate decode it.
    app.addContentTypeParser(
      "*",
      { parseAs: "string" },
      (_req: FastifyRequest, body: string | Buffer, done) => {
        done(null, body.toString());
      },
    );

    app.all("/services", async (req: FastifyRequest, reply: FastifyReply) => {
      if (req.method !== "GET") {
        return reply.code(405).send();
      }
      return sendResponse(reply, await this.handleGetServices());
    });

    app.all("/add-delegate", async (req: FastifyRequest, reply: FastifyReply) => {
      if (req.method !== "POST") {
        return reply.code(405).send();
      }
      return sendResponse(reply, this.handleAddDelegate(req.body));
    });

    app.all("/ping", async (_req: FastifyRequest, reply: FastifyReply) => {
      return sendResponse(reply, this.handlePing());
    });

    app.setErrorHandler((err, _req, reply) => {
      // Body parser failures (invalid JSON, empty JSON body) carry a 4xx code.
      const status =
        typeof err.statusCode === "number" && err.statusCode < 500
          ? err.statusCode
          : 500;
      if (status >= 500) {
        this.log.error("Request failed", err);
      } else {
        this.log.warn("Rejected request", { error: err.message, status });
      }
      return reply.code(status).send();
    });

    return app;
  }
}

function sendResponse(reply: FastifyReply, res: ProtocolResponse): FastifyReply {
  reply.code(res.status);
  if (res.body === undefined) {
    return reply.send();
  }
  return reply.type("application/json; charset=utf-8").send(res.body);
}
