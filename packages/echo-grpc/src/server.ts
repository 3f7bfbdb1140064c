// gRPC server hosting the echo service.

import * as grpc from "@grpc/grpc-js";
import {
  admissionMiddleware,
  type AdmissionMiddleware,
  createLogger,
  defaultEchoConfig,
  type EchoConfig,
  EchoService,
  type EchoServiceOptions,
  type Logger,
  loggingMiddleware,
  type ServerMiddleware,
  validateConfig,
} from "@stream-echo/core";
import { echoHandlers } from "./handlers.ts";
import { loadEchoService } from "./proto.ts";

export interface EchoServerOptions {
  /** Unset fields use `defaultEchoConfig()`. */
  config?: Partial<EchoConfig>;
  logger?: Logger;
  /** Extra middleware, run after call logging and admission. */
  middleware?: ServerMiddleware[];
  transforms?: EchoServiceOptions["transforms"];
}

/**
 * Serves EchoService over plaintext HTTP/2.
 *
 * Calls pass through call logging, then admission (at most
 * `maxConcurrentCalls` at once), then any extra middleware.
 */
export class EchoServer {
  readonly config: EchoConfig;
  readonly service: EchoService;
  readonly admission: AdmissionMiddleware;

  private readonly server: grpc.Server;
  private readonly log: Logger;
  private port: number | null = null;

  constructor(options: EchoServerOptions = {}) {
    this.config = { ...defaultEchoConfig(), ...options.config };
    validateConfig(this.config);
    this.log = options.logger ?? createLogger("echo:server");
    this.admission = admissionMiddleware(this.config.maxConcurrentCalls);
    this.service = new EchoService({
      config: this.config,
      logger: this.log.child("stream"),
      transforms: options.transforms,
      middleware: [loggingMiddleware(this.log.child("rpc")), this.admission, ...(options.middleware ?? [])],
    });

    this.server = new grpc.Server({
      "grpc.max_receive_message_length": this.config.maxMessageBytes,
      "grpc.max_send_message_length": this.config.maxMessageBytes,
    });
    this.server.addService(loadEchoService().service, echoHandlers(this.service, this.log));
  }

  /** Port bound by `listen()`, or null before that. */
  get boundPort(): number | null {
    return this.port;
  }

  /** Bind `host:port` and start serving. Resolves with the bound port. */
  listen(): Promise<number> {
    const address = formatAddress(this.config.host, this.config.port);
    return new Promise((resolve, reject) => {
      this.server.bindAsync(address, grpc.ServerCredentials.createInsecure(), (error, port) => {
        if (error) {
          reject(error);
          return;
        }
        this.port = port;
        this.log.info(`listening on ${formatAddress(this.config.host, port)}`, {
          maxConcurrentCalls: this.config.maxConcurrentCalls,
          queueCapacity: this.config.queueCapacity,
        });
        resolve(port);
      });
    });
  }

  /**
   * Stop accepting calls and wait for in-flight ones.
   *
   * Calls still running after `shutdownGraceMs` are cancelled.
   */
  shutdown(): Promise<void> {
    this.log.info("shutting down", { inFlight: this.admission.inFlight, graceMs: this.config.shutdownGraceMs });
    return new Promise((resolve) => {
      let forced = false;
      const timer = setTimeout(() => {
        forced = true;
        this.log.warn("grace period elapsed, cancelling remaining calls", {
          inFlight: this.admission.inFlight,
        });
        this.server.forceShutdown();
        resolve();
      }, this.config.shutdownGraceMs);

      this.server.tryShutdown((error) => {
        clearTimeout(timer);
        if (forced) return;
        if (error) {
          this.log.warn("graceful shutdown failed, forcing", { error: error.message });
          this.server.forceShutdown();
        } else {
          this.log.info("server stopped");
        }
        resolve();
      });
    });
  }
}

/** `host:port`, bracketing IPv6 literals. */
export function formatAddress(host: string, port: number): string {
  return host.includes(":") && !host.startsWith("[") ? `[${host}]:${port}` : `${host}:${port}`;
}
