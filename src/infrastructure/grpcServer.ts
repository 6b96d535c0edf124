import * as grpc from "@grpc/grpc-js";
import { ShutdownTimeoutError } from "../domain/errors.js";
import type { Logger } from "./logger.js";
import type { RpcServices } from "./protoLoader.js";

/**
 * Build a gRPC server exposing `implementations`, keyed by fully-qualified
 * service name. Every key must name a loaded service.
 */
export function createGrpcServer(
  services: RpcServices,
  implementations: Record<string, grpc.UntypedServiceImplementation>,
): grpc.Server {
  const server = new grpc.Server();
  for (const [name, impl] of Object.entries(implementations)) {
    const ctor = services.get(name);
    if (!ctor) throw new Error(`service ${name} is not declared in the loaded protos`);
    server.addService(ctor.service, impl);
  }
  return server;
}

/**
 * The binary-RPC endpoint. Runs beside the HTTP listener with no ordering
 * between the two.
 */
export class GrpcListener {
  private port: number | null = null;

  constructor(
    private readonly server: grpc.Server,
    private readonly logger: Logger,
  ) {}

  /** Bind and serve; resolves with the bound port. */
  start(port: number, host = ""): Promise<number> {
    const address = `${host || "0.0.0.0"}:${port}`;
    return new Promise<number>((resolve, reject) => {
      this.server.bindAsync(address, grpc.ServerCredentials.createInsecure(), (error, boundPort) => {
        if (error) return reject(error);
        this.port = boundPort;
        this.logger.info({ port: boundPort }, "gRPC listener started");
        resolve(boundPort);
      });
    });
  }

  boundPort(): number | null {
    return this.port;
  }

  /**
   * Let in-flight calls finish; after `timeoutMs` cancel them and reject with
   * ShutdownTimeoutError.
   */
  shutdown(timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        settled = true;
        this.server.forceShutdown();
        this.port = null;
        reject(new ShutdownTimeoutError("gRPC listener", timeoutMs));
      }, timeoutMs);

      this.server.tryShutdown((error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.port = null;
        if (error) reject(error);
        else resolve();
      });
    });
  }
}
