import { createServer, type RequestListener, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import { ShutdownTimeoutError } from "../domain/errors.js";
import type { Logger } from "./logger.js";

/**
 * The general HTTP endpoint.
 *
 * `listen` is the foreground task of a running server: it resolves only once
 * the listener has closed, and rejects when binding or serving fails.
 */
export class HttpListener {
  private server: Server | null = null;

  constructor(
    private readonly handler: RequestListener,
    private readonly logger: Logger,
  ) {}

  listen(port: number, host = ""): Promise<void> {
    if (this.server) return Promise.reject(new Error("HTTP listener already started"));
    const server = createServer(this.handler);
    // Keep-alive longer than common proxy idle timeouts
    server.keepAliveTimeout = 65000;
    server.headersTimeout = 66000;
    this.server = server;

    return new Promise<void>((resolve, reject) => {
      server.once("error", (error) => {
        this.server = null;
        reject(error);
      });
      server.once("close", () => {
        this.server = null;
        resolve();
      });
      server.listen(port, host || undefined, () => {
        const { port: boundPort } = this.address() ?? { port };
        this.logger.info({ port: boundPort }, "HTTP listener started");
      });
    });
  }

  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === "object" ? address : null;
  }

  isListening(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Stop accepting connections and wait for in-flight requests. Connections
   * still open after `timeoutMs` are destroyed and the returned promise
   * rejects with ShutdownTimeoutError.
   */
  shutdown(timeoutMs: number): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    if (!server.listening) {
      // bind still in flight; close once it lands
      return new Promise<void>((resolve) => {
        server.once("listening", resolve);
        server.once("error", () => resolve());
      }).then(() => this.shutdown(timeoutMs));
    }

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        settled = true;
        server.closeAllConnections();
        reject(new ShutdownTimeoutError("HTTP listener", timeoutMs));
      }, timeoutMs);

      server.close((error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) reject(error);
        else resolve();
      });
      server.closeIdleConnections();
    });
  }
}
