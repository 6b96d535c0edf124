import http from "http";
import * as grpc from "@grpc/grpc-js";
import { describe, it, expect } from "vitest";
import { ShutdownTimeoutError } from "../src/domain/errors.js";
import { GrpcListener, createGrpcServer } from "../src/infrastructure/grpcServer.js";
import { HttpListener } from "../src/infrastructure/httpListener.js";
import { loadRpcServices } from "../src/infrastructure/protoLoader.js";
import { silentLogger } from "./helpers.js";

function waitForListening(listener: HttpListener): Promise<number> {
  return new Promise((resolve) => {
    const poll = () => {
      const address = listener.address();
      if (address) resolve(address.port);
      else setTimeout(poll, 5);
    };
    poll();
  });
}

describe("HttpListener", () => {
  it("should settle listen once shut down", async () => {
    const listener = new HttpListener((_req, res) => res.end("ok"), silentLogger());
    const serving = listener.listen(0, "127.0.0.1");
    await waitForListening(listener);

    expect(listener.isListening()).toBe(true);
    await listener.shutdown(1000);

    await expect(serving).resolves.toBeUndefined();
    expect(listener.isListening()).toBe(false);
  });

  it("should reject listen when the port is taken", async () => {
    const first = new HttpListener((_req, res) => res.end(), silentLogger());
    const serving = first.listen(0, "127.0.0.1");
    const port = await waitForListening(first);

    const second = new HttpListener((_req, res) => res.end(), silentLogger());
    await expect(second.listen(port, "127.0.0.1")).rejects.toMatchObject({ code: "EADDRINUSE" });

    await first.shutdown(1000);
    await serving;
  });

  it("should resolve shutdown immediately when never started", async () => {
    const listener = new HttpListener((_req, res) => res.end(), silentLogger());
    await expect(listener.shutdown(10)).resolves.toBeUndefined();
  });

  it("should time out on a stalled request and drop its connection", async () => {
    const listener = new HttpListener(() => {
      // never responds
    }, silentLogger());
    const serving = listener.listen(0, "127.0.0.1");
    const port = await waitForListening(listener);

    const clientClosed = new Promise<void>((resolve) => {
      const req = http.get({ host: "127.0.0.1", port, path: "/stalled" });
      req.on("error", () => resolve());
      req.on("close", () => resolve());
    });
    // let the request reach the handler
    await new Promise((resolve) => setTimeout(resolve, 50));

    const error = await listener.shutdown(100).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ShutdownTimeoutError);
    expect(error).toHaveProperty("message", "HTTP listener did not stop within 100ms");
    await clientClosed;
    await serving;
  });
});

describe("GrpcListener", () => {
  it("should bind, report its port and shut down", async () => {
    const listener = new GrpcListener(createGrpcServer(loadRpcServices(), {}), silentLogger());

    const port = await listener.start(0, "127.0.0.1");

    expect(port).toBeGreaterThan(0);
    expect(listener.boundPort()).toBe(port);
    await listener.shutdown(1000);
    expect(listener.boundPort()).toBeNull();
  });

  it("should reject a service missing from the loaded protos", () => {
    expect(() =>
      createGrpcServer(loadRpcServices(), {
        "linkhold.api.v2.ShortcutService": {
          listShortcuts: (_call: grpc.ServerUnaryCall<object, object>, callback: grpc.sendUnaryData<object>) =>
            callback(null, {}),
        },
      }),
    ).toThrow("service linkhold.api.v2.ShortcutService is not declared in the loaded protos");
  });
});
