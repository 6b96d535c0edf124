import express, { type Express } from "express";
import { SHUTDOWN_TIMEOUT_MS, TELEMETRY_EVENTS } from "./domain/constants.js";
import { GatewayRegistrationError, LifecycleError, errorMessage } from "./domain/errors.js";
import { ServerMetrics } from "./domain/metrics/serverMetrics.js";
import { provisionSecret } from "./domain/usecases/provisionSecret.js";
import { SubscriptionService, type LicenseVerifier } from "./domain/usecases/subscription.js";
import type { Profile, WorkspaceSettingStore } from "./domain/types.js";
import { GrpcListener, createGrpcServer } from "./infrastructure/grpcServer.js";
import { HttpListener } from "./infrastructure/httpListener.js";
import type { Logger } from "./infrastructure/logger.js";
import { rpcPortOf } from "./infrastructure/profile.js";
import { loadRpcServices, type LoadRpcServicesOptions, type RpcServices } from "./infrastructure/protoLoader.js";
import { createRpcGateway, type RpcGateway } from "./interfaces/http/rpcGateway.js";
import { createWorkspaceService, WORKSPACE_SERVICE } from "./interfaces/grpc/workspaceService.js";
import { createApiV1Router } from "./interfaces/http/apiV1.js";
import { serveFrontend } from "./interfaces/http/frontend.js";
import { applyMiddlewarePipeline, type PipelineOptions } from "./interfaces/http/pipeline.js";
import { routeErrorHandler } from "./interfaces/http/responseHelper.js";

export type LifecycleState = "constructed" | "started" | "shuttingDown" | "stopped";

export interface ServerDeps {
  profile: Profile;
  store: WorkspaceSettingStore;
  logger: Logger;
  licenseVerifier?: LicenseVerifier;
  metrics?: ServerMetrics;
  /** Overrides for the pipeline stages (stream, timeout, limiter store). */
  pipeline?: Omit<PipelineOptions, "metrics">;
  /** Where the RPC protos are loaded from; defaults to the bundled proto/ tree. */
  protos?: LoadRpcServicesOptions;
  shutdownTimeoutMs?: number;
}

/**
 * Load the RPC services and build the gateway that dials them on
 * 127.0.0.1:rpcPort. Any failure surfaces as a GatewayRegistrationError.
 */
function registerGateway(
  protos: LoadRpcServicesOptions | undefined,
  rpcPort: number,
  logger: Logger,
): { services: RpcServices; gateway: RpcGateway } {
  try {
    const services = loadRpcServices(protos);
    const gateway = createRpcGateway({
      services,
      target: `127.0.0.1:${rpcPort}`,
      logger: logger.child({ component: "gateway" }),
    });
    return { services, gateway };
  } catch (error) {
    if (error instanceof GatewayRegistrationError) throw error;
    throw new GatewayRegistrationError("failed to register gRPC gateway", { cause: error });
  }
}

interface ServerParts {
  app: Express;
  secret: string;
  metrics: ServerMetrics;
  subscriptionService: SubscriptionService;
  httpListener: HttpListener;
  grpcListener: GrpcListener;
  gateway: RpcGateway;
}

/**
 * Owns both listeners, the provisioned secret and the store handle for one
 * running process. Built only through `Server.create`, which either returns a
 * fully wired server or throws.
 */
export class Server {
  private state: LifecycleState = "constructed";
  private shutdownPromise: Promise<void> | null = null;

  private constructor(
    private readonly deps: ServerDeps,
    private readonly parts: ServerParts,
  ) {}

  static async create(deps: ServerDeps): Promise<Server> {
    const { profile, store, logger } = deps;
    const metrics = deps.metrics ?? new ServerMetrics();

    const app = express();
    app.disable("x-powered-by");
    applyMiddlewarePipeline(app, { ...deps.pipeline, metrics });

    // No route is registered without a secret.
    const secret = await provisionSecret(profile.mode, store);

    app.get("/healthz", (_req, res) => {
      res.status(200).type("text/plain").send("Service ready.");
    });

    const subscriptionService = new SubscriptionService(store, deps.licenseVerifier);
    app.use("/api/v1", createApiV1Router({ profile, secret, subscriptionService, metrics }));

    const { services, gateway } = registerGateway(deps.protos, rpcPortOf(profile), logger);
    let grpcListener: GrpcListener;
    try {
      const grpcServer = createGrpcServer(services, {
        [WORKSPACE_SERVICE]: createWorkspaceService({ profile, subscriptionService }),
      });
      grpcListener = new GrpcListener(grpcServer, logger.child({ component: "grpc" }));
    } catch (error) {
      gateway.close();
      throw error;
    }
    app.use(gateway.router);

    if (serveFrontend(app, profile.publicDir)) {
      logger.info({ publicDir: profile.publicDir }, "serving frontend");
    }

    app.use(routeErrorHandler(logger));

    const httpListener = new HttpListener(app, logger.child({ component: "http" }));
    return new Server(deps, { app, secret, metrics, subscriptionService, httpListener, grpcListener, gateway });
  }

  get app(): Express {
    return this.parts.app;
  }

  get secret(): string {
    return this.parts.secret;
  }

  get metrics(): ServerMetrics {
    return this.parts.metrics;
  }

  get lifecycleState(): LifecycleState {
    return this.state;
  }

  httpAddress() {
    return this.parts.httpListener.address();
  }

  /**
   * Launch the gRPC listener in the background, then serve HTTP until the
   * listener closes. Only HTTP bind/serve failures reject.
   */
  async start(): Promise<void> {
    if (this.state !== "constructed") {
      throw new LifecycleError(`cannot start a server in state ${this.state}`);
    }
    const { profile, logger } = this.deps;
    const { subscriptionService, grpcListener, httpListener, metrics } = this.parts;
    this.state = "started";

    void subscriptionService.loadSubscription().then(
      (subscription) => logger.info({ plan: subscription.plan }, "subscription loaded"),
      (error: unknown) => logger.error({ err: error }, "failed to load subscription"),
    );

    // bound on every interface so the loopback gateway reaches it whatever profile.addr is
    void grpcListener.start(rpcPortOf(profile)).catch((error: unknown) => {
      logger.error({ err: error, port: rpcPortOf(profile) }, "failed to start gRPC listener");
    });

    metrics.enqueue(TELEMETRY_EVENTS.SERVER_START);
    await httpListener.listen(profile.port, profile.addr);
  }

  /**
   * Best-effort teardown: HTTP listener, gRPC listener, gateway clients,
   * store. A failing step is logged and the next one still runs. Repeated
   * calls share the first call's promise.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) this.shutdownPromise = this.runShutdown();
    return this.shutdownPromise;
  }

  private async runShutdown(): Promise<void> {
    const { logger, store } = this.deps;
    const { httpListener, grpcListener, gateway, metrics } = this.parts;
    this.state = "shuttingDown";
    const deadline = Date.now() + (this.deps.shutdownTimeoutMs ?? SHUTDOWN_TIMEOUT_MS);
    const remaining = () => Math.max(0, deadline - Date.now());

    const step = async (name: string, release: () => Promise<void> | void) => {
      try {
        await release();
      } catch (error) {
        logger.error({ err: error, step: name }, `failed to shutdown ${name}: ${errorMessage(error)}`);
      }
    };

    await step("http listener", () => httpListener.shutdown(remaining()));
    await step("grpc listener", () => grpcListener.shutdown(remaining()));
    await step("gateway", () => gateway.close());
    await step("store", () => store.close());

    metrics.enqueue(TELEMETRY_EVENTS.SERVER_STOP);
    this.state = "stopped";
    logger.info("server stopped properly");
  }
}
