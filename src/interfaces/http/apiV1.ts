import { Router } from "express";
import type { ServerMetrics } from "../../domain/metrics/serverMetrics.js";
import type { SubscriptionService } from "../../domain/usecases/subscription.js";
import type { Profile } from "../../domain/types.js";
import { sendSuccess } from "./responseHelper.js";

export interface ApiV1Params {
  profile: Profile;
  /** Session-signing secret; registration refuses to run without one. */
  secret: string;
  subscriptionService: SubscriptionService;
  metrics: ServerMetrics;
  startedAt?: Date;
}

/**
 * Versioned JSON routes mounted under /api/v1.
 */
export function createApiV1Router(params: ApiV1Params): Router {
  const { profile, secret, subscriptionService, metrics } = params;
  if (!secret) {
    throw new Error("api v1 routes require a provisioned session secret");
  }
  const startedAt = params.startedAt ?? new Date();
  const router = Router();

  router.get("/workspace/profile", (_req, res) => {
    sendSuccess(res, {
      mode: profile.mode,
      version: profile.version,
      plan: subscriptionService.getSubscription().plan,
    });
  });

  router.get("/status", (_req, res) => {
    sendSuccess(res, {
      version: profile.version,
      mode: profile.mode,
      uptimeSeconds: Math.floor((Date.now() - startedAt.getTime()) / 1000),
      metrics: metrics.getMetrics(),
    });
  });

  return router;
}
