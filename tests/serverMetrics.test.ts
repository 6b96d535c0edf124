import { describe, it, expect, beforeEach } from "vitest";
import { ServerMetrics } from "../src/domain/metrics/serverMetrics.js";

describe("ServerMetrics", () => {
  let metrics: ServerMetrics;

  beforeEach(() => {
    metrics = new ServerMetrics(() => new Date("2026-01-02T03:04:05.000Z"));
  });

  describe("request counters", () => {
    it("should count classified requests", () => {
      metrics.recordRequest(false);
      metrics.recordRequest(true);
      metrics.recordRequest(true);

      expect(metrics.getMetrics().requests).toMatchObject({ requests_total: 3, rpc_requests_total: 2 });
    });

    it("should split limiter rejections by reason", () => {
      metrics.recordRateLimit("denied");
      metrics.recordRateLimit("denied");
      metrics.recordRateLimit("error");
      metrics.recordTimeout();

      expect(metrics.getMetrics().requests).toEqual({
        requests_total: 0,
        rpc_requests_total: 0,
        timeouts_total: 1,
        rate_limited_total: 2,
        rate_limit_errors_total: 1,
      });
    });
  });

  describe("telemetry events", () => {
    it("should timestamp queued events", () => {
      metrics.enqueue("server start");

      expect(metrics.getMetrics().events).toEqual([{ name: "server start", timestamp: "2026-01-02T03:04:05.000Z" }]);
    });

    it("should keep only the newest 100 events", () => {
      for (let i = 0; i < 105; i++) metrics.enqueue(`event ${i}`);

      const { events } = metrics.getMetrics();
      expect(events).toHaveLength(100);
      expect(events[0]?.name).toBe("event 5");
      expect(events[99]?.name).toBe("event 104");
    });

    it("should hand out a copy of the queue", () => {
      metrics.enqueue("server start");
      metrics.getMetrics().events.pop();

      expect(metrics.getMetrics().events).toHaveLength(1);
    });
  });

  it("should reset everything", () => {
    metrics.recordRequest(true);
    metrics.enqueue("server start");
    metrics.reset();

    expect(metrics.getMetrics()).toEqual({
      requests: {
        requests_total: 0,
        rpc_requests_total: 0,
        timeouts_total: 0,
        rate_limited_total: 0,
        rate_limit_errors_total: 0,
      },
      events: [],
    });
  });
});
