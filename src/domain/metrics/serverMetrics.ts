/**
 * Request and lifecycle counters for one running server.
 *
 * Every pipeline stage records into the same tracker, so the counters show
 * how much traffic was classified as RPC, timed out or was rate limited.
 * Telemetry events (such as "server start") are kept in a bounded queue.
 */

/**
 * Counters for the general HTTP pipeline
 */
export interface RequestMetrics {
  /** Requests seen by the classification stage */
  requests_total: number;
  /** Requests classified as binary-RPC traffic */
  rpc_requests_total: number;
  /** Requests aborted by the timeout guard */
  timeouts_total: number;
  /** Requests rejected with 429 */
  rate_limited_total: number;
  /** Requests rejected with 403 because the limiter itself failed */
  rate_limit_errors_total: number;
}

export interface TelemetryRecord {
  name: string;
  timestamp: string;
}

export interface ServerMetricsSnapshot {
  requests: RequestMetrics;
  events: TelemetryRecord[];
}

const MAX_EVENTS = 100;

export class ServerMetrics {
  private requests = 0;
  private rpcRequests = 0;
  private timeouts = 0;
  private rateLimited = 0;
  private rateLimitErrors = 0;
  private events: TelemetryRecord[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Record a classified request
   *
   * @param rpc Whether the request was classified as binary-RPC traffic
   */
  recordRequest(rpc: boolean): void {
    this.requests++;
    if (rpc) this.rpcRequests++;
  }

  recordTimeout(): void {
    this.timeouts++;
  }

  /**
   * Record a limiter rejection
   *
   * @param reason "denied" for an exhausted bucket, "error" for a limiter failure
   */
  recordRateLimit(reason: "denied" | "error"): void {
    if (reason === "denied") this.rateLimited++;
    else this.rateLimitErrors++;
  }

  /** Queue a telemetry event. The oldest events drop once the queue is full. */
  enqueue(name: string): void {
    this.events.push({ name, timestamp: this.now().toISOString() });
    if (this.events.length > MAX_EVENTS) this.events.shift();
  }

  getMetrics(): ServerMetricsSnapshot {
    return {
      requests: {
        requests_total: this.requests,
        rpc_requests_total: this.rpcRequests,
        timeouts_total: this.timeouts,
        rate_limited_total: this.rateLimited,
        rate_limit_errors_total: this.rateLimitErrors,
      },
      events: [...this.events],
    };
  }

  reset(): void {
    this.requests = 0;
    this.rpcRequests = 0;
    this.timeouts = 0;
    this.rateLimited = 0;
    this.rateLimitErrors = 0;
    this.events = [];
  }
}
