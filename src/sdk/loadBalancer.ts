import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { SlotAnalyzer } from "./analyzer.js";
import type { RoundSummary } from "./analyzer.js";
import { RecoveryProber } from "./prober.js";
import { RequestRacer } from "./racer.js";
import type { RaceResult } from "./racer.js";
import { EndpointRegistry } from "./registry.js";
import type { QuarantineEvent } from "./registry.js";
import { createRpcRequest } from "./request.js";
import type {
  EndpointConfig,
  EndpointStatus,
  LoadBalancerOptions,
  RpcRequest,
} from "./types.js";
import { HttpUpstreamCaller } from "./upstream.js";
import type { UpstreamCaller } from "./upstream.js";

export interface LoadBalancerDeps {
  /** Upstream transport (default: HttpUpstreamCaller) */
  caller?: UpstreamCaller;
  logger?: Logger;
}

/**
 * LoadBalancer races every request across its healthy endpoints and keeps
 * lagging endpoints out of rotation.
 *
 * One instance owns one registry, racer, analyzer and prober; nothing is
 * shared between instances.
 *
 * @example
 * ```ts
 * const balancer = new LoadBalancer(
 *   ["https://rpc1.example.com", "https://rpc2.example.com"],
 *   { lagTolerance: 5, lagThreshold: 3 },
 * );
 * balancer.start();
 * const slot = await balancer.request<{ result: number }>({
 *   jsonrpc: "2.0",
 *   id: 1,
 *   method: "getSlot",
 * });
 * ```
 */
export class LoadBalancer {
  private readonly registry: EndpointRegistry;
  private readonly analyzer: SlotAnalyzer;
  private readonly racer: RequestRacer;
  private readonly prober: RecoveryProber;
  private readonly logger: Logger;
  private readonly onEndpointQuarantined: LoadBalancerOptions["onEndpointQuarantined"];
  private routeId?: string;

  constructor(
    endpoints: Array<string | EndpointConfig>,
    options?: LoadBalancerOptions,
    deps: LoadBalancerDeps = {},
  ) {
    if (!endpoints.length) {
      throw new Error("LoadBalancer requires at least one endpoint.");
    }

    this.logger = deps.logger ?? silentLogger;
    this.onEndpointQuarantined = options?.onEndpointQuarantined;
    const caller = deps.caller ?? new HttpUpstreamCaller();

    this.registry = new EndpointRegistry(endpoints, options, {
      clock: options?.clock,
      logger: this.logger,
    });
    this.analyzer = new SlotAnalyzer(this.registry, this.logger);
    this.racer = new RequestRacer(this.registry, caller, this.analyzer, options, this.logger);
    this.prober = new RecoveryProber(this.registry, caller, this.analyzer, options, this.logger);

    this.registry.onQuarantine((event) => this.triggerAlert(event));
  }

  /**
   * Start probing quarantined endpoints in the background.
   */
  start(): void {
    this.prober.start();
  }

  /**
   * Stop probing and wait for rounds still being collected.
   */
  async stop(): Promise<void> {
    this.prober.stop();
    await this.racer.drain();
  }

  /**
   * Race an already decoded request.
   */
  async forward(request: RpcRequest, signal?: AbortSignal): Promise<RaceResult> {
    return this.racer.race(request, signal);
  }

  /**
   * Make a JSON-RPC request through the load balancer and return the
   * winning response's parsed body.
   */
  async request<T>(payload: unknown, init?: { signal?: AbortSignal }): Promise<T> {
    const result = await this.forward(createRpcRequest(payload), init?.signal);
    return result.response.payload as T;
  }

  /**
   * Run one probe sweep immediately.
   */
  async probe(): Promise<RoundSummary[]> {
    return this.prober.probeAll();
  }

  /**
   * Wait until every round started so far has been analyzed.
   */
  async drain(): Promise<void> {
    await this.racer.drain();
  }

  /**
   * Get status of all endpoints.
   */
  getStatus(): EndpointStatus[] {
    return this.registry.getStatus();
  }

  getActiveCount(): number {
    return this.registry.snapshotActive().length;
  }

  getRegistry(): EndpointRegistry {
    return this.registry;
  }

  /**
   * Set route ID for alert callbacks (used by gateway).
   * @internal
   */
  setRouteId(routeId: string): void {
    this.routeId = routeId;
  }

  private triggerAlert(event: QuarantineEvent): void {
    if (!this.onEndpointQuarantined) {
      return;
    }

    const { endpoint } = event;
    const alert = {
      endpointId: endpoint.id,
      url: endpoint.url,
      routeId: this.routeId,
      reason: event.reason,
      consecutiveLagCount: endpoint.consecutiveLagCount,
      lastKnownSlot: endpoint.lastKnownSlot,
      canonicalSlot: event.canonicalSlot,
      lastError: endpoint.lastError,
      quarantinedUntil: endpoint.quarantinedUntil ?? Date.now(),
      timestamp: endpoint.quarantinedSince ?? Date.now(),
    };

    // Fire and forget - don't block request handling
    Promise.resolve()
      .then(() => this.onEndpointQuarantined?.(alert))
      .catch((error: unknown) => {
        this.logger.error({ endpoint: endpoint.id, err: error }, "Error in alert callback");
      });
  }
}
