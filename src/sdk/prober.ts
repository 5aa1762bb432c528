import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { RoundSummary, SlotAnalyzer } from "./analyzer.js";
import { withDefaults } from "./defaults.js";
import type { EndpointRegistry } from "./registry.js";
import type { ProbeOptions, RpcRequest, UpstreamResult } from "./types.js";
import type { UpstreamCaller } from "./upstream.js";

export const DEFAULT_PROBE_OPTIONS: Required<ProbeOptions> = {
  probeIntervalMs: 10_000,
  probeMethod: "getSlot",
  probeParams: [],
};

/**
 * Periodically probes quarantined endpoints, independent of client traffic.
 * Results go through the analyzer like any other observation; a probe never
 * reinstates an endpoint early.
 */
export class RecoveryProber {
  private readonly options: Required<ProbeOptions>;
  private readonly callTimeoutMs: number;
  private timer: NodeJS.Timeout | null = null;
  private inFlight = false;
  private sequence = 0;

  constructor(
    private readonly registry: EndpointRegistry,
    private readonly caller: UpstreamCaller,
    private readonly analyzer: SlotAnalyzer,
    options?: ProbeOptions & { callTimeoutMs?: number },
    private readonly logger: Logger = silentLogger,
  ) {
    const { callTimeoutMs, ...probeOptions } = options ?? {};
    this.options = withDefaults(DEFAULT_PROBE_OPTIONS, probeOptions);
    this.callTimeoutMs = callTimeoutMs ?? 5_000;
    if (!Number.isFinite(this.options.probeIntervalMs) || this.options.probeIntervalMs <= 0) {
      throw new Error(`probeIntervalMs must be > 0 (got ${this.options.probeIntervalMs})`);
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Start the periodic probe loop. */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.probeIntervalMs);
    this.timer.unref();
  }

  /** Stop the probe loop. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Probe every quarantined endpoint once.
   */
  async probeAll(): Promise<RoundSummary[]> {
    const targets = this.registry.listQuarantined();
    return Promise.all(
      targets.map(async (endpoint) => {
        const request = this.buildProbe();
        const start = Date.now();
        const result = await Promise.resolve()
          .then(() => this.caller.call(endpoint, request, { timeoutMs: this.callTimeoutMs }))
          .catch(
            (error: unknown): UpstreamResult => ({
              ok: false,
              error: {
                kind: "network",
                message: error instanceof Error ? error.message : String(error),
              },
              latencyMs: Date.now() - start,
            }),
          );
        const summary = this.analyzer.analyzeProbe(endpoint.id, request, result);
        this.logger.debug(
          {
            endpoint: endpoint.id,
            ok: result.ok,
            slot: summary.observations[0]?.slot,
            canonicalSlot: summary.canonicalSlot,
            lagging: summary.lagging.length > 0,
          },
          "Probed endpoint",
        );
        return summary;
      }),
    );
  }

  private async tick(): Promise<void> {
    if (this.inFlight) return;
    this.inFlight = true;
    try {
      await this.probeAll();
    } catch (error) {
      this.logger.error({ err: error }, "Probe sweep failed");
    } finally {
      this.inFlight = false;
    }
  }

  private buildProbe(): RpcRequest {
    this.sequence += 1;
    const payload = {
      jsonrpc: "2.0",
      id: `probe-${this.sequence}`,
      method: this.options.probeMethod,
      params: this.options.probeParams,
    };
    return {
      id: `probe-${this.sequence}`,
      methods: [this.options.probeMethod],
      payload,
      body: JSON.stringify(payload),
    };
  }
}
