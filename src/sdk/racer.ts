import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { RoundSummary, SlotAnalyzer } from "./analyzer.js";
import { withDefaults } from "./defaults.js";
import {
  AllEndpointsFailedError,
  NoHealthyEndpointsError,
  RequestTimeoutError,
} from "./errors.js";
import type { EndpointRegistry } from "./registry.js";
import { RequestRound } from "./round.js";
import { extractSlot } from "./slot.js";
import type { RaceOptions, RawResponse, RpcRequest, UpstreamResult } from "./types.js";
import type { UpstreamCaller, UpstreamTarget } from "./upstream.js";

export const DEFAULT_RACE_OPTIONS: Required<RaceOptions> = {
  requestTimeoutMs: 10_000,
  callTimeoutMs: 5_000,
  stragglerTimeoutMs: 2_000,
};

export interface RaceResult {
  endpointId: string;
  response: RawResponse;
  latencyMs: number;
  round: RequestRound;
}

const STRAGGLER_REASON = "straggler deadline exceeded";

/**
 * RequestRacer fans a request out to every active endpoint and settles on
 * the first success.
 *
 * The remaining calls keep running after the client has its answer. Once
 * they all finish, or `stragglerTimeoutMs` after the client-facing outcome,
 * the round is closed and handed to the analyzer exactly once. Calls still
 * running at that point are aborted and left unresolved: only an outcome a
 * call produced itself, its own timeout included, is charged to its endpoint.
 */
export class RequestRacer {
  private readonly options: Required<RaceOptions>;
  private readonly openRounds = new Set<Promise<RoundSummary>>();

  constructor(
    private readonly registry: EndpointRegistry,
    private readonly caller: UpstreamCaller,
    private readonly analyzer: SlotAnalyzer,
    options?: RaceOptions,
    private readonly logger: Logger = silentLogger,
  ) {
    this.options = withDefaults(DEFAULT_RACE_OPTIONS, options);
  }

  async race(request: RpcRequest, signal?: AbortSignal): Promise<RaceResult> {
    const active = this.registry.snapshotActive();
    if (!active.length) {
      throw new NoHealthyEndpointsError(this.registry.size);
    }
    if (signal?.aborted) {
      throw new RequestTimeoutError(this.options.requestTimeoutMs, true);
    }

    const round = new RequestRound(
      request.id,
      active.map((endpoint) => endpoint.id),
    );
    this.track(round);

    return new Promise<RaceResult>((resolve, reject) => {
      const stragglers = new AbortController();
      let decided = false;
      let remaining = active.length;
      let stragglerTimer: NodeJS.Timeout | undefined;

      const closeRound = () => {
        if (!round.open) return;
        if (stragglerTimer) clearTimeout(stragglerTimer);
        round.close(STRAGGLER_REASON);
        stragglers.abort();
        round.finish(this.analyze(round));
      };

      const decide = () => {
        decided = true;
        clearTimeout(requestTimer);
        signal?.removeEventListener("abort", onCancel);
        stragglerTimer = setTimeout(closeRound, this.options.stragglerTimeoutMs);
        stragglerTimer.unref();
      };

      const onCancel = () => {
        if (decided) return;
        decide();
        reject(new RequestTimeoutError(this.options.requestTimeoutMs, true));
      };

      const requestTimer = setTimeout(() => {
        if (decided) return;
        decide();
        this.logger.warn(
          { request: request.id, pending: round.pendingCount },
          "Request timed out",
        );
        reject(new RequestTimeoutError(this.options.requestTimeoutMs));
      }, this.options.requestTimeoutMs);
      requestTimer.unref();
      signal?.addEventListener("abort", onCancel, { once: true });

      const onResult = (endpoint: UpstreamTarget, result: UpstreamResult) => {
        const arrivedAt = Date.now();
        const accepted = round.settle(
          endpoint.id,
          result.ok
            ? {
                status: "success",
                response: result.response,
                slot: extractSlot(request, result.response.payload),
                arrivedAt,
                latencyMs: result.latencyMs,
              }
            : {
                status: "failure",
                error: result.error,
                arrivedAt,
                latencyMs: result.latencyMs,
              },
        );
        if (!accepted) return;
        remaining -= 1;

        if (!decided && result.ok) {
          decide();
          this.logger.debug(
            { request: request.id, endpoint: endpoint.id, latencyMs: result.latencyMs },
            "Round won",
          );
          resolve({
            endpointId: endpoint.id,
            response: result.response,
            latencyMs: result.latencyMs,
            round,
          });
        } else if (!decided && remaining === 0) {
          decide();
          reject(new AllEndpointsFailedError(round.failures()));
        }

        if (remaining === 0) {
          closeRound();
        }
      };

      for (const endpoint of active) {
        const start = Date.now();
        Promise.resolve()
          .then(() =>
            this.caller.call(endpoint, request, {
              timeoutMs: this.options.callTimeoutMs,
              signal: stragglers.signal,
            }),
          )
          .catch(
            (error: unknown): UpstreamResult => ({
              ok: false,
              error: {
                kind: "network",
                message: error instanceof Error ? error.message : String(error),
              },
              latencyMs: Date.now() - start,
            }),
          )
          .then((result) => onResult(endpoint, result))
          .catch((error: unknown) => {
            this.logger.error(
              { request: request.id, endpoint: endpoint.id, err: error },
              "Failed to record call outcome",
            );
          });
      }
    });
  }

  /**
   * Wait until every round started so far has been analyzed.
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.openRounds));
  }

  private track(round: RequestRound): void {
    const closed = round.closed;
    this.openRounds.add(closed);
    void closed.then(() => this.openRounds.delete(closed));
  }

  private analyze(round: RequestRound): RoundSummary {
    try {
      return this.analyzer.analyze(round);
    } catch (error) {
      this.logger.error({ request: round.requestId, err: error }, "Round analysis failed");
      return { requestId: round.requestId, observations: [], lagging: [], failed: [] };
    }
  }
}
