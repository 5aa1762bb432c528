import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { EndpointRegistry } from "./registry.js";
import type { RequestRound } from "./round.js";
import { extractSlot } from "./slot.js";
import type { RpcRequest, UpstreamResult } from "./types.js";

export interface SlotObservation {
  endpointId: string;
  slot: number;
  arrivedAt: number;
}

export interface RoundSummary {
  requestId: string;
  /** Highest slot among successful observations; absent when none carried one */
  canonicalSlot?: number;
  observations: SlotObservation[];
  lagging: string[];
  failed: string[];
}

/**
 * Turns closed rounds and probe results into registry updates.
 */
export class SlotAnalyzer {
  private readonly tolerance: number;

  constructor(
    private readonly registry: EndpointRegistry,
    private readonly logger: Logger = silentLogger,
    tolerance?: number,
  ) {
    this.tolerance = tolerance ?? registry.lagTolerance;
  }

  analyze(round: RequestRound): RoundSummary {
    const observations: SlotObservation[] = [];
    const failed: string[] = [];

    for (const [endpointId, entry] of round.responses) {
      if (entry.status === "failure") {
        failed.push(endpointId);
        this.registry.recordFailure(endpointId, entry.error.message);
      } else if (entry.status === "success") {
        this.registry.recordLiveness(endpointId, entry.latencyMs);
        if (entry.slot !== undefined) {
          observations.push({ endpointId, slot: entry.slot, arrivedAt: entry.arrivedAt });
        }
      }
    }

    const summary = this.applyObservations(round.requestId, observations, maxSlot(observations));
    summary.failed = failed;

    this.logger.debug(
      {
        request: round.requestId,
        canonicalSlot: summary.canonicalSlot,
        observed: observations.length,
        lagging: summary.lagging.join(",") || undefined,
        failed: failed.join(",") || undefined,
        unresolved: round.unresolved().join(",") || undefined,
      },
      "Round analyzed",
    );
    return summary;
  }

  /**
   * One-endpoint round for a recovery probe. The endpoint is compared with
   * the best slot the other endpoints have reported, since it cannot be
   * compared with itself.
   */
  analyzeProbe(endpointId: string, request: RpcRequest, result: UpstreamResult): RoundSummary {
    if (!result.ok) {
      this.registry.recordFailure(endpointId, result.error.message);
      return { requestId: request.id, observations: [], lagging: [], failed: [endpointId] };
    }

    this.registry.recordLiveness(endpointId, result.latencyMs);
    const slot = extractSlot(request, result.response.payload);
    if (slot === undefined) {
      return { requestId: request.id, observations: [], lagging: [], failed: [] };
    }

    const reference = this.registry.bestKnownSlot(endpointId);
    const canonicalSlot = reference === undefined ? slot : Math.max(reference, slot);
    return this.applyObservations(
      request.id,
      [{ endpointId, slot, arrivedAt: Date.now() }],
      canonicalSlot,
    );
  }

  private applyObservations(
    requestId: string,
    observations: SlotObservation[],
    canonicalSlot: number | undefined,
  ): RoundSummary {
    const lagging: string[] = [];
    if (canonicalSlot !== undefined) {
      for (const observation of observations) {
        this.registry.recordObservation(
          observation.endpointId,
          observation.slot,
          canonicalSlot,
          this.tolerance,
        );
        if (canonicalSlot - observation.slot > this.tolerance) {
          lagging.push(observation.endpointId);
        }
      }
    }
    return { requestId, canonicalSlot, observations, lagging, failed: [] };
  }
}

function maxSlot(observations: SlotObservation[]): number | undefined {
  let best: number | undefined;
  for (const { slot } of observations) {
    if (best === undefined || slot > best) best = slot;
  }
  return best;
}
