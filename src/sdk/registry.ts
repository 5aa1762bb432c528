import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { computeBackoffMs } from "./backoff.js";
import { withDefaults } from "./defaults.js";
import type {
  EndpointConfig,
  EndpointState,
  EndpointStatus,
  QuarantineOptions,
} from "./types.js";

type InternalEndpoint = {
  id: string;
  url: string;
  headers: Record<string, string>;
  timeoutMs?: number;
  state: EndpointState;
  lastKnownSlot?: number;
  consecutiveLagCount: number;
  quarantinedSince?: number;
  quarantinedUntil?: number;
  probeFailureCount: number;
  probation: boolean;
  quarantineHistory: number[];
  lastLatencyMs?: number;
  lastError?: string;
  lastSeenAt?: number;
};

export interface QuarantineEvent {
  endpoint: EndpointStatus;
  reason: "lag" | "failure";
  canonicalSlot?: number;
}

export type QuarantineListener = (event: QuarantineEvent) => void;

export const DEFAULT_QUARANTINE_OPTIONS: Required<QuarantineOptions> = {
  lagTolerance: 7,
  lagThreshold: 3,
  failureWeight: 2,
  backoffBaseMs: 5_000,
  backoffFactor: 2,
  backoffMaxMs: 300_000,
  backoffWindowMs: 600_000,
  probeFailurePenalty: 0.5,
};

export interface RegistryDeps {
  clock?: () => number;
  logger?: Logger;
}

/**
 * EndpointRegistry owns every upstream's health and quarantine state and is
 * the only place that state changes.
 *
 * All methods are synchronous: each call runs to completion on the event
 * loop, so transitions of one endpoint never interleave and rounds touching
 * different endpoints never wait on each other.
 *
 * Quarantine windows expire lazily. An endpoint whose `quarantinedUntil`
 * has passed is reinstated the next time anything reads or writes it, with
 * its lag counter reset and on probation: its next lagging observation or
 * failure quarantines it again straight away.
 */
export class EndpointRegistry {
  private readonly endpoints = new Map<string, InternalEndpoint>();
  private readonly options: Required<QuarantineOptions>;
  private readonly listeners: QuarantineListener[] = [];
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(
    endpoints: Array<string | EndpointConfig>,
    options?: QuarantineOptions,
    deps: RegistryDeps = {},
  ) {
    if (!endpoints.length) {
      throw new Error("EndpointRegistry requires at least one endpoint.");
    }

    this.options = withDefaults(DEFAULT_QUARANTINE_OPTIONS, options);
    validateOptions(this.options);
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? silentLogger;

    for (const endpoint of endpoints) {
      const entry = normalizeEndpoint(endpoint);
      if (this.endpoints.has(entry.id)) {
        throw new Error(`Duplicate endpoint id: ${entry.id}`);
      }
      this.endpoints.set(entry.id, entry);
    }
  }

  get size(): number {
    return this.endpoints.size;
  }

  get lagTolerance(): number {
    return this.options.lagTolerance;
  }

  /**
   * Endpoints currently eligible for dispatch.
   */
  snapshotActive(): EndpointStatus[] {
    const now = this.clock();
    const active: EndpointStatus[] = [];
    for (const entry of this.endpoints.values()) {
      this.refresh(entry, now);
      if (entry.state === "active") {
        active.push(this.toStatus(entry, now));
      }
    }
    return active;
  }

  /**
   * Endpoints the recovery prober should look at: those inside a quarantine
   * window, and those reinstated on probation that have not been observed
   * since.
   */
  listQuarantined(): EndpointStatus[] {
    const now = this.clock();
    const result: EndpointStatus[] = [];
    for (const entry of this.endpoints.values()) {
      this.refresh(entry, now);
      if (entry.state === "quarantined" || entry.probation) {
        result.push(this.toStatus(entry, now));
      }
    }
    return result;
  }

  get(id: string): EndpointStatus | undefined {
    const entry = this.endpoints.get(id);
    if (!entry) return undefined;
    const now = this.clock();
    this.refresh(entry, now);
    return this.toStatus(entry, now);
  }

  getStatus(): EndpointStatus[] {
    const now = this.clock();
    return Array.from(this.endpoints.values()).map((entry) => {
      this.refresh(entry, now);
      return this.toStatus(entry, now);
    });
  }

  /**
   * Highest slot ever observed from any endpoint other than `excludeId`.
   */
  bestKnownSlot(excludeId?: string): number | undefined {
    let best: number | undefined;
    for (const entry of this.endpoints.values()) {
      if (entry.id === excludeId || entry.lastKnownSlot === undefined) {
        continue;
      }
      if (best === undefined || entry.lastKnownSlot > best) {
        best = entry.lastKnownSlot;
      }
    }
    return best;
  }

  /**
   * Record a slot observed from an endpoint against the canonical slot of
   * the round it belongs to.
   */
  recordObservation(
    id: string,
    slot: number,
    canonicalSlot: number,
    tolerance: number = this.options.lagTolerance,
  ): void {
    const entry = this.endpoints.get(id);
    if (!entry) return;
    const now = this.clock();
    this.refresh(entry, now);

    if (entry.lastKnownSlot === undefined || slot > entry.lastKnownSlot) {
      entry.lastKnownSlot = slot;
    }
    entry.lastSeenAt = now;

    if (canonicalSlot - slot <= tolerance) {
      entry.consecutiveLagCount = 0;
      entry.probeFailureCount = 0;
      entry.probation = false;
      return;
    }

    this.logger.debug(
      {
        endpoint: entry.id,
        slot,
        canonicalSlot,
        behind: canonicalSlot - slot,
      },
      "Lagging observation",
    );
    this.applyLag(entry, 1, now, "lag", canonicalSlot);
  }

  /**
   * Record a failed call. Failures weigh more than a single lagging slot.
   */
  recordFailure(id: string, reason?: string): void {
    const entry = this.endpoints.get(id);
    if (!entry) return;
    const now = this.clock();
    this.refresh(entry, now);

    entry.lastError = reason;
    if (entry.state === "quarantined") {
      entry.probeFailureCount += 1;
    }
    this.applyLag(entry, this.options.failureWeight, now, "failure");
  }

  /**
   * Record a successful call. Only latency and last-seen time change.
   */
  recordLiveness(id: string, latencyMs?: number): void {
    const entry = this.endpoints.get(id);
    if (!entry) return;
    const now = this.clock();
    this.refresh(entry, now);

    entry.lastSeenAt = now;
    entry.lastError = undefined;
    if (latencyMs !== undefined) {
      entry.lastLatencyMs = latencyMs;
    }
  }

  onQuarantine(listener: QuarantineListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  private refresh(entry: InternalEndpoint, now: number): void {
    if (
      entry.state !== "quarantined" ||
      entry.quarantinedUntil === undefined ||
      now < entry.quarantinedUntil
    ) {
      return;
    }

    entry.state = "active";
    entry.consecutiveLagCount = 0;
    entry.probation = true;
    entry.quarantinedSince = undefined;
    entry.quarantinedUntil = undefined;
    this.logger.info({ endpoint: entry.id }, "Endpoint reinstated");
  }

  private applyLag(
    entry: InternalEndpoint,
    weight: number,
    now: number,
    reason: QuarantineEvent["reason"],
    canonicalSlot?: number,
  ): void {
    entry.consecutiveLagCount += weight;
    if (entry.state === "quarantined") {
      return;
    }
    if (entry.probation || entry.consecutiveLagCount >= this.options.lagThreshold) {
      this.quarantine(entry, now, reason, canonicalSlot);
    }
  }

  private quarantine(
    entry: InternalEndpoint,
    now: number,
    reason: QuarantineEvent["reason"],
    canonicalSlot?: number,
  ): void {
    entry.quarantineHistory = entry.quarantineHistory.filter(
      (at) => now - at < this.options.backoffWindowMs,
    );
    entry.quarantineHistory.push(now);

    const durationMs = computeBackoffMs(
      {
        baseMs: this.options.backoffBaseMs,
        factor: this.options.backoffFactor,
        maxMs: this.options.backoffMaxMs,
        probeFailurePenalty: this.options.probeFailurePenalty,
      },
      entry.quarantineHistory.length,
      entry.probeFailureCount,
    );

    entry.state = "quarantined";
    entry.quarantinedSince = now;
    entry.quarantinedUntil = now + durationMs;
    entry.probeFailureCount = 0;
    entry.probation = false;

    this.logger.warn(
      {
        endpoint: entry.id,
        reason,
        lagCount: entry.consecutiveLagCount,
        lastKnownSlot: entry.lastKnownSlot,
        canonicalSlot,
        durationMs,
      },
      "Endpoint quarantined",
    );

    const event: QuarantineEvent = {
      endpoint: this.toStatus(entry, now),
      reason,
      canonicalSlot,
    };
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error(
          {
            endpoint: entry.id,
            err: error,
          },
          "Quarantine listener failed",
        );
      }
    }
  }

  private toStatus(entry: InternalEndpoint, now: number): EndpointStatus {
    return {
      id: entry.id,
      url: entry.url,
      headers: { ...entry.headers },
      timeoutMs: entry.timeoutMs,
      state: entry.state,
      lastKnownSlot: entry.lastKnownSlot,
      consecutiveLagCount: entry.consecutiveLagCount,
      quarantinedSince: entry.quarantinedSince,
      quarantinedUntil: entry.quarantinedUntil,
      probeFailureCount: entry.probeFailureCount,
      probation: entry.probation,
      recentQuarantines: entry.quarantineHistory.filter(
        (at) => now - at < this.options.backoffWindowMs,
      ).length,
      lastLatencyMs: entry.lastLatencyMs,
      lastError: entry.lastError,
      lastSeenAt: entry.lastSeenAt,
    };
  }
}

function normalizeEndpoint(endpoint: string | EndpointConfig): InternalEndpoint {
  const config = typeof endpoint === "string" ? { url: endpoint } : endpoint;
  if (!config.url) {
    throw new Error("Endpoint must include a url.");
  }

  return {
    id: config.id ?? config.url,
    url: config.url,
    headers: config.headers ?? {},
    timeoutMs: config.timeoutMs,
    state: "active",
    consecutiveLagCount: 0,
    probeFailureCount: 0,
    probation: false,
    quarantineHistory: [],
  };
}

function validateOptions(options: Required<QuarantineOptions>): void {
  if (!Number.isInteger(options.lagThreshold) || options.lagThreshold < 1) {
    throw new Error(`lagThreshold must be a positive integer (got ${options.lagThreshold})`);
  }
  if (!(options.lagTolerance >= 0)) {
    throw new Error(`lagTolerance must be >= 0 (got ${options.lagTolerance})`);
  }
  if (!(options.failureWeight > 0)) {
    throw new Error(`failureWeight must be > 0 (got ${options.failureWeight})`);
  }
  if (!(options.backoffBaseMs > 0) || !(options.backoffMaxMs >= options.backoffBaseMs)) {
    throw new Error(
      `backoff must satisfy 0 < backoffBaseMs <= backoffMaxMs (got ${options.backoffBaseMs}, ${options.backoffMaxMs})`,
    );
  }
  if (!(options.backoffFactor >= 1)) {
    throw new Error(`backoffFactor must be >= 1 (got ${options.backoffFactor})`);
  }
}
