/**
 * Configuration for a single upstream RPC endpoint.
 */
export interface EndpointConfig {
  /** The URL of the RPC endpoint */
  url: string;
  /** Optional stable identifier (default: the URL) */
  id?: string;
  /** Optional headers to include with requests to this endpoint */
  headers?: Record<string, string>;
  /** Optional per-call timeout in milliseconds, overriding callTimeoutMs */
  timeoutMs?: number;
}

export type EndpointState = "active" | "quarantined";

/**
 * Point-in-time view of an endpoint's health and quarantine state.
 */
export interface EndpointStatus {
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
  /** Set between a window-expiry reinstatement and the next observation */
  probation: boolean;
  /** Quarantine transitions inside the current backoff window */
  recentQuarantines: number;
  lastLatencyMs?: number;
  lastError?: string;
  lastSeenAt?: number;
}

/**
 * Quarantine state machine and backoff settings.
 */
export interface QuarantineOptions {
  /** Slots an observation may trail the canonical slot by (default: 7) */
  lagTolerance?: number;
  /** Consecutive lag count that quarantines an endpoint (default: 3) */
  lagThreshold?: number;
  /** Lag count added by a failed call (default: 2) */
  failureWeight?: number;
  /** First quarantine window in milliseconds (default: 5000) */
  backoffBaseMs?: number;
  /** Growth per repeated quarantine inside the window (default: 2) */
  backoffFactor?: number;
  /** Upper bound for a quarantine window (default: 300000) */
  backoffMaxMs?: number;
  /** Rolling window over which repeated quarantines are counted (default: 600000) */
  backoffWindowMs?: number;
  /** Extra window share per probe failure carried into a quarantine (default: 0.5) */
  probeFailurePenalty?: number;
}

/**
 * Timing settings for a fan-out round.
 */
export interface RaceOptions {
  /** Client-facing deadline for the first success (default: 10000) */
  requestTimeoutMs?: number;
  /** Per-upstream call timeout (default: 5000) */
  callTimeoutMs?: number;
  /** How long stragglers may run after the client-facing outcome (default: 2000) */
  stragglerTimeoutMs?: number;
}

/**
 * Recovery probe settings.
 */
export interface ProbeOptions {
  /** Interval between probe sweeps (default: 10000) */
  probeIntervalMs?: number;
  /** JSON-RPC method sent as probe (default: "getSlot") */
  probeMethod?: string;
  /** Params for the probe method */
  probeParams?: unknown[];
}

/**
 * Options for the LoadBalancer.
 */
export interface LoadBalancerOptions extends QuarantineOptions, RaceOptions, ProbeOptions {
  /** Called whenever an endpoint enters quarantine */
  onEndpointQuarantined?: AlertCallback;
  /** Clock used for quarantine windows (default: Date.now) */
  clock?: () => number;
}

/**
 * A decoded client request, ready to be forwarded verbatim.
 */
export interface RpcRequest {
  /** Correlates the calls of one round */
  id: string;
  /** JSON-RPC methods carried by the payload, in order */
  methods: string[];
  /** Parsed JSON-RPC payload (single object or batch array) */
  payload: unknown;
  /** Serialized body sent upstream */
  body: string;
}

/**
 * A successful upstream response.
 */
export interface RawResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
  payload: unknown;
}

export type CallErrorKind = "network" | "timeout" | "aborted" | "status" | "malformed";

export interface CallError {
  kind: CallErrorKind;
  message: string;
  status?: number;
}

export type UpstreamResult =
  | { ok: true; response: RawResponse; latencyMs: number }
  | { ok: false; error: CallError; latencyMs: number };

/**
 * Alert information when an endpoint is quarantined.
 */
export interface QuarantineAlert {
  endpointId: string;
  url: string;
  /** Route ID (if from gateway) */
  routeId?: string;
  reason: "lag" | "failure";
  consecutiveLagCount: number;
  lastKnownSlot?: number;
  canonicalSlot?: number;
  lastError?: string;
  quarantinedUntil: number;
  timestamp: number;
}

/**
 * Alert callback function called when an endpoint is quarantined.
 */
export type AlertCallback = (alert: QuarantineAlert) => void | Promise<void>;
