export { LoadBalancer } from "./loadBalancer.js";
export type { LoadBalancerDeps } from "./loadBalancer.js";
export { EndpointRegistry, DEFAULT_QUARANTINE_OPTIONS } from "./registry.js";
export type { QuarantineEvent, QuarantineListener } from "./registry.js";
export { RequestRacer, DEFAULT_RACE_OPTIONS } from "./racer.js";
export type { RaceResult } from "./racer.js";
export { RequestRound } from "./round.js";
export type { RoundEntry } from "./round.js";
export { SlotAnalyzer } from "./analyzer.js";
export type { RoundSummary, SlotObservation } from "./analyzer.js";
export { RecoveryProber, DEFAULT_PROBE_OPTIONS } from "./prober.js";
export { HttpUpstreamCaller } from "./upstream.js";
export type { CallOptions, UpstreamCaller, UpstreamTarget } from "./upstream.js";
export { extractSlot, extractResponseSlot } from "./slot.js";
export { computeBackoffMs } from "./backoff.js";
export { createRpcRequest, extractMethods } from "./request.js";
export {
  AllEndpointsFailedError,
  ConfigError,
  NoHealthyEndpointsError,
  RequestTimeoutError,
  SlotGuardError,
} from "./errors.js";
export { createTelegramAlert, formatQuarantineMessage } from "./alerts.js";
export type { TelegramAlertConfig } from "./alerts.js";
export type {
  AlertCallback,
  CallError,
  CallErrorKind,
  EndpointConfig,
  EndpointState,
  EndpointStatus,
  LoadBalancerOptions,
  ProbeOptions,
  QuarantineAlert,
  QuarantineOptions,
  RaceOptions,
  RawResponse,
  RpcRequest,
  UpstreamResult,
} from "./types.js";
