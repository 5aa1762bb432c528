export interface BackoffSettings {
  baseMs: number;
  factor: number;
  maxMs: number;
  probeFailurePenalty: number;
}

/**
 * Length of a quarantine window.
 *
 * `attempt` counts quarantines inside the rolling window, starting at 1.
 * `probeFailures` stretches the window for endpoints that kept failing
 * probes during their previous quarantine.
 */
export function computeBackoffMs(
  settings: BackoffSettings,
  attempt: number,
  probeFailures = 0,
): number {
  const exponent = Math.max(0, attempt - 1);
  const grown = settings.baseMs * Math.pow(settings.factor, exponent);
  const penalized = grown * (1 + settings.probeFailurePenalty * Math.max(0, probeFailures));
  return Math.min(settings.maxMs, Math.round(penalized));
}
