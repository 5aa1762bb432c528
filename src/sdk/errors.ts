export abstract class SlotGuardError extends Error {
  public readonly name: string;
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * No endpoint was eligible for dispatch: every configured upstream is
 * inside its quarantine window.
 */
export class NoHealthyEndpointsError extends SlotGuardError {
  constructor(public readonly total: number) {
    super(`No healthy endpoints available (total=${total}).`);
  }
}

/**
 * Every dispatched call of a round failed.
 */
export class AllEndpointsFailedError extends SlotGuardError {
  constructor(public readonly failures: Array<{ endpointId: string; reason: string }>) {
    super(
      `All endpoints failed: ${failures
        .map((f) => `${f.endpointId} (${f.reason})`)
        .join(", ")}`,
    );
  }
}

/**
 * The client-facing deadline elapsed, or the client went away, before any
 * endpoint answered successfully.
 */
export class RequestTimeoutError extends SlotGuardError {
  constructor(
    public readonly requestTimeoutMs: number,
    public readonly cancelled = false,
  ) {
    super(
      cancelled
        ? "Request cancelled before any endpoint responded."
        : `Request timed out (requestTimeoutMs=${requestTimeoutMs}).`,
    );
  }
}

export class ConfigError extends SlotGuardError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}
