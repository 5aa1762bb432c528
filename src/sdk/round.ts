import type { RoundSummary } from "./analyzer.js";
import type { CallError, RawResponse } from "./types.js";

export type RoundEntry =
  | { status: "pending" }
  | {
      status: "success";
      response: RawResponse;
      slot?: number;
      arrivedAt: number;
      latencyMs: number;
    }
  | { status: "failure"; error: CallError; arrivedAt: number; latencyMs?: number }
  /** Still in flight when the round closed; never counted for or against the endpoint */
  | { status: "unresolved"; reason: string; closedAt: number };

/**
 * Every call spawned for one client request. Owned by the racer that
 * created it until it is closed and handed to the analyzer.
 */
export class RequestRound {
  readonly responses = new Map<string, RoundEntry>();
  private resolveClosed: (summary: RoundSummary) => void = () => undefined;
  /** Resolves with the analysis once the round is closed */
  readonly closed = new Promise<RoundSummary>((resolve) => {
    this.resolveClosed = resolve;
  });
  private isClosed = false;

  constructor(readonly requestId: string, endpointIds: string[]) {
    for (const id of endpointIds) {
      this.responses.set(id, { status: "pending" });
    }
  }

  get open(): boolean {
    return !this.isClosed;
  }

  get pendingCount(): number {
    let count = 0;
    for (const entry of this.responses.values()) {
      if (entry.status === "pending") count += 1;
    }
    return count;
  }

  /**
   * Store a call's outcome. Returns false when the round is already closed
   * or the endpoint was not part of it.
   */
  settle(
    endpointId: string,
    entry: Extract<RoundEntry, { status: "success" | "failure" }>,
  ): boolean {
    if (this.isClosed || this.responses.get(endpointId)?.status !== "pending") {
      return false;
    }
    this.responses.set(endpointId, entry);
    return true;
  }

  /**
   * Stop accepting outcomes. Calls still pending are marked unresolved.
   */
  close(reason: string, now: number = Date.now()): void {
    if (this.isClosed) return;
    for (const [id, entry] of this.responses) {
      if (entry.status === "pending") {
        this.responses.set(id, { status: "unresolved", reason, closedAt: now });
      }
    }
    this.isClosed = true;
  }

  finish(summary: RoundSummary): void {
    this.resolveClosed(summary);
  }

  failures(): Array<{ endpointId: string; reason: string }> {
    const result: Array<{ endpointId: string; reason: string }> = [];
    for (const [endpointId, entry] of this.responses) {
      if (entry.status === "failure") {
        result.push({ endpointId, reason: entry.error.message });
      }
    }
    return result;
  }

  unresolved(): string[] {
    const result: string[] = [];
    for (const [endpointId, entry] of this.responses) {
      if (entry.status === "unresolved") result.push(endpointId);
    }
    return result;
  }
}
