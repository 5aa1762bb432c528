import { describe, it, expect, beforeEach } from "@jest/globals";
import { EndpointRegistry } from "./registry.js";
import type { QuarantineEvent } from "./registry.js";
import type { QuarantineOptions } from "./types.js";

const START = 1_700_000_000_000;

describe("EndpointRegistry", () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = START;
  });

  const create = (options: QuarantineOptions = {}) =>
    new EndpointRegistry(
      [
        { id: "a", url: "https://a.example.com" },
        { id: "b", url: "https://b.example.com" },
      ],
      options,
      { clock },
    );

  describe("constructor", () => {
    it("should throw if no endpoints provided", () => {
      expect(() => new EndpointRegistry([])).toThrow(
        "EndpointRegistry requires at least one endpoint.",
      );
    });

    it("should throw if endpoint config has no url", () => {
      expect(() => new EndpointRegistry([{ url: "" }])).toThrow("Endpoint must include a url.");
    });

    it("should reject duplicate ids", () => {
      expect(
        () => new EndpointRegistry(["https://a.example.com", "https://a.example.com"]),
      ).toThrow("Duplicate endpoint id: https://a.example.com");
    });

    it("should reject a non-positive lag threshold", () => {
      expect(() => new EndpointRegistry(["https://a.example.com"], { lagThreshold: 0 })).toThrow(
        "lagThreshold must be a positive integer (got 0)",
      );
    });

    it("should use the url as id and start every endpoint active", () => {
      const registry = new EndpointRegistry([
        "https://a.example.com",
        { url: "https://b.example.com", headers: { authorization: "Bearer test-secret" } },
      ]);

      expect(registry.getStatus()).toEqual([
        expect.objectContaining({
          id: "https://a.example.com",
          state: "active",
          consecutiveLagCount: 0,
          headers: {},
        }),
        expect.objectContaining({
          id: "https://b.example.com",
          headers: { authorization: "Bearer test-secret" },
        }),
      ]);
      expect(registry.snapshotActive()).toHaveLength(2);
    });
  });

  describe("recordObservation", () => {
    it("should keep the highest slot ever seen", () => {
      const registry = create();
      registry.recordObservation("a", 120, 120);
      registry.recordObservation("a", 110, 115);

      expect(registry.get("a")?.lastKnownSlot).toBe(120);
    });

    it("should count lag only beyond the tolerance", () => {
      const registry = create({ lagTolerance: 5 });
      registry.recordObservation("a", 95, 100);
      expect(registry.get("a")?.consecutiveLagCount).toBe(0);

      registry.recordObservation("a", 94, 100);
      expect(registry.get("a")?.consecutiveLagCount).toBe(1);
    });

    it("should reset the lag count on a healthy observation", () => {
      const registry = create({ lagTolerance: 5 });
      registry.recordObservation("a", 80, 100);
      registry.recordObservation("a", 80, 100);
      registry.recordObservation("a", 100, 100);

      expect(registry.get("a")?.consecutiveLagCount).toBe(0);
      expect(registry.get("a")?.state).toBe("active");
    });

    it("should quarantine after the lag threshold and notify listeners", () => {
      const registry = create({ lagTolerance: 5, lagThreshold: 3 });
      const events: QuarantineEvent[] = [];
      registry.onQuarantine((event) => events.push(event));

      registry.recordObservation("a", 80, 100);
      registry.recordObservation("a", 80, 100);
      expect(registry.get("a")?.state).toBe("active");
      registry.recordObservation("a", 80, 100);

      const status = registry.get("a");
      expect(status?.state).toBe("quarantined");
      expect(status?.quarantinedSince).toBe(START);
      expect(status?.quarantinedUntil).toBe(START + 5_000);
      expect(status?.recentQuarantines).toBe(1);
      expect(registry.snapshotActive().map((e) => e.id)).toEqual(["b"]);

      expect(events).toHaveLength(1);
      expect(events[0]?.reason).toBe("lag");
      expect(events[0]?.canonicalSlot).toBe(100);
      expect(events[0]?.endpoint.id).toBe("a");
    });

    it("should ignore unknown endpoints", () => {
      const registry = create();
      registry.recordObservation("missing", 1, 100);
      registry.recordFailure("missing");
      expect(registry.get("missing")).toBeUndefined();
    });
  });

  describe("recordFailure", () => {
    it("should weigh a failure more than a lagging slot", () => {
      const registry = create();
      registry.recordFailure("a", "HTTP 500");

      expect(registry.get("a")?.consecutiveLagCount).toBe(2);
      expect(registry.get("a")?.lastError).toBe("HTTP 500");
      expect(registry.get("a")?.state).toBe("active");

      registry.recordFailure("a", "HTTP 500");
      expect(registry.get("a")?.state).toBe("quarantined");
    });

    it("should count probe failures without quarantining again", () => {
      const registry = create({ lagThreshold: 1 });
      const events: QuarantineEvent[] = [];
      registry.onQuarantine((event) => events.push(event));

      registry.recordFailure("a", "down");
      registry.recordFailure("a", "still down");
      registry.recordFailure("a", "still down");

      expect(events).toHaveLength(1);
      expect(events[0]?.reason).toBe("failure");
      expect(registry.get("a")?.probeFailureCount).toBe(2);
      expect(registry.get("a")?.quarantinedUntil).toBe(START + 5_000);
    });
  });

  describe("quarantine windows", () => {
    it("should reinstate lazily on probation once the window has passed", () => {
      const registry = create({ lagThreshold: 1 });
      registry.recordFailure("a");

      now = START + 4_999;
      expect(registry.get("a")?.state).toBe("quarantined");

      now = START + 5_000;
      const status = registry.get("a");
      expect(status?.state).toBe("active");
      expect(status?.probation).toBe(true);
      expect(status?.consecutiveLagCount).toBe(0);
      expect(status?.quarantinedUntil).toBeUndefined();
      expect(registry.snapshotActive().map((e) => e.id)).toEqual(["a", "b"]);
    });

    it("should re-quarantine on the first lag signal after reinstatement with a longer window", () => {
      const registry = create({ lagThreshold: 3, lagTolerance: 5 });
      registry.recordFailure("a");
      registry.recordFailure("a");
      expect(registry.get("a")?.quarantinedUntil).toBe(START + 5_000);

      now = START + 5_000;
      registry.recordObservation("a", 90, 100);

      const status = registry.get("a");
      expect(status?.state).toBe("quarantined");
      expect(status?.quarantinedUntil).toBe(START + 5_000 + 10_000);
      expect(status?.recentQuarantines).toBe(2);
    });

    it("should end probation on a healthy observation", () => {
      const registry = create({ lagThreshold: 3, lagTolerance: 5 });
      registry.recordFailure("a");
      registry.recordFailure("a");

      now = START + 5_000;
      registry.recordObservation("a", 100, 100);
      registry.recordObservation("a", 90, 100);

      const status = registry.get("a");
      expect(status?.probation).toBe(false);
      expect(status?.state).toBe("active");
      expect(status?.consecutiveLagCount).toBe(1);
    });

    it("should lengthen the next window by the probe failures seen", () => {
      const registry = create({ lagThreshold: 1 });
      registry.recordFailure("a");
      registry.recordFailure("a");
      registry.recordFailure("a");
      expect(registry.get("a")?.probeFailureCount).toBe(2);

      now = START + 5_000;
      registry.recordFailure("a");

      // 5000 * 2^1 * (1 + 0.5 * 2)
      expect(registry.get("a")?.quarantinedUntil).toBe(START + 5_000 + 20_000);
      expect(registry.get("a")?.probeFailureCount).toBe(0);
    });

    it("should clear probe failures on a healthy probe without ending the window", () => {
      const registry = create({ lagThreshold: 1 });
      registry.recordFailure("a");
      registry.recordFailure("a");
      registry.recordObservation("a", 100, 100);

      const status = registry.get("a");
      expect(status?.probeFailureCount).toBe(0);
      expect(status?.state).toBe("quarantined");
      expect(status?.quarantinedUntil).toBe(START + 5_000);
    });

    it("should not carry old failed recovery checks into a later lag quarantine", () => {
      const registry = create({ lagThreshold: 1 });
      registry.recordFailure("a");
      for (let i = 0; i < 4; i++) {
        registry.recordFailure("a", "still down");
      }
      expect(registry.get("a")?.probeFailureCount).toBe(4);

      now = START + 5_000;
      registry.recordObservation("a", 100, 100);
      expect(registry.get("a")?.probeFailureCount).toBe(0);
      expect(registry.get("a")?.probation).toBe(false);

      now = START + 5_000 + 3_600_000;
      registry.recordObservation("a", 90, 100);

      const status = registry.get("a");
      expect(status?.state).toBe("quarantined");
      expect(status?.quarantinedUntil).toBe(now + 5_000);
    });

    it("should cap the window at backoffMaxMs", () => {
      const registry = create({ lagThreshold: 1, backoffBaseMs: 1_000, backoffMaxMs: 3_000 });
      for (let attempt = 0; attempt < 4; attempt++) {
        registry.recordFailure("a");
        const until = registry.get("a")?.quarantinedUntil ?? now;
        now = until;
      }

      registry.recordFailure("a");
      expect(registry.get("a")?.quarantinedUntil).toBe(now + 3_000);
    });

    it("should forget quarantines older than the backoff window", () => {
      const registry = create({ lagThreshold: 1, backoffWindowMs: 60_000 });
      registry.recordFailure("a");

      now = START + 60_000;
      registry.recordFailure("a");

      expect(registry.get("a")?.quarantinedUntil).toBe(now + 5_000);
      expect(registry.get("a")?.recentQuarantines).toBe(1);
    });
  });

  describe("listQuarantined", () => {
    it("should include quarantined endpoints and those on probation", () => {
      const registry = create({ lagThreshold: 1 });
      registry.recordFailure("a");
      expect(registry.listQuarantined().map((e) => e.id)).toEqual(["a"]);

      now = START + 5_000;
      expect(registry.listQuarantined().map((e) => e.id)).toEqual(["a"]);

      registry.recordObservation("a", 100, 100);
      expect(registry.listQuarantined()).toEqual([]);
    });
  });

  describe("bestKnownSlot", () => {
    it("should return the highest slot, optionally excluding one endpoint", () => {
      const registry = create();
      expect(registry.bestKnownSlot()).toBeUndefined();

      registry.recordObservation("a", 150, 150);
      registry.recordObservation("b", 140, 150);

      expect(registry.bestKnownSlot()).toBe(150);
      expect(registry.bestKnownSlot("a")).toBe(140);
    });
  });

  describe("onQuarantine", () => {
    it("should stop notifying after unsubscribe", () => {
      const registry = create({ lagThreshold: 1 });
      const seen: string[] = [];
      const unsubscribe = registry.onQuarantine((event) => seen.push(event.endpoint.id));

      registry.recordFailure("a");
      unsubscribe();
      registry.recordFailure("b");

      expect(seen).toEqual(["a"]);
    });

    it("should keep going when a listener throws", () => {
      const registry = create({ lagThreshold: 1 });
      const seen: string[] = [];
      registry.onQuarantine(() => {
        throw new Error("listener failed");
      });
      registry.onQuarantine((event) => seen.push(event.endpoint.id));

      registry.recordFailure("a");

      expect(seen).toEqual(["a"]);
      expect(registry.get("a")?.state).toBe("quarantined");
    });
  });

  describe("recordLiveness", () => {
    it("should record latency and clear the last error", () => {
      const registry = create();
      registry.recordFailure("a", "timeout");
      registry.recordLiveness("a", 42);

      const status = registry.get("a");
      expect(status?.lastLatencyMs).toBe(42);
      expect(status?.lastError).toBeUndefined();
      expect(status?.lastSeenAt).toBe(START);
      expect(status?.consecutiveLagCount).toBe(2);
    });
  });
});
