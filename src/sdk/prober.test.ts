import { describe, it, expect, jest } from "@jest/globals";
import { SlotAnalyzer } from "./analyzer.js";
import { RecoveryProber } from "./prober.js";
import { EndpointRegistry } from "./registry.js";
import type { RpcRequest, UpstreamResult } from "./types.js";
import type { CallOptions, UpstreamCaller, UpstreamTarget } from "./upstream.js";

const slotResult = (slot: number): UpstreamResult => {
  const payload = { jsonrpc: "2.0", id: "probe", result: slot };
  return {
    ok: true,
    response: { status: 200, headers: {}, body: JSON.stringify(payload), payload },
    latencyMs: 3,
  };
};

function setup(results: Record<string, UpstreamResult>, probeIntervalMs = 10_000) {
  let now = 1_000_000;
  const registry = new EndpointRegistry(
    [
      { id: "a", url: "http://a.test" },
      { id: "b", url: "http://b.test" },
    ],
    { lagThreshold: 1, lagTolerance: 5 },
    { clock: () => now },
  );
  const call = jest.fn<UpstreamCaller["call"]>(
    async (endpoint: UpstreamTarget, _request: RpcRequest, _options: CallOptions) =>
      results[endpoint.id] ?? slotResult(0),
  );
  const caller: UpstreamCaller = { call };
  const prober = new RecoveryProber(registry, caller, new SlotAnalyzer(registry), {
    probeIntervalMs,
    callTimeoutMs: 250,
  });
  return {
    registry,
    call,
    prober,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("RecoveryProber", () => {
  it("should reject a non-positive interval", () => {
    const registry = new EndpointRegistry(["http://a.test"]);
    const caller: UpstreamCaller = { call: async () => slotResult(1) };
    expect(
      () => new RecoveryProber(registry, caller, new SlotAnalyzer(registry), { probeIntervalMs: 0 }),
    ).toThrow("probeIntervalMs must be > 0 (got 0)");
  });

  it("should probe only quarantined endpoints", async () => {
    const { registry, call, prober } = setup({ a: slotResult(100) });
    registry.recordObservation("b", 100, 100);
    registry.recordFailure("a", "down");

    const summaries = await prober.probeAll();

    expect(call).toHaveBeenCalledTimes(1);
    const [target, request, options] = call.mock.calls[0] ?? [];
    expect(target?.id).toBe("a");
    expect(request?.methods).toEqual(["getSlot"]);
    expect(request?.payload).toEqual({
      jsonrpc: "2.0",
      id: "probe-1",
      method: "getSlot",
      params: [],
    });
    expect(options).toEqual({ timeoutMs: 250 });
    expect(summaries).toHaveLength(1);
    expect(summaries[0]?.canonicalSlot).toBe(100);
  });

  it("should clear probe failures on a healthy probe but keep the window", async () => {
    const { registry, prober } = setup({ a: slotResult(100) });
    registry.recordObservation("b", 100, 100);
    registry.recordFailure("a", "down");
    registry.recordFailure("a", "still down");
    expect(registry.get("a")?.probeFailureCount).toBe(1);

    await prober.probeAll();

    const status = registry.get("a");
    expect(status?.state).toBe("quarantined");
    expect(status?.probeFailureCount).toBe(0);
  });

  it("should count failed probes against the endpoint", async () => {
    const { registry, prober } = setup({
      a: { ok: false, error: { kind: "timeout", message: "Timed out after 250ms" }, latencyMs: 250 },
    });
    registry.recordFailure("a", "down");

    const [summary] = await prober.probeAll();

    expect(summary?.failed).toEqual(["a"]);
    expect(registry.get("a")?.probeFailureCount).toBe(1);
  });

  it("should record a caller that throws as a failed check", async () => {
    const { registry, call, prober } = setup({});
    call.mockRejectedValueOnce(new Error("socket hang up"));
    registry.recordObservation("b", 100, 100);
    registry.recordFailure("a", "down");

    const summaries = await prober.probeAll();

    expect(summaries).toEqual([
      { requestId: "probe-1", observations: [], lagging: [], failed: ["a"] },
    ]);
    expect(registry.get("a")?.probeFailureCount).toBe(1);
    expect(registry.get("a")?.lastError).toBe("socket hang up");
  });

  it("should re-quarantine a reinstated endpoint whose probe still lags", async () => {
    const { registry, prober, advance } = setup({ a: slotResult(50) });
    registry.recordObservation("b", 100, 100);
    registry.recordFailure("a", "down");

    advance(5_000);
    expect(registry.get("a")?.probation).toBe(true);

    const [summary] = await prober.probeAll();

    expect(summary?.lagging).toEqual(["a"]);
    expect(registry.get("a")?.state).toBe("quarantined");
  });

  it("should do nothing when no endpoint needs probing", async () => {
    const { call, prober } = setup({});
    await expect(prober.probeAll()).resolves.toEqual([]);
    expect(call).not.toHaveBeenCalled();
  });

  it("should probe on an interval until stopped", async () => {
    const { registry, call, prober } = setup({ a: slotResult(100) }, 10);
    registry.recordFailure("a", "down");

    prober.start();
    expect(prober.running).toBe(true);
    await new Promise((resolve) => setTimeout(resolve, 60));
    prober.stop();

    expect(prober.running).toBe(false);
    expect(call.mock.calls.length).toBeGreaterThan(0);
    const callsAtStop = call.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(call.mock.calls.length).toBe(callsAtStop);
  });
});
