import { describe, it, expect } from "@jest/globals";
import { createRpcRequest } from "./request.js";
import { extractResponseSlot, extractSlot } from "./slot.js";

describe("extractResponseSlot", () => {
  it("should read getSlot results", () => {
    expect(extractResponseSlot("getSlot", { jsonrpc: "2.0", id: 1, result: 250_000_123 })).toBe(
      250_000_123,
    );
  });

  it("should read the context slot of any method", () => {
    const response = {
      jsonrpc: "2.0",
      id: 1,
      result: { context: { slot: 4242 }, value: { lamports: 10 } },
    };
    expect(extractResponseSlot("getBalance", response)).toBe(4242);
    expect(extractResponseSlot(undefined, response)).toBe(4242);
  });

  it("should read hex block numbers", () => {
    expect(extractResponseSlot("eth_blockNumber", { jsonrpc: "2.0", id: 1, result: "0x1b4" })).toBe(
      436,
    );
    expect(
      extractResponseSlot("eth_blockNumber", { jsonrpc: "2.0", id: 1, result: "latest" }),
    ).toBeUndefined();
  });

  it("should read starknet block numbers", () => {
    expect(extractResponseSlot("starknet_blockNumber", { result: 812 })).toBe(812);
    expect(
      extractResponseSlot("starknet_blockHashAndNumber", {
        result: { block_hash: "0xabc", block_number: 813 },
      }),
    ).toBe(813);
  });

  it("should ignore errors, unknown methods and invalid values", () => {
    expect(
      extractResponseSlot("getSlot", { jsonrpc: "2.0", id: 1, error: { code: -32005, message: "x" } }),
    ).toBeUndefined();
    expect(extractResponseSlot("getBalance", { result: 12 })).toBeUndefined();
    expect(extractResponseSlot("getSlot", { result: -1 })).toBeUndefined();
    expect(extractResponseSlot("getSlot", { result: 1.5 })).toBeUndefined();
    expect(extractResponseSlot("getSlot", "12")).toBeUndefined();
    expect(extractResponseSlot("getSlot", { id: 1 })).toBeUndefined();
  });
});

describe("extractSlot", () => {
  it("should use the request method for single requests", () => {
    const request = createRpcRequest({ jsonrpc: "2.0", id: 7, method: "getSlot" });
    expect(extractSlot(request, { jsonrpc: "2.0", id: 7, result: 99 })).toBe(99);
  });

  it("should take the highest slot of a batch, matching responses by id", () => {
    const request = createRpcRequest([
      { jsonrpc: "2.0", id: 1, method: "getSlot" },
      { jsonrpc: "2.0", id: 2, method: "getBalance", params: ["addr"] },
      { jsonrpc: "2.0", id: 3, method: "getBlockHeight" },
    ]);
    const payload = [
      { jsonrpc: "2.0", id: 3, result: 1_000_000 },
      { jsonrpc: "2.0", id: 1, result: 500 },
      { jsonrpc: "2.0", id: 2, result: { context: { slot: 510 }, value: 1 } },
    ];

    expect(extractSlot(request, payload)).toBe(510);
  });

  it("should return undefined when nothing carries a slot", () => {
    const request = createRpcRequest({ jsonrpc: "2.0", id: 1, method: "getVersion" });
    expect(extractSlot(request, { jsonrpc: "2.0", id: 1, result: { "solana-core": "1.18.0" } })).toBe(
      undefined,
    );
  });
});
