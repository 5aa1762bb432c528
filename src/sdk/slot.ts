import { methodOf } from "./request.js";
import type { RpcRequest } from "./types.js";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toSlot(value: unknown): number | undefined {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0
    ? value
    : undefined;
}

function hexToSlot(value: unknown): number | undefined {
  if (typeof value !== "string" || !/^0x[0-9a-fA-F]+$/.test(value)) {
    return undefined;
  }
  return toSlot(Number.parseInt(value, 16));
}

// Methods whose bare result is the chain's progress counter.
const RESULT_READERS: Record<string, (result: unknown) => number | undefined> = {
  getSlot: toSlot,
  eth_blockNumber: hexToSlot,
  starknet_blockNumber: toSlot,
  starknet_blockHashAndNumber: (result) =>
    isObject(result) ? toSlot(result.block_number) : undefined,
};

/**
 * Slot implied by a single JSON-RPC response object.
 *
 * Solana's `{ context: { slot }, value }` envelope is recognized for every
 * method; otherwise the request method decides how `result` is read.
 */
export function extractResponseSlot(
  method: string | undefined,
  response: unknown,
): number | undefined {
  if (!isObject(response) || "error" in response || !("result" in response)) {
    return undefined;
  }

  const result = response.result;
  if (isObject(result) && isObject(result.context) && "slot" in result.context) {
    return toSlot(result.context.slot);
  }

  const reader = method ? RESULT_READERS[method] : undefined;
  return reader ? reader(result) : undefined;
}

/**
 * Slot implied by an upstream payload for the given request, if any.
 * A batch yields the highest slot among its responses.
 */
export function extractSlot(request: RpcRequest, payload: unknown): number | undefined {
  if (!Array.isArray(payload)) {
    return extractResponseSlot(methodOf(request.payload), payload);
  }

  const methodsById = new Map<unknown, string>();
  if (Array.isArray(request.payload)) {
    for (const entry of request.payload) {
      const method = methodOf(entry);
      if (isObject(entry) && method !== undefined) {
        methodsById.set(entry.id, method);
      }
    }
  }

  let best: number | undefined;
  for (const response of payload) {
    const method = isObject(response) ? methodsById.get(response.id) : undefined;
    const slot = extractResponseSlot(method, response);
    if (slot !== undefined && (best === undefined || slot > best)) {
      best = slot;
    }
  }
  return best;
}
