import { randomUUID } from "node:crypto";
import type { RpcRequest } from "./types.js";

/**
 * JSON-RPC methods named by a single or batch payload, in order.
 */
export function extractMethods(payload: unknown): string[] {
  if (Array.isArray(payload)) {
    return payload
      .map((entry) => methodOf(entry))
      .filter((m): m is string => typeof m === "string");
  }

  const method = methodOf(payload);
  return method === undefined ? [] : [method];
}

/**
 * Wrap a decoded payload for dispatch. `body` keeps the client's exact
 * bytes when the payload came off the wire.
 */
export function createRpcRequest(payload: unknown, body?: string): RpcRequest {
  return {
    id: randomUUID(),
    methods: extractMethods(payload),
    payload,
    body: body ?? JSON.stringify(payload),
  };
}

/**
 * Method of one JSON-RPC call object, if it names one.
 */
export function methodOf(entry: unknown): string | undefined {
  if (!entry || typeof entry !== "object" || !("method" in entry)) {
    return undefined;
  }
  return typeof entry.method === "string" ? entry.method : undefined;
}
