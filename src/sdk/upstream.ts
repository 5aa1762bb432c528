import type { EndpointStatus, RpcRequest, UpstreamResult } from "./types.js";

export type UpstreamTarget = Pick<EndpointStatus, "id" | "url" | "headers" | "timeoutMs">;

export interface CallOptions {
  /** Used unless the endpoint sets its own timeoutMs */
  timeoutMs: number;
  /** Aborts the call, e.g. once a round's straggler deadline passes */
  signal?: AbortSignal;
}

/**
 * Performs one call to one endpoint. Implementations never reject: every
 * outcome is reported through the result union, and they never retry.
 */
export interface UpstreamCaller {
  call(endpoint: UpstreamTarget, request: RpcRequest, options: CallOptions): Promise<UpstreamResult>;
}

/**
 * UpstreamCaller that POSTs the JSON-RPC body with fetch.
 */
export class HttpUpstreamCaller implements UpstreamCaller {
  async call(
    endpoint: UpstreamTarget,
    request: RpcRequest,
    options: CallOptions,
  ): Promise<UpstreamResult> {
    const timeoutMs = endpoint.timeoutMs ?? options.timeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    const onAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    const headers = new Headers({ "content-type": "application/json" });
    for (const [key, value] of Object.entries(endpoint.headers)) {
      headers.set(key, value);
    }

    const start = Date.now();
    try {
      const response = await fetch(endpoint.url, {
        method: "POST",
        headers,
        body: request.body,
        signal: controller.signal,
      });
      const body = await response.text();
      const latencyMs = Date.now() - start;

      if (!response.ok) {
        return {
          ok: false,
          error: { kind: "status", message: `HTTP ${response.status}`, status: response.status },
          latencyMs,
        };
      }

      let payload: unknown;
      try {
        payload = JSON.parse(body);
      } catch {
        return {
          ok: false,
          error: { kind: "malformed", message: "Response body is not valid JSON" },
          latencyMs,
        };
      }

      return {
        ok: true,
        response: {
          status: response.status,
          headers: headersToRecord(response.headers),
          body,
          payload,
        },
        latencyMs,
      };
    } catch (error) {
      const latencyMs = Date.now() - start;
      if (timedOut) {
        return {
          ok: false,
          error: { kind: "timeout", message: `Timed out after ${timeoutMs}ms` },
          latencyMs,
        };
      }
      if (controller.signal.aborted) {
        return { ok: false, error: { kind: "aborted", message: "Call aborted" }, latencyMs };
      }
      return {
        ok: false,
        error: {
          kind: "network",
          message: error instanceof Error ? error.message : "Unknown error",
        },
        latencyMs,
      };
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }
}

function headersToRecord(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
}
