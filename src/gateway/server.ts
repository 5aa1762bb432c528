import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import { createLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { createTelegramAlert } from "../sdk/alerts.js";
import {
  AllEndpointsFailedError,
  NoHealthyEndpointsError,
  RequestTimeoutError,
} from "../sdk/errors.js";
import { LoadBalancer } from "../sdk/loadBalancer.js";
import { createRpcRequest, extractMethods } from "../sdk/request.js";
import type { AlertCallback } from "../sdk/types.js";
import type { GatewayConfig, HealthReport, RouteStatus } from "./types.js";

interface InternalRoute {
  id: string;
  methods?: Set<string>;
  balancer: LoadBalancer;
}

type ResolvedConfig = GatewayConfig & {
  host: string;
  maxBodyBytes: number;
  healthCheckPath: string;
  statusPath: string;
};

const DEFAULT_MAX_BODY_BYTES = 1_000_000; // 1MB

// JSON-RPC server error codes for aggregate upstream outcomes.
export const ERROR_CODES = {
  noHealthyEndpoints: -32001,
  allEndpointsFailed: -32002,
  timeout: -32003,
  internal: -32603,
} as const;

/**
 * RPC Gateway - HTTP server that receives RPC requests and races them
 * across each route's upstream endpoints.
 *
 * @example
 * ```ts
 * const gateway = new RpcGateway({
 *   port: 8080,
 *   routes: [
 *     {
 *       id: "main",
 *       endpoints: ["https://rpc1.example.com", "https://rpc2.example.com"],
 *       options: { lagTolerance: 5, lagThreshold: 3 },
 *     },
 *   ],
 * });
 *
 * await gateway.start();
 * // RPC clients can now connect to http://localhost:8080
 * ```
 */
export class RpcGateway {
  private readonly config: ResolvedConfig;
  private readonly routes: InternalRoute[];
  private readonly logger: Logger;
  private server?: Server;

  constructor(config: GatewayConfig) {
    if (!config.routes.length) {
      throw new Error("RpcGateway requires at least one route.");
    }

    this.config = {
      ...config,
      host: config.host ?? "0.0.0.0",
      maxBodyBytes: config.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
      healthCheckPath: config.healthCheckPath ?? "/health",
      statusPath: config.statusPath ?? "/status",
    };
    this.logger = config.logger ?? createLogger();

    const alert = resolveAlert(config, this.logger);
    this.routes = config.routes.map((route) => {
      const balancer = new LoadBalancer(
        route.endpoints,
        {
          ...route.options,
          onEndpointQuarantined: route.options?.onEndpointQuarantined ?? alert,
        },
        { caller: config.caller, logger: this.logger },
      );
      balancer.setRouteId(route.id);
      return {
        id: route.id,
        methods: route.methods ? new Set(route.methods) : undefined,
        balancer,
      };
    });
  }

  /**
   * Start the gateway server and the routes' recovery probers.
   */
  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        this.logger.error({ err: error }, "Unhandled gateway error");
        if (!res.headersSent) {
          this.sendJsonRpcError(res, null, ERROR_CODES.internal, "Internal error.", 500);
        }
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    for (const route of this.routes) {
      route.balancer.start();
    }

    this.logger.info(`RPC Gateway listening on http://${this.config.host}:${this.getPort()}`);
  }

  /**
   * Stop the gateway server.
   */
  async stop(): Promise<void> {
    if (!this.server) {
      return;
    }

    const server = this.server;
    this.server = undefined;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await Promise.all(this.routes.map((route) => route.balancer.stop()));

    this.logger.info("RPC Gateway stopped.");
  }

  /**
   * Port the server is bound to, or undefined when not started.
   */
  getPort(): number | undefined {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : undefined;
  }

  /**
   * Get status of all routes and their endpoints.
   */
  getStatus(): RouteStatus[] {
    return this.routes.map((route) => {
      const endpoints = route.balancer.getStatus();
      return {
        routeId: route.id,
        methods: route.methods ? Array.from(route.methods) : undefined,
        activeEndpoints: endpoints.filter((e) => e.state === "active").length,
        endpoints,
      };
    });
  }

  getHealth(): HealthReport {
    const routes = this.routes.map((route) => ({
      routeId: route.id,
      active: route.balancer.getActiveCount(),
      total: route.balancer.getStatus().length,
    }));
    return {
      status: routes.every((r) => r.active > 0) ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      routes,
    };
  }

  /**
   * Get a specific route's load balancer for direct access.
   */
  getBalancer(routeId: string): LoadBalancer | undefined {
    return this.routes.find((r) => r.id === routeId)?.balancer;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    // Handle CORS
    if (this.applyCors(req, res)) {
      return;
    }

    if (req.method === "GET" && this.serveInfo(req, res)) {
      return;
    }

    // Only POST is supported for JSON-RPC
    if (req.method !== "POST") {
      res.writeHead(405, { "content-type": "application/json" });
      res.end(JSON.stringify({ error: "Only POST is supported." }));
      return;
    }

    // Read request body
    let rawBody: string;
    try {
      rawBody = await this.readBody(req);
    } catch {
      res.writeHead(413, { "content-type": "application/json" });
      res.end(JSON.stringify({ error: "Request body too large." }));
      return;
    }

    // Parse JSON
    let payload: unknown;
    try {
      payload = rawBody ? JSON.parse(rawBody) : null;
    } catch {
      this.sendJsonRpcError(res, null, -32700, "Parse error: Invalid JSON.");
      return;
    }

    const methods = extractMethods(payload);
    if (!methods.length) {
      this.sendJsonRpcError(res, payload, -32600, "Invalid Request.");
      return;
    }

    // Check global method whitelist
    if (this.config.allowedMethods?.length) {
      const allowed = new Set(this.config.allowedMethods);
      const blocked = methods.find((m) => !allowed.has(m));
      if (blocked) {
        this.sendJsonRpcError(res, payload, -32601, `Method not allowed: ${blocked}`);
        return;
      }
    }

    const route = this.findRoute(methods);
    if (!route) {
      this.sendJsonRpcError(res, payload, -32601, "Method not found.");
      return;
    }

    // The race stops waiting if the client goes away; the round itself
    // keeps collecting responses for slot analysis.
    const disconnect = new AbortController();
    res.once("close", () => {
      if (!res.writableEnded) disconnect.abort();
    });

    const startTime = Date.now();
    try {
      const result = await route.balancer.forward(
        createRpcRequest(payload, rawBody),
        disconnect.signal,
      );
      const duration = Date.now() - startTime;
      const endpoint = route.balancer.getRegistry().get(result.endpointId);
      this.logRequest(methods, route.id, endpoint?.url, result.response.status, duration);

      res.writeHead(result.response.status, {
        "content-type": "application/json",
        ...this.filterResponseHeaders(result.response.headers),
      });
      res.end(result.response.body);
    } catch (error) {
      const duration = Date.now() - startTime;
      const { status, code, message } = describeFailure(error);
      this.logRequest(methods, route.id, undefined, status, duration, error);

      if (res.writableEnded || res.destroyed) {
        return;
      }
      this.sendJsonRpcError(res, payload, code, message, status);
    }
  }

  private serveInfo(req: IncomingMessage, res: ServerResponse): boolean {
    const path = new URL(req.url ?? "/", "http://gateway").pathname;

    if (path === this.config.healthCheckPath) {
      const health = this.getHealth();
      res.writeHead(health.status === "ok" ? 200 : 503, { "content-type": "application/json" });
      res.end(JSON.stringify(health));
      return true;
    }

    if (path === this.config.statusPath) {
      res.writeHead(200, { "content-type": "application/json" });
      res.end(JSON.stringify({ timestamp: new Date().toISOString(), routes: this.getStatus() }));
      return true;
    }

    return false;
  }

  private logRequest(
    methods: string[],
    routeId: string,
    endpointUrl: string | undefined,
    status: number,
    durationMs: number,
    error?: unknown,
  ): void {
    const methodStr = methods.join(", ");
    const statusIcon = status >= 200 && status < 300 ? "✓" : "✗";
    const host = endpointUrl ? new URL(endpointUrl).host : "none";
    const line = `${statusIcon} ${methodStr} → ${host} (${routeId}) ${status} ${durationMs}ms`;

    if (error) {
      this.logger.warn(
        { error: error instanceof Error ? error.name : String(error) },
        `${line} ERROR`,
      );
    } else {
      this.logger.info(line);
    }
  }

  private findRoute(methods: string[]): InternalRoute | undefined {
    // First, try to find a route that explicitly handles all requested methods
    for (const route of this.routes) {
      if (!route.methods) {
        // Route handles all methods
        return route;
      }
      if (methods.every((m) => route.methods?.has(m))) {
        return route;
      }
    }

    // Fall back to default route if configured
    if (this.config.defaultRouteId) {
      return this.routes.find((r) => r.id === this.config.defaultRouteId);
    }

    return undefined;
  }

  private async readBody(req: IncomingMessage): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      let size = 0;
      let tooLarge = false;
      const chunks: Buffer[] = [];

      // Past the limit the rest of the body is read and dropped so the 413
      // can still be written on the same connection.
      req.on("data", (chunk: Buffer) => {
        if (tooLarge) return;
        size += chunk.length;
        if (size > this.config.maxBodyBytes) {
          tooLarge = true;
          chunks.length = 0;
          reject(new Error("Body too large."));
          return;
        }
        chunks.push(chunk);
      });

      req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
      req.on("error", reject);
    });
  }

  private sendJsonRpcError(
    res: ServerResponse,
    payload: unknown,
    code: number,
    message: string,
    httpStatus = 200,
  ): void {
    res.writeHead(httpStatus, { "content-type": "application/json" });

    const buildError = (p: unknown) => {
      const id = p && typeof p === "object" && "id" in p ? p.id : null;
      return { jsonrpc: "2.0", id: id ?? null, error: { code, message } };
    };

    if (Array.isArray(payload)) {
      res.end(JSON.stringify(payload.map(buildError)));
    } else {
      res.end(JSON.stringify(buildError(payload)));
    }
  }

  private applyCors(req: IncomingMessage, res: ServerResponse): boolean {
    const cors = this.config.cors;
    if (!cors) {
      return false;
    }

    const origin = req.headers.origin;
    const allowedOrigins = cors.allowedOrigins ?? ["*"];
    const allowOrigin =
      origin && allowedOrigins.includes(origin) ? origin : allowedOrigins[0] ?? "*";

    res.setHeader("Access-Control-Allow-Origin", allowOrigin);
    res.setHeader(
      "Access-Control-Allow-Methods",
      (cors.allowedMethods ?? ["POST", "OPTIONS"]).join(", "),
    );
    res.setHeader(
      "Access-Control-Allow-Headers",
      (cors.allowedHeaders ?? ["content-type"]).join(", "),
    );

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return true;
    }

    return false;
  }

  private filterResponseHeaders(headers: Record<string, string>): Record<string, string> {
    const result: Record<string, string> = {};
    const skip = new Set([
      "content-length",
      "content-encoding",
      "transfer-encoding",
      "connection",
      "keep-alive",
    ]);

    for (const [key, value] of Object.entries(headers)) {
      if (!skip.has(key.toLowerCase())) {
        result[key] = value;
      }
    }

    return result;
  }
}

function describeFailure(error: unknown): { status: number; code: number; message: string } {
  if (error instanceof NoHealthyEndpointsError) {
    return {
      status: 503,
      code: ERROR_CODES.noHealthyEndpoints,
      message: "No healthy upstream endpoints.",
    };
  }
  if (error instanceof AllEndpointsFailedError) {
    return {
      status: 502,
      code: ERROR_CODES.allEndpointsFailed,
      message: "Bad Gateway: all upstream requests failed.",
    };
  }
  if (error instanceof RequestTimeoutError) {
    return {
      status: 504,
      code: ERROR_CODES.timeout,
      message: "Gateway Timeout: no upstream responded in time.",
    };
  }
  return { status: 500, code: ERROR_CODES.internal, message: "Internal error." };
}

function resolveAlert(config: GatewayConfig, logger: Logger): AlertCallback | undefined {
  if (config.onEndpointQuarantined) {
    return config.onEndpointQuarantined;
  }
  if (config.telegram) {
    return createTelegramAlert({ ...config.telegram, logger });
  }
  return undefined;
}
