// SDK - racing, slot analysis and quarantine
export * from "./sdk/index.js";

// Gateway - HTTP server for routing RPC requests
export { RpcGateway, ERROR_CODES } from "./gateway/index.js";
export type {
  CorsConfig,
  GatewayConfig,
  HealthReport,
  RouteConfig,
  RouteStatus,
  TelegramConfig,
} from "./gateway/index.js";

export { loadConfig, toGatewayConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions, LogLevel } from "./logger.js";
