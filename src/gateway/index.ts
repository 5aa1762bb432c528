export { RpcGateway, ERROR_CODES } from "./server.js";
export type {
  CorsConfig,
  GatewayConfig,
  HealthReport,
  RouteConfig,
  RouteStatus,
  TelegramConfig,
} from "./types.js";
export type { AlertCallback } from "../sdk/types.js";
