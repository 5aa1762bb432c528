import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { AlertCallback, QuarantineAlert } from "./types.js";

/**
 * Telegram alert configuration.
 */
export interface TelegramAlertConfig {
  /** Telegram bot token */
  botToken: string;
  /** Telegram chat ID to send alerts to */
  chatId: string;
  /** Optional: custom message format function */
  formatMessage?: (alert: QuarantineAlert) => string;
  /** Optional: Bot API base URL (default: https://api.telegram.org) */
  apiBaseUrl?: string;
  logger?: Logger;
}

/**
 * Create a Telegram alert callback function.
 */
export function createTelegramAlert(config: TelegramAlertConfig): AlertCallback {
  const { botToken, chatId, formatMessage } = config;
  const logger = config.logger ?? silentLogger;
  const apiBaseUrl = config.apiBaseUrl ?? "https://api.telegram.org";

  return async (alert: QuarantineAlert): Promise<void> => {
    const message = formatMessage ? formatMessage(alert) : formatQuarantineMessage(alert);

    const response = await fetch(`${apiBaseUrl}/bot${botToken}/sendMessage`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        chat_id: chatId,
        text: message,
        parse_mode: "HTML",
      }),
    });

    if (!response.ok) {
      const detail = await response.text();
      throw new Error(`Telegram API responded ${response.status}: ${detail}`);
    }
    logger.info(
      {
        endpoint: alert.endpointId,
        chatId,
      },
      "Quarantine alert sent to Telegram",
    );
  };
}

export function formatQuarantineMessage(alert: QuarantineAlert): string {
  const routeInfo = alert.routeId ? `\nRoute: <b>${escapeHtml(alert.routeId)}</b>` : "";
  const slotInfo =
    alert.lastKnownSlot !== undefined
      ? `\nLast slot: <code>${alert.lastKnownSlot}</code>` +
        (alert.canonicalSlot !== undefined
          ? ` (canonical <code>${alert.canonicalSlot}</code>)`
          : "")
      : "";
  const errorInfo = alert.lastError
    ? `\nError: <code>${escapeHtml(alert.lastError)}</code>`
    : "";

  return (
    `🚨 <b>RPC Endpoint Quarantined</b>\n\n` +
    `Endpoint: <code>${escapeHtml(alert.url)}</code>\n` +
    `ID: <code>${escapeHtml(alert.endpointId)}</code>${routeInfo}\n` +
    `Reason: <b>${alert.reason}</b> (lag count ${alert.consecutiveLagCount})${slotInfo}${errorInfo}\n` +
    `Until: <code>${new Date(alert.quarantinedUntil).toISOString()}</code>`
  );
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}
