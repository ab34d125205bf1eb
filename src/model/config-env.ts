import type { LogLevel } from "../utils/logger";

export type TelegramMode = "polling" | "webhook";

export interface Env {
  TELEGRAM_BOT_TOKEN: string;
  TELEGRAM_API_BASE: string;
  TELEGRAM_MODE: TelegramMode;
  TELEGRAM_WEBHOOK_SECRET?: string;

  SENSOR_URL: string;
  POLL_INTERVAL_SECONDS: number;
  FETCH_TIMEOUT_MS: number;
  DEFAULT_SENSOR_ID: string;

  // sensor id -> display name
  SENSOR_NAMES: Record<string, string>;
  LOCALE: string;
  TIME_ZONE?: string;

  TRIGGER_TOKEN?: string;
  PORT: number;

  LOG_FILE: string;
  LOG_LEVEL: LogLevel;
}
