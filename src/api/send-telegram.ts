import type { Env } from "../model/config-env";
import { DeliveryError } from "../model/errors";
import type { NotificationSink } from "../model/notify-model";
import type { TelegramResponse } from "../model/telegram-model";

export type TelegramConfig = Pick<Env, "TELEGRAM_BOT_TOKEN" | "TELEGRAM_API_BASE">;

export class TelegramApiError extends Error {
  override name = "TelegramApiError";

  constructor(
    readonly method: string,
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export async function callTelegram<T>(
  config: TelegramConfig,
  method: string,
  payload: unknown,
  signal?: AbortSignal,
): Promise<T> {
  if (!config.TELEGRAM_BOT_TOKEN || config.TELEGRAM_BOT_TOKEN.trim() === "") {
    throw new TelegramApiError(method, "TELEGRAM_BOT_TOKEN is missing (undefined/empty)");
  }

  const base = config.TELEGRAM_API_BASE.replace(/\/+$/, "");
  const res = await fetch(`${base}/bot${config.TELEGRAM_BOT_TOKEN}/${method}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(payload),
    signal,
  });

  const data = (await res.json().catch(() => ({ ok: false }))) as TelegramResponse<T>;
  if (!res.ok || !data.ok || data.result === undefined) {
    throw new TelegramApiError(
      method,
      `Telegram ${method} failed: ${res.status}${data.description ? ` ${data.description}` : ""}`,
      res.status,
    );
  }

  return data.result;
}

export async function sendTelegram(
  config: TelegramConfig,
  chatId: string,
  text: string,
  opts?: { parseMode?: "Markdown" },
): Promise<void> {
  await callTelegram<unknown>(config, "sendMessage", {
    chat_id: chatId,
    text,
    ...(opts?.parseMode && { parse_mode: opts.parseMode }),
  });
}

export function createTelegramSink(config: TelegramConfig): NotificationSink {
  return {
    async send(subscriberId, text) {
      try {
        await sendTelegram(config, subscriberId, text);
      } catch (err) {
        if (err instanceof TelegramApiError) {
          throw new DeliveryError(subscriberId, err.message, err.status);
        }
        throw new DeliveryError(
          subscriberId,
          `Telegram sendMessage failed: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    },
  };
}
