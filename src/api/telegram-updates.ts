import { setTimeout as sleep } from "node:timers/promises";

import { z } from "zod";

import type { Reply } from "../model/command-model";
import { describeError } from "../model/errors";
import {
  telegramUpdateSchema,
  type TelegramUpdate,
} from "../model/telegram-model";
import type { Logger } from "../utils/logger";
import { callTelegram, sendTelegram, type TelegramConfig } from "./send-telegram";

export type UpdateHandler = (
  chatId: string,
  text: string,
) => Promise<Reply | null>;

/** Passes the message text of an update to `handle` and sends back the reply. */
export async function handleTelegramUpdate(
  config: TelegramConfig,
  update: TelegramUpdate,
  handle: UpdateHandler,
): Promise<boolean> {
  const msg = update.message;
  if (!msg?.text) return false;

  const chatId = String(msg.chat.id);
  const reply = await handle(chatId, msg.text);
  if (!reply) return false;

  await sendTelegram(config, chatId, reply.text, { parseMode: reply.parseMode });
  return true;
}

const updateIdSchema = z.object({ update_id: z.number().int() });

export type PollingOptions = {
  timeoutSec?: number;
  retryDelayMs?: number;
};

export type TelegramPolling = {
  stop(): Promise<void>;
};

export function startTelegramPolling(
  config: TelegramConfig,
  handle: UpdateHandler,
  log: Logger,
  opts: PollingOptions = {},
): TelegramPolling {
  const timeoutSec = opts.timeoutSec ?? 30;
  const retryDelayMs = opts.retryDelayMs ?? 5000;
  const controller = new AbortController();
  const { signal } = controller;
  let offset = 0;

  const processUpdate = async (raw: unknown, updateId: number) => {
    const parsed = telegramUpdateSchema.safeParse(raw);
    if (!parsed.success) {
      log.debug(`[telegram] ignoring update ${updateId}`);
      return;
    }

    try {
      await handleTelegramUpdate(config, parsed.data, handle);
    } catch (err) {
      log.error(`[telegram] update ${updateId} failed: ${describeError(err)}`);
    }
  };

  const loop = async () => {
    while (!signal.aborted) {
      let updates: unknown[];
      try {
        updates = await callTelegram<unknown[]>(
          config,
          "getUpdates",
          { offset, timeout: timeoutSec, allowed_updates: ["message"] },
          signal,
        );
      } catch (err) {
        if (signal.aborted) break;
        log.warn(`[telegram] getUpdates failed: ${describeError(err)}`);
        await sleep(retryDelayMs, undefined, { signal }).catch(
          (sleepErr: unknown) => {
            if (!signal.aborted) throw sleepErr;
          },
        );
        continue;
      }

      // the whole batch is acknowledged before any command runs
      const batch: Promise<void>[] = [];
      for (const raw of updates) {
        const id = updateIdSchema.safeParse(raw);
        if (!id.success) {
          log.warn("[telegram] skipping update without update_id");
          continue;
        }
        offset = Math.max(offset, id.data.update_id + 1);
        batch.push(processUpdate(raw, id.data.update_id));
      }
      await Promise.allSettled(batch);
    }
  };

  log.info("[telegram] long polling started");
  const running = loop().catch((err: unknown) => {
    log.error(`[telegram] polling stopped: ${describeError(err)}`);
  });

  return {
    async stop() {
      controller.abort();
      await running;
      log.info("[telegram] long polling stopped");
    },
  };
}
