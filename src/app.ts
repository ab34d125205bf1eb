import { Hono } from "hono";

import { handleTelegramUpdate } from "./api/telegram-updates";
import type { TelegramConfig } from "./api/send-telegram";
import { describeError } from "./model/errors";
import type { TickResult } from "./model/alert-model";
import { telegramUpdateSchema } from "./model/telegram-model";
import type { CommandFacade } from "./utils/command-facade";
import type { Logger } from "./utils/logger";

export type AppDeps = {
  facade: CommandFacade;
  runAlerts: () => Promise<TickResult>;
  telegram: TelegramConfig;
  log: Logger;
  triggerToken?: string;
  webhookSecret?: string;
};

export function createApp(deps: AppDeps) {
  const { facade, log } = deps;
  const app = new Hono();

  app.get("/health", (c) => c.json({ ok: true }));

  app.get("/status", async (c) => {
    const fetched = await facade.snapshot();
    if (!fetched.ok) {
      return c.json(
        { ok: false, error: `could not retrieve data (${fetched.error.kind})` },
        502,
      );
    }
    return c.json({ ok: true, readings: fetched.readings });
  });

  app.post("/trigger-alerts", async (c) => {
    if (!deps.triggerToken) return c.text("Not Found", 404);

    const token = c.req.header("x-trigger-token");
    if (!token || token !== deps.triggerToken) {
      return c.text("Unauthorized", 401);
    }

    const result = await deps.runAlerts();
    return c.json(result);
  });

  app.post("/telegram/webhook", async (c) => {
    if (deps.webhookSecret) {
      const secret = c.req.header("x-telegram-bot-api-secret-token");
      if (secret !== deps.webhookSecret) return c.text("Unauthorized", 401);
    }

    const body: unknown = await c.req.json().catch(() => null);
    const parsed = telegramUpdateSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ ok: false, error: "invalid update" }, 400);
    }

    try {
      await handleTelegramUpdate(deps.telegram, parsed.data, facade.handle);
    } catch (err) {
      // Telegram retries non-2xx deliveries; the failure is logged instead
      log.error(
        `[http] webhook update ${parsed.data.update_id} failed: ${describeError(err)}`,
      );
    }
    return c.json({ ok: true });
  });

  app.onError((err, c) => {
    log.error(`[http] ${c.req.method} ${c.req.path} failed: ${describeError(err)}`);
    return c.json({ ok: false, error: "internal error" }, 500);
  });

  return app;
}
