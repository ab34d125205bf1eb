import "dotenv/config";

import { serve } from "@hono/node-server";

import { fetchSensorReadings } from "./api/fetch-sensor-data";
import { createTelegramSink } from "./api/send-telegram";
import {
  startTelegramPolling,
  type TelegramPolling,
} from "./api/telegram-updates";
import { createApp } from "./app";
import type { Env } from "./model/config-env";
import { ConfigError, describeError } from "./model/errors";
import { AlertFlagTable } from "./store/alert-flags";
import { ThresholdStore } from "./store/threshold-store";
import { createCommandFacade } from "./utils/command-facade";
import type { DisplayOptions } from "./utils/format-message";
import { loadEnv } from "./utils/load-env";
import { createLogger } from "./utils/logger";
import { runAlertsOnce, startAlertLoop, type AlertDeps } from "./utils/run-alerts";

function readEnv(): Env {
  try {
    return loadEnv();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[boot] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

async function main() {
  const env = readEnv();
  const log = createLogger({ level: env.LOG_LEVEL, file: env.LOG_FILE });

  const thresholds = new ThresholdStore();
  const flags = new AlertFlagTable();
  const display: DisplayOptions = {
    sensorNames: env.SENSOR_NAMES,
    locale: env.LOCALE,
    timeZone: env.TIME_ZONE,
  };
  const fetchReadings = () => fetchSensorReadings(env);

  const alertDeps: AlertDeps = {
    fetchReadings,
    thresholds,
    flags,
    sink: createTelegramSink(env),
    display,
    log,
  };

  const facade = createCommandFacade({
    thresholds,
    flags,
    fetchReadings,
    display,
    log,
  });

  const app = createApp({
    facade,
    runAlerts: () => runAlertsOnce(alertDeps),
    telegram: env,
    log,
    triggerToken: env.TRIGGER_TOKEN,
    webhookSecret: env.TELEGRAM_WEBHOOK_SECRET,
  });

  const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    log.info(`[http] listening on :${info.port}`);
  });

  const loop = startAlertLoop(alertDeps, env.POLL_INTERVAL_SECONDS * 1000);

  let polling: TelegramPolling | undefined;
  if (env.TELEGRAM_MODE === "polling") {
    polling = startTelegramPolling(env, facade.handle, log);
  } else {
    log.info("[telegram] webhook mode, updates on POST /telegram/webhook");
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`[boot] ${signal} received, shutting down`);

    await polling?.stop();
    await loop.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await log.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error(`[boot] shutdown failed: ${describeError(err)}`);
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  console.error(`[boot] fatal: ${describeError(err)}`);
  process.exit(1);
});
