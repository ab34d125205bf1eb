import { z } from "zod";

import type { Env } from "../model/config-env";
import { ConfigError } from "../model/errors";

const optionalText = z
  .string()
  .trim()
  .transform((s) => (s === "" ? undefined : s))
  .optional();

function isLocale(locale: string): boolean {
  try {
    new Intl.DateTimeFormat(locale);
    return true;
  } catch {
    return false;
  }
}

function isTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z
    .string({ required_error: "required" })
    .trim()
    .min(1, "must not be empty"),
  TELEGRAM_API_BASE: z.string().url().default("https://api.telegram.org"),
  TELEGRAM_MODE: z.enum(["polling", "webhook"]).default("polling"),
  TELEGRAM_WEBHOOK_SECRET: optionalText,

  SENSOR_URL: z.string().url().default("http://localhost:8080/sensors"),
  POLL_INTERVAL_SECONDS: z.coerce.number().int().positive().default(600),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  DEFAULT_SENSOR_ID: z.string().trim().min(1).default("sensor1"),

  SENSOR_NAMES: z.string().default(""),
  LOCALE: z
    .string()
    .trim()
    .min(1)
    .refine(isLocale, "not a valid locale")
    .default("de-DE"),
  TIME_ZONE: optionalText.refine(
    (tz) => tz === undefined || isTimeZone(tz),
    "unknown time zone",
  ),

  TRIGGER_TOKEN: optionalText,
  PORT: z.coerce.number().int().min(1).max(65_535).default(8787),

  LOG_FILE: z.string().trim().min(1).default("bot.log"),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["debug", "info", "warn", "error"]))
    .default("info"),
});

export function parseSensorNames(input: string): Record<string, string> {
  // format: sensor1=Living room,sensor2=Kitchen
  const out: Record<string, string> = {};
  if (!input || input.trim() === "") return out;

  for (const chunk of input.split(",")) {
    const part = chunk.trim();
    if (!part) continue;

    const eq = part.indexOf("=");
    if (eq <= 0) continue;

    const id = part.slice(0, eq).trim();
    const name = part.slice(eq + 1).trim();
    if (!id || !name) continue;

    out[id] = name;
  }

  return out;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      ),
    );
  }

  const { SENSOR_NAMES, ...rest } = parsed.data;
  return { ...rest, SENSOR_NAMES: parseSensorNames(SENSOR_NAMES) };
}
