import { z } from "zod";

import type { Env } from "../model/config-env";
import { FetchError } from "../model/errors";
import type { FetchResult, Reading } from "../model/sensor-model";

const sensorEntrySchema = z.object({
  device_id: z.string().min(1),
  sensor_type: z.string().min(1),
  value: z.number().finite(),
  timestamp: z.number().finite(),
});

// single-sensor feed: { "temperature": 26.3, "humidity": 55.0 }
const flatSchema = z
  .record(z.number().finite())
  .refine((obj) => Object.keys(obj).some((k) => k !== "timestamp"), {
    message: "no sensor values",
  });

const payloadSchema = z.union([z.array(sensorEntrySchema), flatSchema]);

export type SensorClientConfig = Pick<
  Env,
  "SENSOR_URL" | "FETCH_TIMEOUT_MS" | "DEFAULT_SENSOR_ID"
>;

export function toReadings(
  payload: z.infer<typeof payloadSchema>,
  defaultSensorId: string,
  nowSec: number,
): Reading[] {
  if (Array.isArray(payload)) {
    return payload.map((e) => ({
      sensorId: e.device_id,
      metric: e.sensor_type,
      value: e.value,
      observedAt: Math.trunc(e.timestamp),
    }));
  }

  const observedAt = Math.trunc(payload.timestamp ?? nowSec);
  return Object.entries(payload)
    .filter(([metric]) => metric !== "timestamp")
    .map(([metric, value]) => ({
      sensorId: defaultSensorId,
      metric,
      value,
      observedAt,
    }));
}

export async function fetchSensorReadings(
  config: SensorClientConfig,
  now: () => number = Date.now,
): Promise<FetchResult> {
  const url = config.SENSOR_URL;

  let text: string;
  try {
    const res = await fetch(url, {
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(config.FETCH_TIMEOUT_MS),
    });

    if (!res.ok) {
      const body = await res.text().catch(() => "");
      return {
        ok: false,
        error: new FetchError(
          "transport",
          `Sensor feed error ${res.status}: ${body}`.trim(),
        ),
      };
    }

    text = await res.text();
  } catch (err) {
    const timedOut = err instanceof Error && err.name === "TimeoutError";
    return {
      ok: false,
      error: new FetchError(
        "transport",
        timedOut
          ? `Sensor feed timeout after ${config.FETCH_TIMEOUT_MS}ms`
          : `Sensor feed request to ${url} failed`,
        { cause: err },
      ),
    };
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    return {
      ok: false,
      error: new FetchError(
        "decode",
        `Sensor feed returned invalid JSON: ${text.slice(0, 200)}`,
        { cause: err },
      ),
    };
  }

  const parsed = payloadSchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      error: new FetchError(
        "decode",
        `Sensor feed payload rejected: ${parsed.error.issues
          .map((i) => `${i.path.join(".") || "(root)"} ${i.message}`)
          .join("; ")}`,
      ),
    };
  }

  const nowSec = Math.floor(now() / 1000);
  return {
    ok: true,
    readings: toReadings(parsed.data, config.DEFAULT_SENSOR_ID, nowSec),
  };
}
