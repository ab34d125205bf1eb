import { vi } from "vitest";

import type { FetchReadings, FetchResult, Reading } from "../model/sensor-model";
import type { DisplayOptions } from "../utils/format-message";
import type { Logger } from "../utils/logger";

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    close: vi.fn(async () => undefined),
  } satisfies Logger;
}

export const display: DisplayOptions = {
  sensorNames: { sensor1: "Living room" },
  locale: "de-DE",
  timeZone: "UTC",
};

export function reading(
  sensorId: string,
  metric: string,
  value: number,
  observedAt = 1_700_000_000,
): Reading {
  return { sensorId, metric, value, observedAt };
}

export function ok(...readings: Reading[]): FetchResult {
  return { ok: true, readings };
}

export function fetchSequence(...results: FetchResult[]) {
  const fn = vi.fn<FetchReadings>();
  for (const r of results) fn.mockResolvedValueOnce(r);
  return fn;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}
