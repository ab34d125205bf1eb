import type { FetchError } from "./errors";

export type Reading = {
  readonly sensorId: string;
  readonly metric: string;
  readonly value: number;
  // epoch seconds
  readonly observedAt: number;
};

export type FetchResult =
  | { ok: true; readings: Reading[] }
  | { ok: false; error: FetchError };

export type FetchReadings = () => Promise<FetchResult>;
