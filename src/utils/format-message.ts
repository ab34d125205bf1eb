import type { Bound, BoundKey, SubscriberThresholds } from "../model/alert-model";
import type { Reading } from "../model/sensor-model";
import { splitBoundKey } from "../store/threshold-store";
import { formatTimestamp, type TimeFormat } from "./format-time";

export type DisplayOptions = TimeFormat & {
  // sensor id -> display name
  sensorNames: Record<string, string>;
};

type MetricInfo = { label: string; unit: string };

const METRICS = new Map<string, MetricInfo>([
  ["temperature", { label: "Temperature", unit: "°C" }],
  ["humidity", { label: "Humidity", unit: "%" }],
  ["pressure", { label: "Pressure", unit: "hPa" }],
  ["co2", { label: "CO₂", unit: "ppm" }],
]);

export function metricInfo(metric: string): MetricInfo {
  return METRICS.get(metric.toLowerCase()) ?? { label: metric, unit: "" };
}

export function sensorName(sensorId: string, opts: DisplayOptions): string {
  return Object.hasOwn(opts.sensorNames, sensorId)
    ? opts.sensorNames[sensorId]
    : sensorId;
}

export function formatValue(value: number, metric: string): string {
  return `${value.toFixed(1)} ${metricInfo(metric).unit}`.trim();
}

// legacy Telegram Markdown
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, "\\$1");
}

export function formatAlert(
  reading: Reading,
  bound: Bound,
  limit: number,
  opts: DisplayOptions,
): string {
  const { label } = metricInfo(reading.metric);
  const where = sensorName(reading.sensorId, opts);
  const direction =
    bound === "min" ? "fell below the threshold" : "rose above the threshold";

  return `⚠ ${label} at ${where} ${direction}: ${formatValue(
    reading.value,
    reading.metric,
  )} (threshold: ${formatValue(limit, reading.metric)})`;
}

export function formatReadingLine(
  reading: Reading,
  opts: DisplayOptions,
): string {
  const where = escapeMarkdown(sensorName(reading.sensorId, opts));
  const label = escapeMarkdown(metricInfo(reading.metric).label);
  const value = formatValue(reading.value, reading.metric);
  const at = formatTimestamp(reading.observedAt, opts);

  return `📍 *${where}* – ${label}: *${value}* (${at})`;
}

export function formatStatus(readings: Reading[], opts: DisplayOptions): string {
  const lines = ["📊 *Current sensor data:*"];
  if (readings.length === 0) {
    lines.push("No readings available.");
  }
  for (const r of readings) lines.push(formatReadingLine(r, opts));
  return lines.join("\n");
}

export const FETCH_FAILED_TEXT = "❌ Could not retrieve sensor data.";

export function formatThresholdSet(
  sensorId: string,
  metric: string,
  bound: Bound,
  value: number,
  opts: DisplayOptions,
): string {
  const icon = bound === "min" ? "🔻" : "🔺";
  return `${icon} ${bound.toUpperCase()} threshold ${metricInfo(metric).label} ${sensorName(
    sensorId,
    opts,
  )}: ${formatValue(value, metric)}`;
}

export function formatThresholdCleared(
  sensorId: string,
  metric: string,
  bound: Bound,
  removed: boolean,
  opts: DisplayOptions,
): string {
  const what = `${bound.toUpperCase()} threshold ${metricInfo(metric).label} ${sensorName(
    sensorId,
    opts,
  )}`;
  return removed ? `🗑 Removed ${what}.` : `No ${what} is set.`;
}

export function formatThresholdList(
  thresholds: SubscriberThresholds,
  opts: DisplayOptions,
): string {
  const lines: string[] = [];
  for (const [sensorId, bounds] of thresholds) {
    const where = escapeMarkdown(sensorName(sensorId, opts));
    const sorted = [...bounds].sort(([a], [b]) => a.localeCompare(b));
    for (const [key, limit] of sorted) {
      lines.push(formatBoundLine(where, key, limit));
    }
  }

  if (lines.length === 0) {
    return "You have no thresholds set. Use /set to add one.";
  }
  return ["📋 *Your thresholds:*", ...lines].join("\n");
}

function formatBoundLine(where: string, key: BoundKey, limit: number): string {
  const { metric, bound } = splitBoundKey(key);
  const label = escapeMarkdown(metricInfo(metric).label);
  return `• ${where} – ${label} ${bound}: ${formatValue(limit, metric)}`;
}
