import { describe, expect, it } from "vitest";

import { display, reading } from "../test/helpers";
import {
  escapeMarkdown,
  formatAlert,
  formatReadingLine,
  formatStatus,
  formatThresholdCleared,
  formatThresholdList,
  formatThresholdSet,
  formatValue,
  metricInfo,
  sensorName,
} from "./format-message";
import { formatTimestamp } from "./format-time";

describe("formatTimestamp", () => {
  it("renders epoch seconds in the configured locale and zone", () => {
    expect(formatTimestamp(1_700_000_000, { locale: "de-DE", timeZone: "UTC" })).toBe(
      "14.11.2023, 22:13:20",
    );
  });

  it("falls back to the epoch for out-of-range values", () => {
    expect(formatTimestamp(Number.NaN, { locale: "de-DE", timeZone: "UTC" })).toBe(
      "01.01.1970, 00:00:00",
    );
    expect(formatTimestamp(1e20, { locale: "de-DE", timeZone: "UTC" })).toBe(
      "01.01.1970, 00:00:00",
    );
  });
});

describe("metrics and names", () => {
  it("knows labels and units of common metrics", () => {
    expect(metricInfo("temperature")).toEqual({ label: "Temperature", unit: "°C" });
    expect(metricInfo("Humidity")).toEqual({ label: "Humidity", unit: "%" });
    expect(metricInfo("lux")).toEqual({ label: "lux", unit: "" });
    expect(metricInfo("constructor")).toEqual({ label: "constructor", unit: "" });
  });

  it("formats values with one decimal and unit", () => {
    expect(formatValue(21.54, "temperature")).toBe("21.5 °C");
    expect(formatValue(3, "lux")).toBe("3.0");
  });

  it("uses display names when configured", () => {
    expect(sensorName("sensor1", display)).toBe("Living room");
    expect(sensorName("sensor2", display)).toBe("sensor2");
    expect(sensorName("toString", display)).toBe("toString");
  });

  it("escapes legacy markdown", () => {
    expect(escapeMarkdown("sensor_1 *x* [y] `z`")).toBe(
      "sensor\\_1 \\*x\\* \\[y] \\`z\\`",
    );
  });
});

describe("formatAlert", () => {
  it("describes min and max violations", () => {
    const r = reading("sensor1", "temperature", 17.46);
    expect(formatAlert(r, "min", 18, display)).toBe(
      "⚠ Temperature at Living room fell below the threshold: 17.5 °C (threshold: 18.0 °C)",
    );
    expect(formatAlert(reading("sensor2", "humidity", 71), "max", 70, display)).toBe(
      "⚠ Humidity at sensor2 rose above the threshold: 71.0 % (threshold: 70.0 %)",
    );
  });
});

describe("formatStatus", () => {
  it("renders one line per reading", () => {
    const text = formatStatus(
      [
        reading("sensor1", "temperature", 21.54),
        reading("sensor_2", "humidity", 55),
      ],
      display,
    );

    expect(text).toBe(
      [
        "📊 *Current sensor data:*",
        "📍 *Living room* – Temperature: *21.5 °C* (14.11.2023, 22:13:20)",
        "📍 *sensor\\_2* – Humidity: *55.0 %* (14.11.2023, 22:13:20)",
      ].join("\n"),
    );
  });

  it("says so when the feed is empty", () => {
    expect(formatStatus([], display)).toBe(
      "📊 *Current sensor data:*\nNo readings available.",
    );
  });

  it("renders a single reading line", () => {
    expect(formatReadingLine(reading("sensor1", "lux", 300, 0), display)).toBe(
      "📍 *Living room* – lux: *300.0* (01.01.1970, 00:00:00)",
    );
  });
});

describe("threshold texts", () => {
  it("confirms set and clear", () => {
    expect(formatThresholdSet("sensor1", "temperature", "max", 25, display)).toBe(
      "🔺 MAX threshold Temperature Living room: 25.0 °C",
    );
    expect(formatThresholdSet("sensor1", "humidity", "min", 30, display)).toBe(
      "🔻 MIN threshold Humidity Living room: 30.0 %",
    );
    expect(formatThresholdCleared("sensor1", "temperature", "max", true, display)).toBe(
      "🗑 Removed MAX threshold Temperature Living room.",
    );
    expect(formatThresholdCleared("sensor1", "temperature", "min", false, display)).toBe(
      "No MIN threshold Temperature Living room is set.",
    );
  });

  it("lists bounds sorted per sensor", () => {
    const thresholds = new Map([
      [
        "sensor1",
        new Map([
          ["temperature_min" as const, 18],
          ["temperature_max" as const, 25],
        ]),
      ],
    ]);

    expect(formatThresholdList(thresholds, display)).toBe(
      [
        "📋 *Your thresholds:*",
        "• Living room – Temperature max: 25.0 °C",
        "• Living room – Temperature min: 18.0 °C",
      ].join("\n"),
    );
  });

  it("hints at /set when nothing is configured", () => {
    expect(formatThresholdList(new Map(), display)).toBe(
      "You have no thresholds set. Use /set to add one.",
    );
  });
});
