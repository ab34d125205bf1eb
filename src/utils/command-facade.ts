import type { Bound } from "../model/alert-model";
import type { Command, Reply } from "../model/command-model";
import { describeError } from "../model/errors";
import type { FetchReadings, FetchResult } from "../model/sensor-model";
import type { AlertFlagTable } from "../store/alert-flags";
import { boundKey, type ThresholdStore } from "../store/threshold-store";
import {
  escapeMarkdown,
  FETCH_FAILED_TEXT,
  formatStatus,
  formatThresholdCleared,
  formatThresholdList,
  formatThresholdSet,
  type DisplayOptions,
} from "./format-message";
import type { Logger } from "./logger";
import { COMMANDS, createSensorResolver, parseCommand } from "./parse-command";

export type CommandFacadeDeps = {
  thresholds: ThresholdStore;
  flags: AlertFlagTable;
  fetchReadings: FetchReadings;
  display: DisplayOptions;
  log: Logger;
};

export interface CommandFacade {
  /** Parses and runs a chat message; null when the text is not a command. */
  handle(subscriberId: string, text: string): Promise<Reply | null>;
  execute(subscriberId: string, command: Command): Promise<Reply>;
  help(): Reply;
  status(): Promise<Reply>;
  snapshot(): Promise<FetchResult>;
  setThreshold(
    subscriberId: string,
    sensorId: string,
    metric: string,
    bound: Bound,
    value: number,
  ): Reply;
  clearThreshold(
    subscriberId: string,
    sensorId: string,
    metric: string,
    bound: Bound,
  ): Reply;
  listThresholds(subscriberId: string): Reply;
}

export function helpText(display: DisplayOptions): string {
  const lines = ["📖 *Help:*"];
  for (const c of COMMANDS) {
    lines.push(`${escapeMarkdown(c.usage)} – ${c.description}`);
  }

  const named = Object.entries(display.sensorNames);
  if (named.length > 0) {
    lines.push("", "*Sensors:*");
    for (const [id, name] of named) {
      lines.push(`• ${escapeMarkdown(name)} (${escapeMarkdown(id)})`);
    }
  }
  return lines.join("\n");
}

export function createCommandFacade(deps: CommandFacadeDeps): CommandFacade {
  const { thresholds, flags, display, log } = deps;
  const resolveSensor = createSensorResolver(display.sensorNames);

  const facade: CommandFacade = {
    async handle(subscriberId, text) {
      const parsed = parseCommand(text, resolveSensor);
      if (!parsed) return null;
      if (!parsed.ok) {
        log.debug(
          `[command] rejected from ${subscriberId} (${parsed.reason}): ${text}`,
        );
        return { text: parsed.message };
      }
      return facade.execute(subscriberId, parsed.command);
    },

    async execute(subscriberId, command) {
      switch (command.kind) {
        case "start":
          return { text: "👋 Welcome! Use /help to see all commands." };
        case "help":
          return facade.help();
        case "status":
          return facade.status();
        case "thresholds":
          return facade.listThresholds(subscriberId);
        case "set":
          return facade.setThreshold(
            subscriberId,
            command.sensorId,
            command.metric,
            command.bound,
            command.value,
          );
        case "clear":
          return facade.clearThreshold(
            subscriberId,
            command.sensorId,
            command.metric,
            command.bound,
          );
      }
    },

    help() {
      return { text: helpText(display), parseMode: "Markdown" };
    },

    snapshot() {
      return deps.fetchReadings();
    },

    async status() {
      const fetched = await deps.fetchReadings();
      if (!fetched.ok) {
        log.warn(
          `[command] status fetch failed (${fetched.error.kind}): ${describeError(fetched.error)}`,
        );
        return { text: FETCH_FAILED_TEXT };
      }
      return { text: formatStatus(fetched.readings, display), parseMode: "Markdown" };
    },

    setThreshold(subscriberId, sensorId, metric, bound, value) {
      thresholds.set(subscriberId, { sensorId, boundKey: boundKey(metric, bound) }, value);
      log.info(
        `[command] ${subscriberId} set ${sensorId} ${boundKey(metric, bound)}=${value}`,
      );
      return {
        text: formatThresholdSet(sensorId, metric, bound, value, display),
      };
    },

    clearThreshold(subscriberId, sensorId, metric, bound) {
      const key = { sensorId, boundKey: boundKey(metric, bound) };
      const removed = thresholds.clear(subscriberId, key);
      flags.delete({ ...key, subscriberId });
      if (removed) {
        log.info(`[command] ${subscriberId} cleared ${sensorId} ${key.boundKey}`);
      }
      return {
        text: formatThresholdCleared(sensorId, metric, bound, removed, display),
      };
    },

    listThresholds(subscriberId) {
      return {
        text: formatThresholdList(thresholds.getAll(subscriberId), display),
        parseMode: "Markdown",
      };
    },
  };

  return facade;
}
