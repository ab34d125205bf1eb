import type { Bound } from "./alert-model";

export type Command =
  | { kind: "start" }
  | { kind: "help" }
  | { kind: "status" }
  | { kind: "thresholds" }
  | {
      kind: "set";
      sensorId: string;
      metric: string;
      bound: Bound;
      value: number;
    }
  | { kind: "clear"; sensorId: string; metric: string; bound: Bound };

export type CommandRejection = "unknown" | "usage" | "invalid_number";

export type ParsedCommand =
  | { ok: true; command: Command }
  | { ok: false; reason: CommandRejection; message: string };

export type Reply = {
  text: string;
  parseMode?: "Markdown";
};
