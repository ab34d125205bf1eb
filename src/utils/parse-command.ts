import type { Bound } from "../model/alert-model";
import type {
  Command,
  CommandRejection,
  ParsedCommand,
} from "../model/command-model";

export type CommandInfo = {
  name: string;
  usage: string;
  description: string;
};

export const COMMANDS: readonly CommandInfo[] = [
  { name: "start", usage: "/start", description: "Start the bot." },
  { name: "help", usage: "/help", description: "Show this help." },
  {
    name: "status",
    usage: "/status",
    description: "Show all current sensor readings.",
  },
  {
    name: "thresholds",
    usage: "/thresholds",
    description: "List your thresholds.",
  },
  {
    name: "set",
    usage: "/set <sensor> <metric> <min|max> <value>",
    description: "Alert when a reading leaves the bound.",
  },
  {
    name: "min",
    usage: "/min <sensor> <metric> <value>",
    description: "Alert when a reading falls below the value.",
  },
  {
    name: "max",
    usage: "/max <sensor> <metric> <value>",
    description: "Alert when a reading rises above the value.",
  },
  {
    name: "clear",
    usage: "/clear <sensor> <metric> <min|max>",
    description: "Remove a threshold.",
  },
];

const METRIC_ALIASES = new Map<string, string>([
  ["t", "temperature"],
  ["temp", "temperature"],
  ["h", "humidity"],
  ["hum", "humidity"],
]);

const NUMBER_RE = /^[+-]?(\d+([.,]\d*)?|[.,]\d+)$/;

export function parseNumber(raw: string): number | null {
  if (!NUMBER_RE.test(raw)) return null;
  const n = Number(raw.replace(",", "."));
  return Number.isFinite(n) ? n : null;
}

function parseBound(raw: string): Bound | null {
  const b = raw.toLowerCase();
  return b === "min" || b === "max" ? b : null;
}

function normalizeMetric(raw: string): string {
  const m = raw.toLowerCase();
  return METRIC_ALIASES.get(m) ?? m;
}

function reject(reason: CommandRejection, message: string): ParsedCommand {
  return { ok: false, reason, message };
}

function accept(command: Command): ParsedCommand {
  return { ok: true, command };
}

function usage(name: string): ParsedCommand {
  const info = COMMANDS.find((c) => c.name === name);
  return reject("usage", `Usage: ${info?.usage ?? `/${name}`}`);
}

/**
 * Parse a chat message into a command. Returns null for text that is not a
 * command at all. `resolveSensor` maps a user-typed sensor token (id or
 * display name) to a sensor id.
 */
export function parseCommand(
  text: string,
  resolveSensor: (token: string) => string = (t) => t,
): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith("/")) return null;

  const [head = "", ...args] = trimmed.split(/\s+/);
  // "/status@SomeBot" -> "status"
  const name = head.slice(1).split("@")[0]?.toLowerCase() ?? "";

  switch (name) {
    case "start":
      return args.length === 0 ? accept({ kind: "start" }) : usage(name);
    case "help":
      return accept({ kind: "help" });
    case "status":
      return args.length === 0 ? accept({ kind: "status" }) : usage(name);
    case "thresholds":
      return args.length === 0 ? accept({ kind: "thresholds" }) : usage(name);

    case "set":
    case "min":
    case "max": {
      const expected = name === "set" ? 4 : 3;
      if (args.length !== expected) return usage(name);

      const [sensor, metric, ...rest] = args;
      const bound = name === "set" ? parseBound(rest[0] ?? "") : parseBound(name);
      if (!sensor || !metric || !bound) return usage(name);

      const rawValue = rest[rest.length - 1] ?? "";
      const value = parseNumber(rawValue);
      if (value === null) {
        return reject(
          "invalid_number",
          `"${rawValue}" is not a valid number.`,
        );
      }

      return accept({
        kind: "set",
        sensorId: resolveSensor(sensor),
        metric: normalizeMetric(metric),
        bound,
        value,
      });
    }

    case "clear": {
      if (args.length !== 3) return usage(name);
      const [sensor = "", metric = "", rawBound = ""] = args;
      const bound = parseBound(rawBound);
      if (!bound) return usage(name);

      return accept({
        kind: "clear",
        sensorId: resolveSensor(sensor),
        metric: normalizeMetric(metric),
        bound,
      });
    }

    default:
      return reject(
        "unknown",
        `Unknown command ${head}. Use /help to see all commands.`,
      );
  }
}

function normalizeName(s: string): string {
  return s.toLowerCase().replace(/[\s_-]+/g, "");
}

export function createSensorResolver(
  sensorNames: Record<string, string>,
): (token: string) => string {
  return (token) => {
    if (Object.hasOwn(sensorNames, token)) return token;

    const wanted = normalizeName(token);
    for (const [id, name] of Object.entries(sensorNames)) {
      if (normalizeName(name) === wanted || normalizeName(id) === wanted) {
        return id;
      }
    }
    return token;
  };
}
