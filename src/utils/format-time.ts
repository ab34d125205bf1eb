export type TimeFormat = {
  locale: string;
  timeZone?: string;
};

export function formatTimestamp(epochSec: number, fmt: TimeFormat): string {
  let date = new Date(epochSec * 1000);
  // out-of-range or non-numeric timestamps render as the epoch
  if (!Number.isFinite(date.getTime())) date = new Date(0);

  return date.toLocaleString(fmt.locale, {
    timeZone: fmt.timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  });
}
