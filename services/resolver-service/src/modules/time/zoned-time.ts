const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(zone: string): Intl.DateTimeFormat {
  const cached = formatters.get(zone);
  if (cached) return cached;
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone: zone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
  });
  formatters.set(zone, formatter);
  return formatter;
}

function wallClockParts(instant: Date, zone: string): Record<string, number> {
  const parts: Record<string, number> = {};
  for (const part of formatterFor(zone).formatToParts(instant)) {
    if (part.type !== "literal") parts[part.type] = Number(part.value);
  }
  return parts;
}

/** Offset of `zone` from UTC at `instant`, in whole minutes (east positive). */
export function zoneOffsetMinutes(instant: Date, zone: string): number {
  const p = wallClockParts(instant, zone);
  const wallAsUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const instantToSecond = Math.floor(instant.getTime() / 1000) * 1000;
  return Math.round((wallAsUtc - instantToSecond) / 60_000);
}

export function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/**
 * Renders `instant` as ISO-8601 with milliseconds in `zone`.
 * UTC keeps the `Z` suffix; other zones carry an explicit `±HH:MM` offset.
 */
export function formatInZone(instant: Date, zone: string): string {
  if (zone === "UTC") return instant.toISOString();

  const offset = zoneOffsetMinutes(instant, zone);
  const local = new Date(instant.getTime() + offset * 60_000);
  const date = `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}`;
  const time = `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())}`;
  return `${date}T${time}.${pad(local.getUTCMilliseconds(), 3)}${formatOffset(offset)}`;
}
