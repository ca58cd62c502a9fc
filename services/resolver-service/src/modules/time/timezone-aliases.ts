export const TIMEZONE_ALIASES = Symbol("TIMEZONE_ALIASES");

export const DEFAULT_ZONE = "UTC";

export type TimezoneAliasTable = ReadonlyMap<string, string>;

export const defaultTimezoneAliases: TimezoneAliasTable = new Map<string, string>([
  ["UTC", "UTC"],
  ["EST", "America/New_York"],
  ["US/Eastern", "America/New_York"],
  ["PST", "America/Los_Angeles"],
  ["US/Pacific", "America/Los_Angeles"],
  ["CET", "Europe/Berlin"],
  ["Europe/Berlin", "Europe/Berlin"],
]);
