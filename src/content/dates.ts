const ISO_DATE_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:\d{2})?)?$/;

function parseOffsetMinutes(offset: string | undefined): number | null {
  if (!offset || offset === "Z") return 0;
  const sign = offset.startsWith("-") ? -1 : 1;
  const hours = Number(offset.slice(1, 3));
  const minutes = Number(offset.slice(4, 6));
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse the date forms Hugo accepts in front matter:
 * `2024-03-01`, `2024-03-01T10:30`, `2024-03-01 10:30:00`, `2024-03-01T10:30:00.5+02:00`.
 * Values without an offset are read as UTC. Returns null for anything else,
 * including dates that do not exist on the calendar (2023-02-29).
 */
export function parseIsoDate(value: string): Date | null {
  const match = value.trim().match(ISO_DATE_RE);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hour = Number(match[4] ?? 0);
  const minute = Number(match[5] ?? 0);
  const second = Number(match[6] ?? 0);
  const millis = match[7] ? Math.floor(Number(`0.${match[7]}`) * 1000) : 0;

  const calendar = new Date(Date.UTC(year, month - 1, day));
  if (
    calendar.getUTCFullYear() !== year ||
    calendar.getUTCMonth() !== month - 1 ||
    calendar.getUTCDate() !== day
  ) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 59) return null;

  const offset = parseOffsetMinutes(match[8]);
  if (offset === null) return null;

  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis) - offset * 60_000;
  return new Date(utc);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYY-MM-DDTHH:MM:SSZ` in UTC, the form written into new documents */
export function formatIsoDate(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}Z`
  );
}

/** `YYYY-MM-DD` in UTC */
export function formatDay(date: Date): string {
  return formatIsoDate(date).slice(0, 10);
}
