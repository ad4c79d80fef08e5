import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";
// active plugin dayjs
dayjs.extend(customParseFormat);

export const DATE_FORMAT = "YYYY-MM-DD";

/** Strict `YYYY-MM-DD` parse; `null` for anything else. */
export function parseIsoDate(value: string): dayjs.Dayjs | null {
  const parsed = dayjs(value, DATE_FORMAT, true);
  return parsed.isValid() ? parsed : null;
}

export function firstMondayOnOrAfter(date: dayjs.Dayjs): dayjs.Dayjs {
  return date.startOf("day").add((8 - date.day()) % 7, "day");
}

export function weekStartDates(start: dayjs.Dayjs, weeks: number): string[] {
  const monday = firstMondayOnOrAfter(start);
  return Array.from({ length: weeks }, (_, week) =>
    monday.add(week * 7, "day").format(DATE_FORMAT)
  );
}

export function weekTitle(startDate: string): string {
  return `Week Plan — Week of ${startDate}`;
}

/** Parses a command-line flag value; `undefined` passes through. */
export function parseWholeNumber(
  flag: string,
  value: string | undefined
): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new Error(`--${flag} expects a whole number, got "${value}"`);
  }
  return parseInt(value, 10);
}
