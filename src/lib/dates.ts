import type { DateRange } from "./types.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function formatDate(year: number, month: number, day: number): string {
  return `${year}-${pad(month)}-${pad(day)}`;
}

export function formatMonth(year: number, month: number): string {
  return `${year}-${pad(month)}`;
}

/** Checks both the YYYY-MM-DD shape and that the day exists */
export function isValidIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(year, month);
}

/** Every date of the month, ascending */
export function enumerateMonth(year: number, month: number): string[] {
  const dates: string[] = [];
  const total = daysInMonth(year, month);
  for (let day = 1; day <= total; day++) {
    dates.push(formatDate(year, month, day));
  }
  return dates;
}

export function monthRange(year: number, month: number): DateRange {
  return {
    from: formatDate(year, month, 1),
    to: formatDate(year, month, daysInMonth(year, month)),
  };
}

/** API timestamps such as "2025-09-03T00:00:00" are cut to the date */
export function toIsoDate(value: string): string {
  return value.slice(0, 10);
}
