import { enumerateMonth, formatMonth, monthRange } from "./dates.js";
import { ComputationError, SourceUnavailableError, errorMessage } from "./errors.js";
import {
  EXPECTED_WORKING_DAY_HOURS,
  formatHours,
  fromCentihours,
  sumHours,
  toCentihours,
} from "./hours.js";
import { formatInvalidDaysReport } from "./report.js";
import { validateMonthQuery } from "./validation.js";
import type {
  CalendarSource,
  CheckOptions,
  DateRange,
  DayStatus,
  ExcessPolicy,
  InvalidDay,
  MonthCheck,
  TimeEntry,
  TimeEntrySource,
} from "./types.js";

export interface ComplianceSources {
  calendar: CalendarSource;
  entries: TimeEntrySource;
}

export function isNormalWorkingDay(status: Pick<DayStatus, "isWorkingDay" | "isHoliday">): boolean {
  return status.isWorkingDay && !status.isHoliday;
}

export function expectedHoursFor(status: Pick<DayStatus, "isWorkingDay" | "isHoliday">): number {
  return isNormalWorkingDay(status) ? EXPECTED_WORKING_DAY_HOURS : 0;
}

function describeIssue(status: DayStatus, current: number, expected: number): string {
  if (isNormalWorkingDay(status)) {
    const difference = expected - current;
    return difference > 0
      ? `Logged ${formatHours(current)}h, should have ${formatHours(expected)}h (${formatHours(difference)}h missing)`
      : `Logged ${formatHours(current)}h, should have ${formatHours(expected)}h (${formatHours(-difference)}h over)`;
  }

  const kind = status.isHoliday ? "Public holiday" : "Non-working day";
  return `${kind} should have ${formatHours(expected)}h but has ${formatHours(current)}h`;
}

/**
 * Applies the daily rule to one date. Returns null when the logged total
 * matches the expected hours exactly, or when the day is over-logged and
 * the excess policy is "ignore".
 */
export function evaluateDay(
  status: DayStatus,
  entries: TimeEntry[],
  excessPolicy: ExcessPolicy = "flag"
): InvalidDay | null {
  const current = sumHours(entries.map((entry) => entry.hours));
  const expected = toCentihours(expectedHoursFor(status));
  const shortfall = expected - current;

  if (shortfall === 0) return null;
  if (shortfall < 0 && excessPolicy === "ignore") return null;

  const currentHours = fromCentihours(current);
  const expectedHours = fromCentihours(expected);

  return {
    date: status.date,
    currentHours,
    expectedHours,
    shortfallHours: fromCentihours(shortfall),
    isWorkingDay: status.isWorkingDay,
    isHoliday: status.isHoliday,
    issueMessage: describeIssue(status, currentHours, expectedHours),
    entries,
  };
}

async function fromSource<T>(label: string, load: () => Promise<T>): Promise<T> {
  try {
    return await load();
  } catch (error) {
    if (error instanceof SourceUnavailableError) throw error;
    throw new SourceUnavailableError(`Failed to fetch ${label}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

async function loadDayStatuses(
  calendar: CalendarSource,
  dates: string[],
  range: DateRange
): Promise<Map<string, DayStatus>> {
  const statuses = new Map<string, DayStatus>();

  const listBatch = calendar.listDayStatuses?.bind(calendar);
  if (listBatch) {
    const batch = await fromSource("day statuses", () => listBatch(range));
    for (const status of batch) {
      statuses.set(status.date, status);
    }
  }

  for (const date of dates) {
    if (!statuses.has(date)) {
      statuses.set(date, await fromSource(`day status for ${date}`, () => calendar.getDayStatus(date)));
    }
  }

  return statuses;
}

function groupByDate(entries: TimeEntry[]): Map<string, TimeEntry[]> {
  const grouped = new Map<string, TimeEntry[]>();
  for (const entry of entries) {
    const list = grouped.get(entry.date);
    if (list) {
      list.push(entry);
    } else {
      grouped.set(entry.date, [entry]);
    }
  }
  return grouped;
}

/**
 * Finds every day of the month whose logged hours differ from the expected
 * hours. Invalid days are returned in ascending date order, which is the
 * order the month is enumerated in.
 */
export async function findInvalidDays(
  year: number,
  month: number,
  sources: ComplianceSources,
  excessPolicy: ExcessPolicy = "flag"
): Promise<InvalidDay[]> {
  if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
    throw new ComputationError(`Cannot enumerate the days of year ${year}, month ${month}`);
  }

  const dates = enumerateMonth(year, month);
  if (dates.length === 0) {
    throw new ComputationError(`Calendar enumeration produced no days for ${formatMonth(year, month)}`);
  }

  const range = monthRange(year, month);
  const entries = groupByDate(
    await fromSource("time entries", () => sources.entries.listEntries(range))
  );
  const statuses = await loadDayStatuses(sources.calendar, dates, range);

  const invalidDays: InvalidDay[] = [];
  for (const date of dates) {
    const status = statuses.get(date);
    if (!status) {
      throw new ComputationError(`No day status resolved for ${date}`);
    }
    const invalid = evaluateDay({ ...status, date }, entries.get(date) ?? [], excessPolicy);
    if (invalid) invalidDays.push(invalid);
  }

  return invalidDays;
}

export async function checkMonth(
  year: unknown,
  month: unknown,
  sources: ComplianceSources,
  options: CheckOptions = {}
): Promise<MonthCheck> {
  const query = validateMonthQuery(year, month, options.now);
  const invalidDays = await findInvalidDays(
    query.year,
    query.month,
    sources,
    options.excessPolicy
  );
  const label = formatMonth(query.year, query.month);

  return {
    month: label,
    totalInvalidDays: invalidDays.length,
    invalidDays,
    report: formatInvalidDaysReport(label, invalidDays),
  };
}
