import { z, type ZodError } from "zod";
import { isValidIsoDate } from "./dates.js";
import { ValidationError } from "./errors.js";
import { hasHourPrecision } from "./hours.js";
import { Activity, HourRate, type LogTimeRequest } from "./types.js";

export const MIN_YEAR = 2020;
export const MIN_LOG_HOURS = 0.5;
export const MAX_LOG_HOURS = 8;

const HOUR_RATE_CODES = Object.values(HourRate).join(", ");
const ACTIVITY_CODES = Object.values(Activity).join(", ");

const logTimeSchema = z.object({
  projectId: z
    .number({ required_error: "is required", invalid_type_error: "must be a number" })
    .int("must be an integer")
    .positive("must be positive"),
  hours: z
    .number({ required_error: "is required", invalid_type_error: "must be a number" })
    .min(MIN_LOG_HOURS, `must be between ${MIN_LOG_HOURS} and ${MAX_LOG_HOURS}`)
    .max(MAX_LOG_HOURS, `must be between ${MIN_LOG_HOURS} and ${MAX_LOG_HOURS}`)
    .refine(hasHourPrecision, "must have at most two decimals"),
  logDates: z
    .array(z.string().refine(isValidIsoDate, "must be dates in YYYY-MM-DD format"), {
      required_error: "is required",
      invalid_type_error: "must be a list of dates",
    })
    .min(1, "must contain at least one date")
    .refine((dates) => new Set(dates).size === dates.length, "must not contain duplicate dates"),
  hourRate: z
    .nativeEnum(HourRate, { errorMap: () => ({ message: `must be one of ${HOUR_RATE_CODES}` }) })
    .default(HourRate.Normal),
  activity: z
    .nativeEnum(Activity, { errorMap: () => ({ message: `must be one of ${ACTIVITY_CODES}` }) })
    .default(Activity.Code),
  comment: z
    .string({ invalid_type_error: "must be a string" })
    .nullish()
    .transform((value) => (value ?? "").trim()),
});

function toValidationError(error: ZodError): ValidationError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? String(issue.path[0]) : "input";
  return new ValidationError(field, issue ? issue.message : "is invalid");
}

/**
 * Validates a whole log-time batch in one pass. Nothing is submitted unless
 * every field, and every date, is acceptable.
 */
export function validateLogRequest(input: unknown): LogTimeRequest {
  const parsed = logTimeSchema.safeParse(input);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return parsed.data;
}

export function validateMonthQuery(
  year: unknown,
  month: unknown,
  now: Date = new Date()
): { year: number; month: number } {
  const maxYear = now.getFullYear() + 1;
  const yearMessage = `must be between ${MIN_YEAR} and ${maxYear}`;
  const monthMessage = "must be between 1 and 12";

  const schema = z.object({
    year: z
      .number({ required_error: "is required", invalid_type_error: "must be a number" })
      .int(yearMessage)
      .min(MIN_YEAR, yearMessage)
      .max(maxYear, yearMessage),
    month: z
      .number({ required_error: "is required", invalid_type_error: "must be a number" })
      .int(monthMessage)
      .min(1, monthMessage)
      .max(12, monthMessage),
  });

  const parsed = schema.safeParse({ year, month });
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return parsed.data;
}
