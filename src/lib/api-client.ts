import { z } from "zod";
import { requireCredentials } from "./config.js";
import { toIsoDate } from "./dates.js";
import { SourceUnavailableError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type {
  CalendarSource,
  Credentials,
  DateRange,
  DayStatus,
  EntrySubmission,
  Project,
  ProjectSource,
  TimeEntry,
  TimeEntrySource,
  TimesheetConfig,
} from "./types.js";

export const USER_AGENT = "timesheet-mcp/0.1.0";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ApiClientOptions {
  baseUrl: string;
  credentials: Credentials;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

const projectListSchema = z.array(
  z.object({
    id: z.number().int(),
    name: z.string(),
  })
);

const calendarDaySchema = z.object({
  logDate: z.string(),
  isNormalWorkingDay: z.boolean().nullish(),
  isPublicHoliday: z.boolean().nullish(),
  logTimes: z
    .array(
      z.object({
        projectName: z.string().nullish(),
        hours: z.number(),
        comment: z.string().nullish(),
      })
    )
    .nullish(),
});

const calendarSchema = z.array(calendarDaySchema);

type CalendarDay = z.infer<typeof calendarDaySchema>;

function extractDetail(body: string, fallback: string): string {
  if (!body) return fallback;
  try {
    const data: unknown = JSON.parse(body);
    if (data && typeof data === "object" && "message" in data && typeof data.message === "string") {
      return data.message;
    }
    return JSON.stringify(data);
  } catch {
    return body;
  }
}

/**
 * Client for the Insider timesheet API. Serves as the project, calendar and
 * time entry source. Calendar responses are shared between listEntries and
 * listDayStatuses for the same range, so one instance should serve a single
 * invocation.
 */
export class InsiderApiClient implements CalendarSource, TimeEntrySource, ProjectSource {
  private readonly baseUrl: string;
  private readonly credentials: Credentials;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger?: Logger;
  private readonly calendars = new Map<string, Promise<CalendarDay[]>>();

  constructor(options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.credentials = options.credentials;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger;
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.credentials.authToken}`,
      "Content-Type": "application/json",
      "User-Agent": USER_AGENT,
      Accept: "application/json, text/plain, */*",
    };
  }

  private async request<T>(
    label: string,
    path: string,
    schema: z.ZodType<T>,
    init: RequestInit = {}
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    this.logger?.debug(`${init.method ?? "GET"} ${url}`);

    let response: Response;
    let body: string;
    try {
      response = await this.fetchImpl(url, {
        ...init,
        headers: this.headers(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = await response.text();
    } catch (error) {
      this.logger?.error(`${label}: ${errorMessage(error)}`);
      throw new SourceUnavailableError(`${label}: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const detail = extractDetail(body, response.statusText || `HTTP ${response.status}`);
      this.logger?.error(`${label}: ${detail}`);
      throw new SourceUnavailableError(`${label}: ${detail}`, { status: response.status });
    }

    let data: unknown = null;
    if (body) {
      try {
        data = JSON.parse(body);
      } catch (error) {
        throw new SourceUnavailableError(`${label}: response is not valid JSON`, { cause: error });
      }
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new SourceUnavailableError(`${label}: unexpected response shape`, { cause: parsed.error });
    }
    return parsed.data;
  }

  async listProjects(): Promise<Project[]> {
    return this.request(
      "Failed to fetch projects",
      `/project/get-basic/user/${this.credentials.userId}`,
      projectListSchema
    );
  }

  async submitEntry(submission: EntrySubmission): Promise<void> {
    const payload = {
      userId: this.credentials.userId,
      empCode: this.credentials.employeeCode,
      logDate: submission.date,
      hours: submission.hours,
      hourRate: submission.hourRate,
      activity: submission.activity,
      projectId: submission.projectId,
      inquiryId: null,
      milestoneId: null,
      comment: submission.comment,
    };

    await this.request("Failed to log time", "/timesheet/add", z.unknown(), {
      method: "POST",
      body: JSON.stringify(payload),
    });
  }

  private getCalendar(range: DateRange): Promise<CalendarDay[]> {
    const key = `${range.from}/${range.to}`;
    const cached = this.calendars.get(key);
    if (cached) return cached;

    const pending = this.request(
      "Failed to fetch timesheet calendar",
      `/timesheet/${encodeURIComponent(this.credentials.employeeCode)}/timesheetCalendar/${range.from}/${range.to}`,
      calendarSchema
    );
    this.calendars.set(key, pending);
    // A failed request is not reused
    void pending.catch(() => {
      this.calendars.delete(key);
    });
    return pending;
  }

  async listEntries(range: DateRange): Promise<TimeEntry[]> {
    const days = await this.getCalendar(range);
    return days.flatMap((day) =>
      (day.logTimes ?? []).map((log) => ({
        projectName: log.projectName ?? "Unknown Project",
        hours: log.hours,
        comment: log.comment ?? "",
        date: toIsoDate(day.logDate),
      }))
    );
  }

  async listDayStatuses(range: DateRange): Promise<DayStatus[]> {
    const days = await this.getCalendar(range);
    return days.map((day) => ({
      date: toIsoDate(day.logDate),
      isWorkingDay: day.isNormalWorkingDay ?? false,
      isHoliday: day.isPublicHoliday ?? false,
    }));
  }

  async getDayStatus(date: string): Promise<DayStatus> {
    const statuses = await this.listDayStatuses({ from: date, to: date });
    const status = statuses.find((candidate) => candidate.date === date);
    if (!status) {
      throw new SourceUnavailableError(`Failed to fetch timesheet calendar: no data for ${date}`);
    }
    return status;
  }
}

/** Builds a client from the process configuration; fails on missing credentials */
export function createApiClient(
  config: TimesheetConfig,
  options: { fetch?: FetchLike; logger?: Logger } = {}
): InsiderApiClient {
  return new InsiderApiClient({
    baseUrl: config.apiBaseUrl,
    credentials: requireCredentials(config),
    timeoutMs: config.requestTimeoutMs,
    fetch: options.fetch,
    logger: options.logger,
  });
}
