// Timesheet Types

export interface TimeEntry {
  projectName: string;
  hours: number;
  comment: string;
  /** YYYY-MM-DD */
  date: string;
}

export interface DayStatus {
  date: string;
  isWorkingDay: boolean;
  isHoliday: boolean;
}

export interface InvalidDay {
  date: string;
  currentHours: number;
  expectedHours: number;
  /** Negative when more hours were logged than expected */
  shortfallHours: number;
  isWorkingDay: boolean;
  isHoliday: boolean;
  issueMessage: string;
  entries: TimeEntry[];
}

export interface MonthCheck {
  /** YYYY-MM */
  month: string;
  totalInvalidDays: number;
  invalidDays: InvalidDay[];
  report: string;
}

export interface Project {
  id: number;
  name: string;
}

export interface DateRange {
  from: string;
  to: string;
}

// Closed code sets accepted by the timesheet API

export const HourRate = {
  Normal: 1,
  OvertimeWeekday: 2,
  OvertimeWeekend: 3,
  OvertimeHoliday: 4,
} as const;

export type HourRate = (typeof HourRate)[keyof typeof HourRate];

export const Activity = {
  Code: 1,
  Test: 2,
} as const;

export type Activity = (typeof Activity)[keyof typeof Activity];

export type ExcessPolicy = "flag" | "ignore";

export type LogLevel = "debug" | "info" | "warn" | "error";

// Input Types

export interface LogTimeInput {
  projectId: unknown;
  hours: unknown;
  logDates: unknown;
  hourRate?: unknown;
  activity?: unknown;
  comment?: unknown;
}

export interface LogTimeRequest {
  projectId: number;
  hours: number;
  logDates: string[];
  hourRate: HourRate;
  activity: Activity;
  comment: string;
}

export interface EntrySubmission {
  projectId: number;
  date: string;
  hours: number;
  hourRate: HourRate;
  activity: Activity;
  comment: string;
}

export interface LogTimeOutcome {
  projectId: number;
  date: string;
  status: "done" | "failed";
  error?: string;
}

export interface LogTimeResult {
  results: LogTimeOutcome[];
}

// Collaborators

export interface CalendarSource {
  getDayStatus(date: string): Promise<DayStatus>;
  /** Optional batch lookup; days it omits are asked through getDayStatus */
  listDayStatuses?(range: DateRange): Promise<DayStatus[]>;
}

export interface TimeEntrySource {
  listEntries(range: DateRange): Promise<TimeEntry[]>;
  submitEntry(submission: EntrySubmission): Promise<void>;
}

export interface ProjectSource {
  listProjects(): Promise<Project[]>;
}

export interface CheckOptions {
  excessPolicy?: ExcessPolicy;
  /** Clock used for the year bound */
  now?: Date;
}

// Configuration

export interface TimesheetConfig {
  apiBaseUrl: string;
  authToken: string;
  userId: string;
  employeeCode: string;
  requestTimeoutMs: number;
  excessPolicy: ExcessPolicy;
  logLevel: LogLevel;
}

export interface Credentials {
  authToken: string;
  userId: number;
  employeeCode: string;
}
