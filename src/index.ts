/**
 * timesheet-mcp - timesheet tools for MCP clients
 *
 * Check a month for days that are not logged to the expected hours:
 *   timesheet check 2025 9
 *
 * Or serve the tools to an MCP client:
 *   timesheet-mcp
 */

export {
  checkMonth,
  findInvalidDays,
  evaluateDay,
  expectedHoursFor,
  isNormalWorkingDay,
  type ComplianceSources,
} from "./lib/compliance.js";

export { formatInvalidDaysReport, formatProjectList } from "./lib/report.js";

export { validateLogRequest, validateMonthQuery } from "./lib/validation.js";

export { logTime, hasFailures } from "./lib/timelog.js";

export {
  InsiderApiClient,
  createApiClient,
  type ApiClientOptions,
  type FetchLike,
} from "./lib/api-client.js";

export { loadConfig, requireCredentials, type LoadConfigOptions } from "./lib/config.js";

export {
  TimesheetError,
  ValidationError,
  SourceUnavailableError,
  ComputationError,
  ConfigurationError,
} from "./lib/errors.js";

export { createLogger, type Logger } from "./lib/logger.js";

export {
  createTimesheetServer,
  runStdioServer,
  type TimesheetSources,
  type TimesheetServerOptions,
} from "./mcp/server.js";

export {
  HourRate,
  Activity,
  type TimeEntry,
  type DayStatus,
  type InvalidDay,
  type MonthCheck,
  type Project,
  type DateRange,
  type LogTimeRequest,
  type LogTimeResult,
  type LogTimeOutcome,
  type EntrySubmission,
  type CalendarSource,
  type TimeEntrySource,
  type ProjectSource,
  type CheckOptions,
  type ExcessPolicy,
  type TimesheetConfig,
} from "./lib/types.js";
