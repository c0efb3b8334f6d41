import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { validateLogRequest } from "./validation.js";
import type { LogTimeOutcome, LogTimeResult, TimeEntrySource } from "./types.js";

/**
 * Validates the batch up front, then submits one entry per date in order.
 * A failed date is recorded and does not stop the dates after it.
 */
export async function logTime(
  input: unknown,
  source: TimeEntrySource,
  logger?: Logger
): Promise<LogTimeResult> {
  const request = validateLogRequest(input);
  const results: LogTimeOutcome[] = [];

  for (const date of request.logDates) {
    const submission = {
      projectId: request.projectId,
      date,
      hours: request.hours,
      hourRate: request.hourRate,
      activity: request.activity,
      comment: request.comment,
    };
    logger?.debug(`Submitting entry: ${JSON.stringify(submission)}`);

    try {
      await source.submitEntry(submission);
      results.push({ projectId: request.projectId, date, status: "done" });
    } catch (error) {
      logger?.error(`Failed to log time for ${date}: ${errorMessage(error)}`);
      results.push({
        projectId: request.projectId,
        date,
        status: "failed",
        error: errorMessage(error),
      });
    }
  }

  return { results };
}

export function hasFailures(result: LogTimeResult): boolean {
  return result.results.some((outcome) => outcome.status === "failed");
}
