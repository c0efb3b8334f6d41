/**
 * MCP server exposing the timesheet tools.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { createApiClient } from "../lib/api-client.js";
import { checkMonth, type ComplianceSources } from "../lib/compliance.js";
import { requireCredentials } from "../lib/config.js";
import { errorMessage, toErrorPayload } from "../lib/errors.js";
import { silentLogger, type Logger } from "../lib/logger.js";
import { formatProjectList } from "../lib/report.js";
import { hasFailures, logTime } from "../lib/timelog.js";
import type { ExcessPolicy, ProjectSource, TimesheetConfig } from "../lib/types.js";

export const SERVER_NAME = "timesheet-mcp";
export const SERVER_VERSION = "0.1.0";

export interface TimesheetSources extends ComplianceSources {
  projects: ProjectSource;
}

export interface TimesheetServerOptions {
  /** Called once per tool call; may throw when credentials are missing */
  resolveSources: () => TimesheetSources;
  excessPolicy?: ExcessPolicy;
  logger?: Logger;
  now?: () => Date;
}

// Strings are let through so the core validator reports the field
const numeric = () => z.union([z.number(), z.string()]);

function textResult(text: string, isError = false): CallToolResult {
  return { content: [{ type: "text", text }], isError };
}

async function withErrorHandling(
  name: string,
  logger: Logger,
  run: () => Promise<CallToolResult>
): Promise<CallToolResult> {
  try {
    return await run();
  } catch (error) {
    logger.error(`Error executing tool '${name}': ${errorMessage(error)}`);
    return textResult(JSON.stringify(toErrorPayload(error)), true);
  }
}

export function createTimesheetServer(options: TimesheetServerOptions): McpServer {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // ---- Tools ----

  server.registerTool("list_projects", {
    title: "List Projects",
    description: "Get a list of all available projects for the user in markdown format",
  }, async () => {
    logger.info("Calling tool: list_projects");
    return withErrorHandling("list_projects", logger, async () => {
      const { projects } = options.resolveSources();
      return textResult(formatProjectList(await projects.listProjects()));
    });
  });

  server.registerTool("log_time_project", {
    title: "Log Time",
    description: "Log time to a specific project on one or more dates",
    inputSchema: {
      projectId: numeric().describe("Project ID from list_projects"),
      hours: numeric().describe("Number of hours to log per date (0.5 to 8)"),
      logDates: z.array(z.string()).describe("List of dates to log time for in YYYY-MM-DD format"),
      hourRate: numeric()
        .optional()
        .describe("Hour rate: 1 for normal, 2 for OT weekday, 3 for OT weekend, 4 for OT holiday"),
      activity: numeric().optional().describe("Activity type: 1 for Code, 2 for Test"),
      comment: z.string().optional().describe("Optional comment for the time entry"),
    },
  }, async (args) => {
    logger.info(`Calling tool: log_time_project with arguments: ${JSON.stringify(args)}`);
    return withErrorHandling("log_time_project", logger, async () => {
      const { entries } = options.resolveSources();
      const result = await logTime(args, entries, logger);
      const failed = hasFailures(result);

      return textResult(
        JSON.stringify({
          success: !failed,
          message: failed ? "Some entries could not be logged" : "Time logged successfully",
          details: result,
        }),
        failed
      );
    });
  });

  server.registerTool("list_invalid_days", {
    title: "List Invalid Days",
    description: "List all invalid log days (not exactly 8h on working days) for a specific month",
    inputSchema: {
      year: numeric().describe("Year to check (e.g., 2025)"),
      month: numeric().describe("Month to check (1-12)"),
    },
  }, async ({ year, month }) => {
    logger.info(`Calling tool: list_invalid_days with arguments: ${JSON.stringify({ year, month })}`);
    return withErrorHandling("list_invalid_days", logger, async () => {
      const { calendar, entries } = options.resolveSources();
      const check = await checkMonth(year, month, { calendar, entries }, {
        excessPolicy: options.excessPolicy,
        now: now(),
      });
      return textResult(check.report);
    });
  });

  return server;
}

/** Runs the server on stdio against the Insider API */
export async function runStdioServer(config: TimesheetConfig, logger: Logger): Promise<void> {
  try {
    requireCredentials(config);
  } catch (error) {
    // Keep serving; every tool call reports the problem
    logger.error(errorMessage(error));
  }

  const server = createTimesheetServer({
    resolveSources: () => {
      const client = createApiClient(config, { logger });
      return { projects: client, calendar: client, entries: client };
    },
    excessPolicy: config.excessPolicy,
    logger,
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Timesheet MCP server running on stdio");
}
