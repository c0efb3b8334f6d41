#!/usr/bin/env node
/**
 * MCP server for the Insider timesheet.
 * Exposes tools for listing projects, logging time and checking a month.
 *
 * Usage:
 *   timesheet mcp        # Start MCP server on stdio
 *   timesheet-mcp        # Direct binary
 */

import { loadConfig } from "../lib/config.js";
import { createLogger } from "../lib/logger.js";
import { runStdioServer } from "./server.js";

const config = loadConfig();
const logger = createLogger(config.logLevel);

runStdioServer(config, logger).catch((error) => {
  logger.error(`MCP server error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
