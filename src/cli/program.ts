import { Command } from "commander";
import chalk from "chalk";
import { createApiClient } from "../lib/api-client.js";
import { checkMonth } from "../lib/compliance.js";
import { getConfigPath, maskSecret } from "../lib/config.js";
import { errorMessage, toErrorPayload } from "../lib/errors.js";
import { formatHours } from "../lib/hours.js";
import type { Logger } from "../lib/logger.js";
import { formatProjectList } from "../lib/report.js";
import { hasFailures, logTime } from "../lib/timelog.js";
import type {
  CalendarSource,
  ProjectSource,
  TimeEntrySource,
  TimesheetConfig,
} from "../lib/types.js";
import { runStdioServer, SERVER_VERSION } from "../mcp/server.js";

export type CliClient = ProjectSource & CalendarSource & TimeEntrySource;

export interface CliOptions {
  config: Readonly<TimesheetConfig>;
  /** File the config was loaded from */
  configPath?: string;
  logger: Logger;
  createClient?: () => CliClient;
  print?: (text: string) => void;
  printError?: (text: string) => void;
  setExitCode?: (code: number) => void;
  now?: () => Date;
}

function parseNumber(value: string): number {
  return Number(value);
}

export function createProgram(options: CliOptions): Command {
  const { config, logger } = options;
  const createClient = options.createClient ?? (() => createApiClient(config, { logger }));
  const print = options.print ?? ((text: string) => console.log(text));
  const printError = options.printError ?? ((text: string) => console.error(text));
  const setExitCode = options.setExitCode ?? ((code: number) => {
    process.exitCode = code;
  });
  const now = options.now ?? (() => new Date());

  function fail(error: unknown, json: boolean): void {
    if (json) {
      print(JSON.stringify(toErrorPayload(error), null, 2));
    } else {
      printError(chalk.red(`Error: ${errorMessage(error)}`));
    }
    setExitCode(1);
  }

  const program = new Command();

  program
    .name("timesheet")
    .description("Log time and check monthly timesheet compliance")
    .version(SERVER_VERSION);

  // Projects command
  program
    .command("projects")
    .description("List projects you can log time to")
    .option("--json", "Output results as JSON", false)
    .action(async (opts: { json: boolean }) => {
      try {
        const projects = await createClient().listProjects();
        print(opts.json ? JSON.stringify(projects, null, 2) : formatProjectList(projects));
      } catch (error) {
        fail(error, opts.json);
      }
    });

  // Check command
  program
    .command("check")
    .argument("<year>", "Year to check", parseNumber)
    .argument("<month>", "Month to check (1-12)", parseNumber)
    .option("--json", "Output results as JSON", false)
    .description("List invalid days for a month")
    .action(async (year: number, month: number, opts: { json: boolean }) => {
      try {
        const client = createClient();
        const check = await checkMonth(year, month, { calendar: client, entries: client }, {
          excessPolicy: config.excessPolicy,
          now: now(),
        });

        if (check.totalInvalidDays > 0) setExitCode(1);

        if (opts.json) {
          print(JSON.stringify({
            month: check.month,
            totalInvalidDays: check.totalInvalidDays,
            invalidDays: check.invalidDays,
          }, null, 2));
          return;
        }

        print(check.report);
        if (check.totalInvalidDays > 0) {
          const missing = check.invalidDays.reduce((total, day) => total + Math.max(0, day.shortfallHours), 0);
          print(chalk.yellow(`${check.totalInvalidDays} invalid day(s), ${formatHours(missing)}h missing`));
        } else {
          print(chalk.green("All days are compliant"));
        }
      } catch (error) {
        fail(error, opts.json);
      }
    });

  // Log command
  program
    .command("log")
    .description("Log time to a project on one or more dates")
    .requiredOption("-p, --project <id>", "Project ID", parseNumber)
    .requiredOption("--hours <hours>", "Hours to log per date", parseNumber)
    .requiredOption("-d, --date <dates...>", "Dates in YYYY-MM-DD format")
    .option("-r, --rate <rate>", "Hour rate: 1 normal, 2 OT weekday, 3 OT weekend, 4 OT holiday", parseNumber, 1)
    .option("-a, --activity <activity>", "Activity: 1 Code, 2 Test", parseNumber, 1)
    .option("-c, --comment <comment>", "Comment for the time entry", "")
    .option("--json", "Output results as JSON", false)
    .action(async (opts: {
      project: number;
      hours: number;
      date: string[];
      rate: number;
      activity: number;
      comment: string;
      json: boolean;
    }) => {
      try {
        const result = await logTime(
          {
            projectId: opts.project,
            hours: opts.hours,
            logDates: opts.date,
            hourRate: opts.rate,
            activity: opts.activity,
            comment: opts.comment,
          },
          createClient(),
          logger
        );

        if (opts.json) {
          print(JSON.stringify(result, null, 2));
        } else {
          for (const outcome of result.results) {
            print(outcome.status === "done"
              ? `${chalk.green("✓")} Project ${outcome.projectId}, ${outcome.date}: done`
              : `${chalk.red("✗")} Project ${outcome.projectId}, ${outcome.date}: ${outcome.error}`);
          }
        }

        if (hasFailures(result)) setExitCode(1);
      } catch (error) {
        fail(error, opts.json);
      }
    });

  // Config command
  program
    .command("config")
    .description("Show the resolved configuration")
    .option("--json", "Output as JSON", false)
    .action((opts: { json: boolean }) => {
      const shown = { ...config, authToken: maskSecret(config.authToken) };
      if (opts.json) {
        print(JSON.stringify(shown, null, 2));
        return;
      }

      print(chalk.bold("Configuration"));
      print(`${chalk.gray("Config file:")} ${options.configPath ?? getConfigPath()}`);
      for (const [key, value] of Object.entries(shown)) {
        print(`${chalk.gray(`${key}:`)} ${value === "" ? chalk.red("Not set") : String(value)}`);
      }
    });

  // MCP command
  program
    .command("mcp")
    .description("Start the MCP server on stdio")
    .action(async () => {
      await runStdioServer(config, logger);
    });

  return program;
}
