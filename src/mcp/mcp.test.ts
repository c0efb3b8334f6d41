import { describe, test, expect, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { ConfigurationError, SourceUnavailableError } from "../lib/errors.js";
import type { DayStatus, EntrySubmission, Project, TimeEntry } from "../lib/types.js";
import { createTimesheetServer, type TimesheetSources } from "./server.js";

/**
 * In-memory stand-in for the timesheet API.
 */
class FakeTimesheet {
  projects: Project[] = [{ id: 10522, name: "SSO PoC" }];
  entries: TimeEntry[] = [];
  submitted: EntrySubmission[] = [];
  failSubmissionsOn: string[] = [];

  sources(): TimesheetSources {
    return {
      projects: { listProjects: async () => this.projects },
      calendar: {
        getDayStatus: async (date: string): Promise<DayStatus> => {
          const [year, month, day] = date.split("-").map(Number);
          const weekday = new Date(Date.UTC(year, month - 1, day)).getUTCDay();
          return { date, isWorkingDay: weekday !== 0 && weekday !== 6, isHoliday: false };
        },
      },
      entries: {
        listEntries: async () => this.entries,
        submitEntry: async (submission: EntrySubmission) => {
          if (this.failSubmissionsOn.includes(submission.date)) {
            throw new SourceUnavailableError("Failed to log time: Timesheet is locked", { status: 400 });
          }
          this.submitted.push(submission);
        },
      },
    };
  }
}

let client: Client | undefined;

afterEach(async () => {
  await client?.close();
  client = undefined;
});

async function connect(resolveSources: () => TimesheetSources): Promise<Client> {
  const server = createTimesheetServer({
    resolveSources,
    now: () => new Date(2025, 5, 15),
  });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  client = new Client({ name: "test", version: "1.0" });
  await client.connect(clientTransport);
  return client;
}

async function callTool(mcp: Client, name: string, args: Record<string, unknown> = {}) {
  const result = CallToolResultSchema.parse(await mcp.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (!first || first.type !== "text") {
    throw new Error(`Tool ${name} returned no text content`);
  }
  return { text: first.text, isError: result.isError ?? false };
}

function fullSeptember(exceptDay: number): TimeEntry[] {
  const entries: TimeEntry[] = [];
  for (let day = 1; day <= 30; day++) {
    const date = `2025-09-${String(day).padStart(2, "0")}`;
    const weekday = new Date(Date.UTC(2025, 8, day)).getUTCDay();
    if (weekday !== 0 && weekday !== 6 && day !== exceptDay) {
      entries.push({ date, hours: 8, projectName: "SSO PoC", comment: "" });
    }
  }
  return entries;
}

describe("MCP Server", () => {
  test("lists tools", async () => {
    const fake = new FakeTimesheet();
    const mcp = await connect(() => fake.sources());

    const { tools } = await mcp.listTools();

    expect(tools.map((tool) => tool.name)).toEqual(["list_projects", "log_time_project", "list_invalid_days"]);
  });

  test("calls list_projects", async () => {
    const fake = new FakeTimesheet();
    const mcp = await connect(() => fake.sources());

    const result = await callTool(mcp, "list_projects");

    expect(result).toEqual({ text: "# Available Projects\n\n- **SSO PoC** (ID: 10522)\n", isError: false });
  });

  test("calls log_time_project", async () => {
    const fake = new FakeTimesheet();
    const mcp = await connect(() => fake.sources());

    const result = await callTool(mcp, "log_time_project", {
      projectId: 10522,
      hours: 4,
      logDates: ["2025-05-29"],
      hourRate: 2,
      activity: 1,
      comment: "Working on feature X",
    });

    expect(result.isError).toBe(false);
    expect(JSON.parse(result.text)).toEqual({
      success: true,
      message: "Time logged successfully",
      details: { results: [{ projectId: 10522, date: "2025-05-29", status: "done" }] },
    });
    expect(fake.submitted).toEqual([
      { projectId: 10522, date: "2025-05-29", hours: 4, hourRate: 2, activity: 1, comment: "Working on feature X" },
    ]);
  });

  test("reports a validation error for an invalid hour rate", async () => {
    const fake = new FakeTimesheet();
    const mcp = await connect(() => fake.sources());

    const result = await callTool(mcp, "log_time_project", {
      projectId: 10522,
      hours: 8,
      logDates: ["2025-05-29"],
      hourRate: 5,
    });

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text)).toEqual({
      error: "Invalid hourRate: must be one of 1, 2, 3, 4",
      code: "VALIDATION_ERROR",
      field: "hourRate",
    });
    expect(fake.submitted).toEqual([]);
  });

  test("marks a partially failed batch as an error", async () => {
    const fake = new FakeTimesheet();
    fake.failSubmissionsOn = ["2025-09-02"];
    const mcp = await connect(() => fake.sources());

    const result = await callTool(mcp, "log_time_project", {
      projectId: 10522,
      hours: 8,
      logDates: ["2025-09-01", "2025-09-02"],
    });

    expect(result.isError).toBe(true);
    const payload = JSON.parse(result.text);
    expect(payload.success).toBe(false);
    expect(payload.details.results[1]).toEqual({
      projectId: 10522,
      date: "2025-09-02",
      status: "failed",
      error: "Failed to log time: Timesheet is locked",
    });
    expect(fake.submitted.map((submission) => submission.date)).toEqual(["2025-09-01"]);
  });

  test("calls list_invalid_days", async () => {
    const fake = new FakeTimesheet();
    fake.entries = [
      ...fullSeptember(3),
      { date: "2025-09-03", hours: 6, projectName: "AxiaGram", comment: "Feature work" },
    ];
    const mcp = await connect(() => fake.sources());

    const result = await callTool(mcp, "list_invalid_days", { year: 2025, month: 9 });

    expect(result.isError).toBe(false);
    expect(result.text).toBe(
      [
        "# Invalid Days for 2025-09",
        "",
        "**Total Invalid Days:** 1",
        "",
        "## 2025-09-03",
        "- **Current Hours:** 6.0h",
        "- **Expected Hours:** 8.0h",
        "- **Shortfall:** 2.0h",
        "- **Working Day:** Yes",
        "- **Holiday:** No",
        "- **Issue:** Logged 6.0h, should have 8.0h (2.0h missing)",
        "- **Current Log Entries:**",
        "  - AxiaGram: 6.0h (Feature work)",
        "",
        "",
      ].join("\n")
    );
  });

  test("rejects an out-of-range month", async () => {
    const fake = new FakeTimesheet();
    const mcp = await connect(() => fake.sources());

    const result = await callTool(mcp, "list_invalid_days", { year: 2025, month: 13 });

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text)).toMatchObject({ code: "VALIDATION_ERROR", field: "month" });
  });

  test("reports a year sent as a string as a validation error", async () => {
    const fake = new FakeTimesheet();
    const mcp = await connect(() => fake.sources());

    const result = await callTool(mcp, "list_invalid_days", { year: "2025", month: 9 });

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text)).toEqual({
      error: "Invalid year: must be a number",
      code: "VALIDATION_ERROR",
      field: "year",
    });
  });

  test("reports hours sent as a string as a validation error", async () => {
    const fake = new FakeTimesheet();
    const mcp = await connect(() => fake.sources());

    const result = await callTool(mcp, "log_time_project", {
      projectId: 10522,
      hours: "4",
      logDates: ["2025-09-01"],
    });

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text)).toEqual({
      error: "Invalid hours: must be a number",
      code: "VALIDATION_ERROR",
      field: "hours",
    });
    expect(fake.submitted).toEqual([]);
  });

  test("reports missing credentials on every call", async () => {
    const mcp = await connect(() => {
      throw new ConfigurationError(["INSIDER_AUTH_TOKEN"]);
    });

    const result = await callTool(mcp, "list_projects");

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text)).toEqual({
      error: "Missing required environment variables: INSIDER_AUTH_TOKEN",
      code: "CONFIGURATION_ERROR",
    });
  });
});
