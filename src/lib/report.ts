import { formatHours } from "./hours.js";
import type { InvalidDay, Project, TimeEntry } from "./types.js";

function yesNo(value: boolean): string {
  return value ? "Yes" : "No";
}

function formatEntry(entry: TimeEntry): string {
  const project = entry.projectName || "Unknown Project";
  const comment = entry.comment || "No comment";
  return `  - ${project}: ${formatHours(entry.hours)}h (${comment})`;
}

function formatInvalidDay(day: InvalidDay): string[] {
  const lines = [
    `## ${day.date}`,
    `- **Current Hours:** ${formatHours(day.currentHours)}h`,
    `- **Expected Hours:** ${formatHours(day.expectedHours)}h`,
    `- **Shortfall:** ${formatHours(day.shortfallHours)}h`,
    `- **Working Day:** ${yesNo(day.isWorkingDay)}`,
    `- **Holiday:** ${yesNo(day.isHoliday)}`,
    `- **Issue:** ${day.issueMessage}`,
  ];

  if (day.entries.length > 0) {
    lines.push("- **Current Log Entries:**", ...day.entries.map(formatEntry));
  } else {
    lines.push("- **Current Log Entries:** None");
  }

  lines.push("");
  return lines;
}

/** Markdown report for one month's invalid days */
export function formatInvalidDaysReport(month: string, invalidDays: InvalidDay[]): string {
  const lines = [
    `# Invalid Days for ${month}`,
    "",
    `**Total Invalid Days:** ${invalidDays.length}`,
    "",
  ];

  if (invalidDays.length === 0) {
    lines.push("No invalid days found for this month! 🎉");
  } else {
    for (const day of invalidDays) {
      lines.push(...formatInvalidDay(day));
    }
  }

  return lines.join("\n") + "\n";
}

export function formatProjectList(projects: Project[]): string {
  if (projects.length === 0) {
    return "# Available Projects\n\nNo projects found.\n";
  }

  const lines = projects.map((project) => `- **${project.name}** (ID: ${project.id})`);
  return `# Available Projects\n\n${lines.join("\n")}\n`;
}
