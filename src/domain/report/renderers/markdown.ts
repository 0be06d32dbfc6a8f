import type { CheckResult } from "../../checks/types.js";
import { unitStatusRows } from "../status.js";
import type { Report } from "../types.js";
import {
  assertRenderable,
  categorySections,
  escapeHtml,
  isRequired,
  resultLabel,
  shouldShowOutput,
  statusCounts,
} from "./shared.js";

function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function fenceFor(text: string): string {
  let fence = "```";
  while (text.includes(fence)) fence += "`";
  return fence;
}

export function outputBlock(result: CheckResult): string[] {
  const fence = fenceFor(result.output);
  return [
    "<details>",
    `<summary>${escapeHtml(resultLabel(result))}: ${result.status}</summary>`,
    "",
    `${fence}text`,
    result.output,
    fence,
    "",
    "</details>",
    "",
  ];
}

function banner(report: Report): string[] {
  const counts = statusCounts(report.results);
  const lines = [`**Overall status: ${report.overall.toUpperCase()}**`, ""];
  if (report.cancelled) {
    lines.push("_The run was cancelled; unfinished checks are marked skipped._", "");
  }
  lines.push(
    `Checks: ${counts.success} success, ${counts.failure} failure, ${counts.skipped} skipped`,
    "",
  );
  return lines;
}

function unitTable(report: Report): string[] {
  const lines = ["## Units", ""];
  if (report.units.length === 0) {
    lines.push("_No units discovered._", "");
    return lines;
  }

  const columns = report.checks
    .filter((c) => c.required && c.scope === "per-unit")
    .map((c) => c.name);
  lines.push(
    `| Unit | ${[...columns, "Status"].join(" | ")} |`,
    `|${["Unit", ...columns, "Status"].map(() => "---").join("|")}|`,
  );
  for (const row of unitStatusRows(report)) {
    const statuses = columns.map((c) => row.checks[c] ?? "n/a");
    lines.push(`| ${cell(row.unit)} | ${[...statuses, row.status].join(" | ")} |`);
  }
  lines.push("");
  return lines;
}

function sections(report: Report): string[] {
  const lines: string[] = [];
  for (const section of categorySections(report)) {
    lines.push(`## ${section.title}`, "");
    if (section.results.length === 0) {
      lines.push("_No results._", "");
      continue;
    }
    lines.push(
      "| Check | Unit | Required | Status | Detail |",
      "|---|---|---|---|---|",
    );
    for (const r of section.results) {
      lines.push(
        `| ${cell(r.check)} | ${cell(r.unit ?? "(global)")} | ${isRequired(report, r.check) ? "yes" : "no"} | ${r.status} | ${cell(r.reason ?? "")} |`,
      );
    }
    lines.push("");
    for (const r of section.results) {
      if (shouldShowOutput(report, r)) lines.push(...outputBlock(r));
    }
  }
  return lines;
}

/** Markdown report. The `Generated:` line is the only time-dependent text. */
export function renderMarkdown(report: Report): string {
  assertRenderable(report);
  const lines = [
    `# ${report.title}`,
    "",
    `Generated: ${report.generatedAt}`,
    "",
    ...banner(report),
    ...unitTable(report),
    ...sections(report),
  ];
  return lines.join("\n").trimEnd() + "\n";
}
