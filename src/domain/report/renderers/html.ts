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

const STYLE = `body{font-family:-apple-system,BlinkMacSystemFont,'Segoe UI',Roboto,sans-serif;line-height:1.6;margin:0;color:#333;background:#f8f9fa}
.container{max-width:1200px;margin:0 auto;padding:20px}
header{background:#1a237e;color:#fff;padding:20px;margin-bottom:30px}
h2{color:#1a237e;border-bottom:2px solid #e0e0e0;padding-bottom:10px}
.section{background:#fff;border-radius:8px;box-shadow:0 4px 6px rgba(0,0,0,.1);padding:20px;margin-bottom:30px}
.banner{padding:12px 20px;border-radius:6px;font-weight:bold}
.banner.success{background:#e8f5e9}.banner.failure{background:#ffebee}
pre{background:#f5f5f5;padding:15px;border-radius:5px;overflow:auto}
table{width:100%;border-collapse:collapse;margin:20px 0}
th,td{text-align:left;padding:12px;border-bottom:1px solid #ddd}
th{background:#f2f2f2}
.success{color:#2e7d32}.failure{color:#c62828}.skipped{color:#ef6c00}`;

function status(value: string): string {
  return `<span class="${escapeHtml(value)}">${escapeHtml(value)}</span>`;
}

function banner(report: Report): string[] {
  const counts = statusCounts(report.results);
  const lines = [
    `<div class="banner ${report.overall}">Overall status: ${report.overall.toUpperCase()}</div>`,
  ];
  if (report.cancelled) {
    lines.push("<p>The run was cancelled; unfinished checks are marked skipped.</p>");
  }
  lines.push(
    `<p>Checks: ${counts.success} success, ${counts.failure} failure, ${counts.skipped} skipped</p>`,
  );
  return lines;
}

function unitTable(report: Report): string[] {
  const lines = ['<div class="section">', "<h2>Units</h2>"];
  if (report.units.length === 0) {
    lines.push("<p>No units discovered.</p>", "</div>");
    return lines;
  }
  const columns = report.checks
    .filter((c) => c.required && c.scope === "per-unit")
    .map((c) => c.name);
  lines.push(
    "<table>",
    `<tr>${["Unit", ...columns, "Status"].map((h) => `<th>${escapeHtml(h)}</th>`).join("")}</tr>`,
  );
  for (const row of unitStatusRows(report)) {
    const cells = [
      `<td>${escapeHtml(row.unit)}</td>`,
      ...columns.map((c) => `<td>${status(row.checks[c] ?? "n/a")}</td>`),
      `<td>${status(row.status)}</td>`,
    ];
    lines.push(`<tr>${cells.join("")}</tr>`);
  }
  lines.push("</table>", "</div>");
  return lines;
}

function outputBlock(result: CheckResult): string[] {
  return [
    "<details>",
    `<summary>${escapeHtml(resultLabel(result))}: ${status(result.status)}</summary>`,
    `<pre>${escapeHtml(result.output)}</pre>`,
    "</details>",
  ];
}

function sections(report: Report): string[] {
  const lines: string[] = [];
  for (const section of categorySections(report)) {
    lines.push('<div class="section">', `<h2>${escapeHtml(section.title)}</h2>`);
    if (section.results.length === 0) {
      lines.push("<p>No results.</p>", "</div>");
      continue;
    }
    lines.push(
      "<table>",
      "<tr><th>Check</th><th>Unit</th><th>Required</th><th>Status</th><th>Detail</th></tr>",
    );
    for (const r of section.results) {
      lines.push(
        `<tr><td>${escapeHtml(r.check)}</td><td>${escapeHtml(r.unit ?? "(global)")}</td><td>${isRequired(report, r.check) ? "yes" : "no"}</td><td>${status(r.status)}</td><td>${escapeHtml(r.reason ?? "")}</td></tr>`,
      );
    }
    lines.push("</table>");
    for (const r of section.results) {
      if (shouldShowOutput(report, r)) lines.push(...outputBlock(r));
    }
    lines.push("</div>");
  }
  return lines;
}

/** Standalone HTML page. The `Generated:` paragraph is the only time-dependent text. */
export function renderHtml(report: Report): string {
  assertRenderable(report);
  const title = escapeHtml(report.title);
  const lines = [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="UTF-8">',
    `<title>${title}</title>`,
    `<style>${STYLE}</style>`,
    "</head>",
    "<body>",
    '<header><div class="container">',
    `<h1>${title}</h1>`,
    `<p class="generated">Generated: ${escapeHtml(report.generatedAt)}</p>`,
    "</div></header>",
    '<div class="container">',
    ...banner(report),
    ...unitTable(report),
    ...sections(report),
    "</div>",
    "</body>",
    "</html>",
  ];
  return lines.join("\n") + "\n";
}
