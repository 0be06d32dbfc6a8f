import type { Report } from "../types.js";
import {
  assertRenderable,
  isRequired,
  resultLabel,
  statusCounts,
} from "./shared.js";

const MAX_DETAIL_ROWS = 50;

/** Short Markdown summary suitable for a pull request comment. */
export function renderPrComment(report: Report): string {
  assertRenderable(report);
  const counts = statusCounts(report.results);
  const requiredFailures = report.results.filter(
    (r) => r.status === "failure" && isRequired(report, r.check),
  );

  const headline =
    report.overall === "success"
      ? "✅ All required checks passed."
      : `❌ Required checks failed: ${requiredFailures.map(resultLabel).join(", ")}`;

  const notable = report.results.filter((r) => r.status !== "success");
  const lines = [
    `### ${report.title}`,
    "",
    headline,
    "",
    `${counts.success} success · ${counts.failure} failure · ${counts.skipped} skipped`,
  ];

  if (notable.length > 0) {
    lines.push(
      "",
      "<details>",
      "<summary>View details</summary>",
      "",
      "| Check | Unit | Required | Status | Detail |",
      "|---|---|---|---|---|",
    );
    for (const r of notable.slice(0, MAX_DETAIL_ROWS)) {
      lines.push(
        `| ${r.check} | ${r.unit ?? "(global)"} | ${isRequired(report, r.check) ? "yes" : "no"} | ${r.status} | ${(r.reason ?? "").replace(/\|/g, "\\|")} |`,
      );
    }
    if (notable.length > MAX_DETAIL_ROWS) {
      lines.push("", `…and ${notable.length - MAX_DETAIL_ROWS} more.`);
    }
    lines.push("", "</details>");
  }

  return lines.join("\n") + "\n";
}
