import { RenderError } from "../../../core/errors.js";
import type { CheckResult } from "../../checks/types.js";
import { CHECK_CATEGORIES, type CheckCategory } from "../../checks/types.js";
import type { Report, ReportCheck } from "../types.js";

export const CATEGORY_TITLES: Record<CheckCategory, string> = {
  formatting: "Formatting",
  lint: "Linting",
  security: "Security Analysis",
  "contract-analysis": "Contract Analysis",
  build: "Build",
};

/**
 * Reject reports no renderer can draw faithfully. Only the rendering step
 * aborts; the caller still holds the report.
 */
export function assertRenderable(report: Report): void {
  const problems: string[] = [];
  if (!report.title) problems.push("missing title");
  if (!report.generatedAt) problems.push("missing generatedAt");

  const checkNames = new Set(report.checks.map((c) => c.name));
  const unitNames = new Set(report.units.map((u) => u.name));
  for (const result of report.results) {
    if (!checkNames.has(result.check)) {
      problems.push(`result references unknown check ${result.check}`);
    }
    if (result.unit !== undefined && !unitNames.has(result.unit)) {
      problems.push(`result references unknown unit ${result.unit}`);
    }
  }

  if (problems.length > 0) {
    throw new RenderError(`Malformed report: ${problems.join("; ")}`);
  }
}

export interface CategorySection {
  category: CheckCategory;
  title: string;
  checks: ReportCheck[];
  results: CheckResult[];
}

/** One section per category that has at least one configured check. */
export function categorySections(report: Report): CategorySection[] {
  return CHECK_CATEGORIES.map((category) => {
    const checks = report.checks.filter((c) => c.category === category);
    const names = new Set(checks.map((c) => c.name));
    return {
      category,
      title: CATEGORY_TITLES[category],
      checks,
      results: report.results.filter((r) => names.has(r.check)),
    };
  }).filter((section) => section.checks.length > 0);
}

export function isRequired(report: Report, check: string): boolean {
  return report.checks.some((c) => c.name === check && c.required);
}

/** Output is shown for failures and for every advisory check. */
export function shouldShowOutput(report: Report, result: CheckResult): boolean {
  if (result.output.length === 0) return false;
  return result.status === "failure" || !isRequired(report, result.check);
}

export function resultLabel(result: CheckResult): string {
  return result.unit ? `${result.check} (${result.unit})` : `${result.check} (global)`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

// CSI/OSC escape sequences as written by coloured terminal output.
const ANSI_ESCAPE = /\u001b(?:\[[0-?]*[ -\/]*[@-~]|\][^\u0007]*\u0007|[@-_])/g;
// Characters XML 1.0 does not allow, even escaped.
const XML_FORBIDDEN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

/** Tool output with colour codes and XML-illegal control characters removed. */
export function xmlSafeText(text: string): string {
  return text.replace(ANSI_ESCAPE, "").replace(XML_FORBIDDEN, "");
}

export function statusCounts(results: readonly CheckResult[]): Record<CheckResult["status"], number> {
  const counts = { success: 0, failure: 0, skipped: 0 };
  for (const r of results) counts[r.status]++;
  return counts;
}
