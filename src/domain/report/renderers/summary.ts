import type { CheckStatus } from "../../checks/types.js";
import { unitStatusRows } from "../status.js";
import type { OverallStatus, Report } from "../types.js";
import { assertRenderable, isRequired, statusCounts } from "./shared.js";

/** Machine-readable digest of a report (summary.json). */
export interface ReportSummary {
  title: string;
  generatedAt: string;
  overall: OverallStatus;
  cancelled: boolean;
  counts: Record<CheckStatus, number>;
  units: Array<{ name: string; status: OverallStatus }>;
  results: Array<{
    check: string;
    unit: string | null;
    required: boolean;
    status: CheckStatus;
    reason: string | null;
  }>;
}

export function summarizeReport(report: Report): ReportSummary {
  return {
    title: report.title,
    generatedAt: report.generatedAt,
    overall: report.overall,
    cancelled: report.cancelled,
    counts: statusCounts(report.results),
    units: unitStatusRows(report).map((row) => ({ name: row.unit, status: row.status })),
    results: report.results.map((r) => ({
      check: r.check,
      unit: r.unit ?? null,
      required: isRequired(report, r.check),
      status: r.status,
      reason: r.reason ?? null,
    })),
  };
}

export function renderJsonSummary(report: Report): string {
  assertRenderable(report);
  return JSON.stringify(summarizeReport(report), null, 2) + "\n";
}
