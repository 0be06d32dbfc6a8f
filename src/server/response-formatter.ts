import type { RunAnalysisData } from "../domain/analysis/tools.js";
import type { OverallStatus } from "../domain/report/types.js";

/**
 * Compact run_analysis output: just what decides whether the run is green.
 */
export interface CompactRun {
  overall: OverallStatus;
  exit_code: number;
  cancelled: boolean;
  counts: RunAnalysisData["summary"]["counts"];
  failed_required: string[];
  failed_advisory: string[];
  skipped: string[];
  files: string[];
  comment_url?: string;
}

function label(r: { check: string; unit: string | null }): string {
  return r.unit ? `${r.check} (${r.unit})` : `${r.check} (global)`;
}

export function compactRun(data: RunAnalysisData): CompactRun {
  const { summary } = data;
  const failed = summary.results.filter((r) => r.status === "failure");
  return {
    overall: summary.overall,
    exit_code: data.exit_code,
    cancelled: summary.cancelled,
    counts: summary.counts,
    failed_required: failed.filter((r) => r.required).map(label),
    failed_advisory: failed.filter((r) => !r.required).map(label),
    skipped: summary.results
      .filter((r) => r.status === "skipped")
      .map((r) => (r.reason ? `${label(r)}: ${r.reason}` : label(r))),
    files: data.files.map((f) => f.path),
    ...(data.comment_url && { comment_url: data.comment_url }),
  };
}
