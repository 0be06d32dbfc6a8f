import type { CheckResult } from "../checks/types.js";
import type { OverallStatus, Report, ReportCheck, UnitStatusRow } from "./types.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_SKIPPED = 2;
export const EXIT_FATAL = 70;

function requiredNames(checks: ReportCheck[]): Set<string> {
  return new Set(checks.filter((c) => c.required).map((c) => c.name));
}

/** Failure iff a required check recorded a failure. Advisory results never count. */
export function computeOverallStatus(
  results: readonly CheckResult[],
  checks: ReportCheck[],
): OverallStatus {
  const required = requiredNames(checks);
  return results.some((r) => r.status === "failure" && required.has(r.check))
    ? "failure"
    : "success";
}

/** Failure iff a required check failed for this unit; a unit with no results is a success. */
export function computeUnitStatus(
  unit: string,
  results: readonly CheckResult[],
  checks: ReportCheck[],
): OverallStatus {
  return computeOverallStatus(
    results.filter((r) => r.unit === unit),
    checks,
  );
}

export function compareResults(a: CheckResult, b: CheckResult): number {
  if (a.unit !== b.unit) {
    if (a.unit === undefined) return -1;
    if (b.unit === undefined) return 1;
    return a.unit < b.unit ? -1 : 1;
  }
  if (a.check === b.check) return 0;
  return a.check < b.check ? -1 : 1;
}

export function sortResults(results: readonly CheckResult[]): CheckResult[] {
  return [...results].sort(compareResults);
}

/** Rows of the per-unit table: one per unit, one column per required per-unit check. */
export function unitStatusRows(report: Report): UnitStatusRow[] {
  const columns = report.checks.filter((c) => c.required && c.scope === "per-unit");
  return report.units.map((unit) => {
    const checks: UnitStatusRow["checks"] = {};
    for (const column of columns) {
      const result = report.results.find(
        (r) => r.unit === unit.name && r.check === column.name,
      );
      if (result) checks[column.name] = result.status;
    }
    return {
      unit: unit.name,
      status: computeUnitStatus(unit.name, report.results, report.checks),
      checks,
    };
  });
}

export interface ExitCodeOptions {
  failOnSkipped?: boolean;
}

export function exitCodeFor(report: Report, opts: ExitCodeOptions = {}): number {
  if (report.overall === "failure") return EXIT_FAILURE;
  if (opts.failOnSkipped && report.results.some((r) => r.status === "skipped")) {
    return EXIT_SKIPPED;
  }
  return EXIT_SUCCESS;
}
