import type {
  CheckCategory,
  CheckResult,
  CheckScope,
  Unit,
} from "../checks/types.js";

export type OverallStatus = "success" | "failure";

export type ReportFormat = "html" | "markdown" | "junit" | "json";

export const REPORT_FORMATS: readonly ReportFormat[] = [
  "html",
  "markdown",
  "junit",
  "json",
];

/** The slice of a check definition the report needs for rendering. */
export interface ReportCheck {
  name: string;
  category: CheckCategory;
  scope: CheckScope;
  required: boolean;
  description?: string;
}

export interface Report {
  title: string;
  /** The only non-deterministic field; rendered on a single labelled line. */
  generatedAt: string;
  overall: OverallStatus;
  cancelled: boolean;
  checks: ReportCheck[];
  units: Unit[];
  /** Sorted by unit (global first), then check name. */
  results: CheckResult[];
}

export interface UnitStatusRow {
  unit: string;
  status: OverallStatus;
  /** Status per required per-unit check, keyed by check name. */
  checks: Record<string, CheckResult["status"]>;
}
