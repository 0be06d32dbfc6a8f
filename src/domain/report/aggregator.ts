import { logWarn } from "../../core/logging.js";
import type { CheckResult, ScheduledCheck, Unit } from "../checks/types.js";
import {
  computeOverallStatus,
  computeUnitStatus,
  sortResults,
} from "./status.js";
import type { OverallStatus, Report, ReportCheck } from "./types.js";

export const NO_RESULT_REASON = "no result recorded";

function pairKey(pair: ScheduledCheck): string {
  return `${pair.check}\u0000${pair.unit ?? ""}`;
}

export interface ResultGroup<K> {
  key: K;
  results: readonly CheckResult[];
}

export interface FinalizeOptions {
  title: string;
  generatedAt: string;
  units: Unit[];
  cancelled?: boolean;
}

/**
 * Append-only collection of check results for one run.
 *
 * Workers call `record()` from async callbacks; the call is synchronous and
 * never awaits, so appends from concurrent workers cannot interleave.
 * Ordering is restored at `finalize()`.
 */
export class ResultAggregator {
  private readonly checks: ReportCheck[];
  private readonly checkNames: Set<string>;
  private readonly scheduled = new Map<string, ScheduledCheck>();
  private readonly recorded = new Set<string>();
  private readonly results: CheckResult[] = [];

  constructor(checks: ReportCheck[]) {
    this.checks = checks.map((c) => ({ ...c }));
    this.checkNames = new Set(checks.map((c) => c.name));
  }

  schedule(pairs: ScheduledCheck[]): void {
    for (const pair of pairs) {
      if (!this.checkNames.has(pair.check)) {
        throw new Error(`Cannot schedule unknown check: ${pair.check}`);
      }
      const key = pairKey(pair);
      if (this.scheduled.has(key)) {
        throw new Error(`Already scheduled: ${describe(pair)}`);
      }
      this.scheduled.set(key, { check: pair.check, unit: pair.unit });
    }
  }

  record(result: CheckResult): void {
    const key = pairKey(result);
    if (!this.scheduled.has(key)) {
      throw new Error(`Result for unscheduled check: ${describe(result)}`);
    }
    if (this.recorded.has(key)) {
      throw new Error(`Duplicate result: ${describe(result)}`);
    }
    this.recorded.add(key);
    this.results.push(result);
  }

  /** Results in the order they were recorded. */
  get entries(): readonly CheckResult[] {
    return this.results;
  }

  pending(): ScheduledCheck[] {
    return [...this.scheduled.entries()]
      .filter(([key]) => !this.recorded.has(key))
      .map(([, pair]) => pair);
  }

  overallStatus(): OverallStatus {
    return computeOverallStatus(this.results, this.checks);
  }

  unitStatus(unit: string): OverallStatus {
    return computeUnitStatus(unit, this.results, this.checks);
  }

  /** Grouped by unit, global results first (key undefined), then by unit name. */
  byUnit(): ResultGroup<string | undefined>[] {
    const groups = new Map<string | undefined, CheckResult[]>();
    for (const result of sortResults(this.results)) {
      const group = groups.get(result.unit) ?? [];
      group.push(result);
      groups.set(result.unit, group);
    }
    return [...groups.entries()].map(([key, results]) => ({ key, results }));
  }

  byCheck(): ResultGroup<string>[] {
    const groups = new Map<string, CheckResult[]>();
    const ordered = sortResults(this.results).sort((a, b) =>
      a.check < b.check ? -1 : a.check > b.check ? 1 : 0,
    );
    for (const result of ordered) {
      const group = groups.get(result.check) ?? [];
      group.push(result);
      groups.set(result.check, group);
    }
    return [...groups.entries()].map(([key, results]) => ({ key, results }));
  }

  /**
   * Build the report. Any scheduled pair still missing a result is filled in
   * as skipped so that no scheduled check disappears from the output.
   */
  finalize(opts: FinalizeOptions): Report {
    for (const pair of this.pending()) {
      logWarn(`No result recorded for ${describe(pair)}; marking skipped`);
      this.record({
        check: pair.check,
        unit: pair.unit,
        status: "skipped",
        output: "",
        reason: opts.cancelled ? "cancelled" : NO_RESULT_REASON,
        durationMs: 0,
      });
    }

    return {
      title: opts.title,
      generatedAt: opts.generatedAt,
      overall: this.overallStatus(),
      cancelled: opts.cancelled ?? false,
      checks: this.checks.map((c) => ({ ...c })),
      units: opts.units.map((u) => ({ ...u })),
      results: sortResults(this.results),
    };
  }
}

function describe(pair: ScheduledCheck): string {
  return pair.unit ? `${pair.check} (${pair.unit})` : `${pair.check} (global)`;
}
