import path from "path";
import { getErrorMessage, logDebug, logError, logInfo } from "../../core/logging.js";
import { WorkerPool } from "../../core/worker-pool.js";
import type { ResultAggregator } from "../report/aggregator.js";
import {
  CANCELLED_REASON,
  type CheckContext,
  type CheckOutcome,
} from "./check-context.js";
import { runCodeStats } from "./code-stats.js";
import { runCommandCheck } from "./command-check.js";
import { runSchemaGeneration } from "./schema-generation.js";
import { runSecurityScan } from "./security-scan.js";
import { invokeTool } from "./tool-invoker.js";
import type {
  CheckDefinition,
  ScheduledCheck,
  ToolInvoker,
  Unit,
} from "./types.js";

/** Artifact directory of global checks; hidden, so no discovered unit can share it. */
export const GLOBAL_ARTIFACT_DIR = ".global";

export interface CheckRunnerOptions {
  /** Working directory of global checks. */
  workspaceRoot: string;
  /** Root of the per-unit artifact directories. */
  outputRoot: string;
  /** Upper bound on units analysed at once. */
  maxParallel: number;
  defaultTimeoutMs?: number;
  invoke?: ToolInvoker;
}

/**
 * Every (check, unit) pair a run will produce a result for: global checks
 * once, per-unit checks once per unit, in definition then unit order.
 */
export function planChecks(
  definitions: CheckDefinition[],
  units: Unit[],
): ScheduledCheck[] {
  const pairs: ScheduledCheck[] = [];
  for (const def of definitions) {
    if (def.scope === "global") {
      pairs.push({ check: def.name });
    } else {
      for (const unit of units) pairs.push({ check: def.name, unit: unit.name });
    }
  }
  return pairs;
}

/**
 * Runs check definitions against discovered units and feeds every outcome to
 * the aggregator.
 *
 * Per-unit work is one job per unit (its checks run in definition order, so
 * the unit's artifact directory has a single writer), bounded by
 * `maxParallel`. Global checks run in a separate lane alongside. A failing
 * check never stops its siblings; cancellation turns every pair not yet
 * finished into a skipped result.
 */
export class CheckRunner {
  private readonly options: CheckRunnerOptions;
  private readonly invoke: ToolInvoker;

  constructor(options: CheckRunnerOptions) {
    this.options = options;
    this.invoke = options.invoke ?? invokeTool;
  }

  async run(
    definitions: CheckDefinition[],
    units: Unit[],
    aggregator: ResultAggregator,
    signal?: AbortSignal,
  ): Promise<void> {
    aggregator.schedule(planChecks(definitions, units));

    const globals = definitions.filter((d) => d.scope === "global");
    const perUnit = definitions.filter((d) => d.scope === "per-unit");

    const globalLane = new WorkerPool(1);
    const unitPool = new WorkerPool(this.options.maxParallel);

    const globalJobs = globals.map(
      (def) => () => this.execute(def, undefined, aggregator, signal),
    );
    const unitJobs =
      perUnit.length === 0
        ? []
        : units.map((unit) => async () => {
            for (const def of perUnit) {
              await this.execute(def, unit, aggregator, signal);
            }
          });

    logInfo(
      `Running ${globals.length} global and ${perUnit.length} per-unit check(s) over ${units.length} unit(s)`,
    );

    const settled = await Promise.all([
      globalLane.runAll(globalJobs),
      unitPool.runAll(unitJobs),
    ]);
    const rejected = settled
      .flat()
      .find((s): s is PromiseRejectedResult => s.status === "rejected");
    if (rejected) {
      throw rejected.reason;
    }
  }

  private async execute(
    def: CheckDefinition,
    unit: Unit | undefined,
    aggregator: ResultAggregator,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const label = unit ? `${def.name} (${unit.name})` : def.name;

    if (signal?.aborted) {
      aggregator.record({
        check: def.name,
        unit: unit?.name,
        status: "skipped",
        output: "",
        reason: CANCELLED_REASON,
        durationMs: 0,
      });
      logDebug(`${label}: cancelled before start`);
      return;
    }

    const ctx: CheckContext = {
      unit,
      workspaceRoot: this.options.workspaceRoot,
      artifactDir: path.join(
        this.options.outputRoot,
        unit ? unit.name : GLOBAL_ARTIFACT_DIR,
      ),
      invoke: this.invoke,
      signal,
      defaultTimeoutMs: this.options.defaultTimeoutMs,
    };

    const started = Date.now();
    let outcome: CheckOutcome;
    try {
      outcome = await dispatch(def, ctx);
    } catch (err) {
      logError(`${label}: check errored:`, getErrorMessage(err));
      outcome = {
        status: "failure",
        output: "",
        reason: `check error: ${getErrorMessage(err)}`,
      };
    }

    aggregator.record({
      check: def.name,
      unit: unit?.name,
      status: outcome.status,
      output: outcome.output,
      reason: outcome.reason,
      payload: outcome.payload,
      durationMs: Date.now() - started,
    });
    logInfo(
      `${label}: ${outcome.status}${outcome.reason ? ` (${outcome.reason})` : ""}`,
    );
  }
}

function dispatch(def: CheckDefinition, ctx: CheckContext): Promise<CheckOutcome> {
  switch (def.kind) {
    case "command":
      return runCommandCheck(def, ctx);
    case "schema":
      return runSchemaGeneration(def, ctx);
    case "pattern-scan":
      return runSecurityScan(ctx);
    case "code-stats":
      return runCodeStats(def, ctx);
  }
}
