import type { AnalysisConfig } from "../../core/config.js";
import { RenderError } from "../../core/errors.js";
import { getErrorMessage, logError, logInfo, logWarn } from "../../core/logging.js";
import type { PostedComment } from "../../data-sources/github-comment-client.js";
import { CheckRunner } from "../checks/check-runner.js";
import {
  DEFAULT_CHECKS_FILE,
  loadCheckDefinitions,
  selectChecks,
} from "../checks/definitions.js";
import type { CheckDefinition, ToolInvoker, Unit } from "../checks/types.js";
import {
  applyPatchPlan,
  planAllowAttributePatches,
  type PatchPlan,
} from "../patches/allow-attribute.js";
import { ResultAggregator } from "../report/aggregator.js";
import { renderPrComment } from "../report/renderers/index.js";
import { resultLabel } from "../report/renderers/shared.js";
import { exitCodeFor } from "../report/status.js";
import type { Report, ReportCheck, ReportFormat } from "../report/types.js";
import { writeReport, type WrittenReport } from "../report/writer.js";
import { discoverUnits } from "../units/discovery.js";

/** Anything that can post a Markdown comment; the GitHub client in production. */
export interface CommentPublisher {
  postComment(body: string): Promise<PostedComment>;
}

export interface AnalysisPipelineConfig {
  analysis: AnalysisConfig;
  invoke?: ToolInvoker;
  publisher?: CommentPublisher;
  now?: () => Date;
}

export interface RunAnalysisOptions {
  /** Check names to run; all definitions when empty. */
  checks?: string[];
  formats?: ReportFormat[];
  signal?: AbortSignal;
  /** Overrides the configured whole-run deadline; 0 disables it. */
  timeoutMs?: number;
  failOnSkipped?: boolean;
  publish?: boolean;
}

export interface AnalysisRunResult {
  report: Report;
  written: WrittenReport[];
  exitCode: number;
  published?: PostedComment;
}

/** Plain-text listing of a finalized report, for logs when it cannot be rendered. */
export function describeReport(report: Report): string {
  return [
    `Overall: ${report.overall}${report.cancelled ? " (cancelled)" : ""}`,
    ...report.results.map(
      (r) => `  ${resultLabel(r)}: ${r.status}${r.reason ? ` (${r.reason})` : ""}`,
    ),
  ].join("\n");
}

export function toReportCheck(def: CheckDefinition): ReportCheck {
  return {
    name: def.name,
    category: def.category,
    scope: def.scope,
    required: def.required,
    description: def.description,
  };
}

// AnalysisPipeline runs one analysis end to end:
// discover -> schedule -> run -> finalize -> write -> publish.
// Discovery and render errors propagate; every check failure is captured
// in the report instead.
export class AnalysisPipeline {
  private config: AnalysisPipelineConfig;
  private definitions: CheckDefinition[] | undefined;
  private latest: AnalysisRunResult | undefined;
  private active: Promise<AnalysisRunResult> | undefined;

  constructor(config: AnalysisPipelineConfig) {
    this.config = config;
  }

  get lastRun(): AnalysisRunResult | undefined {
    return this.latest;
  }

  listUnits(): Promise<Unit[]> {
    const { unitRoot, manifestName } = this.config.analysis;
    return discoverUnits(unitRoot, manifestName);
  }

  async listChecks(): Promise<CheckDefinition[]> {
    if (!this.definitions) {
      this.definitions = await loadCheckDefinitions(
        this.config.analysis.checksFile ?? DEFAULT_CHECKS_FILE,
      );
    }
    return this.definitions;
  }

  get running(): boolean {
    return this.active !== undefined;
  }

  /**
   * Runs share the output directory, so only one may be in flight.
   * A second call while one runs rejects instead of queueing.
   */
  async run(opts: RunAnalysisOptions = {}): Promise<AnalysisRunResult> {
    if (this.active) {
      throw new Error("An analysis is already running");
    }
    const current = this.execute(opts);
    this.active = current;
    try {
      return await current;
    } finally {
      this.active = undefined;
    }
  }

  private async execute(opts: RunAnalysisOptions): Promise<AnalysisRunResult> {
    const analysis = this.config.analysis;
    const now = this.config.now ?? (() => new Date());

    // 1. Discover units and pick checks; both errors abort the run
    const units = await this.listUnits();
    const definitions = selectChecks(await this.listChecks(), opts.checks);
    logInfo(
      `Discovered ${units.length} unit(s) under ${analysis.unitRoot}; running ${definitions.length} check(s)`,
    );

    // 2. Run every check, under the caller's signal and the run deadline
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (opts.signal?.aborted) controller.abort();
    opts.signal?.addEventListener("abort", onAbort, { once: true });

    const timeoutMs = opts.timeoutMs ?? analysis.runTimeoutMs;
    const deadline =
      timeoutMs > 0
        ? setTimeout(() => {
            logWarn(`Analysis deadline of ${timeoutMs}ms reached; cancelling`);
            controller.abort();
          }, timeoutMs)
        : undefined;

    const aggregator = new ResultAggregator(definitions.map(toReportCheck));
    const runner = new CheckRunner({
      workspaceRoot: analysis.workspaceRoot,
      outputRoot: analysis.outputDir,
      maxParallel: analysis.maxParallel,
      defaultTimeoutMs: analysis.checkTimeoutMs,
      invoke: this.config.invoke,
    });

    try {
      await runner.run(definitions, units, aggregator, controller.signal);
    } finally {
      if (deadline) clearTimeout(deadline);
      opts.signal?.removeEventListener("abort", onAbort);
    }

    // 3. Finalize and write
    const report = aggregator.finalize({
      title: analysis.reportTitle,
      generatedAt: now().toISOString(),
      units,
      cancelled: controller.signal.aborted,
    });
    let written: WrittenReport[];
    try {
      written = await writeReport(
        report,
        analysis.outputDir,
        opts.formats ?? analysis.reportFormats,
      );
    } catch (err) {
      if (err instanceof RenderError) {
        logError(`Report could not be rendered: ${err.message}\n${describeReport(report)}`);
      }
      throw err;
    }

    const result: AnalysisRunResult = {
      report,
      written,
      exitCode: exitCodeFor(report, {
        failOnSkipped: opts.failOnSkipped ?? analysis.failOnSkipped,
      }),
    };

    // 4. Publish (best-effort; never changes the exit code)
    if (opts.publish && this.config.publisher) {
      try {
        result.published = await this.config.publisher.postComment(
          renderPrComment(report),
        );
        logInfo(`Published report comment ${result.published.url}`);
      } catch (err) {
        logError("Failed to publish report comment:", getErrorMessage(err));
      }
    }

    logInfo(`Analysis finished: ${report.overall} (exit code ${result.exitCode})`);
    this.latest = result;
    return result;
  }

  planPatches(lint?: string): Promise<PatchPlan> {
    const { patchRoots, workspaceRoot } = this.config.analysis;
    return planAllowAttributePatches(patchRoots, workspaceRoot, lint);
  }

  applyPatches(plan: PatchPlan): Promise<string[]> {
    return applyPatchPlan(plan);
  }
}
