import { parseReportFormats } from "../../core/config.js";
import { getErrorMessage } from "../../core/logging.js";
import type { CheckDefinition, Unit } from "../checks/types.js";
import type { SourcePatch } from "../patches/allow-attribute.js";
import { REPORT_FILE_NAMES, renderReport } from "../report/renderers/index.js";
import { summarizeReport, type ReportSummary } from "../report/renderers/summary.js";
import { REPORT_FORMATS, type ReportFormat } from "../report/types.js";
import type { AnalysisPipeline } from "./pipeline.js";

export interface ToolResult<T> {
  success: boolean;
  data?: T;
  error?: string;
}

export interface RunAnalysisArgs {
  checks?: string[];
  formats?: string[];
  timeout_ms?: number;
  fail_on_skipped?: boolean;
  publish?: boolean;
}

export interface RunAnalysisData {
  summary: ReportSummary;
  exit_code: number;
  files: Array<{ format: ReportFormat; path: string }>;
  comment_url?: string;
}

export interface GetReportArgs {
  format?: string;
}

export interface PlanLintPatchesArgs {
  lint?: string;
  apply?: boolean;
}

export interface PlanLintPatchesData {
  lint: string;
  patches: SourcePatch[];
  diff: string;
  applied?: string[];
}

function failure<T>(error: string): ToolResult<T> {
  return { success: false, error };
}

export async function listUnits(
  pipeline: AnalysisPipeline,
): Promise<ToolResult<{ units: Unit[] }>> {
  try {
    return { success: true, data: { units: await pipeline.listUnits() } };
  } catch (err) {
    return failure(getErrorMessage(err));
  }
}

export async function listChecks(pipeline: AnalysisPipeline): Promise<
  ToolResult<{
    checks: Array<Pick<CheckDefinition, "name" | "kind" | "category" | "scope" | "required" | "description">>;
  }>
> {
  try {
    const checks = (await pipeline.listChecks()).map((c) => ({
      name: c.name,
      kind: c.kind,
      category: c.category,
      scope: c.scope,
      required: c.required,
      description: c.description,
    }));
    return { success: true, data: { checks } };
  } catch (err) {
    return failure(getErrorMessage(err));
  }
}

/**
 * Run an analysis. Maps MCP tool args (snake_case) to pipeline options.
 * A failing analysis is still a successful tool call; the report says why.
 */
export async function runAnalysis(
  pipeline: AnalysisPipeline,
  args: RunAnalysisArgs,
): Promise<ToolResult<RunAnalysisData>> {
  let formats: ReportFormat[] | undefined;
  if (args.formats && args.formats.length > 0) {
    const parsed = parseReportFormats(args.formats);
    if (parsed.unknown.length > 0) {
      return failure(
        `Unknown report format(s): ${parsed.unknown.join(", ")}. Valid: ${REPORT_FORMATS.join(", ")}`,
      );
    }
    formats = parsed.formats;
  }
  if (args.timeout_ms !== undefined && (!Number.isInteger(args.timeout_ms) || args.timeout_ms < 0)) {
    return failure("timeout_ms must be a non-negative integer");
  }

  try {
    const result = await pipeline.run({
      checks: args.checks,
      formats,
      timeoutMs: args.timeout_ms,
      failOnSkipped: args.fail_on_skipped,
      publish: args.publish,
    });
    return {
      success: true,
      data: {
        summary: summarizeReport(result.report),
        exit_code: result.exitCode,
        files: result.written,
        comment_url: result.published?.url,
      },
    };
  } catch (err) {
    return failure(`Analysis failed: ${getErrorMessage(err)}`);
  }
}

/** Render the most recent run's report in the requested format (markdown by default). */
export function getReport(
  pipeline: AnalysisPipeline,
  args: GetReportArgs,
): ToolResult<{ format: ReportFormat; file_name: string; content: string }> {
  const run = pipeline.lastRun;
  if (!run) {
    return failure("No analysis has run yet. Call run_analysis first.");
  }

  const requested = args.format ?? "markdown";
  const { formats } = parseReportFormats([requested]);
  const format = formats[0];
  if (!format) {
    return failure(
      `Unknown report format: ${requested}. Valid: ${REPORT_FORMATS.join(", ")}`,
    );
  }

  try {
    return {
      success: true,
      data: {
        format,
        file_name: REPORT_FILE_NAMES[format],
        content: renderReport(run.report, format),
      },
    };
  } catch (err) {
    return failure(getErrorMessage(err));
  }
}

/** Plan lint-suppression patches; applies them only when `apply` is true. */
export async function planLintPatches(
  pipeline: AnalysisPipeline,
  args: PlanLintPatchesArgs,
): Promise<ToolResult<PlanLintPatchesData>> {
  try {
    const plan = await pipeline.planPatches(args.lint);
    const data: PlanLintPatchesData = {
      lint: plan.lint,
      patches: plan.patches,
      diff: plan.diff,
    };
    if (args.apply) {
      data.applied = await pipeline.applyPatches(plan);
    }
    return { success: true, data };
  } catch (err) {
    return failure(`Patch planning failed: ${getErrorMessage(err)}`);
  }
}
