import { z } from "zod";
import * as analysisTools from "../domain/analysis/tools.js";
import { compactRun } from "./response-formatter.js";
import { type RegisteredTool, defineTool } from "./tool-registry.js";

// Formats stay plain strings here so that the domain layer can match them
// case-insensitively and report the valid set.
const runAnalysisArgs = z.object({
  checks: z
    .array(z.string())
    .optional()
    .describe("Check names to run. Default: all configured checks."),
  formats: z
    .array(z.string())
    .optional()
    .describe("Report formats to write (html, markdown, junit, json). Default: ANALYSIS_REPORT_FORMATS."),
  timeout_ms: z
    .number()
    .optional()
    .describe(
      "Cancel the run after this many milliseconds; unfinished checks are reported as skipped. 0 disables the deadline.",
    ),
  fail_on_skipped: z
    .boolean()
    .optional()
    .describe("Exit code 2 when any check was skipped. Default: ANALYSIS_FAIL_ON_SKIPPED."),
  publish: z
    .boolean()
    .default(false)
    .describe(
      "Post the summary as a pull request comment (needs GITHUB_TOKEN, GITHUB_REPOSITORY, GITHUB_PR_NUMBER).",
    ),
  verbose: z
    .boolean()
    .default(true)
    .describe("Return every result. Set to false for compact output (failures and skips only)."),
});

const getReportArgs = z.object({
  format: z.string().optional().describe("Report format: markdown, html, junit or json. Default: markdown."),
});

const planLintPatchesArgs = z.object({
  lint: z.string().optional().describe("Lint to allow. Default: clippy::manual_div_ceil."),
  apply: z.boolean().optional().describe("Write the planned attributes into the files. Default: false."),
});

export function getToolDefinitions(): RegisteredTool[] {
  return [
    defineTool({
      name: "list_units",
      description:
        "List the analysis units: every directory under the unit root that holds a manifest (Cargo.toml by default). Sorted by path.",
      args: z.object({}),
      handler: (_args, ctx) => analysisTools.listUnits(ctx.pipeline),
    }),
    defineTool({
      name: "list_checks",
      description:
        "List the configured checks with their category, scope (global or per-unit) and whether they are required (gate the overall status) or advisory.",
      args: z.object({}),
      handler: (_args, ctx) => analysisTools.listChecks(ctx.pipeline),
    }),
    defineTool({
      name: "run_analysis",
      description:
        "Run the checks against every unit, aggregate the results and write the report files. Overall status is FAILURE only when a required check failed; missing tools show up as skipped. Returns the report summary and exit code.",
      args: runAnalysisArgs,
      handler: async ({ verbose, publish, ...opts }, ctx) => {
        if (publish && !ctx.publishingEnabled) {
          return {
            success: false,
            error: "Publishing is not configured. Set GITHUB_TOKEN, GITHUB_REPOSITORY and GITHUB_PR_NUMBER.",
          };
        }

        const response = await analysisTools.runAnalysis(ctx.pipeline, { ...opts, publish });
        if (!verbose && response.data) {
          return { success: response.success, data: compactRun(response.data) };
        }
        return response;
      },
    }),
    defineTool({
      name: "get_report",
      description:
        "Render the report of the most recent run_analysis call in one format (markdown, html, junit or json).",
      args: getReportArgs,
      handler: async (args, ctx) => analysisTools.getReport(ctx.pipeline, args),
    }),
    defineTool({
      name: "plan_lint_patches",
      description:
        "Find sources using manual ceiling division and plan a file-level #![allow(...)] for each. Returns a unified diff for review. Files are only modified when apply is true.",
      args: planLintPatchesArgs,
      handler: (args, ctx) => analysisTools.planLintPatches(ctx.pipeline, args),
    }),
  ];
}
