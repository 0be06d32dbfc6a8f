#!/usr/bin/env node
/**
 * Run the analysis once: discover units, run the checks, write the reports
 * and exit with the derived status.
 *
 * Exit codes: 0 success, 1 a required check failed, 2 skipped checks with
 * --fail-on-skipped, 70 the run itself could not complete.
 *
 * Usage:
 *   contract-analysis
 *   contract-analysis --root contracts --format markdown,junit
 *   contract-analysis --plan-patches
 */

import { isPublishingEnabled, loadConfig } from "../core/config.js";
import { getErrorMessage, logError, logInfo, logWarn } from "../core/logging.js";
import { GitHubCommentClient } from "../data-sources/github-comment-client.js";
import { AnalysisPipeline } from "../domain/analysis/pipeline.js";
import { renderJsonSummary } from "../domain/report/renderers/index.js";
import { EXIT_FATAL, EXIT_SUCCESS } from "../domain/report/status.js";
import { USAGE, applyCliOverrides, parseCliArgs } from "./args.js";

async function main(): Promise<number> {
  const opts = parseCliArgs(process.argv.slice(2));
  if (opts.help) {
    console.log(USAGE);
    return EXIT_SUCCESS;
  }

  const config = loadConfig();
  const analysis = applyCliOverrides(config.analysis, opts);

  const publishing = opts.publish && isPublishingEnabled(config.github);
  if (opts.publish && !publishing) {
    logWarn("--publish ignored: GITHUB_TOKEN, GITHUB_REPOSITORY and GITHUB_PR_NUMBER are required");
  }

  const pipeline = new AnalysisPipeline({
    analysis,
    publisher: publishing ? new GitHubCommentClient(config.github) : undefined,
  });

  // Patch mode never runs the checks
  if (opts.planPatches || opts.applyPatches) {
    const plan = await pipeline.planPatches();
    if (plan.patches.length === 0) {
      logInfo("No files need a lint-suppression attribute");
      return EXIT_SUCCESS;
    }
    if (opts.applyPatches) {
      const applied = await pipeline.applyPatches(plan);
      for (const file of applied) console.log(file);
    } else {
      process.stdout.write(plan.diff);
    }
    return EXIT_SUCCESS;
  }

  const controller = new AbortController();
  const cancel = (signal: string) => {
    if (controller.signal.aborted) return;
    logWarn(`Received ${signal}, cancelling analysis (finished results are kept)...`);
    controller.abort();
  };
  process.on("SIGINT", () => cancel("SIGINT"));
  process.on("SIGTERM", () => cancel("SIGTERM"));

  const result = await pipeline.run({
    checks: opts.checks,
    signal: controller.signal,
    publish: publishing,
  });
  process.stdout.write(renderJsonSummary(result.report));
  return result.exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logError("Analysis aborted:", getErrorMessage(err));
    process.exitCode = EXIT_FATAL;
  });
