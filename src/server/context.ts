import { isPublishingEnabled, loadConfig, type AppConfig } from "../core/config.js";
import { logInfo } from "../core/logging.js";
import { GitHubCommentClient } from "../data-sources/github-comment-client.js";
import { AnalysisPipeline } from "../domain/analysis/pipeline.js";

export interface ServerContext {
  config: AppConfig;
  pipeline: AnalysisPipeline;
  publishingEnabled: boolean;
}

/**
 * Create the server context.
 * All instantiation happens here (not at module import time).
 */
export function createServerContext(config: AppConfig = loadConfig()): ServerContext {
  const publishingEnabled = isPublishingEnabled(config.github);
  const pipeline = new AnalysisPipeline({
    analysis: config.analysis,
    publisher: publishingEnabled ? new GitHubCommentClient(config.github) : undefined,
  });

  logInfo(
    `Analysing units under ${config.analysis.unitRoot} (reports in ${config.analysis.outputDir})`,
  );
  if (!publishingEnabled) {
    logInfo("PR comment publishing disabled (GITHUB_TOKEN, GITHUB_REPOSITORY or GITHUB_PR_NUMBER unset)");
  }

  return { config, pipeline, publishingEnabled };
}
