import axios from "axios";
import type { GitHubConfig } from "../core/config.js";
import { getErrorMessage, logDebug, logWarn } from "../core/logging.js";
import { RateLimiter } from "../core/rate-limiter.js";

export interface PostedComment {
  id: number;
  url: string;
}

const MAX_COMMENT_CHARS = 65_000;

function isPostedComment(value: unknown): value is { id: number; html_url: string } {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "number" &&
    "html_url" in value &&
    typeof value.html_url === "string"
  );
}

/**
 * Posts analysis summaries as pull request comments through the GitHub REST
 * API (issue comments endpoint).
 */
export class GitHubCommentClient {
  private config: GitHubConfig;
  private rateLimiter: RateLimiter;

  constructor(config: GitHubConfig) {
    this.config = config;
    this.rateLimiter = new RateLimiter(config.rateLimitMs, "github");
  }

  async postComment(body: string): Promise<PostedComment> {
    const { token, repository, pullRequest } = this.config;
    if (!token || !repository || !pullRequest) {
      throw new Error("GitHub publishing needs GITHUB_TOKEN, GITHUB_REPOSITORY and GITHUB_PR_NUMBER");
    }

    const url = `${this.config.apiBaseUrl}/repos/${repository}/issues/${pullRequest}/comments`;
    const trimmed =
      body.length > MAX_COMMENT_CHARS
        ? `${body.slice(0, MAX_COMMENT_CHARS)}\n\n_(truncated)_\n`
        : body;

    const data = await this.rateLimiter.schedule(() =>
      this.postWithRetry(url, { body: trimmed }, token),
    );
    if (!isPostedComment(data)) {
      throw new Error(`Unexpected response from ${url}`);
    }
    logDebug(`Posted comment ${data.id} to ${repository}#${pullRequest}`);
    return { id: data.id, url: data.html_url };
  }

  private async postWithRetry(
    url: string,
    payload: Record<string, unknown>,
    token: string,
  ): Promise<unknown> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        const response = await axios.post(url, payload, {
          timeout: 30_000,
          headers: {
            Authorization: `Bearer ${token}`,
            Accept: "application/vnd.github+json",
            "X-GitHub-Api-Version": "2022-11-28",
          },
        });
        return response.data;
      } catch (error: unknown) {
        lastError = error instanceof Error ? error : new Error(String(error));
        const msg = getErrorMessage(error);

        const isRetryable =
          msg.includes("429") ||
          msg.includes("500") ||
          msg.includes("502") ||
          msg.includes("503") ||
          msg.includes("ECONNRESET") ||
          msg.includes("timeout");

        if (!isRetryable || attempt === this.config.maxRetries) {
          break;
        }

        const backoffMs = this.config.retryBackoffMs * Math.pow(2, attempt);
        logWarn(
          `Retry ${attempt + 1}/${this.config.maxRetries} for ${url} in ${backoffMs}ms: ${msg}`,
        );
        await new Promise<void>((r) => setTimeout(r, backoffMs));
      }
    }

    throw lastError ?? new Error(`Failed to post to ${url}`);
  }
}
