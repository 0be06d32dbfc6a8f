import dotenv from "dotenv";
import path from "path";
import { REPORT_FORMATS, type ReportFormat } from "../domain/report/types.js";

// Load environment variables
dotenv.config();

export interface AnalysisConfig {
  /** Directory whose subdirectories are the analysis units. */
  unitRoot: string;
  manifestName: string;
  /** Working directory of global checks. */
  workspaceRoot: string;
  outputDir: string;
  reportFormats: ReportFormat[];
  reportTitle: string;
  maxParallel: number;
  /** Whole-run deadline; 0 disables it. */
  runTimeoutMs: number;
  checkTimeoutMs: number;
  /** Check definitions file; undefined means the bundled defaults. */
  checksFile?: string;
  failOnSkipped: boolean;
  /** Roots scanned by the lint-patch planner, relative to workspaceRoot. */
  patchRoots: string[];
}

export interface GitHubConfig {
  token?: string;
  apiBaseUrl: string;
  repository?: string;
  pullRequest?: number;
  rateLimitMs: number;
  maxRetries: number;
  retryBackoffMs: number;
}

export interface AppConfig {
  analysis: AnalysisConfig;
  github: GitHubConfig;
}

function envNum(
  key: string,
  fallback: number,
  validate: (n: number) => boolean,
): number {
  const val = process.env[key];
  if (val === undefined || val.trim() === "") return fallback;
  const parsed = Number(val);
  return validate(parsed) ? parsed : fallback;
}

function envInt(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isInteger);
}

function envBool(key: string, fallback: boolean): boolean {
  const raw = (process.env[key] ?? "").trim().toLowerCase();
  if (raw === "") return fallback;
  if (["true", "1", "yes", "on"].includes(raw)) return true;
  if (["false", "0", "no", "off"].includes(raw)) return false;
  return fallback;
}

function envList(key: string, fallback: string[]): string[] {
  const raw = process.env[key];
  if (!raw) return fallback;
  const items = raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length > 0 ? items : fallback;
}

function envString(key: string): string | undefined {
  const raw = process.env[key]?.trim();
  return raw ? raw : undefined;
}

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((f) => f === value);
}

/**
 * Parse a comma-separated format list. Unknown names are reported by
 * validateAnalysisConfig rather than silently dropped.
 */
export function parseReportFormats(values: string[]): {
  formats: ReportFormat[];
  unknown: string[];
} {
  const formats: ReportFormat[] = [];
  const unknown: string[] = [];
  for (const value of values.map((v) => v.toLowerCase())) {
    if (isReportFormat(value)) {
      if (!formats.includes(value)) formats.push(value);
    } else {
      unknown.push(value);
    }
  }
  return { formats, unknown };
}

const DEFAULT_MAX_PARALLEL = 4;
const MAX_PARALLEL_LIMIT = 64;
const DEFAULT_CHECK_TIMEOUT_MS = 10 * 60 * 1000;

/**
 * Loads analysis settings from environment variables.
 * Every value has a default matching the stock CI layout (contracts/ under the repo root).
 */
export function loadAnalysisConfig(): AnalysisConfig {
  const workspaceRoot = path.resolve(envString("ANALYSIS_WORKSPACE") ?? ".");
  const { formats, unknown } = parseReportFormats(
    envList("ANALYSIS_REPORT_FORMATS", [...REPORT_FORMATS]),
  );
  const config: AnalysisConfig = {
    unitRoot: path.resolve(workspaceRoot, envString("ANALYSIS_ROOT") ?? "contracts"),
    manifestName: envString("ANALYSIS_MANIFEST") ?? "Cargo.toml",
    workspaceRoot,
    outputDir: path.resolve(
      workspaceRoot,
      envString("ANALYSIS_OUTPUT_DIR") ?? "analysis-output",
    ),
    reportFormats: formats,
    reportTitle: envString("ANALYSIS_REPORT_TITLE") ?? "Contract Analysis Report",
    maxParallel: Math.min(
      MAX_PARALLEL_LIMIT,
      Math.max(1, envInt("ANALYSIS_MAX_PARALLEL", DEFAULT_MAX_PARALLEL)),
    ),
    runTimeoutMs: Math.max(0, envInt("ANALYSIS_TIMEOUT_MS", 0)),
    checkTimeoutMs: Math.max(1000, envInt("ANALYSIS_CHECK_TIMEOUT_MS", DEFAULT_CHECK_TIMEOUT_MS)),
    checksFile: envString("ANALYSIS_CHECKS_FILE"),
    failOnSkipped: envBool("ANALYSIS_FAIL_ON_SKIPPED", false),
    patchRoots: envList("ANALYSIS_PATCH_ROOTS", ["contracts", "packages"]),
  };
  if (unknown.length > 0) {
    throw new Error(
      `Invalid analysis config:\n  - unknown report format(s): ${unknown.join(", ")}`,
    );
  }
  validateAnalysisConfig(config);
  return config;
}

/**
 * Validate analysis settings at startup.
 * Throws on misconfiguration rather than running with a broken layout.
 */
export function validateAnalysisConfig(c: AnalysisConfig): void {
  const errors: string[] = [];

  if (c.reportFormats.length === 0) {
    errors.push("at least one report format is required");
  }
  if (!c.manifestName || c.manifestName.includes("/")) {
    errors.push("manifestName must be a plain file name");
  }
  if (!Number.isInteger(c.maxParallel) || c.maxParallel < 1) {
    errors.push("maxParallel must be a positive integer");
  }
  if (c.runTimeoutMs < 0) errors.push("runTimeoutMs must be non-negative");
  if (c.checkTimeoutMs <= 0) errors.push("checkTimeoutMs must be positive");

  const output = path.resolve(c.outputDir);
  const units = path.resolve(c.unitRoot);
  if (output === units || units.startsWith(output + path.sep)) {
    errors.push("outputDir must not contain the unit root");
  }

  if (errors.length > 0) {
    throw new Error(`Invalid analysis config:\n  - ${errors.join("\n  - ")}`);
  }
}

// Only the public GitHub API is called with the configured token
const GITHUB_API_BASE_URL = "https://api.github.com";

/**
 * Loads pull-request comment publishing settings. Publishing is enabled only
 * when token, repository and pull request number are all present.
 */
export function loadGitHubConfig(): GitHubConfig {
  const pr = envInt("GITHUB_PR_NUMBER", 0);
  return {
    token: envString("GITHUB_TOKEN"),
    apiBaseUrl: GITHUB_API_BASE_URL,
    repository: envString("GITHUB_REPOSITORY"),
    pullRequest: pr > 0 ? pr : undefined,
    rateLimitMs: Math.max(100, envInt("GITHUB_RATE_LIMIT_MS", 1000)),
    maxRetries: Math.max(0, Math.min(10, envInt("GITHUB_MAX_RETRIES", 3))),
    retryBackoffMs: Math.max(100, envInt("GITHUB_RETRY_BACKOFF_MS", 2000)),
  };
}

export function validateGitHubConfig(config: GitHubConfig): void {
  const errors: string[] = [];

  if (!config.apiBaseUrl.startsWith("https://")) {
    errors.push("apiBaseUrl must start with https://");
  }
  if (config.repository && !/^[\w.-]+\/[\w.-]+$/.test(config.repository)) {
    errors.push("repository must look like owner/name");
  }
  if (config.rateLimitMs < 100) {
    errors.push("rateLimitMs must be >= 100");
  }

  if (errors.length > 0) {
    throw new Error(`Invalid GitHub config:\n  - ${errors.join("\n  - ")}`);
  }
}

export function isPublishingEnabled(config: GitHubConfig): boolean {
  return Boolean(config.token && config.repository && config.pullRequest);
}

export function loadConfig(): AppConfig {
  const github = loadGitHubConfig();
  validateGitHubConfig(github);
  return {
    analysis: loadAnalysisConfig(),
    github,
  };
}
