import fs from "fs";
import os from "os";
import path from "path";
import { vi } from "vitest";
import type { AnalysisConfig, GitHubConfig } from "../src/core/config.js";
import type {
  CheckDefinition,
  CheckResult,
  CommandCheckDefinition,
  ToolInvocation,
  ToolOutcome,
  Unit,
} from "../src/domain/checks/types.js";
import type { Report, ReportCheck } from "../src/domain/report/types.js";

/** Fixed timestamp so rendered reports are comparable across runs. */
export const GENERATED_AT = "2026-01-15T12:00:00.000Z";

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function makeUnit(name: string, root = "/work/contracts"): Unit {
  return { name, path: path.join(root, name) };
}

/** Creates `<root>/<name>/Cargo.toml` and the given source files. */
export function writeUnit(
  root: string,
  name: string,
  files: Record<string, string> = { "src/lib.rs": "pub fn f() {}\n" },
): Unit {
  const dir = path.join(root, name);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, "Cargo.toml"), `[package]\nname = "${name}"\n`);
  for (const [rel, content] of Object.entries(files)) {
    const file = path.join(dir, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }
  return { name, path: dir };
}

export function makeCommandCheck(
  overrides: Partial<CommandCheckDefinition> = {},
): CommandCheckDefinition {
  return {
    name: "compile",
    category: "build",
    scope: "per-unit",
    required: true,
    kind: "command",
    command: "cargo",
    args: ["check"],
    ...overrides,
  };
}

export function toReportChecks(defs: CheckDefinition[]): ReportCheck[] {
  return defs.map((d) => ({
    name: d.name,
    category: d.category,
    scope: d.scope,
    required: d.required,
    description: d.description,
  }));
}

export function makeResult(overrides: Partial<CheckResult> & { check: string }): CheckResult {
  return {
    status: "success",
    output: "",
    durationMs: 10,
    ...overrides,
  };
}

export function makeReport(overrides: Partial<Report> = {}): Report {
  return {
    title: "Contract Analysis Report",
    generatedAt: GENERATED_AT,
    overall: "success",
    cancelled: false,
    checks: [],
    units: [],
    results: [],
    ...overrides,
  };
}

export function toolOutcome(overrides: Partial<ToolOutcome> = {}): ToolOutcome {
  return {
    exitCode: 0,
    stdout: "",
    stderr: "",
    timedOut: false,
    cancelled: false,
    ...overrides,
  };
}

/**
 * Tool invoker answering from a function of the invocation.
 * Records every call for assertions.
 */
export function makeInvoker(
  respond: (inv: ToolInvocation) => ToolOutcome | Promise<ToolOutcome> = () => toolOutcome(),
) {
  return vi.fn(async (inv: ToolInvocation): Promise<ToolOutcome> => respond(inv));
}

export function makeAnalysisConfig(
  overrides: Partial<AnalysisConfig> = {},
): AnalysisConfig {
  return {
    unitRoot: "/work/contracts",
    manifestName: "Cargo.toml",
    workspaceRoot: "/work",
    outputDir: "/work/analysis-output",
    reportFormats: ["html", "markdown", "junit", "json"],
    reportTitle: "Contract Analysis Report",
    maxParallel: 2,
    runTimeoutMs: 0,
    checkTimeoutMs: 60_000,
    failOnSkipped: false,
    patchRoots: ["contracts"],
    ...overrides,
  };
}

export function makeGitHubConfig(overrides: Partial<GitHubConfig> = {}): GitHubConfig {
  return {
    token: "test-token",
    apiBaseUrl: "https://api.github.com",
    repository: "example/contracts",
    pullRequest: 7,
    rateLimitMs: 100,
    maxRetries: 2,
    retryBackoffMs: 100,
    ...overrides,
  };
}
