import fs from "fs";
import path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DiscoveryError, RenderError } from "../src/core/errors.js";
import { logError } from "../src/core/logging.js";
import { AnalysisPipeline, type CommentPublisher } from "../src/domain/analysis/pipeline.js";
import type { ToolInvocation, ToolOutcome } from "../src/domain/checks/types.js";
import { renderPrComment } from "../src/domain/report/renderers/index.js";
import { GENERATED_AT, makeAnalysisConfig, makeInvoker, makeTmpDir, toolOutcome, writeUnit } from "./fixtures.js";

vi.mock("../src/core/logging.js", () => ({
  logDebug: vi.fn(),
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logError: vi.fn(),
  getErrorMessage: (err: unknown) => (err instanceof Error ? err.message : String(err)),
}));

const CHECKS_FILE = {
  checks: [
    { name: "format", category: "formatting", scope: "global", required: true, kind: "command", command: "cargo", args: ["fmt", "--check"] },
    { name: "compile", category: "build", scope: "per-unit", required: true, kind: "command", command: "cargo", args: ["check"] },
    { name: "patterns", category: "security", scope: "per-unit", required: false, kind: "pattern-scan" },
  ],
};

function failCompileFor(unit: string) {
  return makeInvoker((inv: ToolInvocation) =>
    inv.args[0] === "check" && path.basename(inv.cwd) === unit
      ? toolOutcome({ exitCode: 101, stderr: "error[E0425]: cannot find value `amount`" })
      : toolOutcome(),
  );
}

/** Resolves only when the invocation is aborted. */
function hangingInvoker() {
  return makeInvoker(
    (inv) =>
      new Promise<ToolOutcome>((resolve) => {
        inv.signal?.addEventListener("abort", () =>
          resolve(toolOutcome({ exitCode: null, cancelled: true })),
        );
      }),
  );
}

describe("AnalysisPipeline", () => {
  let root: string;

  const pipelineWith = (
    invoke: ReturnType<typeof makeInvoker>,
    publisher?: CommentPublisher,
    overrides: Parameters<typeof makeAnalysisConfig>[0] = {},
  ) =>
    new AnalysisPipeline({
      analysis: makeAnalysisConfig({
        workspaceRoot: root,
        unitRoot: path.join(root, "contracts"),
        outputDir: path.join(root, "analysis-output"),
        checksFile: path.join(root, "checks.json"),
        reportFormats: ["markdown", "json"],
        ...overrides,
      }),
      invoke,
      publisher,
      now: () => new Date(GENERATED_AT),
    });

  beforeEach(() => {
    root = makeTmpDir("pipeline");
    fs.writeFileSync(path.join(root, "checks.json"), JSON.stringify(CHECKS_FILE));
    for (const name of ["a", "b", "c"]) writeUnit(path.join(root, "contracts"), name);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("runs every check, writes the reports and derives the exit code", async () => {
    const pipeline = pipelineWith(failCompileFor("b"));
    const result = await pipeline.run();

    expect(result.exitCode).toBe(1);
    expect(result.report.overall).toBe("failure");
    expect(result.report.generatedAt).toBe(GENERATED_AT);
    // 1 global + 2 per-unit x 3 units
    expect(result.report.results).toHaveLength(7);
    expect(result.written.map((w) => path.basename(w.path))).toEqual(["report.md", "summary.json"]);

    const summary = JSON.parse(fs.readFileSync(path.join(root, "analysis-output", "summary.json"), "utf-8"));
    expect(summary.units).toEqual([
      { name: "a", status: "success" },
      { name: "b", status: "failure" },
      { name: "c", status: "success" },
    ]);
    expect(pipeline.lastRun).toBe(result);
  });

  it("runs a selection of checks", async () => {
    const result = await pipelineWith(makeInvoker()).run({ checks: ["format"] });
    expect(result.report.results.map((r) => r.check)).toEqual(["format"]);
    expect(result.exitCode).toBe(0);
  });

  it("rejects unknown check names before running anything", async () => {
    const invoke = makeInvoker();
    await expect(pipelineWith(invoke).run({ checks: ["deploy"] })).rejects.toThrow("Unknown check(s): deploy");
    expect(invoke).not.toHaveBeenCalled();
  });

  it("aborts on an unreadable unit root without writing reports", async () => {
    const pipeline = pipelineWith(makeInvoker(), undefined, { unitRoot: path.join(root, "missing") });
    await expect(pipeline.run()).rejects.toBeInstanceOf(DiscoveryError);
    expect(fs.existsSync(path.join(root, "analysis-output"))).toBe(false);
  });

  it("reports every check as cancelled when the caller aborts first", async () => {
    const controller = new AbortController();
    controller.abort();
    const invoke = makeInvoker();

    const result = await pipelineWith(invoke).run({ signal: controller.signal, failOnSkipped: true });

    expect(invoke).not.toHaveBeenCalled();
    expect(result.report.cancelled).toBe(true);
    expect(new Set(result.report.results.map((r) => r.reason))).toEqual(new Set(["cancelled"]));
    expect(result.exitCode).toBe(2);
  });

  it("cancels the run at its deadline", async () => {
    const result = await pipelineWith(hangingInvoker()).run({ timeoutMs: 20, checks: ["format"] });
    expect(result.report.cancelled).toBe(true);
    expect(result.report.results[0]).toMatchObject({ check: "format", status: "skipped", reason: "cancelled" });
  });

  it("logs the finished results when the report cannot be rendered", async () => {
    vi.mocked(logError).mockClear();
    const pipeline = pipelineWith(failCompileFor("b"), undefined, { reportTitle: "" });

    await expect(pipeline.run({ checks: ["format", "compile"] })).rejects.toBeInstanceOf(RenderError);
    expect(logError).toHaveBeenCalledWith(
      [
        "Report could not be rendered: Malformed report: missing title",
        "Overall: failure",
        "  format (global): success",
        "  compile (a): success",
        "  compile (b): failure (exit code 101)",
        "  compile (c): success",
      ].join("\n"),
    );
  });

  it("refuses a second run while one is in flight", async () => {
    const controller = new AbortController();
    const pipeline = pipelineWith(hangingInvoker());

    const first = pipeline.run({ checks: ["format"], signal: controller.signal });
    expect(pipeline.running).toBe(true);
    await expect(pipeline.run({ checks: ["format"] })).rejects.toThrow("An analysis is already running");

    controller.abort();
    expect((await first).report.cancelled).toBe(true);
    expect(pipeline.running).toBe(false);
  });

  it("publishes the PR comment when asked", async () => {
    const publisher = { postComment: vi.fn(async () => ({ id: 1, url: "https://example.test/c/1" })) };
    const result = await pipelineWith(failCompileFor("b"), publisher).run({ publish: true });

    expect(publisher.postComment).toHaveBeenCalledWith(renderPrComment(result.report));
    expect(result.published).toEqual({ id: 1, url: "https://example.test/c/1" });
  });

  it("keeps the exit code when publishing fails", async () => {
    const publisher = {
      postComment: vi.fn(async () => {
        throw new Error("Request failed with status code 403");
      }),
    };
    const result = await pipelineWith(makeInvoker(), publisher).run({ publish: true });
    expect(result.exitCode).toBe(0);
    expect(result.published).toBeUndefined();
  });

  it("plans lint patches under the configured roots", async () => {
    writeUnit(path.join(root, "contracts"), "fees", {
      "src/lib.rs": "pub fn pages(t: u64, s: u64) -> u64 {\n    (t + s - 1) / s\n}\n",
    });
    const plan = await pipelineWith(makeInvoker()).planPatches();
    expect(plan.patches.map((p) => p.file)).toEqual(["contracts/fees/src/lib.rs"]);
  });
});
