import fs from "fs";
import path from "path";
import { describe, it, expect, vi, afterEach } from "vitest";
import { ToolUnavailableError } from "../src/core/errors.js";
import type { CheckContext } from "../src/domain/checks/check-context.js";
import { runCommandCheck } from "../src/domain/checks/command-check.js";
import type { ToolInvoker } from "../src/domain/checks/types.js";
import { makeCommandCheck, makeInvoker, makeTmpDir, makeUnit, toolOutcome } from "./fixtures.js";

vi.mock("../src/core/logging.js", () => ({
  logDebug: vi.fn(),
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logError: vi.fn(),
}));

function makeCtx(invoke: ToolInvoker, overrides: Partial<CheckContext> = {}): CheckContext {
  return {
    unit: makeUnit("my-token"),
    workspaceRoot: "/work",
    artifactDir: "/work/analysis-output/my-token",
    invoke,
    defaultTimeoutMs: 60_000,
    ...overrides,
  };
}

describe("runCommandCheck", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  it("runs in the unit directory with placeholders expanded", async () => {
    const invoke = makeInvoker(() => toolOutcome({ stdout: "Finished\n" }));
    const def = makeCommandCheck({ args: ["build", "--out", "{unit_snake}.wasm", "{unit}"] });

    const outcome = await runCommandCheck(def, makeCtx(invoke));

    expect(outcome).toEqual({ status: "success", output: "Finished" });
    expect(invoke).toHaveBeenCalledWith({
      command: "cargo",
      args: ["build", "--out", "my_token.wasm", "my-token"],
      cwd: "/work/contracts/my-token",
      timeoutMs: 60_000,
      signal: undefined,
    });
  });

  it("runs global checks in the workspace root and prefers the check's own timeout", async () => {
    const invoke = makeInvoker();
    const def = makeCommandCheck({ scope: "global", timeoutMs: 5000 });

    await runCommandCheck(def, makeCtx(invoke, { unit: undefined }));

    expect(invoke).toHaveBeenCalledWith(expect.objectContaining({ cwd: "/work", timeoutMs: 5000 }));
  });

  it("skips when the tool is unavailable", async () => {
    const invoke = makeInvoker(() => {
      throw new ToolUnavailableError("cargo");
    });
    await expect(runCommandCheck(makeCommandCheck(), makeCtx(invoke))).resolves.toEqual({
      status: "skipped",
      output: "",
      reason: "tool unavailable: cargo",
    });
  });

  it("rethrows unexpected invocation errors", async () => {
    const invoke = makeInvoker(() => {
      throw new Error("spawn EMFILE");
    });
    await expect(runCommandCheck(makeCommandCheck(), makeCtx(invoke))).rejects.toThrow("spawn EMFILE");
  });

  it("fails on a non-zero exit code and keeps both streams", async () => {
    const invoke = makeInvoker(() =>
      toolOutcome({ exitCode: 101, stdout: "Checking my-token\n", stderr: "error[E0425]\n" }),
    );
    await expect(runCommandCheck(makeCommandCheck(), makeCtx(invoke))).resolves.toEqual({
      status: "failure",
      output: "Checking my-token\nerror[E0425]",
      reason: "exit code 101",
    });
  });

  it("maps timeout, signal and cancellation", async () => {
    const timedOut = makeInvoker(() => toolOutcome({ exitCode: null, timedOut: true }));
    const def = makeCommandCheck({ timeoutMs: 500 });
    expect(await runCommandCheck(def, makeCtx(timedOut))).toEqual({
      status: "failure",
      output: "",
      reason: "timed out after 500ms",
    });

    const killed = makeInvoker(() => toolOutcome({ exitCode: null }));
    expect((await runCommandCheck(def, makeCtx(killed))).reason).toBe("terminated by signal");

    const cancelled = makeInvoker(() => toolOutcome({ exitCode: null, cancelled: true }));
    expect(await runCommandCheck(def, makeCtx(cancelled))).toEqual({
      status: "skipped",
      output: "",
      reason: "cancelled",
    });
  });

  it("fails when output matches a failure pattern despite exit code 0", async () => {
    const invoke = makeInvoker(() =>
      toolOutcome({ stderr: "Compiling\nwarning: unused variable `x`\n" }),
    );
    const def = makeCommandCheck({ failurePatterns: ["^error", "^warning:"] });

    const outcome = await runCommandCheck(def, makeCtx(invoke));
    expect(outcome.status).toBe("failure");
    expect(outcome.reason).toBe("output matched failure pattern ^warning:");
  });

  it("copies collected artifacts into the artifact directory", async () => {
    tmpDir = makeTmpDir("command-check");
    const unitDir = path.join(tmpDir, "contracts", "my-token");
    fs.mkdirSync(path.join(unitDir, "target"), { recursive: true });
    fs.writeFileSync(path.join(unitDir, "target", "my_token.wasm"), "wasm");
    const artifactDir = path.join(tmpDir, "out", "my-token");

    const def = makeCommandCheck({
      collect: ["target/{unit_snake}.wasm", "target/missing.wasm"],
    });
    const outcome = await runCommandCheck(
      def,
      makeCtx(makeInvoker(), { unit: { name: "my-token", path: unitDir }, artifactDir }),
    );

    const copied = path.join(artifactDir, "my_token.wasm");
    expect(outcome).toEqual({
      status: "success",
      output: "",
      payload: { type: "artifacts", paths: [copied] },
    });
    expect(fs.readFileSync(copied, "utf-8")).toBe("wasm");
  });
});
