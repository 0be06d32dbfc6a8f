import { EventEmitter } from "events";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ToolUnavailableError } from "../src/core/errors.js";
import { KILL_GRACE_MS, MAX_OUTPUT_CHARS, invokeTool } from "../src/domain/checks/tool-invoker.js";

// Use vi.hoisted() so the spawn mock is available inside the vi.mock() factory
const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock("child_process", () => ({ spawn: spawnMock }));

vi.mock("../src/core/logging.js", () => ({
  logDebug: vi.fn(),
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logError: vi.fn(),
}));

class FakeProcess extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  kill = vi.fn((_signal?: string) => {
    queueMicrotask(() => this.emit("close", null));
    return true;
  });
}

function spawnFake(): FakeProcess {
  const proc = new FakeProcess();
  spawnMock.mockReturnValueOnce(proc);
  return proc;
}

function enoent(): Error {
  return Object.assign(new Error("spawn cargo ENOENT"), { code: "ENOENT" });
}

describe("invokeTool", () => {
  beforeEach(() => {
    spawnMock.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("captures exit code and both streams", async () => {
    const proc = spawnFake();
    const pending = invokeTool({ command: "cargo", args: ["fmt", "--check"], cwd: "/work" });

    proc.stdout.emit("data", Buffer.from("Diff in src/lib.rs\n"));
    proc.stderr.emit("data", Buffer.from("warning: unused\n"));
    proc.emit("close", 1);

    await expect(pending).resolves.toEqual({
      exitCode: 1,
      stdout: "Diff in src/lib.rs\n",
      stderr: "warning: unused\n",
      timedOut: false,
      cancelled: false,
    });
    expect(spawnMock).toHaveBeenCalledWith(
      "cargo",
      ["fmt", "--check"],
      expect.objectContaining({ cwd: "/work", stdio: ["ignore", "pipe", "pipe"] }),
    );
  });

  it("rejects with ToolUnavailableError when the binary is missing", async () => {
    const proc = spawnFake();
    const pending = invokeTool({ command: "cargo", args: [], cwd: "/work" });
    proc.emit("error", enoent());

    const err = await pending.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolUnavailableError);
    expect(err instanceof ToolUnavailableError && err.command).toBe("cargo");
  });

  it("passes other spawn errors through", async () => {
    const proc = spawnFake();
    const pending = invokeTool({ command: "cargo", args: [], cwd: "/work" });
    proc.emit("error", Object.assign(new Error("spawn EMFILE"), { code: "EMFILE" }));

    await expect(pending).rejects.toThrow("spawn EMFILE");
  });

  it("kills the tool at its timeout and reports timedOut", async () => {
    vi.useFakeTimers();
    const proc = spawnFake();
    const pending = invokeTool({ command: "cargo", args: ["build"], cwd: "/work", timeoutMs: 1000 });

    proc.stdout.emit("data", "Compiling vault\n");
    vi.advanceTimersByTime(1000);

    const outcome = await pending;
    expect(proc.kill).toHaveBeenCalledWith("SIGTERM");
    expect(outcome).toEqual({
      exitCode: null,
      stdout: "Compiling vault\n",
      stderr: "",
      timedOut: true,
      cancelled: false,
    });
  });

  it("kills the tool on abort and reports cancelled", async () => {
    const controller = new AbortController();
    const proc = spawnFake();
    const pending = invokeTool({ command: "cargo", args: [], cwd: "/work", signal: controller.signal });

    controller.abort();

    const outcome = await pending;
    expect(proc.kill).toHaveBeenCalledTimes(1);
    expect(outcome.cancelled).toBe(true);
    expect(outcome.timedOut).toBe(false);
  });

  it("kills immediately when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const proc = spawnFake();

    const outcome = await invokeTool({ command: "cargo", args: [], cwd: "/work", signal: controller.signal });
    expect(proc.kill).toHaveBeenCalledTimes(1);
    expect(outcome.cancelled).toBe(true);
  });

  it("sends SIGKILL when the tool ignores SIGTERM", async () => {
    vi.useFakeTimers();
    const proc = spawnFake();
    proc.kill.mockImplementation((signal?: string) => {
      if (signal === "SIGKILL") queueMicrotask(() => proc.emit("close", null));
      return true;
    });
    const pending = invokeTool({ command: "cargo", args: ["test"], cwd: "/work", timeoutMs: 1000 });

    vi.advanceTimersByTime(1000);
    expect(proc.kill.mock.calls).toEqual([["SIGTERM"]]);

    vi.advanceTimersByTime(KILL_GRACE_MS);
    const outcome = await pending;
    expect(proc.kill.mock.calls).toEqual([["SIGTERM"], ["SIGKILL"]]);
    expect(outcome.timedOut).toBe(true);
  });

  it("keeps a multi-byte character split across reads", async () => {
    const proc = spawnFake();
    const pending = invokeTool({ command: "cargo", args: [], cwd: "/work" });

    const bytes = Buffer.from("érror → done");
    proc.stderr.emit("data", bytes.subarray(0, 1));
    proc.stderr.emit("data", bytes.subarray(1));
    proc.emit("close", 101);

    expect((await pending).stderr).toBe("érror → done");
  });

  it("truncates runaway output", async () => {
    const proc = spawnFake();
    const pending = invokeTool({ command: "cargo", args: [], cwd: "/work" });

    proc.stdout.emit("data", "x".repeat(MAX_OUTPUT_CHARS + 10));
    proc.stdout.emit("data", "more");
    proc.emit("close", 0);

    const outcome = await pending;
    expect(outcome.stdout).toBe("x".repeat(MAX_OUTPUT_CHARS) + "\n[output truncated]");
  });
});
