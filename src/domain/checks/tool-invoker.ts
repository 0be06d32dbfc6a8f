import { spawn } from "child_process";
import { StringDecoder } from "string_decoder";
import { ToolUnavailableError } from "../../core/errors.js";
import { logDebug } from "../../core/logging.js";
import type { ToolInvocation, ToolOutcome } from "./types.js";

/** Per-stream cap on captured output. */
export const MAX_OUTPUT_CHARS = 100_000;

/** How long a tool gets to exit after SIGTERM before it is sent SIGKILL. */
export const KILL_GRACE_MS = 5_000;

const TRUNCATION_MARKER = "\n[output truncated]";

// Spawn errors that mean "the tool is not there", as opposed to "it ran and failed".
const UNAVAILABLE_CODES = new Set(["ENOENT", "EACCES", "ENOTDIR"]);

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// Decodes per stream so a UTF-8 sequence split across reads stays intact.
class OutputBuffer {
  private decoder = new StringDecoder("utf8");
  private text = "";
  private truncated = false;

  append(chunk: Buffer | string): void {
    this.push(typeof chunk === "string" ? chunk : this.decoder.write(chunk));
  }

  end(): void {
    this.push(this.decoder.end());
  }

  private push(decoded: string): void {
    if (this.truncated || decoded === "") return;
    this.text += decoded;
    if (this.text.length > MAX_OUTPUT_CHARS) {
      this.text = this.text.slice(0, MAX_OUTPUT_CHARS);
      this.truncated = true;
    }
  }

  toString(): string {
    return this.truncated ? this.text + TRUNCATION_MARKER : this.text;
  }
}

/**
 * Run an external tool without a shell and capture its exit code and output.
 *
 * Rejects with ToolUnavailableError when the binary cannot be spawned.
 * Timeout and abort both terminate the child (SIGTERM, then SIGKILL after
 * KILL_GRACE_MS); the outcome then reports
 * `timedOut` / `cancelled` with whatever output was captured so far.
 */
export function invokeTool(invocation: ToolInvocation): Promise<ToolOutcome> {
  const { command, args, cwd, timeoutMs, signal } = invocation;

  return new Promise<ToolOutcome>((resolve, reject) => {
    const stdout = new OutputBuffer();
    const stderr = new OutputBuffer();
    let timedOut = false;
    let cancelled = false;
    let exited = false;

    logDebug(`Invoking ${command} ${args.join(" ")} in ${cwd}`);

    const proc = spawn(command, args, {
      cwd,
      env: process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    proc.stdout?.on("data", (chunk: Buffer) => stdout.append(chunk));
    proc.stderr?.on("data", (chunk: Buffer) => stderr.append(chunk));

    let killTimer: NodeJS.Timeout | undefined;
    const kill = () => {
      if (exited || killTimer) return;
      proc.kill("SIGTERM");
      killTimer = setTimeout(() => {
        if (exited) return;
        logDebug(`${command} ignored SIGTERM; sending SIGKILL`);
        proc.kill("SIGKILL");
      }, KILL_GRACE_MS);
    };

    const abortHandler = () => {
      cancelled = true;
      kill();
    };

    const timer =
      timeoutMs !== undefined && timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            kill();
          }, timeoutMs)
        : undefined;

    const cleanup = () => {
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener("abort", abortHandler);
    };

    if (signal?.aborted) {
      abortHandler();
    } else {
      signal?.addEventListener("abort", abortHandler, { once: true });
    }

    proc.once("error", (err) => {
      exited = true;
      cleanup();
      const code = errorCode(err);
      if (code !== undefined && UNAVAILABLE_CODES.has(code)) {
        reject(new ToolUnavailableError(command, err));
      } else {
        reject(err);
      }
    });

    proc.once("close", (exitCode) => {
      exited = true;
      cleanup();
      stdout.end();
      stderr.end();
      resolve({
        exitCode,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        timedOut,
        cancelled,
      });
    });
  });
}
