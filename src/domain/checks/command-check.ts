import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import { ToolUnavailableError } from "../../core/errors.js";
import { logDebug } from "../../core/logging.js";
import {
  CANCELLED_REASON,
  combineOutput,
  expandPlaceholders,
  type CheckContext,
  type CheckOutcome,
} from "./check-context.js";
import type { CommandCheckDefinition, ToolOutcome } from "./types.js";

/**
 * Run an opaque external tool and map its outcome:
 * missing tool → skipped, cancelled → skipped, non-zero exit / timeout /
 * failure pattern → failure, otherwise success.
 */
export async function runCommandCheck(
  def: CommandCheckDefinition,
  ctx: CheckContext,
): Promise<CheckOutcome> {
  const cwd = ctx.unit?.path ?? ctx.workspaceRoot;
  const args = def.args.map((arg) => expandPlaceholders(arg, ctx.unit));
  const timeoutMs = def.timeoutMs ?? ctx.defaultTimeoutMs;

  let tool: ToolOutcome;
  try {
    tool = await ctx.invoke({
      command: def.command,
      args,
      cwd,
      timeoutMs,
      signal: ctx.signal,
    });
  } catch (err) {
    if (err instanceof ToolUnavailableError) {
      return {
        status: "skipped",
        output: "",
        reason: `tool unavailable: ${def.command}`,
      };
    }
    throw err;
  }

  const output = combineOutput(tool);

  if (tool.cancelled) {
    return { status: "skipped", output, reason: CANCELLED_REASON };
  }
  if (tool.timedOut) {
    return { status: "failure", output, reason: `timed out after ${timeoutMs}ms` };
  }
  if (tool.exitCode === null) {
    return { status: "failure", output, reason: "terminated by signal" };
  }
  if (tool.exitCode !== 0) {
    return { status: "failure", output, reason: `exit code ${tool.exitCode}` };
  }

  const matched = (def.failurePatterns ?? []).find((pattern) =>
    new RegExp(pattern, "m").test(output),
  );
  if (matched !== undefined) {
    return {
      status: "failure",
      output,
      reason: `output matched failure pattern ${matched}`,
    };
  }

  if (def.collect && def.collect.length > 0) {
    const paths = await collectArtifacts(def.collect, cwd, ctx);
    return { status: "success", output, payload: { type: "artifacts", paths } };
  }

  return { status: "success", output };
}

async function collectArtifacts(
  patterns: string[],
  cwd: string,
  ctx: CheckContext,
): Promise<string[]> {
  const collected: string[] = [];
  for (const pattern of patterns) {
    const source = path.resolve(cwd, expandPlaceholders(pattern, ctx.unit));
    if (!fs.existsSync(source)) {
      logDebug(`Artifact not produced: ${source}`);
      continue;
    }
    await fsp.mkdir(ctx.artifactDir, { recursive: true });
    const target = path.join(ctx.artifactDir, path.basename(source));
    await fsp.copyFile(source, target);
    collected.push(target);
  }
  return collected;
}
