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
import type { SchemaCheckDefinition, ToolOutcome, Unit } from "./types.js";

/** Entry-point message types that get their own placeholder when declared in `src/msg.rs`. */
export const MESSAGE_TYPES = ["InstantiateMsg", "ExecuteMsg", "QueryMsg"] as const;
export type MessageType = (typeof MESSAGE_TYPES)[number];

export function messageSchema(unitName: string, messageType: MessageType): Record<string, unknown> {
  return {
    title: `${unitName} ${messageType} Schema`,
    description: `Generated placeholder schema for ${messageType}`,
    type: "object",
    additionalProperties: true,
  };
}

export function placeholderSchema(unitName: string): Record<string, unknown> {
  return {
    title: `${unitName} Schema`,
    description: "Generated placeholder schema",
    type: "object",
    additionalProperties: true,
  };
}

async function listSchemaFiles(dir: string): Promise<string[]> {
  if (!fs.existsSync(dir)) return [];
  const entries = await fsp.readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.endsWith(".json"))
    .map((e) => path.join(dir, e.name))
    .sort();
}

async function writeJson(file: string, value: unknown): Promise<string> {
  await fsp.writeFile(file, JSON.stringify(value, null, 2) + "\n");
  return file;
}

/** Message types declared as `pub struct` or `pub enum` in the unit's `src/msg.rs`. */
export async function declaredMessageTypes(unit: Unit): Promise<MessageType[]> {
  const msgFile = path.join(unit.path, "src", "msg.rs");
  if (!fs.existsSync(msgFile)) return [];
  const source = await fsp.readFile(msgFile, "utf-8");
  return MESSAGE_TYPES.filter((t) => new RegExp(`pub (struct|enum) ${t}\\b`).test(source));
}

/**
 * One placeholder per declared message type (`instantiatemsg.json`, ...),
 * or a single `schema.json` when the unit declares none.
 */
async function writePlaceholders(targetDir: string, unit: Unit): Promise<string[]> {
  const types = await declaredMessageTypes(unit);
  if (types.length === 0) {
    return [await writeJson(path.join(targetDir, "schema.json"), placeholderSchema(unit.name))];
  }
  const files: string[] = [];
  for (const t of types) {
    files.push(
      await writeJson(path.join(targetDir, `${t.toLowerCase()}.json`), messageSchema(unit.name, t)),
    );
  }
  return files;
}

/**
 * Run the unit's schema generator and publish its output under
 * `<artifactDir>/schema/`. When the generator is missing, fails, or produces
 * nothing, a placeholder schema keeps the artifact layout complete.
 */
export async function runSchemaGeneration(
  def: SchemaCheckDefinition,
  ctx: CheckContext,
): Promise<CheckOutcome> {
  const unit = ctx.unit;
  if (!unit) {
    return { status: "skipped", output: "", reason: "schema generation needs a unit" };
  }

  const targetDir = path.join(ctx.artifactDir, "schema");
  await fsp.mkdir(targetDir, { recursive: true });

  let tool: ToolOutcome;
  try {
    tool = await ctx.invoke({
      command: def.command,
      args: def.args.map((arg) => expandPlaceholders(arg, unit)),
      cwd: unit.path,
      timeoutMs: def.timeoutMs ?? ctx.defaultTimeoutMs,
      signal: ctx.signal,
    });
  } catch (err) {
    if (!(err instanceof ToolUnavailableError)) throw err;
    return {
      status: "skipped",
      output: "",
      reason: `tool unavailable: ${def.command}`,
      payload: { type: "schema", paths: await writePlaceholders(targetDir, unit), placeholder: true },
    };
  }

  const output = combineOutput(tool);
  if (tool.cancelled) {
    return { status: "skipped", output, reason: CANCELLED_REASON };
  }

  const produced = tool.exitCode === 0
    ? await listSchemaFiles(path.join(unit.path, "schema"))
    : [];

  if (produced.length > 0) {
    const paths: string[] = [];
    for (const source of produced) {
      const target = path.join(targetDir, path.basename(source));
      await fsp.copyFile(source, target);
      paths.push(target);
    }
    logDebug(`Copied ${paths.length} schema file(s) for ${unit.name}`);
    return {
      status: "success",
      output,
      payload: { type: "schema", paths, placeholder: false },
    };
  }

  const paths = await writePlaceholders(targetDir, unit);
  const reason = tool.timedOut
    ? "schema generator timed out"
    : tool.exitCode !== 0
      ? `schema generator exited with ${tool.exitCode ?? "signal"}`
      : "schema generator produced no schema files";
  return {
    status: "failure",
    output,
    reason: `${reason}; placeholder written`,
    payload: { type: "schema", paths, placeholder: true },
  };
}
