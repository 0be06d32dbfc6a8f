import fsp from "fs/promises";
import path from "path";
import type { CheckContext, CheckOutcome } from "./check-context.js";
import { countLines, listSourceFiles } from "./source-files.js";
import type { CodeStats, CodeStatsCheckDefinition, DirectoryTotals } from "./types.js";

/** Directories a global code-stats check totals when none are configured. */
export const DEFAULT_STATS_ROOTS = ["contracts", "packages"];

const LARGE_SOURCE_LINES = 2000;
const MEDIUM_SOURCE_LINES = 1000;

export function classifySize(lines: number): CodeStats["sizeClass"] {
  if (lines > LARGE_SOURCE_LINES) return "large";
  if (lines > MEDIUM_SOURCE_LINES) return "medium";
  return "reasonable";
}

export async function collectCodeStats(srcDir: string): Promise<CodeStats | null> {
  const files = await listSourceFiles(srcDir);
  if (files.length === 0) return null;

  let lines = 0;
  for (const file of files) {
    lines += countLines(await fsp.readFile(file, "utf-8"));
  }
  return { files: files.length, lines, sizeClass: classifySize(lines) };
}

const SIZE_NOTES: Record<CodeStats["sizeClass"], string> = {
  large: `source is large (>${LARGE_SOURCE_LINES} lines) and may be complex`,
  medium: `source is medium size (>${MEDIUM_SOURCE_LINES} lines)`,
  reasonable: "source size is reasonable",
};

export async function collectDirectoryTotals(
  workspaceRoot: string,
  roots: string[],
): Promise<DirectoryTotals[]> {
  const totals: DirectoryTotals[] = [];
  for (const root of roots) {
    const files = await listSourceFiles(path.resolve(workspaceRoot, root));
    let lines = 0;
    for (const file of files) {
      lines += countLines(await fsp.readFile(file, "utf-8"));
    }
    totals.push({ root, files: files.length, lines });
  }
  return totals;
}

async function runWorkspaceTotals(
  def: CodeStatsCheckDefinition,
  ctx: CheckContext,
): Promise<CheckOutcome> {
  const roots = def.roots ?? DEFAULT_STATS_ROOTS;
  const totals = await collectDirectoryTotals(ctx.workspaceRoot, roots);
  if (totals.every((t) => t.files === 0)) {
    return { status: "skipped", output: "", reason: `no Rust sources under ${roots.join(", ")}` };
  }
  return {
    status: "success",
    output: totals.map((t) => `${t.root}: ${t.lines} lines in ${t.files} file(s)`).join("\n"),
    payload: { type: "code-stats-totals", totals },
  };
}

/**
 * Informational: always succeeds when there is something to count.
 * Per unit it sizes the unit's `src/`; globally it totals the workspace roots.
 */
export async function runCodeStats(
  def: CodeStatsCheckDefinition,
  ctx: CheckContext,
): Promise<CheckOutcome> {
  if (!ctx.unit) return runWorkspaceTotals(def, ctx);

  const stats = await collectCodeStats(path.join(ctx.unit.path, "src"));
  if (!stats) {
    return { status: "skipped", output: "", reason: "no Rust sources under src/" };
  }

  return {
    status: "success",
    output: `${stats.lines} lines in ${stats.files} file(s); ${SIZE_NOTES[stats.sizeClass]}`,
    payload: { type: "code-stats", stats },
  };
}
