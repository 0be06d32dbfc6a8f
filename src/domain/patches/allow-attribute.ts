import fsp from "fs/promises";
import path from "path";
import { logInfo } from "../../core/logging.js";
import { listSourceFiles, relativePath } from "../checks/source-files.js";

/**
 * Lint-suppression patches for the manual ceiling-division idiom
 * `(a + b - 1) / b`, which clippy flags as `manual_div_ceil`.
 *
 * Planning only reads files. The plan is reviewed as a diff and applied by a
 * separate, explicit call; an analysis run never modifies sources.
 */

export const DEFAULT_LINT = "clippy::manual_div_ceil";

const MANUAL_DIV_CEIL = /\(.+ \+ .+ - 1\) \/ \S/;
const LEADING_INNER = /^\s*(#!\[|\/\/!)/;
const CONTEXT_LINES = 3;

export interface SourcePatch {
  /** Path relative to the plan's base directory, forward slashes. */
  file: string;
  /** 1-based line the attribute is inserted before. */
  line: number;
  insert: string;
  reason: string;
}

export interface PatchPlan {
  lint: string;
  baseDir: string;
  patches: SourcePatch[];
  /** Unified diff of every patch, for review. */
  diff: string;
}

function splitLines(content: string): string[] {
  const lines = content.split("\n");
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** Where a file-level inner attribute goes: after existing leading inner attributes and doc comments. */
export function insertionIndex(lines: string[]): number {
  let index = 0;
  while (index < lines.length && LEADING_INNER.test(lines[index])) index++;
  return index;
}

export function renderPatchDiff(patch: SourcePatch, lines: string[]): string {
  const at = patch.line - 1;
  const before = lines.slice(Math.max(0, at - CONTEXT_LINES), at);
  const after = lines.slice(at, Math.min(lines.length, at + CONTEXT_LINES));
  const oldStart = at - before.length + 1;
  const oldCount = before.length + after.length;

  return [
    `--- a/${patch.file}`,
    `+++ b/${patch.file}`,
    `@@ -${oldStart},${oldCount} +${oldStart},${oldCount + 1} @@`,
    ...before.map((l) => ` ${l}`),
    `+${patch.insert}`,
    ...after.map((l) => ` ${l}`),
  ].join("\n");
}

/** Plan a patch for one file's content, or null when none is needed. */
export function planFilePatch(
  file: string,
  content: string,
  lint: string = DEFAULT_LINT,
): { patch: SourcePatch; diff: string } | null {
  const attribute = `#![allow(${lint})]`;
  if (content.includes(attribute)) return null;

  const lines = splitLines(content);
  const hit = lines.findIndex(
    (l) => !l.trimStart().startsWith("//") && MANUAL_DIV_CEIL.test(l),
  );
  if (hit === -1) return null;

  const patch: SourcePatch = {
    file,
    line: insertionIndex(lines) + 1,
    insert: attribute,
    reason: `manual ceiling division at line ${hit + 1}`,
  };
  return { patch, diff: renderPatchDiff(patch, lines) };
}

export async function planAllowAttributePatches(
  roots: string[],
  baseDir: string,
  lint: string = DEFAULT_LINT,
): Promise<PatchPlan> {
  const patches: SourcePatch[] = [];
  const diffs: string[] = [];

  for (const root of roots) {
    for (const file of await listSourceFiles(path.resolve(baseDir, root))) {
      const planned = planFilePatch(
        relativePath(baseDir, file),
        await fsp.readFile(file, "utf-8"),
        lint,
      );
      if (planned) {
        patches.push(planned.patch);
        diffs.push(planned.diff);
      }
    }
  }

  return {
    lint,
    baseDir,
    patches,
    diff: diffs.length > 0 ? diffs.join("\n") + "\n" : "",
  };
}

/**
 * Apply a reviewed plan. Files that gained the attribute since planning are
 * left alone. Returns the files actually modified.
 */
export async function applyPatchPlan(plan: PatchPlan): Promise<string[]> {
  const applied: string[] = [];
  for (const patch of plan.patches) {
    const file = path.resolve(plan.baseDir, patch.file);
    const content = await fsp.readFile(file, "utf-8");
    if (content.includes(patch.insert)) continue;

    const lines = content.split("\n");
    lines.splice(patch.line - 1, 0, patch.insert);
    await fsp.writeFile(file, lines.join("\n"), "utf-8");
    applied.push(patch.file);
    logInfo(`Inserted ${patch.insert} into ${patch.file}`);
  }
  return applied;
}
