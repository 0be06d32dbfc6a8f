import fsp from "fs/promises";
import path from "path";
import type { CheckContext, CheckOutcome } from "./check-context.js";
import { listSourceFiles, relativePath } from "./source-files.js";
import type { PatternMatch } from "./types.js";

export interface SecurityPattern {
  id: string;
  label: string;
  regex: RegExp;
  /** Lines matching this are not reported (e.g. already checked arithmetic). */
  exclude?: RegExp;
  advice: string;
}

export const SECURITY_PATTERNS: SecurityPattern[] = [
  {
    id: "unchecked-arithmetic",
    label: "Potentially unchecked arithmetic",
    regex: /\.(add|sub|mul|div)\(.*\)/,
    exclude: /checked_/,
    advice:
      "Use checked_add, checked_sub, checked_mul or checked_div to prevent overflow and underflow.",
  },
  {
    id: "panic-unwrap-expect",
    label: "panic!/unwrap/expect usage",
    regex: /panic!|\.unwrap\(|\.expect\(/,
    advice: "Return a contract error instead of panicking.",
  },
  {
    id: "unsafe-block",
    label: "Unsafe blocks",
    regex: /unsafe \{/,
    advice: "Unsafe code should be reviewed and documented.",
  },
  {
    id: "assert-macro",
    label: "assert!/assert_eq!/debug_assert! usage",
    regex: /assert!|assert_eq!|debug_assert!/,
    advice: "Assertions abort execution when they fail.",
  },
];

/** Scan source text; `file` is recorded as given. */
export function scanSource(
  file: string,
  content: string,
  patterns: SecurityPattern[] = SECURITY_PATTERNS,
): PatternMatch[] {
  const matches: PatternMatch[] = [];
  const lines = content.split("\n");
  for (const pattern of patterns) {
    lines.forEach((text, index) => {
      if (!pattern.regex.test(text)) return;
      if (pattern.exclude && pattern.exclude.test(text)) return;
      matches.push({ pattern: pattern.id, file, line: index + 1, text: text.trim() });
    });
  }
  return matches;
}

/** Locations listed per pattern; the payload keeps every match. */
export const MAX_EXAMPLES = 5;

/** One line per matched pattern, followed by up to MAX_EXAMPLES `file:line: text` locations. */
export function summarizeMatches(
  matches: PatternMatch[],
  patterns: SecurityPattern[] = SECURITY_PATTERNS,
): string {
  const lines: string[] = [];
  for (const p of patterns) {
    const hits = matches.filter((m) => m.pattern === p.id);
    if (hits.length === 0) continue;
    lines.push(`${p.id}: ${hits.length} match(es). ${p.advice}`);
    for (const m of hits.slice(0, MAX_EXAMPLES)) {
      lines.push(`  ${m.file}:${m.line}: ${m.text}`);
    }
    if (hits.length > MAX_EXAMPLES) {
      lines.push(`  ... ${hits.length - MAX_EXAMPLES} more`);
    }
  }
  return lines.join("\n");
}

/**
 * Pattern scan of a unit's `src/` tree. Any match is a failure; whether that
 * fails the run is decided by the check's required flag.
 */
export async function runSecurityScan(ctx: CheckContext): Promise<CheckOutcome> {
  if (!ctx.unit) {
    return { status: "skipped", output: "", reason: "pattern scan needs a unit" };
  }

  const srcDir = path.join(ctx.unit.path, "src");
  const files = await listSourceFiles(srcDir);
  if (files.length === 0) {
    return { status: "skipped", output: "", reason: "no Rust sources under src/" };
  }

  const matches: PatternMatch[] = [];
  for (const file of files) {
    const content = await fsp.readFile(file, "utf-8");
    matches.push(...scanSource(relativePath(ctx.unit.path, file), content));
  }

  if (matches.length === 0) {
    return {
      status: "success",
      output: `No security patterns matched in ${files.length} file(s)`,
      payload: { type: "matches", matches },
    };
  }

  return {
    status: "failure",
    output: summarizeMatches(matches),
    reason: `${matches.length} security pattern match(es)`,
    payload: { type: "matches", matches },
  };
}
