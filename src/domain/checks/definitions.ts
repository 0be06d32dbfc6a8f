import fsp from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { logDebug } from "../../core/logging.js";
import { UNIT_ONLY_KINDS, type CheckDefinition } from "./types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Check set shipped with the project (config/default-checks.json). */
export const DEFAULT_CHECKS_FILE = path.resolve(
  __dirname,
  "../../../config/default-checks.json",
);

// ============================================================================
// Schema
// ============================================================================

const baseShape = {
  name: z
    .string()
    .regex(/^[a-z0-9][a-z0-9_-]*$/, "must be lowercase kebab/snake case"),
  category: z.enum([
    "formatting",
    "lint",
    "security",
    "contract-analysis",
    "build",
  ]),
  scope: z.enum(["global", "per-unit"]),
  required: z.boolean(),
  description: z.string().optional(),
};

const commandCheckSchema = z.object({
  ...baseShape,
  kind: z.literal("command"),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  failurePatterns: z.array(z.string()).optional(),
  collect: z.array(z.string().min(1)).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

const schemaCheckSchema = z.object({
  ...baseShape,
  kind: z.literal("schema"),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  timeoutMs: z.number().int().positive().optional(),
});

const patternScanCheckSchema = z.object({
  ...baseShape,
  kind: z.literal("pattern-scan"),
});

const codeStatsCheckSchema = z.object({
  ...baseShape,
  kind: z.literal("code-stats"),
  roots: z.array(z.string().min(1)).optional(),
});

const checkDefinitionSchema = z.discriminatedUnion("kind", [
  commandCheckSchema,
  schemaCheckSchema,
  patternScanCheckSchema,
  codeStatsCheckSchema,
]);

const checksFileSchema = z.object({
  checks: z.array(checkDefinitionSchema),
});

// ============================================================================
// Parsing & validation
// ============================================================================

/**
 * Parse a check-definition document (`{ "checks": [...] }`).
 * Throws one aggregated error for schema violations or broken invariants.
 */
export function parseCheckDefinitions(raw: unknown): CheckDefinition[] {
  const parsed = checksFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
    );
    throw new Error(`Invalid check definitions:\n  - ${issues.join("\n  - ")}`);
  }
  const checks: CheckDefinition[] = parsed.data.checks;
  validateCheckDefinitions(checks);
  return checks;
}

export function validateCheckDefinitions(checks: CheckDefinition[]): void {
  const errors: string[] = [];
  const seen = new Set<string>();

  for (const check of checks) {
    if (seen.has(check.name)) {
      errors.push(`Duplicate check name: ${check.name}`);
    }
    seen.add(check.name);

    if (check.scope === "global" && UNIT_ONLY_KINDS.includes(check.kind)) {
      errors.push(`${check.name}: kind "${check.kind}" requires per-unit scope`);
    }

    if (check.kind === "command") {
      for (const pattern of check.failurePatterns ?? []) {
        try {
          new RegExp(pattern, "m");
        } catch {
          errors.push(`${check.name}: invalid failure pattern ${pattern}`);
        }
      }
    }
  }

  if (errors.length > 0) {
    throw new Error(`Invalid check definitions:\n  - ${errors.join("\n  - ")}`);
  }
}

export async function loadCheckDefinitions(
  file: string = DEFAULT_CHECKS_FILE,
): Promise<CheckDefinition[]> {
  const text = await fsp.readFile(file, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(
      `Check definitions file ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  const checks = parseCheckDefinitions(raw);
  logDebug(`Loaded ${checks.length} check definitions from ${file}`);
  return checks;
}

/**
 * Keep only the named checks, preserving definition order.
 * An empty or missing selection keeps everything.
 */
export function selectChecks(
  checks: CheckDefinition[],
  names?: string[],
): CheckDefinition[] {
  if (!names || names.length === 0) return checks;

  const known = new Set(checks.map((c) => c.name));
  const unknown = names.filter((n) => !known.has(n));
  if (unknown.length > 0) {
    throw new Error(`Unknown check(s): ${unknown.join(", ")}`);
  }

  const wanted = new Set(names);
  return checks.filter((c) => wanted.has(c.name));
}
