// ============================================================================
// Units
// ============================================================================

/** One discovered analysis target (a contract directory). */
export interface Unit {
  readonly name: string;
  readonly path: string;
}

// ============================================================================
// Check definitions
// ============================================================================

export type CheckScope = "global" | "per-unit";

export type CheckCategory =
  | "formatting"
  | "lint"
  | "security"
  | "contract-analysis"
  | "build";

export const CHECK_CATEGORIES: readonly CheckCategory[] = [
  "formatting",
  "lint",
  "security",
  "contract-analysis",
  "build",
];

interface CheckDefinitionBase {
  name: string;
  category: CheckCategory;
  scope: CheckScope;
  /** Required checks fail the run; advisory ones are recorded only. */
  required: boolean;
  description?: string;
}

export interface CommandCheckDefinition extends CheckDefinitionBase {
  kind: "command";
  command: string;
  args: string[];
  /** Output regexes that mark Failure even when the tool exits 0. */
  failurePatterns?: string[];
  /** Files (relative to the working directory) copied into the unit's artifact dir. */
  collect?: string[];
  timeoutMs?: number;
}

export interface SchemaCheckDefinition extends CheckDefinitionBase {
  kind: "schema";
  command: string;
  args: string[];
  timeoutMs?: number;
}

export interface PatternScanCheckDefinition extends CheckDefinitionBase {
  kind: "pattern-scan";
}

export interface CodeStatsCheckDefinition extends CheckDefinitionBase {
  kind: "code-stats";
  /** Workspace-relative directories totalled by a global code-stats check. */
  roots?: string[];
}

export type CheckDefinition =
  | CommandCheckDefinition
  | SchemaCheckDefinition
  | PatternScanCheckDefinition
  | CodeStatsCheckDefinition;

export type CheckKind = CheckDefinition["kind"];

/** Kinds that inspect a unit's directory and cannot run globally. */
export const UNIT_ONLY_KINDS: readonly CheckKind[] = [
  "schema",
  "pattern-scan",
];

// ============================================================================
// Results
// ============================================================================

export type CheckStatus = "success" | "failure" | "skipped";

export interface PatternMatch {
  pattern: string;
  file: string;
  line: number;
  text: string;
}

export interface CodeStats {
  files: number;
  lines: number;
  sizeClass: "reasonable" | "medium" | "large";
}

/** Structured extras attached to a result. Artifacts are referenced by path. */
export interface DirectoryTotals {
  /** As configured, workspace-relative. */
  root: string;
  files: number;
  lines: number;
}

export type CheckPayload =
  | { type: "artifacts"; paths: string[] }
  | { type: "matches"; matches: PatternMatch[] }
  | { type: "code-stats"; stats: CodeStats }
  | { type: "code-stats-totals"; totals: DirectoryTotals[] }
  | { type: "schema"; paths: string[]; placeholder: boolean };

export interface CheckResult {
  readonly check: string;
  /** Unit name; undefined for global checks. */
  readonly unit?: string;
  readonly status: CheckStatus;
  readonly output: string;
  /** Why a check was skipped ("tool unavailable: cargo", "cancelled", ...). */
  readonly reason?: string;
  readonly payload?: CheckPayload;
  readonly durationMs: number;
}

/** A (check, unit) pair the runner committed to producing a result for. */
export interface ScheduledCheck {
  check: string;
  unit?: string;
}

// ============================================================================
// Tool invocation boundary
// ============================================================================

export interface ToolInvocation {
  command: string;
  args: string[];
  cwd: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ToolOutcome {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  cancelled: boolean;
}

export type ToolInvoker = (invocation: ToolInvocation) => Promise<ToolOutcome>;
