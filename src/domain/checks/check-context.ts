import type {
  CheckPayload,
  CheckStatus,
  ToolInvoker,
  ToolOutcome,
  Unit,
} from "./types.js";

/** Everything a check executor may touch for one (check, unit) pair. */
export interface CheckContext {
  /** Undefined for global checks. */
  unit?: Unit;
  /** Working directory of global checks. */
  workspaceRoot: string;
  /** Directory this pair may write artifacts to; owned by a single worker. */
  artifactDir: string;
  invoke: ToolInvoker;
  signal?: AbortSignal;
  /** Applied when the definition sets no timeout of its own. */
  defaultTimeoutMs?: number;
}

/** What an executor reports; the runner adds check name, unit and timing. */
export interface CheckOutcome {
  status: CheckStatus;
  output: string;
  reason?: string;
  payload?: CheckPayload;
}

export const CANCELLED_REASON = "cancelled";

export function combineOutput(outcome: ToolOutcome): string {
  return [outcome.stdout.trimEnd(), outcome.stderr.trimEnd()]
    .filter((part) => part.length > 0)
    .join("\n");
}

/**
 * Expand `{unit}`, `{unit_snake}` and `{unit_path}` in a check argument.
 * Global checks have no unit and keep the text as written.
 */
export function expandPlaceholders(value: string, unit?: Unit): string {
  if (!unit) return value;
  return value
    .replaceAll("{unit_snake}", unit.name.replace(/-/g, "_"))
    .replaceAll("{unit_path}", unit.path)
    .replaceAll("{unit}", unit.name);
}
