/**
 * Error taxonomy for an analysis run.
 *
 * ToolUnavailableError is caught per check and becomes a Skipped result; a
 * tool that runs and fails is a Failure result, not an exception.
 * DiscoveryError aborts the whole run, RenderError only the rendering step.
 */

export class ToolUnavailableError extends Error {
  readonly command: string;

  constructor(command: string, cause?: unknown) {
    super(`Tool unavailable: ${command}`, { cause });
    this.name = "ToolUnavailableError";
    this.command = command;
  }
}

export class DiscoveryError extends Error {
  readonly root: string;

  constructor(root: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Cannot read unit root ${root}${detail}`, { cause });
    this.name = "DiscoveryError";
    this.root = root;
  }
}

export class RenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RenderError";
  }
}
