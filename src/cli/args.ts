import path from "path";
import { parseReportFormats, validateAnalysisConfig, type AnalysisConfig } from "../core/config.js";

export interface CliOptions {
  root?: string;
  output?: string;
  checks?: string[];
  formats?: string[];
  timeoutMs?: number;
  failOnSkipped: boolean;
  publish: boolean;
  planPatches: boolean;
  applyPatches: boolean;
  help: boolean;
}

export const USAGE = `Usage: contract-analysis [options]

  --root DIR          directory holding one unit per subdirectory
  --output DIR        report and artifact directory
  --checks a,b        run only these checks
  --format f,g        report formats (html, markdown, junit, json)
  --timeout MS        cancel the run after MS milliseconds
  --fail-on-skipped   exit with 2 when any check was skipped
  --publish           post the summary as a pull request comment
  --plan-patches      print the lint-suppression diff and exit
  --apply-patches     apply the lint-suppression patches and exit
  --help              show this message`;

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Parses argv (without node and script). Throws on unknown flags or missing values. */
export function parseCliArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {
    failOnSkipped: false,
    publish: false,
    planPatches: false,
    applyPatches: false,
    help: false,
  };

  const value = (i: number, flag: string): string => {
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new Error(`${flag} needs a value`);
    }
    return next;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--root":
        opts.root = value(i, arg);
        i++;
        break;
      case "--output":
        opts.output = value(i, arg);
        i++;
        break;
      case "--checks":
        opts.checks = splitList(value(i, arg));
        i++;
        break;
      case "--format":
        opts.formats = splitList(value(i, arg));
        i++;
        break;
      case "--timeout": {
        const ms = Number(value(i, arg));
        if (!Number.isInteger(ms) || ms < 0) {
          throw new Error("--timeout must be a non-negative integer (milliseconds)");
        }
        opts.timeoutMs = ms;
        i++;
        break;
      }
      case "--fail-on-skipped":
        opts.failOnSkipped = true;
        break;
      case "--publish":
        opts.publish = true;
        break;
      case "--plan-patches":
        opts.planPatches = true;
        break;
      case "--apply-patches":
        opts.applyPatches = true;
        break;
      case "--help":
      case "-h":
        opts.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return opts;
}

/** Config with command-line overrides applied, validated again. */
export function applyCliOverrides(config: AnalysisConfig, opts: CliOptions): AnalysisConfig {
  const merged: AnalysisConfig = { ...config };
  if (opts.root) merged.unitRoot = path.resolve(opts.root);
  if (opts.output) merged.outputDir = path.resolve(opts.output);
  if (opts.formats) {
    const { formats, unknown } = parseReportFormats(opts.formats);
    if (unknown.length > 0) {
      throw new Error(`Unknown report format(s): ${unknown.join(", ")}`);
    }
    merged.reportFormats = formats;
  }
  if (opts.timeoutMs !== undefined) merged.runTimeoutMs = opts.timeoutMs;
  if (opts.failOnSkipped) merged.failOnSkipped = true;
  validateAnalysisConfig(merged);
  return merged;
}
