/**
 * Demo: Run the analysis pipeline over a throwaway three-unit workspace and print the Markdown report.
 * No cargo needed: tools are answered by a scripted invoker.
 * Usage: npx tsx scripts/demo.ts
 */
import fsp from 'fs/promises';
import os from 'os';
import path from 'path';
import { ToolUnavailableError } from '../src/core/errors.js';
import { AnalysisPipeline } from '../src/domain/analysis/pipeline.js';
import { REPORT_FORMATS } from '../src/domain/report/types.js';
import type { ToolInvocation, ToolOutcome } from '../src/domain/checks/types.js';
import { renderMarkdown } from '../src/domain/report/renderers/index.js';

// ── Scripted tools ──────────────────────────────────────────────────
const ok = (stdout = ''): ToolOutcome => ({
  exitCode: 0, stdout, stderr: '', timedOut: false, cancelled: false,
});
const failed = (stderr: string): ToolOutcome => ({
  exitCode: 101, stdout: '', stderr, timedOut: false, cancelled: false,
});

async function scriptedInvoker(inv: ToolInvocation): Promise<ToolOutcome> {
  const unit = path.basename(inv.cwd);
  const line = [inv.command, ...inv.args].join(' ');

  if (line.startsWith('cargo audit')) {
    // Pretend cargo-audit is not installed
    throw new ToolUnavailableError('cargo');
  }
  if (line.startsWith('cargo check') && unit === 'beta') {
    return failed('error[E0425]: cannot find value `amount` in this scope');
  }
  if (line.startsWith('cargo run --example schema')) {
    return failed('error: no example target named `schema`');
  }
  return ok();
}

// ── Workspace ───────────────────────────────────────────────────────
const LIB_RS: Record<string, string> = {
  alpha: 'pub fn pages(total: u64, size: u64) -> u64 {\n    (total + size - 1) / size\n}\n',
  beta: 'pub fn first(v: &[u8]) -> u8 {\n    *v.first().unwrap()\n}\n',
  gamma: 'pub fn id(x: u32) -> u32 {\n    x\n}\n',
};

async function createWorkspace(): Promise<string> {
  const root = await fsp.mkdtemp(path.join(os.tmpdir(), 'analysis-demo-'));
  for (const [name, source] of Object.entries(LIB_RS)) {
    const unit = path.join(root, 'contracts', name);
    await fsp.mkdir(path.join(unit, 'src'), { recursive: true });
    await fsp.writeFile(path.join(unit, 'Cargo.toml'), `[package]\nname = "${name}"\n`);
    await fsp.writeFile(path.join(unit, 'src', 'lib.rs'), source);
  }
  return root;
}

async function main(): Promise<void> {
  const workspace = await createWorkspace();
  const pipeline = new AnalysisPipeline({
    analysis: {
      unitRoot: path.join(workspace, 'contracts'),
      manifestName: 'Cargo.toml',
      workspaceRoot: workspace,
      outputDir: path.join(workspace, 'analysis-output'),
      reportFormats: [...REPORT_FORMATS],
      reportTitle: 'Demo Analysis Report',
      maxParallel: 2,
      runTimeoutMs: 0,
      checkTimeoutMs: 60_000,
      failOnSkipped: false,
      patchRoots: ['contracts'],
    },
    invoke: scriptedInvoker,
  });

  const result = await pipeline.run();
  console.log(renderMarkdown(result.report));
  console.log(`Exit code: ${result.exitCode}`);
  for (const file of result.written) console.log(`  ${file.format}: ${file.path}`);

  const plan = await pipeline.planPatches();
  console.log(`\nPlanned ${plan.patches.length} lint patch(es):\n`);
  console.log(plan.diff);

  await fsp.rm(workspace, { recursive: true, force: true });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
