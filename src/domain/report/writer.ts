import fsp from "fs/promises";
import path from "path";
import { logInfo } from "../../core/logging.js";
import { REPORT_FILE_NAMES, renderReport } from "./renderers/index.js";
import type { Report, ReportFormat } from "./types.js";

export interface WrittenReport {
  format: ReportFormat;
  path: string;
}

/**
 * Render every requested format first, then write them. A RenderError
 * therefore leaves no half-written report set behind.
 */
export async function writeReport(
  report: Report,
  outputRoot: string,
  formats: ReportFormat[],
): Promise<WrittenReport[]> {
  const rendered = formats.map((format) => ({
    format,
    path: path.join(outputRoot, REPORT_FILE_NAMES[format]),
    content: renderReport(report, format),
  }));

  await fsp.mkdir(outputRoot, { recursive: true });
  for (const file of rendered) {
    await fsp.writeFile(file.path, file.content, "utf-8");
    logInfo(`Wrote ${file.format} report to ${file.path}`);
  }
  return rendered.map(({ format, path: filePath }) => ({ format, path: filePath }));
}
