import type { Report, ReportFormat } from "../types.js";
import { renderHtml } from "./html.js";
import { renderJunit } from "./junit.js";
import { renderMarkdown } from "./markdown.js";
import { renderJsonSummary } from "./summary.js";

export type ReportRenderer = (report: Report) => string;

export const RENDERERS: Record<ReportFormat, ReportRenderer> = {
  html: renderHtml,
  markdown: renderMarkdown,
  junit: renderJunit,
  json: renderJsonSummary,
};

export const REPORT_FILE_NAMES: Record<ReportFormat, string> = {
  html: "index.html",
  markdown: "report.md",
  junit: "junit.xml",
  json: "summary.json",
};

export function renderReport(report: Report, format: ReportFormat): string {
  return RENDERERS[format](report);
}

export { renderHtml, renderJunit, renderMarkdown, renderJsonSummary };
export { renderPrComment } from "./pr-comment.js";
