import { XMLBuilder } from "fast-xml-parser";
import type { CheckResult } from "../../checks/types.js";
import type { Report } from "../types.js";
import {
  assertRenderable,
  categorySections,
  isRequired,
  statusCounts,
  xmlSafeText,
} from "./shared.js";

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  format: true,
  indentBy: "  ",
  suppressEmptyNode: true,
});

function testcase(report: Report, result: CheckResult): Record<string, unknown> {
  const node: Record<string, unknown> = {
    "@_name": result.check,
    "@_classname": result.unit ?? "global",
    "@_time": (result.durationMs / 1000).toFixed(3),
  };
  if (result.status === "failure") {
    node.failure = {
      "@_message": xmlSafeText(result.reason ?? "failed"),
      "@_type": isRequired(report, result.check) ? "required" : "advisory",
      "#text": xmlSafeText(result.output),
    };
  } else if (result.status === "skipped") {
    node.skipped = { "@_message": xmlSafeText(result.reason ?? "skipped") };
  } else if (result.output.length > 0) {
    node["system-out"] = xmlSafeText(result.output);
  }
  return node;
}

/** JUnit XML for CI test-report viewers; one testsuite per check category. */
export function renderJunit(report: Report): string {
  assertRenderable(report);
  const totals = statusCounts(report.results);

  const suites = categorySections(report).map((section) => {
    const counts = statusCounts(section.results);
    return {
      "@_name": section.category,
      "@_tests": section.results.length,
      "@_failures": counts.failure,
      "@_skipped": counts.skipped,
      testcase: section.results.map((r) => testcase(report, r)),
    };
  });

  const xml = builder.build({
    testsuites: {
      "@_name": report.title,
      "@_tests": report.results.length,
      "@_failures": totals.failure,
      "@_skipped": totals.skipped,
      "@_timestamp": report.generatedAt,
      testsuite: suites,
    },
  });
  return `<?xml version="1.0" encoding="UTF-8"?>\n${xml}`;
}
