import fs from "fs";
import path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  applyPatchPlan,
  insertionIndex,
  planAllowAttributePatches,
  planFilePatch,
} from "../src/domain/patches/allow-attribute.js";
import { makeTmpDir } from "./fixtures.js";

vi.mock("../src/core/logging.js", () => ({
  logDebug: vi.fn(),
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logError: vi.fn(),
}));

const DIV_CEIL = [
  "//! Fee helpers",
  "#![no_std]",
  "",
  "pub fn pages(total: u64, size: u64) -> u64 {",
  "    (total + size - 1) / size",
  "}",
  "",
].join("\n");

describe("insertionIndex", () => {
  it("goes after leading inner attributes and module docs", () => {
    expect(insertionIndex(["//! docs", "#![no_std]", "use core::fmt;"])).toBe(2);
    expect(insertionIndex(["use core::fmt;"])).toBe(0);
  });
});

describe("planFilePatch", () => {
  it("plans the attribute with a reviewable diff", () => {
    const planned = planFilePatch("contracts/fees/src/lib.rs", DIV_CEIL);

    expect(planned?.patch).toEqual({
      file: "contracts/fees/src/lib.rs",
      line: 3,
      insert: "#![allow(clippy::manual_div_ceil)]",
      reason: "manual ceiling division at line 5",
    });
    expect(planned?.diff).toBe(
      [
        "--- a/contracts/fees/src/lib.rs",
        "+++ b/contracts/fees/src/lib.rs",
        "@@ -1,5 +1,6 @@",
        " //! Fee helpers",
        " #![no_std]",
        "+#![allow(clippy::manual_div_ceil)]",
        " ",
        " pub fn pages(total: u64, size: u64) -> u64 {",
        "     (total + size - 1) / size",
      ].join("\n"),
    );
  });

  it("skips files that already allow the lint", () => {
    expect(planFilePatch("a.rs", `#![allow(clippy::manual_div_ceil)]\n${DIV_CEIL}`)).toBeNull();
  });

  it("skips files without the idiom or with it only in comments", () => {
    expect(planFilePatch("a.rs", "pub fn f(a: u64) -> u64 { a.div_ceil(2) }\n")).toBeNull();
    expect(planFilePatch("a.rs", "// (a + b - 1) / b\nfn f() {}\n")).toBeNull();
  });
});

describe("planAllowAttributePatches / applyPatchPlan", () => {
  let root: string;

  beforeEach(() => {
    root = makeTmpDir("patches");
    const write = (rel: string, content: string) => {
      const file = path.join(root, rel);
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, content);
    };
    write("contracts/fees/src/lib.rs", DIV_CEIL);
    write("contracts/vault/src/lib.rs", "pub fn id(x: u64) -> u64 { x }\n");
    write("packages/math/src/lib.rs", "pub fn half(a: u64) -> u64 {\n    (a + 2 - 1) / 2\n}\n");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("plans without touching files", async () => {
    const plan = await planAllowAttributePatches(["contracts", "packages"], root);

    expect(plan.patches.map((p) => p.file)).toEqual([
      "contracts/fees/src/lib.rs",
      "packages/math/src/lib.rs",
    ]);
    expect(plan.diff.endsWith("\n")).toBe(true);
    expect(fs.readFileSync(path.join(root, "contracts/fees/src/lib.rs"), "utf-8")).toBe(DIV_CEIL);
  });

  it("applies a plan once", async () => {
    const plan = await planAllowAttributePatches(["packages"], root);
    expect(await applyPatchPlan(plan)).toEqual(["packages/math/src/lib.rs"]);
    expect(fs.readFileSync(path.join(root, "packages/math/src/lib.rs"), "utf-8")).toBe(
      "#![allow(clippy::manual_div_ceil)]\npub fn half(a: u64) -> u64 {\n    (a + 2 - 1) / 2\n}\n",
    );

    expect(await applyPatchPlan(plan)).toEqual([]);
  });

  it("returns an empty plan when nothing matches", async () => {
    const plan = await planAllowAttributePatches(["contracts/vault"], root);
    expect(plan).toEqual({
      lint: "clippy::manual_div_ceil",
      baseDir: root,
      patches: [],
      diff: "",
    });
  });
});
