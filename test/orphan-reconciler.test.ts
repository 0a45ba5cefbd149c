/**
 * orphan-reconciler.test.ts — Delete / preserve / archive of pages not regenerated.
 */

import { beforeEach, describe, expect, it } from "vitest";
import { findOrphans, reconcileOrphans } from "../src/services/orphan-reconciler.js";
import { MemoryArtifactTree } from "./helpers/memory-tree.js";

const OLD = "flights/gol-1000-gru-delayed-2025-11-01.html";
const STALE = "flights/gol-2000-gru-cancelled-2025-11-02.html";
const CURRENT = "flights/gol-1234-gru-delayed-2025-12-15.html";

describe("findOrphans", () => {
  it("returns previous paths missing from the success set, deduplicated and sorted", () => {
    expect(findOrphans([STALE, OLD, OLD, CURRENT], new Set([CURRENT]))).toEqual([OLD, STALE]);
  });

  it("returns nothing when every page was regenerated", () => {
    expect(findOrphans([CURRENT], new Set([CURRENT]))).toEqual([]);
  });
});

describe("reconcileOrphans", () => {
  let tree: MemoryArtifactTree;
  const success = new Set([CURRENT]);

  beforeEach(() => {
    tree = new MemoryArtifactTree("2025-11-30");
    tree.files.set(OLD, "<p>old</p>");
    tree.files.set(STALE, "<p>stale</p>");
    tree.files.set(CURRENT, "<p>current</p>");
  });

  it("deletes orphans under the delete policy", async () => {
    const report = await reconcileOrphans(await tree.list("flights"), success, "delete", tree, { indexPreservedOrphans: false });
    expect(report.deleted).toEqual([OLD, STALE]);
    expect([...tree.files.keys()]).toEqual([CURRENT]);
  });

  it("leaves orphans in place under the preserve policy", async () => {
    const report = await reconcileOrphans(await tree.list("flights"), success, "preserve", tree, { indexPreservedOrphans: false });
    expect(report.preserved).toEqual([OLD, STALE]);
    expect(report.indexable).toEqual([]);
    expect(tree.files.size).toBe(3);
  });

  it("keeps preserved orphans indexable when configured", async () => {
    const report = await reconcileOrphans(await tree.list("flights"), success, "preserve", tree, { indexPreservedOrphans: true });
    expect(report.indexable).toEqual([
      { path: OLD, lastmod: "2025-11-30" },
      { path: STALE, lastmod: "2025-11-30" },
    ]);
  });

  it("moves orphans aside under the archive policy", async () => {
    const report = await reconcileOrphans(await tree.list("flights"), success, "archive", tree, { indexPreservedOrphans: false });
    expect(report.archived).toEqual([OLD, STALE]);
    expect([...tree.archived.keys()]).toEqual([OLD, STALE]);
    expect([...tree.files.keys()]).toEqual([CURRENT]);
  });

  it("counts a failing orphan and continues with the rest", async () => {
    tree.failing.add(OLD);
    const report = await reconcileOrphans(await tree.list("flights"), success, "delete", tree, { indexPreservedOrphans: false });
    expect(report.failed).toEqual([{ path: OLD, code: "ORPHAN_IO", reason: `EACCES: permission denied, ${OLD}` }]);
    expect(report.deleted).toEqual([STALE]);
    expect(tree.files.has(OLD)).toBe(true);
  });

  it("never touches pages in the success set", async () => {
    const report = await reconcileOrphans([CURRENT], success, "delete", tree, { indexPreservedOrphans: false });
    expect(report).toEqual({
      policy: "delete",
      orphans: [],
      deleted: [],
      preserved: [],
      archived: [],
      failed: [],
      indexable: [],
    });
    expect(tree.files.get(CURRENT)).toBe("<p>current</p>");
  });
});
