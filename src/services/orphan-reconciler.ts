/**
 * orphan-reconciler.ts — Retention policy for artifacts not regenerated this run.
 *
 * An orphan is a record page that existed before the run and is not in the
 * run's success set. What happens to it is configuration, never a side
 * effect of rendering.
 */

import { ErrorCode, describeError } from "../errors.js";
import { log } from "../logger.js";
import type { ArtifactTree } from "../stores/artifact-tree.js";
import type { OrphanPolicy } from "../types/flight-types.js";

export interface RetainedArtifact {
  path: string;
  /** `YYYY-MM-DD`, from the file's modification date. */
  lastmod: string;
}

export interface OrphanFailure {
  path: string;
  code: typeof ErrorCode.ORPHAN_IO;
  reason: string;
}

export interface ReconciliationReport {
  policy: OrphanPolicy;
  orphans: string[];
  deleted: string[];
  preserved: string[];
  archived: string[];
  failed: OrphanFailure[];
  /** Preserved orphans that stay in the sitemap (only with `indexPreservedOrphans`). */
  indexable: RetainedArtifact[];
}

export interface ReconcileOptions {
  indexPreservedOrphans: boolean;
}

export function findOrphans(previousPaths: Iterable<string>, successSet: ReadonlySet<string>): string[] {
  return [...new Set(previousPaths)].filter((path) => !successSet.has(path)).sort();
}

/**
 * Decide what happens to each orphan without touching the tree. Preserved
 * orphans are settled here (reading their dates when they stay indexed);
 * deletions and archives are left for `applyReconciliation`.
 */
export async function planReconciliation(
  previousPaths: Iterable<string>,
  successSet: ReadonlySet<string>,
  policy: OrphanPolicy,
  tree: ArtifactTree,
  options: ReconcileOptions,
): Promise<ReconciliationReport> {
  const report: ReconciliationReport = {
    policy,
    orphans: findOrphans(previousPaths, successSet),
    deleted: [],
    preserved: [],
    archived: [],
    failed: [],
    indexable: [],
  };
  if (policy !== "preserve") return report;

  for (const path of report.orphans) {
    try {
      if (options.indexPreservedOrphans) {
        report.indexable.push({ path, lastmod: await tree.modifiedDate(path) });
      }
      report.preserved.push(path);
    } catch (err) {
      const reason = describeError(err);
      log.reconcile.warn({ path, policy, reason }, "orphan not reconciled");
      report.failed.push({ path, code: ErrorCode.ORPHAN_IO, reason });
    }
  }
  return report;
}

/** Carry out the deletions or archives a plan calls for. Failures are counted per path. */
export async function applyReconciliation(plan: ReconciliationReport, tree: ArtifactTree): Promise<ReconciliationReport> {
  const report: ReconciliationReport = {
    ...plan,
    deleted: [...plan.deleted],
    archived: [...plan.archived],
    failed: [...plan.failed],
  };

  if (plan.policy !== "preserve") {
    for (const path of plan.orphans) {
      try {
        if (plan.policy === "delete") {
          await tree.remove(path);
          report.deleted.push(path);
        } else {
          await tree.archive(path);
          report.archived.push(path);
        }
      } catch (err) {
        const reason = describeError(err);
        log.reconcile.warn({ path, policy: plan.policy, reason }, "orphan not reconciled");
        report.failed.push({ path, code: ErrorCode.ORPHAN_IO, reason });
      }
    }
  }

  log.reconcile.info({
    policy: report.policy,
    orphans: report.orphans.length,
    deleted: report.deleted.length,
    preserved: report.preserved.length,
    archived: report.archived.length,
    failed: report.failed.length,
  }, "orphans reconciled");

  return report;
}

export async function reconcileOrphans(
  previousPaths: Iterable<string>,
  successSet: ReadonlySet<string>,
  policy: OrphanPolicy,
  tree: ArtifactTree,
  options: ReconcileOptions,
): Promise<ReconciliationReport> {
  return applyReconciliation(await planReconciliation(previousPaths, successSet, policy, tree, options), tree);
}
