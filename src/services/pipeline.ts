/**
 * pipeline.ts — One batch run, leaf to root.
 *
 *   fetch → normalize → merge → render (in memory) → commit
 *
 * Everything before the commit phase is free of persisted side effects, so
 * any fatal error (gate, corrupt store, missing template) aborts with the
 * previous site and store untouched. The commit phase writes record pages
 * and aggregate pages through a tree transaction and saves the store last;
 * if any of that throws, every page written is restored and the error
 * propagates. Orphans and stale destination pages are removed only after
 * the commit has succeeded.
 */

import { ErrorCode, describeError } from "../errors.js";
import { log } from "../logger.js";
import type { SourceFetcher } from "../fetchers/types.js";
import { withTreeTransaction, type ArtifactTree } from "../stores/artifact-tree.js";
import type { FlightStore } from "../stores/flight-store.js";
import type { GenerationOutcome, OrphanPolicy, RawRow } from "../types/flight-types.js";
import { assertRenderGate, renderBatch } from "./batch-renderer.js";
import { normalizeRows, type NormalizationFailure } from "./field-normalizer.js";
import {
  CITY_DIR,
  NOT_FOUND_PATH,
  buildIndexes,
  renderRobots,
  renderSitemapXml,
  type AggregateIndexes,
} from "./index-builder.js";
import type { LookupTables } from "./lookup-tables.js";
import { applyReconciliation, planReconciliation, type ReconciliationReport } from "./orphan-reconciler.js";
import { validateLinkTemplate, type DocumentRenderer } from "./page-renderer.js";
import { mergeRecords } from "./record-merger.js";
import { RECORD_DIR } from "./slug.js";

// ─── Types ──────────────────────────────────────────────────────

export interface PipelineSettings {
  linkTemplate: string | undefined;
  baseUrl: string;
  siteDomain: string;
  minDelayMinutes: number;
  orphanPolicy: OrphanPolicy;
  indexPreservedOrphans: boolean;
  homepageSize: number;
  renderConcurrency: number;
  defaultOrigin: string;
}

export interface SourceInput {
  fetcher: SourceFetcher;
  location: string;
}

export interface PipelineDeps {
  store: FlightStore;
  tree: ArtifactTree;
  tables: LookupTables;
  /** Built by the caller once the gate has passed (see `runPipeline`). */
  createRenderer: () => Promise<DocumentRenderer>;
  now?: () => Date;
}

export interface RunStats {
  totalInputRows: number;
  imported: number;
  upgraded: number;
  duplicates: number;
  mergeErrors: number;
  normalizationErrors: number;
  rendered: number;
  skipped: number;
  failed: number;
  orphansByPolicy: { deleted: number; preserved: number; archived: number };
  orphanFailures: number;
  /** Sources that could not be read at all; their rows never entered the run. */
  sourceFailures: number;
}

export interface RunResult {
  stats: RunStats;
  outcomes: GenerationOutcome[];
  normalizationFailures: NormalizationFailure[];
  reconciliation: ReconciliationReport;
  /** Aggregate files written this run, in write order. */
  aggregatePaths: string[];
  /** Destination pages from earlier runs that no longer have any flights. */
  removedCityPages: string[];
}

// ─── Fetch ──────────────────────────────────────────────────────

async function collectRows(sources: readonly SourceInput[]): Promise<{ rows: RawRow[]; sourceFailures: number }> {
  const rows: RawRow[] = [];
  let sourceFailures = 0;
  for (const { fetcher, location } of sources) {
    const before = rows.length;
    try {
      for await (const row of fetcher.fetchRaw(location)) rows.push(row);
    } catch (err) {
      // A half-read source contributes nothing rather than a partial batch
      rows.length = before;
      sourceFailures += 1;
      log.ingest.warn({ location, source: fetcher.source, reason: describeError(err) }, "source unreadable, skipped");
    }
  }
  return { rows, sourceFailures };
}

// ─── Run ────────────────────────────────────────────────────────

export async function runPipeline(
  settings: PipelineSettings,
  sources: readonly SourceInput[],
  deps: PipelineDeps,
): Promise<RunResult> {
  const now = deps.now ?? (() => new Date());

  // Gate first: nothing is read or written without a link template
  assertRenderGate(settings.linkTemplate);
  validateLinkTemplate(settings.linkTemplate);
  const renderer = await deps.createRenderer();

  const previous = await deps.store.load();

  // ── Ingest ──
  const { rows, sourceFailures } = await collectRows(sources);
  const normalized = normalizeRows(rows, deps.tables, { defaultOrigin: settings.defaultOrigin });
  for (const failure of normalized.failures) {
    log.ingest.debug({ position: failure.position, code: failure.code, reason: failure.reason }, "row rejected");
  }
  log.ingest.info({ rows: rows.length, records: normalized.records.length, rejected: normalized.failures.length }, "rows normalized");

  // ── Merge ──
  const merged = mergeRecords(previous, normalized.records, { mergedAt: now().toISOString() });
  for (const failure of merged.keyFailures) {
    log.merge.warn({ airline: failure.record.airlineName, flight: failure.record.flightNumber, reason: failure.reason }, "no canonical key");
  }
  log.merge.info({ ...merged.stats, total: merged.store.flights.length }, "merge complete");

  // ── Render (in memory) ──
  const previousPaths = await deps.tree.list(RECORD_DIR);
  const previousCityPages = await deps.tree.list(CITY_DIR);
  const batch = await renderBatch(merged.store.flights, renderer, {
    linkTemplate: settings.linkTemplate,
    minDelayMinutes: settings.minDelayMinutes,
    renderConcurrency: settings.renderConcurrency,
  });

  const live = batch.documents.map(({ record, artifact }) => ({ record, artifact }));
  // Aggregate templates failing here is fatal and still precedes the commit
  const renderAggregates = (indexes: AggregateIndexes) => [
    ...[indexes.homepage, indexes.categories.cancelled, indexes.categories.delayed, ...indexes.cities]
      .map((page) => ({ path: page.path, body: renderer.renderListing(page) })),
    { path: indexes.cityIndex.path, body: renderer.renderCityIndex(indexes.cityIndex) },
    { path: NOT_FOUND_PATH, body: renderer.renderNotFound() },
  ];
  const listingPages = renderAggregates(buildIndexes(live, [], { homepageSize: settings.homepageSize }));

  // ── Commit ──
  const outcomes = [...batch.outcomes];
  const successSet = new Set(batch.successSet);
  let { rendered, failed } = batch.counts;

  const committed = await withTreeTransaction(deps.tree, async (txn) => {
    for (const doc of batch.documents) {
      try {
        await txn.write(doc.artifact.path, doc.body);
      } catch (err) {
        const reason = `write failed: ${describeError(err)}`;
        log.render.warn({ key: doc.artifact.key, path: doc.artifact.path, reason }, "artifact not written");
        successSet.delete(doc.artifact.path);
        const at = outcomes.findIndex((o) => o.kind === "rendered" && o.artifact.path === doc.artifact.path);
        if (at >= 0) outcomes[at] = { kind: "failed", key: doc.artifact.key, code: ErrorCode.RENDER_FAILED, reason };
        rendered -= 1;
        failed += 1;
      }
    }

    const plan = await planReconciliation(previousPaths, successSet, settings.orphanPolicy, deps.tree, {
      indexPreservedOrphans: settings.indexPreservedOrphans,
    });

    const written = live.filter((entry) => successSet.has(entry.artifact.path));
    const indexes = buildIndexes(written, plan.indexable, { homepageSize: settings.homepageSize });
    // Listings must not link to pages whose write failed
    const pages = written.length === live.length ? listingPages : renderAggregates(indexes);

    const aggregates: Array<{ path: string; body: string }> = [
      ...pages,
      { path: "sitemap.xml", body: renderSitemapXml(indexes.sitemap, settings.baseUrl) },
      { path: "robots.txt", body: renderRobots(settings.baseUrl) },
      { path: ".nojekyll", body: "" },
    ];
    if (settings.siteDomain.trim()) {
      aggregates.push({ path: "CNAME", body: `${settings.siteDomain.trim()}\n` });
    }
    for (const file of aggregates) {
      await txn.write(file.path, file.body);
    }
    log.index.info({ sitemap: indexes.sitemap.length, homepage: indexes.homepage.entries.length, cities: indexes.cities.length }, "indexes written");

    await deps.store.save(merged.store);
    return { plan, indexes, aggregatePaths: aggregates.map((file) => file.path) };
  });

  // ── Cleanup (committed) ──
  const reconciliation = await applyReconciliation(committed.plan, deps.tree);

  const currentCityPages = new Set(committed.indexes.cities.map((page) => page.path));
  const removedCityPages: string[] = [];
  for (const path of previousCityPages) {
    if (currentCityPages.has(path)) continue;
    try {
      await deps.tree.remove(path);
      removedCityPages.push(path);
    } catch (err) {
      log.index.warn({ path, reason: describeError(err) }, "stale destination page not removed");
    }
  }

  const stats: RunStats = {
    totalInputRows: rows.length,
    imported: merged.stats.imported,
    upgraded: merged.stats.upgraded,
    duplicates: merged.stats.duplicates,
    mergeErrors: merged.stats.errors,
    normalizationErrors: normalized.failures.length,
    rendered,
    skipped: batch.counts.skipped,
    failed,
    orphansByPolicy: {
      deleted: reconciliation.deleted.length,
      preserved: reconciliation.preserved.length,
      archived: reconciliation.archived.length,
    },
    orphanFailures: reconciliation.failed.length,
    sourceFailures,
  };
  log.root.info(stats, "run complete");

  return {
    stats,
    outcomes,
    normalizationFailures: normalized.failures,
    reconciliation,
    aggregatePaths: committed.aggregatePaths,
    removedCityPages,
  };
}
