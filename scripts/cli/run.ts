/**
 * cli/run.ts — One full batch run: ingest, merge, regenerate, reconcile.
 *
 * Usage:
 *   npm run delayboard -- run --historical data/siros-2025-12.csv --live data/live.json
 *   npm run delayboard -- run --live data/live.json --policy archive --out docs
 */

import { extname } from "node:path";
import { resolveConfig } from "../../src/config.js";
import { JsonFeedFetcher } from "../../src/fetchers/json-feed-fetcher.js";
import { TabularFileFetcher } from "../../src/fetchers/tabular-fetcher.js";
import type { SourceFetcher } from "../../src/fetchers/types.js";
import { log } from "../../src/logger.js";
import { assertRenderGate } from "../../src/services/batch-renderer.js";
import { loadLookupTables } from "../../src/services/lookup-tables.js";
import { HtmlDocumentRenderer, loadTemplates, validateLinkTemplate } from "../../src/services/page-renderer.js";
import { runPipeline, type SourceInput } from "../../src/services/pipeline.js";
import { FsArtifactTree } from "../../src/stores/artifact-tree.js";
import { openFlightStore } from "../../src/stores/open-store.js";
import type { RecordSource } from "../../src/types/flight-types.js";
import { getFlags, makeResult, overridesFromArgs } from "./runner.js";
import type { CliCommand } from "./types.js";

function fetcherFor(location: string, source: RecordSource): SourceFetcher {
  return extname(location).toLowerCase() === ".json"
    ? new JsonFeedFetcher(source)
    : new TabularFileFetcher(source);
}

const run: CliCommand = {
  name: "run",
  description: "Ingest sources, merge into the store and regenerate the site",
  run: async (args) => {
    const start = Date.now();
    const config = resolveConfig(overridesFromArgs(args));

    const sources: SourceInput[] = [
      ...getFlags(args, "historical").map((location) => ({ fetcher: fetcherFor(location, "HistoricalImport"), location })),
      ...getFlags(args, "live").map((location) => ({ fetcher: fetcherFor(location, "LiveFeed"), location })),
    ];
    log.boot.info({ sources: sources.length, policy: config.orphanPolicy, outputDir: config.outputDir }, "run starting");

    // Refuse before the store backend is opened (Postgres would create its schema)
    assertRenderGate(config.linkTemplate);
    validateLinkTemplate(config.linkTemplate);

    const tables = await loadLookupTables(config.dataDir);
    const opened = await openFlightStore(config);
    try {
      const result = await runPipeline(config, sources, {
        store: opened.store,
        tree: new FsArtifactTree(config.outputDir, config.archiveDir),
        tables,
        createRenderer: async () => new HtmlDocumentRenderer(await loadTemplates(config.templatesDir), {
          baseUrl: config.baseUrl,
          linkTemplate: config.linkTemplate ?? "",
        }),
      });

      const failedOutcomes = result.outcomes.flatMap((o) => (o.kind === "failed" ? [{ key: o.key, code: o.code, reason: o.reason }] : []));
      const hints: string[] = [];
      if (result.stats.normalizationErrors > 0) hints.push("Rerun with DELAYBOARD_LOG_LEVEL=debug to list rejected rows");
      if (sources.length === 0) hints.push("No --historical or --live sources given; the site was rebuilt from the store only");

      return makeResult("run", start, {
        stats: result.stats,
        store: opened.store.describe(),
        outputDir: config.outputDir,
        failed: failedOutcomes.slice(0, 20),
        rejectedRows: result.normalizationFailures.slice(0, 20),
        orphans: {
          policy: result.reconciliation.policy,
          failed: result.reconciliation.failed,
        },
        aggregates: result.aggregatePaths,
        removedCityPages: result.removedCityPages,
      }, { hints });
    } finally {
      await opened.close();
    }
  },
};

export default run;
