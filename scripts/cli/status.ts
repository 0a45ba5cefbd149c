/**
 * cli/status.ts — Store and site summary without changing anything.
 */

import { resolveConfig } from "../../src/config.js";
import { RECORD_DIR } from "../../src/services/slug.js";
import { FsArtifactTree } from "../../src/stores/artifact-tree.js";
import { openFlightStore } from "../../src/stores/open-store.js";
import { makeResult, overridesFromArgs } from "./runner.js";
import type { CliCommand } from "./types.js";

const status: CliCommand = {
  name: "status",
  description: "Canonical store and artifact tree summary",
  run: async (args) => {
    const start = Date.now();
    const config = resolveConfig(overridesFromArgs(args));
    const opened = await openFlightStore(config);
    try {
      const snapshot = await opened.store.load();
      const pages = await new FsArtifactTree(config.outputDir, config.archiveDir).list(RECORD_DIR);
      const byStatus = { Scheduled: 0, Delayed: 0, Cancelled: 0 };
      for (const flight of snapshot.flights) byStatus[flight.status] += 1;

      const hints: string[] = [];
      if (!config.linkTemplate) hints.push("DELAYBOARD_LINK_TEMPLATE is not set; `run` will refuse to generate pages");

      return makeResult("status", start, {
        store: opened.store.describe(),
        flights: snapshot.metadata.totalFlights,
        sourceCounts: snapshot.metadata.sourceCounts,
        byStatus,
        lastMergeAt: snapshot.metadata.lastMergeAt,
        outputDir: config.outputDir,
        recordPages: pages.length,
        orphanPolicy: config.orphanPolicy,
      }, { hints });
    } finally {
      await opened.close();
    }
  },
};

export default status;
