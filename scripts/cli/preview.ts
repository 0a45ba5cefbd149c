/**
 * cli/preview.ts — Serve the generated site locally until interrupted.
 */

import { resolveConfig } from "../../src/config.js";
import { log } from "../../src/logger.js";
import { createPreviewApp } from "../../src/server/preview.js";
import { makeResult, overridesFromArgs } from "./runner.js";
import type { CliCommand } from "./types.js";

const preview: CliCommand = {
  name: "preview",
  description: "Serve the artifact tree over HTTP (Ctrl+C to stop)",
  run: async (args) => {
    const start = Date.now();
    const config = resolveConfig(overridesFromArgs(args));
    const app = createPreviewApp({ outputDir: config.outputDir });

    const requestsServed = await new Promise<number>((resolve, reject) => {
      let served = 0;
      const server = app.listen(config.previewPort, () => {
        log.http.info({ port: config.previewPort, url: `http://localhost:${config.previewPort}`, outputDir: config.outputDir }, "preview online");
      });
      server.on("request", () => {
        served += 1;
      });
      server.on("error", reject);
      const stop = () => {
        server.close(() => resolve(served));
      };
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);
    });

    return makeResult("preview", start, {
      outputDir: config.outputDir,
      port: config.previewPort,
      requestsServed,
    });
  },
};

export default preview;
