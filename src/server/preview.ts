/**
 * preview.ts — Local static server over the generated site.
 *
 * Serves the artifact tree exactly as a static host would, so pages,
 * listings and the sitemap can be checked before publishing.
 */

import type { IncomingMessage } from "node:http";
import express, { type Express } from "express";
import { pinoHttp } from "pino-http";
import { log } from "../logger.js";

export interface PreviewOptions {
  /** Artifact tree root */
  outputDir: string;
}

export function createPreviewApp(options: PreviewOptions): Express {
  const app = express();
  app.disable("x-powered-by");

  // Structured HTTP request logging
  app.use(
    pinoHttp({
      logger: log.http,
      autoLogging: {
        ignore: (req: IncomingMessage) => (req.url || "").startsWith("/favicon"),
      },
    }),
  );

  app.use(express.static(options.outputDir, {
    extensions: ["html"],
    dotfiles: "ignore",
    etag: true,
  }));

  app.use((req, res) => {
    res.status(404).type("text/plain").send(`Not found: ${req.path}\n`);
  });

  return app;
}
