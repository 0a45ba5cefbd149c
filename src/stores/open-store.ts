/**
 * open-store.ts — Pick the canonical store backend from configuration.
 */

import type { AppConfig } from "../config.js";
import { createPool } from "../db.js";
import { JsonFlightStore, type FlightStore } from "./flight-store.js";
import { PostgresFlightStore } from "./postgres-flight-store.js";

export interface OpenedStore {
  store: FlightStore;
  close(): Promise<void>;
}

export async function openFlightStore(config: Pick<AppConfig, "storePath" | "databaseUrl">): Promise<OpenedStore> {
  if (!config.databaseUrl) {
    return { store: new JsonFlightStore(config.storePath), close: async () => {} };
  }
  const pool = createPool(config.databaseUrl);
  const store = new PostgresFlightStore(pool);
  try {
    await store.initSchema();
  } catch (err) {
    await pool.end();
    throw err;
  }
  return { store, close: () => pool.end() };
}
