/**
 * batch-renderer.ts — One document per eligible record, failures isolated.
 *
 * Each record moves pending → rendering → rendered | skipped | failed.
 * Records are dealt round-robin to async lanes; every lane returns its own
 * outcome list and the coordinator reassembles them in input order, so the
 * result never depends on lane scheduling.
 */

import { ErrorCode, PipelineError, describeError } from "../errors.js";
import { log } from "../logger.js";
import type {
  ArtifactRef,
  CanonicalKeyString,
  FlightRecord,
  GenerationOutcome,
  RenderState,
} from "../types/flight-types.js";
import { deriveKey, keyToString } from "./canonical-key.js";
import type { DocumentRenderer } from "./page-renderer.js";
import { artifactFor } from "./slug.js";

export interface BatchRenderOptions {
  /** Monetization link template; blank aborts the run. */
  linkTemplate: string | undefined;
  minDelayMinutes: number;
  renderConcurrency: number;
}

export interface RenderedDocument {
  readonly record: FlightRecord;
  readonly artifact: ArtifactRef;
  readonly body: string;
}

export interface BatchRenderResult {
  /** One per input record, in input order. */
  outcomes: GenerationOutcome[];
  documents: RenderedDocument[];
  /** Paths of every artifact rendered this run. */
  successSet: Set<string>;
  counts: Record<Exclude<RenderState, "pending" | "rendering">, number>;
}

/** Abort before any output is touched when there is no link template. */
export function assertRenderGate(linkTemplate: string | undefined): asserts linkTemplate is string {
  if (linkTemplate === undefined || linkTemplate.trim() === "") {
    throw new PipelineError(ErrorCode.CONFIG_MISSING, "monetization link template is not configured (DELAYBOARD_LINK_TEMPLATE)");
  }
}

export function isEligible(record: FlightRecord, minDelayMinutes: number): boolean {
  return record.status === "Cancelled" || record.delayMinutes >= minDelayMinutes;
}

export function isComplete(record: FlightRecord): boolean {
  return record.status.trim() !== "" && record.airlineName.trim() !== "" && record.flightNumber.trim() !== "";
}

function recordKey(record: FlightRecord): CanonicalKeyString | null {
  const derived = deriveKey(record);
  return derived.ok ? keyToString(derived.key) : null;
}

interface Job {
  index: number;
  record: FlightRecord;
  artifact: ArtifactRef;
}

interface LaneResult {
  index: number;
  outcome: GenerationOutcome;
  document?: RenderedDocument;
}

function renderOne(job: Job, renderer: DocumentRenderer): LaneResult {
  const { index, record, artifact } = job;
  try {
    const body = renderer.renderRecord(record, artifact);
    return { index, outcome: { kind: "rendered", key: artifact.key, artifact }, document: { record, artifact, body } };
  } catch (err) {
    const reason = describeError(err);
    log.render.warn({ key: artifact.key, reason }, "render failed");
    return { index, outcome: { kind: "failed", key: artifact.key, code: ErrorCode.RENDER_FAILED, reason } };
  }
}

async function runLane(jobs: readonly Job[], renderer: DocumentRenderer): Promise<LaneResult[]> {
  const results: LaneResult[] = [];
  for (const job of jobs) {
    // Yield between records so lanes interleave
    await Promise.resolve();
    results.push(renderOne(job, renderer));
  }
  return results;
}

/**
 * Render every eligible record. Never throws for a single record; only the
 * gate is fatal.
 */
export async function renderBatch(
  records: readonly FlightRecord[],
  renderer: DocumentRenderer,
  options: BatchRenderOptions,
): Promise<BatchRenderResult> {
  assertRenderGate(options.linkTemplate);

  const settled: Array<LaneResult | undefined> = new Array(records.length);
  const jobs: Job[] = [];
  const claimedPaths = new Map<string, CanonicalKeyString>();

  records.forEach((record, index) => {
    const key = recordKey(record);
    if (key === null || !isComplete(record)) {
      const fallbackKey = key ?? `${record.airlineName}|${record.flightNumber}|${record.scheduledAt.slice(0, 10)}`;
      settled[index] = { index, outcome: { kind: "skipped", key: fallbackKey, reason: "incomplete_record" } };
      return;
    }
    if (!isEligible(record, options.minDelayMinutes)) {
      settled[index] = { index, outcome: { kind: "skipped", key, reason: "not_eligible" } };
      return;
    }
    const artifact = artifactFor(record, key);
    const owner = claimedPaths.get(artifact.path);
    if (owner !== undefined) {
      settled[index] = { index, outcome: { kind: "failed", key, code: ErrorCode.RENDER_FAILED, reason: `artifact path ${artifact.path} already belongs to ${owner}` } };
      return;
    }
    claimedPaths.set(artifact.path, key);
    jobs.push({ index, record, artifact });
  });

  const laneCount = Math.max(1, Math.min(options.renderConcurrency, jobs.length));
  const lanes: Job[][] = Array.from({ length: laneCount }, () => []);
  jobs.forEach((job, i) => {
    lanes[i % laneCount]?.push(job);
  });

  const laneResults = await Promise.all(lanes.map((lane) => runLane(lane, renderer)));
  for (const results of laneResults) {
    for (const result of results) settled[result.index] = result;
  }

  const outcomes: GenerationOutcome[] = [];
  const documents: RenderedDocument[] = [];
  const successSet = new Set<string>();
  const counts = { rendered: 0, skipped: 0, failed: 0 };

  for (const result of settled) {
    if (!result) continue;
    outcomes.push(result.outcome);
    counts[result.outcome.kind] += 1;
    if (result.document) {
      documents.push(result.document);
      successSet.add(result.document.artifact.path);
    }
  }

  log.render.info({ ...counts, lanes: laneCount }, "batch rendered");
  return { outcomes, documents, successSet, counts };
}
