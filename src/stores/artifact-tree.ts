/**
 * artifact-tree.ts — The generated site on disk.
 *
 * Paths are relative to the tree root with forward slashes. Every write goes
 * to a sibling temp file and is renamed into place, and a write whose bytes
 * match the current file is skipped so modification dates stay put.
 */

import { mkdir, readFile, readdir, rename, rm, stat, unlink, writeFile } from "node:fs/promises";
import { dirname, join, posix, relative, sep } from "node:path";
import { describeError } from "../errors.js";
import { log } from "../logger.js";

export type WriteResult = "written" | "unchanged";

export interface ArtifactTree {
  /** Every `*.html` under `dir`, relative to the root, sorted. */
  list(dir: string): Promise<string[]>;
  read(path: string): Promise<string | null>;
  write(path: string, body: string): Promise<WriteResult>;
  remove(path: string): Promise<void>;
  /** Move under the archive root, keeping the relative path. Returns the new absolute path. */
  archive(path: string): Promise<string>;
  /** `YYYY-MM-DD` of the file's last modification. */
  modifiedDate(path: string): Promise<string>;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Write-to-temp-then-rename. Shared with the JSON flight store. */
export async function writeFileAtomic(target: string, body: string): Promise<void> {
  await mkdir(dirname(target), { recursive: true });
  const temp = `${target}.${process.pid}.tmp`;
  await writeFile(temp, body, "utf-8");
  try {
    await rename(temp, target);
  } catch (err) {
    await rm(temp, { force: true });
    throw err;
  }
}

export class FsArtifactTree implements ArtifactTree {
  constructor(
    readonly root: string,
    readonly archiveRoot: string,
  ) {}

  private resolve(path: string): string {
    const absolute = join(this.root, ...path.split("/"));
    const rel = relative(this.root, absolute);
    if (rel.startsWith("..") || rel === "") {
      throw new Error(`artifact path escapes the tree: ${path}`);
    }
    return absolute;
  }

  async list(dir: string): Promise<string[]> {
    const base = join(this.root, ...dir.split("/"));
    let names: string[];
    try {
      names = await readdir(base, { recursive: true });
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return names
      .filter((name) => name.endsWith(".html"))
      .map((name) => posix.join(dir, name.split(sep).join("/")))
      .sort();
  }

  async read(path: string): Promise<string | null> {
    try {
      return await readFile(this.resolve(path), "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async write(path: string, body: string): Promise<WriteResult> {
    const current = await this.read(path);
    if (current === body) return "unchanged";
    await writeFileAtomic(this.resolve(path), body);
    log.store.debug({ path }, "artifact written");
    return "written";
  }

  async remove(path: string): Promise<void> {
    await unlink(this.resolve(path));
  }

  async archive(path: string): Promise<string> {
    const source = this.resolve(path);
    const target = join(this.archiveRoot, ...path.split("/"));
    await mkdir(dirname(target), { recursive: true });
    await rename(source, target);
    return target;
  }

  async modifiedDate(path: string): Promise<string> {
    const info = await stat(this.resolve(path));
    return info.mtime.toISOString().slice(0, 10);
  }
}

// ─── Transactions ───────────────────────────────────────────────

/**
 * Records what each write replaced so a failed commit can put the tree back.
 * Only writes made through the transaction are tracked.
 */
export class TreeTransaction {
  private readonly undo: Array<{ path: string; previous: string | null }> = [];

  constructor(private readonly tree: ArtifactTree) {}

  async write(path: string, body: string): Promise<WriteResult> {
    const previous = await this.tree.read(path);
    const result = await this.tree.write(path, body);
    if (result === "written") this.undo.push({ path, previous });
    return result;
  }

  /** Restore in reverse order. Returns the paths that could not be restored. */
  async rollback(): Promise<string[]> {
    const stuck: string[] = [];
    for (const { path, previous } of this.undo.reverse()) {
      try {
        if (previous === null) await this.tree.remove(path);
        else await this.tree.write(path, previous);
      } catch (err) {
        log.store.error({ path, reason: describeError(err) }, "artifact not restored");
        stuck.push(path);
      }
    }
    this.undo.length = 0;
    return stuck;
  }
}

/**
 * Run `fn` against a transaction over `tree`. If it throws, every write it
 * made is undone and the original error is rethrown.
 */
export async function withTreeTransaction<T>(
  tree: ArtifactTree,
  fn: (txn: TreeTransaction) => Promise<T>,
): Promise<T> {
  const txn = new TreeTransaction(tree);
  try {
    return await fn(txn);
  } catch (err) {
    const stuck = await txn.rollback();
    log.store.warn({ reason: describeError(err), unrestored: stuck.length }, "artifact writes rolled back");
    throw err;
  }
}
