import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import type { DriveApi } from "../drive/types.js";
import { DriveWalker } from "../drive/walker.js";
import { CleanupError, LookupError, describeError } from "../errors.js";
import type { ObjectStore } from "../storage/s3.js";
import type { RemoteFolder, SyncReport } from "../types.js";
import { ensureDir } from "../utils/fs.js";
import { error, info, warn } from "../utils/log.js";
import { createStats, formatSummary } from "./stats.js";
import { TransferWorker } from "./worker.js";

export type RunSyncOptions = {
  drive: DriveApi;
  store: ObjectStore;
  rootFolder: string;
  rootFolderId?: string;
  tempDir?: string;
  concurrency?: number;
  now?: () => number;
};

const TEMP_PREFIX = "drive-s3-sync-";

/**
 * Downloads always land in a fresh directory owned by this run. A requested
 * directory only hosts it, so removing the run's directory never touches
 * anything else in there.
 */
async function createTempDir(requested?: string) {
  const parent = requested ?? os.tmpdir();
  await ensureDir(parent);
  return fs.mkdtemp(path.join(parent, TEMP_PREFIX));
}

async function removeTempDir(dir: string) {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch (err) {
    const failure = new CleanupError(
      dir,
      `Error during cleanup of ${dir}: ${describeError(err)}`,
      { cause: err }
    );
    error(failure.message);
  }
}

async function resolveRoot(
  walker: DriveWalker,
  options: RunSyncOptions
): Promise<RemoteFolder> {
  if (options.rootFolderId) {
    const folder = await walker.getFolder(options.rootFolderId);
    if (!folder) {
      throw new LookupError(
        `Could not find root folder with id ${options.rootFolderId}`
      );
    }
    return folder;
  }
  const folder = await walker.findRootFolder(options.rootFolder);
  if (!folder) {
    throw new LookupError(`Could not find ${options.rootFolder} folder`);
  }
  return folder;
}

/**
 * Runs one end-to-end transfer. The summary is printed and the temp
 * directory removed on every exit path; lookup failures resolve to a
 * report with `ok: false`, anything else is rethrown after cleanup.
 */
export async function runSync(options: RunSyncOptions): Promise<SyncReport> {
  const now = options.now ?? Date.now;
  const startedAt = now();
  const stats = createStats();
  const walker = new DriveWalker(options.drive);
  const tempDir = await createTempDir(options.tempDir);

  try {
    const root = await resolveRoot(walker, options);
    info(`Using root folder ${root.name} (${root.id})`);
    const classFolders = await walker.listChildren(root.id);
    if (classFolders.length === 0) {
      throw new LookupError(`No class folders found in ${root.name}`);
    }
    const worker = new TransferWorker({
      drive: options.drive,
      walker,
      store: options.store,
      tempDir,
      concurrency: options.concurrency,
    });
    await worker.transferAll(classFolders, stats);
    return { ok: true, stats, elapsedMs: now() - startedAt };
  } catch (err) {
    if (!(err instanceof LookupError)) {
      throw err;
    }
    error(err.message);
    return {
      ok: false,
      stats,
      elapsedMs: now() - startedAt,
      reason: err.message,
    };
  } finally {
    for (const line of formatSummary(stats, now() - startedAt)) {
      info(line);
    }
    if (stats.failed > 0) {
      warn(`${stats.failed} of ${stats.total} file(s) were not transferred.`);
    }
    await removeTempDir(tempDir);
  }
}
