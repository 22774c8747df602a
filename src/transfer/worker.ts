import { promises as fs } from "node:fs";
import path from "node:path";
import PQueue from "p-queue";
import type { DriveApi } from "../drive/types.js";
import type { DriveWalker } from "../drive/walker.js";
import { CleanupError, TransferError, describeError } from "../errors.js";
import type { ObjectStore } from "../storage/s3.js";
import type {
  FileOutcome,
  RemoteFile,
  RemoteFolder,
  TransferStats,
} from "../types.js";
import { safeFileName } from "../utils/fs.js";
import { KeyedLock } from "../utils/keyed-lock.js";
import { debug, info, warn } from "../utils/log.js";
import { createStats } from "./stats.js";

export function destinationKey(folder: RemoteFolder, file: RemoteFile) {
  return `${folder.name}/${file.name}`;
}

export type TransferWorkerOptions = {
  drive: DriveApi;
  walker: DriveWalker;
  store: ObjectStore;
  tempDir: string;
  concurrency?: number;
};

export class TransferWorker {
  private readonly drive: DriveApi;
  private readonly walker: DriveWalker;
  private readonly store: ObjectStore;
  private readonly tempDir: string;
  private readonly concurrency: number;
  private readonly keyLock = new KeyedLock();
  private nextTaskId = 0;

  constructor(options: TransferWorkerOptions) {
    this.drive = options.drive;
    this.walker = options.walker;
    this.store = options.store;
    this.tempDir = options.tempDir;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  }

  /**
   * Copies every file of every class folder. Per-file and per-folder
   * failures are counted or logged; they never reject.
   */
  async transferAll(
    classFolders: RemoteFolder[],
    stats: TransferStats = createStats()
  ): Promise<TransferStats> {
    const queue = new PQueue({ concurrency: this.concurrency });
    for (const folder of classFolders) {
      info(`Processing folder: ${folder.name}`);
      let files: RemoteFile[];
      try {
        files = await this.walker.listFiles(folder);
      } catch (err) {
        warn(`Failed to list files in ${folder.name}: ${describeError(err)}`);
        continue;
      }
      stats.total += files.length;
      for (const file of files) {
        queue
          .add(() => this.transferFile(folder, file, stats))
          .catch((err: unknown) => {
            // transferFile settles every outcome itself; reaching here is a bug.
            warn(`Unexpected failure for ${file.name}: ${describeError(err)}`);
          });
      }
      // Bound memory: the listing of the next folder waits for this one.
      await queue.onIdle();
    }
    return stats;
  }

  async transferFile(
    folder: RemoteFolder,
    file: RemoteFile,
    stats: TransferStats
  ): Promise<FileOutcome> {
    const key = destinationKey(folder, file);
    const tempPath = this.tempPathFor(file);
    info(`Processing ${file.name} in ${folder.name}`);
    try {
      try {
        await this.drive.download(file.id, tempPath);
      } catch (err) {
        const failure = new TransferError(
          key,
          `Error downloading ${file.name}: ${describeError(err)}`,
          { cause: err }
        );
        warn(failure.message);
        stats.failed += 1;
        return { status: "download-failed", key, error: failure.message };
      }
      stats.downloaded += 1;
      return await this.keyLock.run(key, () =>
        this.uploadIfMissing(key, tempPath, stats)
      );
    } finally {
      await this.removeTempFile(tempPath);
    }
  }

  private async uploadIfMissing(
    key: string,
    tempPath: string,
    stats: TransferStats
  ): Promise<FileOutcome> {
    try {
      if ((await this.store.head(key)) === "exists") {
        info(`File already exists in bucket: ${key}`);
        stats.skipped += 1;
        return { status: "skipped", key };
      }
      await this.store.put(key, tempPath);
    } catch (err) {
      const failure = new TransferError(
        key,
        `Error uploading ${key}: ${describeError(err)}`,
        { cause: err }
      );
      warn(failure.message);
      stats.failed += 1;
      return { status: "upload-failed", key, error: failure.message };
    }
    stats.uploaded += 1;
    debug(`Uploaded ${key}`);
    return { status: "uploaded", key };
  }

  private tempPathFor(file: RemoteFile) {
    const name = safeFileName(file.name);
    if (this.concurrency === 1) {
      return path.join(this.tempDir, name);
    }
    this.nextTaskId += 1;
    return path.join(this.tempDir, `${this.nextTaskId}-${name}`);
  }

  private async removeTempFile(tempPath: string) {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (err) {
      const failure = new CleanupError(
        tempPath,
        `Failed to remove temp file ${tempPath}: ${describeError(err)}`,
        { cause: err }
      );
      warn(failure.message);
    }
  }
}
