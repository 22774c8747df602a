import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DriveWalker } from "../src/drive/walker.js";
import { createStats } from "../src/transfer/stats.js";
import { TransferWorker, destinationKey } from "../src/transfer/worker.js";
import { FakeDrive } from "./fixtures/fake-drive.js";
import { MemoryObjectStore } from "./fixtures/memory-store.js";

describe("TransferWorker", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "worker-test-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function createWorker(drive: FakeDrive, store: MemoryObjectStore, concurrency = 1) {
    return new TransferWorker({
      drive,
      walker: new DriveWalker(drive),
      store,
      tempDir,
      concurrency,
    });
  }

  it("builds destination keys from the class folder and file names", () => {
    expect(
      destinationKey({ id: "a", name: "cats" }, { id: "f", name: "1.jpg", parentName: "cats" })
    ).toBe("cats/1.jpg");
  });

  it("returns an upload-failed outcome and removes the temp file", async () => {
    const drive = new FakeDrive().addFolder("a", "A").addFile("x", "x.jpg", "a");
    const store = new MemoryObjectStore();
    store.failPuts.add("A/x.jpg");
    const stats = createStats();

    const outcome = await createWorker(drive, store).transferFile(
      { id: "a", name: "A" },
      { id: "x", name: "x.jpg", parentName: "A" },
      stats
    );

    expect(outcome).toEqual({
      status: "upload-failed",
      key: "A/x.jpg",
      error: "Error uploading A/x.jpg: SlowDown",
    });
    expect(stats).toEqual({ total: 0, downloaded: 1, uploaded: 0, skipped: 0, failed: 1 });
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it("treats a failed existence check as an upload failure", async () => {
    const drive = new FakeDrive().addFolder("a", "A").addFile("x", "x.jpg", "a");
    const store = new MemoryObjectStore();
    store.failHeads.add("A/x.jpg");
    const stats = createStats();

    const outcome = await createWorker(drive, store).transferFile(
      { id: "a", name: "A" },
      { id: "x", name: "x.jpg", parentName: "A" },
      stats
    );

    expect(outcome.status).toBe("upload-failed");
    expect(store.puts).toEqual([]);
    expect(stats.failed).toBe(1);
  });

  it("removes a partial download", async () => {
    const drive = new FakeDrive().addFolder("a", "A").addFile("x", "x.jpg", "a");
    drive.failDownloads.add("x");
    const stats = createStats();

    const outcome = await createWorker(drive, new MemoryObjectStore()).transferFile(
      { id: "a", name: "A" },
      { id: "x", name: "x.jpg", parentName: "A" },
      stats
    );

    expect(outcome).toEqual({
      status: "download-failed",
      key: "A/x.jpg",
      error: "Error downloading x.jpg: connection reset",
    });
    expect(stats).toEqual({ total: 0, downloaded: 0, uploaded: 0, skipped: 0, failed: 1 });
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it("keeps slashes in keys but not in temp file names", async () => {
    const drive = new FakeDrive().addFolder("a", "A").addFile("s", "a/b.jpg", "a");
    const store = new MemoryObjectStore();

    await createWorker(drive, store).transferAll([{ id: "a", name: "A" }]);

    expect(drive.downloads).toEqual([path.join(tempDir, "a_b.jpg")]);
    expect([...store.objects.keys()]).toEqual(["A/a/b.jpg"]);
  });

  it("continues with the next folder when a listing fails", async () => {
    const drive = new FakeDrive()
      .addFolder("a", "A")
      .addFolder("b", "B")
      .addFile("x", "x.jpg", "a")
      .addFile("y", "y.jpg", "b");
    const list = drive.list.bind(drive);
    drive.list = (query, pageToken) =>
      query.includes("'a' in parents")
        ? Promise.reject(new Error("quota exceeded"))
        : list(query, pageToken);
    const store = new MemoryObjectStore();

    const stats = await createWorker(drive, store).transferAll([
      { id: "a", name: "A" },
      { id: "b", name: "B" },
    ]);

    expect(stats).toEqual({ total: 1, downloaded: 1, uploaded: 1, skipped: 0, failed: 0 });
    expect([...store.objects.keys()]).toEqual(["B/y.jpg"]);
  });

  it("keeps counters and per-key uploads consistent when running in parallel", async () => {
    const drive = new FakeDrive()
      .addFolder("a", "A")
      .addFolder("b", "B")
      .addFile("x", "x.jpg", "a")
      .addFile("d1", "dup.jpg", "a")
      .addFile("d2", "dup.jpg", "a")
      .addFile("bx", "x.jpg", "b");
    const store = new MemoryObjectStore();
    store.putDelayMs = 20;

    const stats = await createWorker(drive, store, 3).transferAll([
      { id: "a", name: "A" },
      { id: "b", name: "B" },
    ]);

    expect(stats).toEqual({ total: 4, downloaded: 4, uploaded: 3, skipped: 1, failed: 0 });
    expect(store.puts.filter((key) => key === "A/dup.jpg")).toEqual(["A/dup.jpg"]);
    expect(new Set(drive.downloads).size).toBe(4);
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it("adds to the counters it is given", async () => {
    const drive = new FakeDrive().addFolder("a", "A").addFile("x", "x.jpg", "a");
    const stats = { total: 5, downloaded: 5, uploaded: 4, skipped: 0, failed: 1 };

    const result = await createWorker(drive, new MemoryObjectStore()).transferAll(
      [{ id: "a", name: "A" }],
      stats
    );

    expect(result).toBe(stats);
    expect(stats).toEqual({ total: 6, downloaded: 6, uploaded: 5, skipped: 0, failed: 1 });
  });
});
