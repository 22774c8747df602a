import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DriveWalker,
  escapeQueryValue,
  folderByNameQuery,
} from "../src/drive/walker.js";
import { FakeDrive } from "./fixtures/fake-drive.js";

describe("DriveWalker", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drains every page of a listing", async () => {
    const drive = new FakeDrive().addFolder("root", "Dataset");
    for (const name of ["a", "b", "c", "d", "e"]) {
      drive.addFolder(name, name.toUpperCase(), "root");
    }
    const walker = new DriveWalker(drive);

    const children = await walker.listChildren("root");

    expect(children.map((folder) => folder.name)).toEqual(["A", "B", "C", "D", "E"]);
    expect(drive.queries.filter((query) => query.includes("'root' in parents"))).toHaveLength(3);
  });

  it("returns null when no folder has the root name", async () => {
    const walker = new DriveWalker(new FakeDrive().addFolder("x", "Other"));

    expect(await walker.findRootFolder("Dataset")).toBeNull();
  });

  it("picks the oldest of several folders sharing the root name", async () => {
    const drive = new FakeDrive()
      .addFolder("r1", "Dataset")
      .addFolder("r2", "Dataset");
    const walker = new DriveWalker(drive);

    const root = await walker.findRootFolder("Dataset");

    expect(root).toEqual({ id: "r1", name: "Dataset" });
    expect(vi.mocked(console.error)).toHaveBeenCalledWith(
      'Found 2 folders named "Dataset"; using the oldest (r1). Others: r2. Pass --root-id to choose explicitly.'
    );
  });

  it("escapes quotes and backslashes in queries", async () => {
    expect(escapeQueryValue("it's a\\b")).toBe("it\\'s a\\\\b");
    expect(folderByNameQuery("it's")).toBe(
      "mimeType = 'application/vnd.google-apps.folder' and name = 'it\\'s' and trashed = false"
    );
    const walker = new DriveWalker(new FakeDrive().addFolder("q", "it's"));
    expect(await walker.findRootFolder("it's")).toEqual({ id: "q", name: "it's" });
  });

  it("lists only files inside a class folder", async () => {
    const drive = new FakeDrive()
      .addFolder("a", "A")
      .addFolder("nested", "nested", "a")
      .addFile("x", "x.jpg", "a");
    const walker = new DriveWalker(drive);

    const files = await walker.listFiles({ id: "a", name: "A" });

    expect(files).toEqual([
      { id: "x", name: "x.jpg", parentName: "A", mimeType: "image/jpeg", size: 6 },
    ]);
  });

  it("builds the breadcrumb of a folder", async () => {
    const drive = new FakeDrive()
      .addFolder("root", "Dataset")
      .addFolder("a", "A", "root")
      .addFolder("s", "sub", "a");
    const walker = new DriveWalker(drive);

    expect((await walker.folderPath("s")).map((folder) => folder.name)).toEqual([
      "Dataset",
      "A",
      "sub",
    ]);
    expect(await walker.folderPath("missing")).toEqual([]);
  });

  it("searches folders by name", async () => {
    const drive = new FakeDrive()
      .addFolder("root", "Dataset")
      .addFolder("o", "Other")
      .addFile("f", "Dataset.zip", "o");
    const walker = new DriveWalker(drive);

    const found = await walker.searchFolders({ nameContains: "Data" });

    expect(found.map((item) => item.id)).toEqual(["root"]);
  });

  it("lists folder contents of every kind", async () => {
    const drive = new FakeDrive()
      .addFolder("a", "A")
      .addFolder("n", "nested", "a")
      .addFile("x", "x.jpg", "a");
    const walker = new DriveWalker(drive);

    const items = await walker.listContents("a");

    expect(items.map((item) => [item.kind, item.name])).toEqual([
      ["folder", "nested"],
      ["file", "x.jpg"],
    ]);
  });

  it("searches folders inside one parent", async () => {
    const drive = new FakeDrive()
      .addFolder("root", "Dataset")
      .addFolder("a", "Cats", "root")
      .addFolder("b", "Dogs", "root")
      .addFolder("c", "Cats", "elsewhere");
    const walker = new DriveWalker(drive);

    const found = await walker.searchFolders({ nameContains: "Cats", parentId: "root" });

    expect(found.map((item) => item.id)).toEqual(["a"]);
    expect(drive.queries).toEqual([
      "mimeType = 'application/vnd.google-apps.folder' and trashed = false and name contains 'Cats' and 'root' in parents",
    ]);
  });

  it("filters folder contents by MIME type", async () => {
    const drive = new FakeDrive()
      .addFolder("a", "A")
      .addFolder("n", "nested", "a")
      .addFile("x", "x.jpg", "a")
      .addFile("p", "p.png", "a", "data:p", "image/png")
      .addFile("t", "notes.txt", "a", "data:t", "text/plain");
    const walker = new DriveWalker(drive);

    const items = await walker.listContents("a", ["image/jpeg", "image/png"]);

    expect(items.map((item) => item.name)).toEqual(["x.jpg", "p.png"]);
    expect(drive.queries).toEqual([
      "'a' in parents and trashed = false and (mimeType = 'image/jpeg' or mimeType = 'image/png')",
    ]);
  });

  it("only resolves folders by id", async () => {
    const drive = new FakeDrive().addFolder("a", "A").addFile("x", "x.jpg", "a");
    const walker = new DriveWalker(drive);

    expect(await walker.getFolder("a")).toEqual({ id: "a", name: "A" });
    expect(await walker.getFolder("x")).toBeNull();
  });
});
