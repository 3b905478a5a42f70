import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { discoverNovels, importNovels } from "../discovery";
import { LibraryStore } from "../library-store";

let root: string;

async function touch(rel: string, text = "text"): Promise<void> {
  const file = path.join(root, rel);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, text);
}

beforeEach(async () => {
  vi.spyOn(console, "error").mockImplementation(() => {});
  root = await fs.mkdtemp(path.join(os.tmpdir(), "reader-discovery-"));
  await touch("alpha.txt", "12345");
  await touch("series/beta.txt");
  await touch(".hidden.txt");
  await touch("node_modules/pkg/readme.txt");
  await touch("notes.md");
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(root, { recursive: true, force: true });
});

describe("discoverNovels", () => {
  it("finds allowed files, skipping dot files and excluded folders", async () => {
    const found = await discoverNovels(root, {
      allowedExt: ["txt"],
      excludedFolders: ["node_modules"],
    });
    expect(found).toEqual([
      { title: "alpha", filePath: path.join(root, "alpha.txt"), size: 5 },
      { title: "beta", filePath: path.join(root, "series", "beta.txt"), size: 4 },
    ]);
  });

  it("accepts extensions written with a leading dot", async () => {
    const found = await discoverNovels(root, { allowedExt: [".md"] });
    expect(found.map((f) => f.title)).toEqual(["notes"]);
  });

  it("finds nothing without extensions", async () => {
    expect(await discoverNovels(root, { allowedExt: [] })).toEqual([]);
  });
});

describe("importNovels", () => {
  it("adds only files not yet in the library", async () => {
    const library = new LibraryStore();
    const opts = { allowedExt: ["txt"], excludedFolders: ["node_modules"] };

    const first = await importNovels(library, root, opts);
    expect(first.map((n) => n.title)).toEqual(["alpha", "beta"]);

    await touch("gamma.txt");
    const second = await importNovels(library, root, opts);
    expect(second.map((n) => n.title)).toEqual(["gamma"]);
    expect(library.list()).toHaveLength(3);
  });
});
