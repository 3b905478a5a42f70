import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LibraryStore } from "../library/library-store";
import { ChunkStore } from "../reader/chunk-store";
import { ReaderSession } from "../reader/session";
import { callTool, ensureWithinRoot, TOOL_DEFINITIONS, type ToolContext } from "../tools";

let root: string;
let ctx: ToolContext;

beforeEach(async () => {
  vi.spyOn(console, "error").mockImplementation(() => {});
  root = await fs.mkdtemp(path.join(os.tmpdir(), "reader-tools-"));
  await fs.writeFile(path.join(root, "tale.txt"), "0123456789abcdefghijKLM\r\n");
  const library = new LibraryStore();
  ctx = {
    library,
    session: new ReaderSession(new ChunkStore({ chunkSize: 10 }), library),
    config: { LIBRARY_ROOT: root, ALLOWED_EXT: ["txt"], EXCLUDED_FOLDERS: [], VERBOSE: false },
  };
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(root, { recursive: true, force: true });
});

async function importAndGetId(): Promise<string> {
  await callTool(ctx, "import_novels", {});
  const [novel] = ctx.library.list();
  if (!novel) throw new Error("import found nothing");
  return novel.id;
}

describe("tool definitions", () => {
  it("advertises every tool once", () => {
    const names = TOOL_DEFINITIONS.map((t) => t.name);
    expect(new Set(names).size).toBe(names.length);
    expect(names).toEqual([
      "list_novels",
      "import_novels",
      "add_novel",
      "remove_novel",
      "open_novel",
      "read_chunk",
      "next_chunk",
      "previous_chunk",
      "reading_progress",
      "set_scroll_position",
      "close_novel",
      "get_preferences",
      "set_preferences",
    ]);
  });
});

describe("callTool", () => {
  it("imports, opens and pages through a novel", async () => {
    const id = await importAndGetId();

    expect(await callTool(ctx, "open_novel", { id })).toMatchObject({
      novelId: id,
      title: "tale",
      content: "0123456789",
      currentIndex: 0,
      totalChunks: 3,
    });
    expect(await callTool(ctx, "next_chunk", {})).toMatchObject({ content: "abcdefghij" });
    expect(await callTool(ctx, "read_chunk", { index: 2 })).toMatchObject({
      content: "KLM",
      progress: 1,
    });
    expect(await callTool(ctx, "previous_chunk", {})).toMatchObject({ currentIndex: 1 });

    const progress = await callTool(ctx, "reading_progress", {});
    expect(progress).toMatchObject({ currentIndex: 1, progress: 0.5, state: "ready" });
    expect(progress).not.toHaveProperty("content");

    expect(await callTool(ctx, "close_novel", {})).toEqual({ closed: id });
    expect(ctx.library.get(id)).toMatchObject({ lastChunkIndex: 1, lastReadPosition: 500 });
  });

  it("requires an open novel for navigation", async () => {
    await expect(callTool(ctx, "next_chunk", {})).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
    });
  });

  it("validates arguments", async () => {
    await expect(callTool(ctx, "open_novel", {})).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
    const id = await importAndGetId();
    await callTool(ctx, "open_novel", { id });
    await expect(callTool(ctx, "read_chunk", { index: "2" })).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
  });

  it("maps unknown novels to InvalidRequest", async () => {
    await expect(callTool(ctx, "open_novel", { id: "nope" })).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
    });
    await expect(callTool(ctx, "remove_novel", { id: "nope" })).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
    });
  });

  it("adds a single file and refuses paths outside the library", async () => {
    const result = await callTool(ctx, "add_novel", { path: "tale.txt", title: "A Tale" });
    expect(result).toMatchObject({ novel: { title: "A Tale", filePath: path.join(root, "tale.txt") } });

    await expect(callTool(ctx, "add_novel", { path: "../escape.txt" })).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
    });
    await expect(callTool(ctx, "add_novel", { path: "absent.txt" })).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
    });
  });

  it("closes the open novel before removing it", async () => {
    const id = await importAndGetId();
    await callTool(ctx, "open_novel", { id });
    expect(await callTool(ctx, "remove_novel", { id })).toEqual({ removed: id });
    expect(ctx.session.openNovelId).toBeNull();
    expect(ctx.library.list()).toEqual([]);
  });

  it("reads and updates display preferences", async () => {
    expect(await callTool(ctx, "get_preferences", {})).toEqual({
      theme: "system",
      fontSize: 18,
      lineSpacing: 18 * 0.3,
    });
    expect(await callTool(ctx, "set_preferences", { theme: "dark", fontSize: 24 })).toEqual({
      theme: "dark",
      fontSize: 24,
      lineSpacing: 24 * 0.3,
    });
    await expect(callTool(ctx, "set_preferences", { theme: "neon" })).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
    });
  });

  it("rejects unknown tools", async () => {
    await expect(callTool(ctx, "delete_everything", {})).rejects.toMatchObject({
      code: ErrorCode.MethodNotFound,
    });
  });
});

describe("ensureWithinRoot", () => {
  it("resolves relative paths under the root", () => {
    expect(ensureWithinRoot("/lib", "a/b.txt")).toBe(path.resolve("/lib/a/b.txt"));
    expect(() => ensureWithinRoot("/lib", "/etc/passwd")).toThrow();
  });
});
