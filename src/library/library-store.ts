import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";
import type { DisplayPreferences, Novel, PositionSink, ReadingPosition } from "../types";
import { applyPreferences, DEFAULT_PREFERENCES, parsePreferences } from "./preferences";

/** Raised when a novel id is not in the library. */
export class NovelNotFoundError extends Error {
  constructor(public readonly novelId: string) {
    super(`Novel not found: ${novelId}`);
    this.name = "NovelNotFoundError";
  }
}

/**
 * Parameters for adding a single novel record.
 *
 * Notes:
 * - `filePath` is resolved to an absolute path before it is stored.
 * - `title` defaults to the file name without its extension.
 */
export interface AddNovelParams {
  filePath: string;
  title?: string;
}

/**
 * Library of imported novels, their resume positions and the shared display
 * preferences, persisted as a single JSON file.
 *
 * Without a store path everything lives in memory only (useful for tests and
 * throwaway sessions). Write failures are logged and never thrown: losing a
 * reading position must not interrupt reading.
 */
export class LibraryStore implements PositionSink {
  /** Filesystem path of the JSON store, if any. */
  private readonly storePath?: string;
  private readonly verbose: boolean;
  private novels: Novel[] = [];
  private preferences: DisplayPreferences = { ...DEFAULT_PREFERENCES };
  /** Tail of the save queue; writes to the store file never overlap. */
  private pendingSave: Promise<void> = Promise.resolve();

  /**
   * @param storePath Optional JSON file the library is read from and written to.
   * @param verbose   Whether to emit verbose logging.
   */
  public constructor(storePath?: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  /**
   * Read the persisted library, dropping records that fail validation or whose
   * file no longer exists. The cleaned list is written back.
   */
  public async load(): Promise<void> {
    this.novels = [];
    this.preferences = { ...DEFAULT_PREFERENCES };
    const storePath = this.storePath;
    if (!storePath || !fsSync.existsSync(storePath)) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(storePath, "utf8"));
    } catch (e) {
      console.error(`[Reader] Failed to read library store at ${storePath}; starting empty:`, e);
      return;
    }
    if (!parsed || typeof parsed !== "object") return;

    if ("preferences" in parsed) this.preferences = parsePreferences(parsed.preferences);
    const records = "novels" in parsed && Array.isArray(parsed.novels) ? parsed.novels : [];
    for (const raw of records) {
      const novel = parseNovel(raw);
      if (!novel) continue;
      if (!fsSync.existsSync(novel.filePath)) {
        console.error(`[Reader] Removing novel with missing file: ${novel.title}`);
        continue;
      }
      this.novels.push(novel);
    }
    console.error(`[Reader] Loaded library: ${this.novels.length} novels.`);
    if (this.verbose) console.error(`[Reader][verbose] Loaded from ${storePath}`);
    if (this.novels.length !== records.length) await this.save();
  }

  /** Snapshot of all records, in import order. */
  public list(): Novel[] {
    return this.novels.map((n) => ({ ...n }));
  }

  public get(id: string): Novel | undefined {
    const found = this.novels.find((n) => n.id === id);
    return found ? { ...found } : undefined;
  }

  /** @throws {NovelNotFoundError} */
  public require(id: string): Novel {
    const found = this.get(id);
    if (!found) throw new NovelNotFoundError(id);
    return found;
  }

  public findByPath(filePath: string): Novel | undefined {
    const abs = path.resolve(filePath);
    const found = this.novels.find((n) => n.filePath === abs);
    return found ? { ...found } : undefined;
  }

  /** Add a novel, or return the existing record for the same file. */
  public async add(params: AddNovelParams): Promise<Novel> {
    const existing = this.findByPath(params.filePath);
    if (existing) return existing;
    const filePath = path.resolve(params.filePath);
    const novel: Novel = {
      id: randomUUID(),
      title: params.title?.trim() || titleFromPath(filePath),
      filePath,
      lastReadPosition: 0,
      lastChunkIndex: 0,
      lastScrollPosition: 0,
      addedAt: new Date().toISOString(),
    };
    this.novels.push(novel);
    await this.save();
    return { ...novel };
  }

  /** @returns Whether a record was removed. */
  public async remove(id: string): Promise<boolean> {
    const before = this.novels.length;
    this.novels = this.novels.filter((n) => n.id !== id);
    if (this.novels.length === before) return false;
    await this.save();
    return true;
  }

  /** Replace the stored record with the same id. Unknown ids are ignored. */
  public async update(novel: Novel): Promise<void> {
    const index = this.novels.findIndex((n) => n.id === novel.id);
    if (index < 0) return;
    this.novels[index] = { ...novel };
    await this.save();
  }

  public async savePosition(novelId: string, position: ReadingPosition): Promise<void> {
    const novel = this.get(novelId);
    if (!novel) {
      if (this.verbose) console.error(`[Reader][verbose] Position for unknown novel ${novelId} ignored`);
      return;
    }
    novel.lastChunkIndex = position.chunkIndex;
    novel.lastReadPosition = position.position;
    novel.lastScrollPosition = position.scrollOffset;
    await this.update(novel);
  }

  public getPreferences(): DisplayPreferences {
    return { ...this.preferences };
  }

  /** @throws {InvalidPreferenceError} */
  public async setPreferences(patch: { theme?: unknown; fontSize?: unknown }): Promise<DisplayPreferences> {
    this.preferences = applyPreferences(this.preferences, patch);
    await this.save();
    return this.getPreferences();
  }

  /**
   * Persist the library (no-op without a store path). Calls are queued, so
   * each write starts after the previous one finished and the last call
   * writes the latest state.
   */
  public save(): Promise<void> {
    const storePath = this.storePath;
    if (!storePath) return Promise.resolve();
    this.pendingSave = this.pendingSave.then(() => this.write(storePath));
    return this.pendingSave;
  }

  private async write(storePath: string): Promise<void> {
    try {
      const out = {
        version: 1,
        savedAt: new Date().toISOString(),
        preferences: this.preferences,
        novels: this.novels,
      };
      await fs.mkdir(path.dirname(storePath), { recursive: true });
      await fs.writeFile(storePath, JSON.stringify(out, null, 2));
      if (this.verbose) console.error(`[Reader][verbose] Persisted library to ${storePath}`);
    } catch (e) {
      console.error(`[Reader] Failed to save library store:`, e);
    }
  }
}

/** File name without its final extension. */
export function titleFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

function parseNovel(raw: unknown): Novel | null {
  if (!raw || typeof raw !== "object") return null;
  const r: Record<string, unknown> = { ...raw };
  const { id, title, filePath } = r;
  if (typeof id !== "string" || typeof title !== "string" || typeof filePath !== "string") {
    return null;
  }
  const num = (v: unknown, fallback = 0) =>
    typeof v === "number" && Number.isFinite(v) && v >= 0 ? v : fallback;
  return {
    id,
    title,
    filePath,
    lastReadPosition: Math.floor(num(r.lastReadPosition)),
    lastChunkIndex: Math.floor(num(r.lastChunkIndex)),
    lastScrollPosition: num(r.lastScrollPosition),
    addedAt: typeof r.addedAt === "string" ? r.addedAt : new Date(0).toISOString(),
  };
}
