import type { ByteSource } from "../library/byte-source";
import { decodeBytes } from "../text/decoder";
import { normalize } from "../text/normalizer";
import { ChunkCache, MAX_CACHED_CHUNKS } from "./chunk-cache";
import { CHUNK_SIZE, NovelDocument } from "./document";
import { deferredRunner, type TaskRunner } from "./task-runner";

/**
 * unloaded -> loading -> ready | error. Navigating a ready document passes
 * through loading again on a cache miss; close() returns to unloaded.
 */
export type ReaderState = "unloaded" | "loading" | "ready" | "error";

/** Observable fields published after every mutation. */
export interface ChunkStoreSnapshot {
  readonly state: ReaderState;
  /** Text of the visible chunk ("" when nothing is visible). */
  readonly content: string;
  readonly loading: boolean;
  readonly error: string | null;
  readonly currentIndex: number;
  readonly totalChunks: number;
}

export type ChunkStoreListener = (snapshot: ChunkStoreSnapshot) => void;

export interface ChunkStoreOptions {
  runner?: TaskRunner;
  chunkSize?: number;
  cacheSize?: number;
  verbose?: boolean;
}

/**
 * Owns one open novel: decodes and normalizes it in the background, serves
 * fixed-size chunks from a small cache and tracks the reading index.
 *
 * Every load() and close() starts a new generation. Background completions
 * carry the generation they were started under and are dropped if it is no
 * longer current, so a slow earlier load can never overwrite a later one.
 */
export class ChunkStore {
  private readonly runner: TaskRunner;
  private readonly chunkSize: number;
  private readonly verbose: boolean;
  private readonly cache: ChunkCache;
  private readonly listeners = new Set<ChunkStoreListener>();

  private document: NovelDocument | null = null;
  private current = 0;
  private visible = "";
  private loading = false;
  private error: string | null = null;
  private generation = 0;
  /** Latest chunk request; an older cache-miss completion is cached but not shown. */
  private chunkRequest = 0;

  public constructor(opts: ChunkStoreOptions = {}) {
    this.runner = opts.runner ?? deferredRunner;
    this.chunkSize = opts.chunkSize ?? CHUNK_SIZE;
    this.verbose = !!opts.verbose;
    this.cache = new ChunkCache(opts.cacheSize ?? MAX_CACHED_CHUNKS);
  }

  public get state(): ReaderState {
    if (this.loading) return "loading";
    if (this.error !== null) return "error";
    return this.document ? "ready" : "unloaded";
  }

  public get content(): string {
    return this.visible;
  }

  public get isLoading(): boolean {
    return this.loading;
  }

  public get errorMessage(): string | null {
    return this.error;
  }

  public get currentIndex(): number {
    return this.current;
  }

  public get totalChunks(): number {
    return this.document?.totalChunks ?? 0;
  }

  /** Indices currently held in the chunk cache, ascending. */
  public cachedIndices(): number[] {
    return this.cache.indices();
  }

  public snapshot(): ChunkStoreSnapshot {
    return {
      state: this.state,
      content: this.visible,
      loading: this.loading,
      error: this.error,
      currentIndex: this.current,
      totalChunks: this.totalChunks,
    };
  }

  /**
   * Register for state changes. Listeners run synchronously right after the
   * mutation that caused them.
   * @returns Function removing the listener.
   */
  public subscribe(listener: ChunkStoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Read, decode and normalize a novel, then show chunk 0. Resolves once the
   * first chunk is visible or `errorMessage` is set; never rejects. A newer
   * load() or a close() issued meanwhile wins and this call resolves without
   * touching state.
   */
  public async load(source: ByteSource): Promise<void> {
    const generation = ++this.generation;
    this.chunkRequest++;
    this.document = null;
    this.cache.clear();
    this.current = 0;
    this.visible = "";
    this.error = null;
    this.loading = true;
    this.emit();

    let doc: NovelDocument;
    try {
      doc = await this.runner.run(async () => {
        const bytes = await source.read();
        const decoded = decodeBytes(bytes);
        if (decoded.lossy) {
          console.error(
            `[Reader] No encoding matched ${source.describe()}; decoded as UTF-8 with replacement characters.`,
          );
        }
        const built = new NovelDocument(normalize(decoded.text), this.chunkSize);
        console.error(
          `[Reader] Loaded ${source.describe()} (${bytes.byteLength} bytes, ${decoded.encoding ?? "utf-8/lossy"}): ${built.length} characters in ${built.totalChunks} chunks.`,
        );
        return built;
      });
    } catch (e) {
      if (generation !== this.generation) return;
      const message = e instanceof Error ? e.message : String(e);
      console.error(`[Reader] Failed to open ${source.describe()}:`, e);
      this.loading = false;
      this.error = `Failed to open file: ${message}`;
      this.emit();
      return;
    }

    if (generation !== this.generation) {
      if (this.verbose) {
        console.error(`[Reader][verbose] Discarding stale load of ${source.describe()}`);
      }
      return;
    }

    this.document = doc;
    if (doc.totalChunks === 0) {
      this.loading = false;
      this.emit();
      return;
    }
    const first = doc.chunk(0);
    this.cache.set(0, first);
    this.show(0, first);
  }

  /**
   * Make chunk `index` visible. No-op (resolved) without a document or for an
   * index outside [0, totalChunks). A cached chunk is shown before this
   * returns; otherwise the slice is computed in the background and cached.
   */
  public loadChunk(index: number): Promise<void> {
    const doc = this.document;
    if (!doc || !doc.hasChunk(index)) return Promise.resolve();

    const request = ++this.chunkRequest;
    const cached = this.cache.get(index);
    if (cached !== undefined) {
      this.show(index, cached);
      return Promise.resolve();
    }

    const generation = this.generation;
    this.loading = true;
    this.emit();
    return this.runner.run(() => doc.chunk(index)).then(
      (text) => {
        if (generation !== this.generation) return;
        const evicted = this.cache.set(index, text);
        if (this.verbose && evicted.length) {
          console.error(`[Reader][verbose] Evicted chunks ${evicted.join(", ")}`);
        }
        if (request === this.chunkRequest) this.show(index, text);
      },
      (e: unknown) => {
        if (generation !== this.generation || request !== this.chunkRequest) return;
        console.error(`[Reader] Failed to load chunk ${index}:`, e);
        this.loading = false;
        this.error = `Failed to load chunk ${index}: ${e instanceof Error ? e.message : String(e)}`;
        this.emit();
      },
    );
  }

  /** Advance one chunk; no-op on the last chunk. */
  public nextChunk(): Promise<void> {
    if (this.current >= this.totalChunks - 1) return Promise.resolve();
    return this.loadChunk(this.current + 1);
  }

  /** Go back one chunk; no-op on the first chunk. */
  public previousChunk(): Promise<void> {
    if (this.current <= 0) return Promise.resolve();
    return this.loadChunk(this.current - 1);
  }

  /** Fraction of the novel traversed, in [0, 1]; 0 when there is at most one chunk. */
  public progress(): number {
    const total = this.totalChunks;
    if (total <= 1) return 0;
    return this.current / (total - 1);
  }

  /** Drop the document, visible text and cache. Safe to call repeatedly. */
  public close(): void {
    this.generation++;
    this.chunkRequest++;
    this.document = null;
    this.cache.clear();
    this.current = 0;
    this.visible = "";
    this.loading = false;
    this.error = null;
    this.emit();
  }

  private show(index: number, text: string): void {
    this.current = index;
    this.visible = text;
    this.loading = false;
    this.error = null;
    this.emit();
  }

  private emit(): void {
    const snap = this.snapshot();
    for (const listener of this.listeners) listener(snap);
  }
}
