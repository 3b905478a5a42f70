import { FileByteSource, type ByteSource } from "../library/byte-source";
import type { LibraryStore } from "../library/library-store";
import type { ReadingPosition } from "../types";
import type { ChunkStore, ChunkStoreSnapshot } from "./chunk-store";

/** What a reader client sees: store state plus which novel it belongs to. */
export interface SessionSnapshot extends ChunkStoreSnapshot {
  novelId: string | null;
  title: string | null;
  progress: number;
  scrollOffset: number;
}

/** Opens the byte source for a novel file; swapped out in tests. */
export type SourceFactory = (filePath: string) => ByteSource;

/**
 * One reader session over the library: opens a novel into the chunk store,
 * resumes it at its saved chunk and reports the position back after every
 * navigation and on close.
 */
export class ReaderSession {
  private novelId: string | null = null;
  private title: string | null = null;
  private scrollOffset = 0;

  public constructor(
    private readonly store: ChunkStore,
    private readonly library: LibraryStore,
    private readonly openSource: SourceFactory = (filePath) => new FileByteSource(filePath),
  ) {}

  public get openNovelId(): string | null {
    return this.novelId;
  }

  /**
   * Close whatever is open, load the novel and jump to its saved chunk when
   * that chunk still exists.
   * @throws {NovelNotFoundError}
   */
  public async open(novelId: string): Promise<SessionSnapshot> {
    const novel = this.library.require(novelId);
    await this.close();
    this.novelId = novel.id;
    this.title = novel.title;
    this.scrollOffset = 0;

    await this.store.load(this.openSource(novel.filePath));
    // A concurrent open() may have taken over while this one was loading.
    if (this.novelId !== novel.id || this.store.state !== "ready") return this.snapshot();

    const resume = novel.lastChunkIndex;
    if (resume > 0 && resume < this.store.totalChunks) {
      await this.store.loadChunk(resume);
      this.scrollOffset = novel.lastScrollPosition;
    }
    return this.snapshot();
  }

  public async goTo(index: number): Promise<SessionSnapshot> {
    return this.navigate(() => this.store.loadChunk(index));
  }

  public async next(): Promise<SessionSnapshot> {
    return this.navigate(() => this.store.nextChunk());
  }

  public async previous(): Promise<SessionSnapshot> {
    return this.navigate(() => this.store.previousChunk());
  }

  /** Record how far the reader scrolled inside the visible chunk. */
  public async setScrollOffset(offset: number): Promise<SessionSnapshot> {
    this.scrollOffset = Math.max(0, offset);
    await this.report();
    return this.snapshot();
  }

  /** Persist the position of the open novel and release it. No-op when nothing is open. */
  public async close(): Promise<void> {
    if (this.novelId === null) return;
    await this.report();
    this.store.close();
    this.novelId = null;
    this.title = null;
    this.scrollOffset = 0;
  }

  /** Position as reported to the library for the open novel. */
  public position(): ReadingPosition {
    return {
      chunkIndex: this.store.currentIndex,
      position: Math.floor(this.store.progress() * 1000) + Math.floor(this.scrollOffset),
      scrollOffset: this.scrollOffset,
    };
  }

  public snapshot(): SessionSnapshot {
    return {
      ...this.store.snapshot(),
      novelId: this.novelId,
      title: this.title,
      progress: this.store.progress(),
      scrollOffset: this.scrollOffset,
    };
  }

  private async navigate(move: () => Promise<void>): Promise<SessionSnapshot> {
    const before = this.store.currentIndex;
    await move();
    if (this.store.currentIndex !== before) this.scrollOffset = 0;
    await this.report();
    return this.snapshot();
  }

  private async report(): Promise<void> {
    // Nothing worth saving until the novel has actually been loaded.
    if (this.novelId === null || this.store.totalChunks === 0) return;
    await this.library.savePosition(this.novelId, this.position());
  }
}
