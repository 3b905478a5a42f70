/**
 * One imported novel plus where its reader left off.
 * Records are persisted by {@link LibraryStore}; the text itself never is.
 */
export interface Novel {
  /** Random UUID assigned on import. */
  readonly id: string;
  title: string;
  /** Absolute path of the plain-text file. */
  readonly filePath: string;
  /** Opaque resume scalar: floor(progress * 1000) + floor(scroll offset). */
  lastReadPosition: number;
  /** Chunk index to reopen at. */
  lastChunkIndex: number;
  /** Scroll offset within the chunk at the time of the last save. */
  lastScrollPosition: number;
  /** ISO timestamp of import. */
  readonly addedAt: string;
}

/** Resume state reported after each navigation and when a novel is closed. */
export interface ReadingPosition {
  chunkIndex: number;
  position: number;
  scrollOffset: number;
}

/** Collaborator that persists reading positions for later resume. */
export interface PositionSink {
  savePosition(novelId: string, position: ReadingPosition): Promise<void>;
}

export type Theme = "light" | "dark" | "system";

/** Display preferences shared by every novel. */
export interface DisplayPreferences {
  theme: Theme;
  /** Points, even values in [12, 32]. */
  fontSize: number;
}
