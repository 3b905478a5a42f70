import { APP_VERSION } from "./config";
import type { ReaderState } from "./reader/chunk-store";

/** Reader state without the chunk text, for health checks. */
export interface ReaderStatus {
  novelId: string | null;
  state: ReaderState;
  currentIndex: number;
  totalChunks: number;
  progress: number;
  error: string | null;
}

/**
 * Mutable in-memory snapshot of server lifecycle + reader progress.
 * Exposed read-only to external callers via `statusManager.getStatus()`.
 */
export interface ServerStatus {
  /** Package version (kept in sync with package.json). */
  version: string;
  /** Folder scanned for novels. */
  libraryRoot: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  /** True once the library has been loaded and the transport is up. */
  ready: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  /** Number of novels in the library. */
  novels: number;
  reader: ReaderStatus;
}

/** Class wrapper around mutable server status state. */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      libraryRoot: initial?.libraryRoot ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      novels: initial?.novels ?? 0,
      reader: initial?.reader ?? {
        novelId: null,
        state: "unloaded",
        currentIndex: 0,
        totalChunks: 0,
        progress: 0,
        error: null,
      },
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setLibraryRoot(root: string) {
    this.data.libraryRoot = root;
  }

  public setNovelCount(count: number) {
    this.data.novels = count;
  }

  /** Mirror the latest reader snapshot (called on every store change). */
  public setReader(reader: ReaderStatus) {
    this.data.reader = { ...reader };
  }

  public markReady() {
    this.data.ready = true;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}

// Singleton instance shared by the entry point and the HTTP /health route.
export const statusManager = new StatusManager();
