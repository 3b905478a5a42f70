import fs from "node:fs/promises";

/** Raised when a novel's bytes cannot be read. Always retryable. */
export class FileUnreadableError extends Error {
  public readonly filePath: string;
  public readonly reason: "not-found" | "unreadable";

  constructor(filePath: string, reason: "not-found" | "unreadable", detail?: string) {
    super(
      reason === "not-found"
        ? `File not found: ${filePath}`
        : `File unreadable: ${filePath}${detail ? ` (${detail})` : ""}`,
    );
    this.name = "FileUnreadableError";
    this.filePath = filePath;
    this.reason = reason;
  }
}

/** Read-only provider of a file's full byte content. */
export interface ByteSource {
  /** Human-readable label used in log lines. */
  describe(): string;
  /** @throws {FileUnreadableError} */
  read(): Promise<Uint8Array>;
}

export class FileByteSource implements ByteSource {
  public constructor(private readonly filePath: string) {}

  public describe(): string {
    return this.filePath;
  }

  public async read(): Promise<Uint8Array> {
    try {
      return await fs.readFile(this.filePath);
    } catch (e) {
      const code = e instanceof Error && "code" in e ? e.code : undefined;
      if (code === "ENOENT") throw new FileUnreadableError(this.filePath, "not-found");
      throw new FileUnreadableError(
        this.filePath,
        "unreadable",
        e instanceof Error ? e.message : String(e),
      );
    }
  }
}

/** Serves bytes already held in memory (uploads, tests). */
export class MemoryByteSource implements ByteSource {
  public constructor(
    private readonly bytes: Uint8Array,
    private readonly label = "<memory>",
  ) {}

  public static fromText(text: string, label?: string): MemoryByteSource {
    return new MemoryByteSource(new TextEncoder().encode(text), label);
  }

  public describe(): string {
    return this.label;
  }

  public async read(): Promise<Uint8Array> {
    return this.bytes;
  }
}
