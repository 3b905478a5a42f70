/** Characters (grapheme clusters) per chunk. */
export const CHUNK_SIZE = 10_000;

const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * The decoded, normalized full text of one opened novel.
 *
 * Lengths and chunk boundaries are measured in user-perceived characters
 * (extended grapheme clusters), so a chunk never separates a letter from its
 * combining marks or splits an emoji sequence. The UTF-16 offset of every
 * boundary is recorded once at construction; slicing a chunk afterwards only
 * copies that chunk.
 */
export class NovelDocument {
  public readonly text: string;
  public readonly chunkSize: number;
  /** Total length in grapheme clusters. */
  public readonly length: number;
  /** UTF-16 offsets of chunk starts, followed by the end of the text. */
  private readonly boundaries: number[];

  public constructor(text: string, chunkSize = CHUNK_SIZE) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer (got ${chunkSize})`);
    }
    this.text = text;
    this.chunkSize = chunkSize;

    const boundaries: number[] = [];
    let count = 0;
    for (const { index } of graphemes.segment(text)) {
      if (count % chunkSize === 0) boundaries.push(index);
      count++;
    }
    boundaries.push(text.length);
    this.boundaries = boundaries;
    this.length = count;
  }

  /** ceil(length / chunkSize); 0 for an empty document. */
  public get totalChunks(): number {
    return this.boundaries.length - 1;
  }

  public hasChunk(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.totalChunks;
  }

  /**
   * Text of chunk `index`, covering characters
   * [index*chunkSize, min((index+1)*chunkSize, length)).
   * @throws {RangeError} When the index is outside [0, totalChunks).
   */
  public chunk(index: number): string {
    if (!this.hasChunk(index)) {
      throw new RangeError(`chunk ${index} outside [0, ${this.totalChunks})`);
    }
    return this.text.slice(this.boundaries[index], this.boundaries[index + 1]);
  }
}
