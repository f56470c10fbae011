// ─── Element Types ────────────────────────────────────────────

/**
 * Kind of an element embedded in a live photo container.
 *
 * The value doubles as the file extension used when every element is
 * extracted at once (`photo-01.Jpg`, `photo-02.Mp4`).
 */
export type ElementKind = 'Jpg' | 'Png' | 'Mp4'

export interface LivePhotoElement {
  kind: ElementKind
  /** Zero-based offset of the first byte of the element. */
  startPosition: number
  /** Zero-based offset of the last byte of the element (inclusive). */
  endPosition: number
  /** `endPosition - startPosition + 1`, always at least 1. */
  length: number
}

// ─── Lookahead Types ──────────────────────────────────────────

/** Classification of the 8 bytes at the current parse position. */
export type LookaheadSignature =
  | { type: 'element'; kind: ElementKind }
  | { type: 'separator' }
  | { type: 'unrecognized' }

// ─── Extraction Types ─────────────────────────────────────────

export interface ExtractionResult {
  /** Path of the file that was written. */
  destinationPath: string
  /** Number of bytes written to the destination. */
  bytesWritten: number
}
