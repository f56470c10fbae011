/**
 * Base interface and types for element scanners.
 *
 * Each scanner consumes exactly one embedded element starting at the cursor's
 * current position, using only that format's own framing, and reports the
 * offset of the element's last byte. On return the cursor sits one byte past
 * that offset. Scanners keep no state between calls.
 */

import type { ElementKind } from '../../../shared/types'

/**
 * Minimal forward cursor used by scanners.
 *
 * {@link FileCursor} implements it over an open file; tests can implement it
 * over an in-memory buffer.
 */
export interface ScanCursor {
  /** Current absolute offset. */
  readonly position: number
  /** Total size of the underlying data in bytes. */
  readonly size: number
  /** Read exactly `length` bytes and advance; throws TruncatedInputError on a short read. */
  read(length: number): Promise<Buffer>
  /** Read one byte and advance. */
  readByte(): Promise<number>
  /** Read exactly `length` bytes without advancing. */
  peek(length: number): Promise<Buffer>
  /** Advance by `count` bytes without reading. */
  skip(count: number): void
  /** Move to the end of the data. */
  seekToEnd(): void
}

/** Interface that all element scanners implement. */
export interface ElementScanner {
  /** Human-readable name of this scanner (for error messages). */
  readonly name: string

  /** The element kind this scanner recognises. */
  readonly kind: ElementKind

  /**
   * Consume the element that starts at the cursor.
   *
   * @returns Offset of the element's last byte.
   * @throws {FormatError} If the element's header is not valid for this format.
   * @throws {TruncatedInputError} If the data ends before the element does.
   */
  scan(cursor: ScanCursor): Promise<number>
}
