import * as fs from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'

import { READ_BUFFER_SIZE } from '../../shared/constants/live-photo-signatures'
import {
  InvalidRangeError,
  isMissingFileError,
  LivePhotoError,
  SourceMissingError,
  SourceOpenError,
  TruncatedInputError
} from '../errors'
import type { ScanCursor } from '../scanning/element-scanners/base-scanner'

// ─── FileCursor ───────────────────────────────────────────────

/**
 * Forward-reading cursor over a single open file.
 *
 * Reads are served from a read-ahead window of `readBufferSize` bytes so the
 * byte-at-a-time walk through JPEG entropy data does not turn into one
 * system call per byte. Every fixed-size read is exact: a short read throws
 * {@link TruncatedInputError} instead of returning a partial buffer.
 *
 * The cursor may be skipped past the end of the file; the next read then
 * fails as truncated.
 */
export class FileCursor implements ScanCursor {
  private handle: FileHandle | null = null
  private fileSize: number = 0
  private cursor: number = 0

  private readonly window: Buffer
  private windowStart: number = 0
  private windowLength: number = 0

  constructor(readBufferSize: number = READ_BUFFER_SIZE) {
    if (!Number.isSafeInteger(readBufferSize) || readBufferSize < 1) {
      throw new InvalidRangeError(`Invalid read buffer size: ${readBufferSize}`)
    }
    this.window = Buffer.alloc(readBufferSize)
  }

  // ── Public Accessors ────────────────────────────────────

  get isOpen(): boolean {
    return this.handle !== null
  }

  get size(): number {
    return this.fileSize
  }

  get position(): number {
    return this.cursor
  }

  // ── Lifecycle ───────────────────────────────────────────

  /**
   * Open a file for reading and place the cursor at offset 0.
   *
   * @throws {SourceMissingError} If the file does not exist.
   * @throws {SourceOpenError} If the file exists but cannot be opened.
   */
  async open(path: string): Promise<void> {
    if (this.handle) {
      throw new LivePhotoError(
        'Cursor is already open. Call close() before opening another file.',
        'ALREADY_OPEN'
      )
    }

    let handle: FileHandle
    try {
      handle = await fs.open(path, 'r')
    } catch (err) {
      if (isMissingFileError(err)) {
        throw new SourceMissingError(path, err)
      }
      throw new SourceOpenError(path, err)
    }

    try {
      const stat = await handle.stat()
      this.fileSize = stat.size
    } catch (err) {
      await handle.close()
      throw new SourceOpenError(path, err)
    }

    this.handle = handle
    this.cursor = 0
    this.windowStart = 0
    this.windowLength = 0
  }

  /** Close the file handle. Safe to call more than once. */
  async close(): Promise<void> {
    const handle = this.handle
    if (!handle) {
      return
    }

    this.handle = null
    this.fileSize = 0
    this.cursor = 0
    this.windowLength = 0
    await handle.close()
  }

  // ── Reading ─────────────────────────────────────────────

  /**
   * Read exactly `length` bytes and advance past them.
   *
   * @throws {TruncatedInputError} If fewer than `length` bytes remain.
   */
  async read(length: number): Promise<Buffer> {
    const data = await this.peek(length)
    this.cursor += length
    return data
  }

  async readByte(): Promise<number> {
    const data = await this.read(1)
    return data[0]
  }

  /**
   * Read exactly `length` bytes without moving the cursor.
   *
   * @throws {TruncatedInputError} If fewer than `length` bytes remain.
   */
  async peek(length: number): Promise<Buffer> {
    const handle = this.ensureOpen()
    const out = Buffer.alloc(length)
    let copied = 0

    while (copied < length) {
      const at = this.cursor + copied

      if (at >= this.windowStart && at < this.windowStart + this.windowLength) {
        const from = at - this.windowStart
        const count = Math.min(length - copied, this.windowLength - from)
        this.window.copy(out, copied, from, from + count)
        copied += count
        continue
      }

      if (at >= this.fileSize) {
        break
      }

      const { bytesRead } = await handle.read(this.window, 0, this.window.length, at)
      this.windowStart = at
      this.windowLength = bytesRead
      if (bytesRead === 0) {
        break
      }
    }

    if (copied < length) {
      throw new TruncatedInputError(
        `Unexpected end of file: needed ${length} bytes, got ${copied}`,
        this.cursor
      )
    }

    return out
  }

  // ── Positioning ─────────────────────────────────────────

  /** Move the cursor forward by `count` bytes without reading them. */
  skip(count: number): void {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new InvalidRangeError(`Cannot skip ${count} bytes`)
    }
    this.cursor += count
  }

  seekToEnd(): void {
    this.cursor = this.fileSize
  }

  // ── Private ─────────────────────────────────────────────

  private ensureOpen(): FileHandle {
    if (!this.handle) {
      throw new LivePhotoError('FileCursor is not open. Call open() first.', 'NOT_OPEN')
    }
    return this.handle
  }
}
