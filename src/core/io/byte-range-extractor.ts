import * as fs from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'

import type { ExtractionResult } from '../../shared/types'
import { COPY_CHUNK_SIZE } from '../../shared/constants/live-photo-signatures'
import {
  ExtractionWriteError,
  InvalidRangeError,
  isMissingFileError,
  SourceMissingError,
  SourceOpenError,
  TruncatedInputError
} from '../errors'

// ─── Types ────────────────────────────────────────────────────

/**
 * Copies an inclusive byte range of a file into a new file.
 *
 * This is the only way the rest of the library touches destination files,
 * so tests can substitute a fake and observe (or forbid) writes.
 */
export interface ByteRangeCopier {
  extract(
    sourcePath: string,
    start: number,
    end: number,
    destinationPath: string
  ): Promise<ExtractionResult>
}

export interface ByteRangeExtractorOptions {
  /** Size of each read from the source file. Default: 1 MB. */
  chunkSize?: number
}

// ─── Helpers ──────────────────────────────────────────────────

async function openSource(sourcePath: string): Promise<FileHandle> {
  try {
    return await fs.open(sourcePath, 'r')
  } catch (err) {
    if (isMissingFileError(err)) {
      throw new SourceMissingError(sourcePath, err)
    }
    throw new SourceOpenError(sourcePath, err)
  }
}

/**
 * Read exactly `length` bytes starting at `start`, `chunkSize` bytes at a
 * time.
 *
 * @throws {TruncatedInputError} If the file ends before `length` bytes.
 */
async function readExactly(
  handle: FileHandle,
  start: number,
  length: number,
  chunkSize: number
): Promise<Buffer> {
  const data = Buffer.alloc(length)
  let filled = 0

  while (filled < length) {
    const toRead = Math.min(chunkSize, length - filled)
    const { bytesRead } = await handle.read(data, filled, toRead, start + filled)
    if (bytesRead === 0) {
      break
    }
    filled += bytesRead
  }

  if (filled < length) {
    throw new TruncatedInputError(
      `Source shorter than expected: read ${filled} of ${length} bytes`,
      start + filled
    )
  }

  return data
}

// ─── ByteRangeExtractor ───────────────────────────────────────

/**
 * Writes the inclusive range `[start, end]` of a source file to a new file.
 *
 *   - `end` past the last byte of the source is clamped to it.
 *   - The whole range is read before the destination is touched, so a
 *     truncated source never leaves a destination file behind.
 *   - An existing destination is replaced.
 */
export class ByteRangeExtractor implements ByteRangeCopier {
  private readonly chunkSize: number

  constructor(options: ByteRangeExtractorOptions = {}) {
    const { chunkSize = COPY_CHUNK_SIZE } = options
    if (!Number.isSafeInteger(chunkSize) || chunkSize < 1) {
      throw new InvalidRangeError(`Invalid copy chunk size: ${chunkSize}`)
    }
    this.chunkSize = chunkSize
  }

  /**
   * @param sourcePath      File to copy from.
   * @param start           Offset of the first byte to copy.
   * @param end             Offset of the last byte to copy (inclusive).
   * @param destinationPath File to create or replace.
   * @throws {InvalidRangeError}    If the range is malformed.
   * @throws {SourceMissingError}   If the source file does not exist.
   * @throws {TruncatedInputError}  If the source holds fewer bytes than the range.
   * @throws {ExtractionWriteError} If the destination cannot be written.
   */
  async extract(
    sourcePath: string,
    start: number,
    end: number,
    destinationPath: string
  ): Promise<ExtractionResult> {
    if (!Number.isSafeInteger(start) || start < 0) {
      throw new InvalidRangeError(`Invalid range start: ${start}`)
    }
    if (!Number.isSafeInteger(end) || end < start) {
      throw new InvalidRangeError(`Invalid range end: ${end} (start ${start})`)
    }

    const source = await openSource(sourcePath)
    let data: Buffer

    try {
      const { size } = await source.stat()
      const lastByte = Math.min(end, size - 1)
      if (lastByte < start) {
        throw new TruncatedInputError(
          `Source shorter than expected: ${size} bytes, range starts at ${start}`,
          start
        )
      }

      data = await readExactly(source, start, lastByte - start + 1, this.chunkSize)
    } finally {
      await source.close()
    }

    try {
      await fs.writeFile(destinationPath, data)
    } catch (err) {
      throw new ExtractionWriteError(destinationPath, err)
    }

    return { destinationPath, bytesWritten: data.length }
  }
}
