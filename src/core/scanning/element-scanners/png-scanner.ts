/**
 * PNG Element Scanner
 *
 * PNG files are chunk-based. Each chunk has the structure:
 *   [4 bytes length] [4 bytes type] [length bytes data] [4 bytes CRC]
 *
 * The image ends with the fixed 12-byte IEND chunk
 * (00 00 00 00 49 45 4E 44 AE 42 60 82).
 *
 * Strategy:
 *   1. Validate the 8-byte PNG signature.
 *   2. Read 12 bytes. If they are the IEND chunk, stop.
 *   3. Otherwise skip `length` more bytes: the 12 already read cover the
 *      length, the type and 4 bytes that stand in for the trailing CRC, so
 *      the next chunk starts exactly `length` bytes later.
 *
 * CRCs and chunk types are not checked.
 */

import { PNG_IEND_CHUNK, PNG_SIGNATURE } from '../../../shared/constants/live-photo-signatures'
import { FormatError } from '../../errors'
import type { ElementScanner, ScanCursor } from './base-scanner'

/** Bytes read per chunk: the IEND chunk is 12 bytes, any chunk is at least that. */
const CHUNK_LOOKAHEAD_SIZE = 12

export class PngScanner implements ElementScanner {
  readonly name = 'PNG Scanner'
  readonly kind = 'Png' as const

  async scan(cursor: ScanCursor): Promise<number> {
    const start = cursor.position
    const signature = await cursor.read(PNG_SIGNATURE.length)
    if (!signature.equals(PNG_SIGNATURE)) {
      throw new FormatError(`${this.name}: not a valid PNG`, start)
    }

    for (;;) {
      const chunkStart = await cursor.read(CHUNK_LOOKAHEAD_SIZE)
      if (chunkStart.equals(PNG_IEND_CHUNK)) {
        return cursor.position - 1
      }

      cursor.skip(chunkStart.readUInt32BE(0))
    }
  }
}
