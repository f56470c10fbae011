/**
 * JPEG Element Scanner
 *
 * A JPEG is a sequence of marker segments:
 *   [FF xx] [2 bytes big-endian length, counting itself] [payload]
 * The Start Of Scan segment (FFDA) is followed by entropy-coded image data
 * that runs until the End Of Image marker (FFD9).
 *
 * Strategy:
 *   1. Validate the FFD8 Start Of Image marker.
 *   2. Hop from segment to segment by declared length until SOS.
 *   3. Walk the entropy data byte by byte until FFD9.
 *
 * Markers that carry no length field (RST0-RST7, TEM) are not recognised in
 * the segment walk; a file that places one before SOS is mis-scanned.
 */

import {
  JPEG_EOI_MARKER,
  JPEG_SOI,
  JPEG_SOS_MARKER
} from '../../../shared/constants/live-photo-signatures'
import { FormatError } from '../../errors'
import type { ElementScanner, ScanCursor } from './base-scanner'

type JpegScanState = 'ScanningHeaderSegments' | 'ScanningEntropyData'

export class JpegScanner implements ElementScanner {
  readonly name = 'JPEG Scanner'
  readonly kind = 'Jpg' as const

  async scan(cursor: ScanCursor): Promise<number> {
    const start = cursor.position
    const soi = await cursor.read(2)
    if (!soi.equals(JPEG_SOI)) {
      throw new FormatError(`${this.name}: not a valid JPEG`, start)
    }

    let state: JpegScanState = 'ScanningHeaderSegments'

    while (state === 'ScanningHeaderSegments') {
      const marker = (await cursor.read(2)).readUInt16BE(0)
      if (marker === JPEG_SOS_MARKER) {
        state = 'ScanningEntropyData'
      }

      const lengthOffset = cursor.position
      const segmentLength = (await cursor.read(2)).readUInt16BE(0)
      if (segmentLength < 2) {
        throw new FormatError(`${this.name}: invalid segment length ${segmentLength}`, lengthOffset)
      }

      // The length counts its own two bytes.
      cursor.skip(segmentLength - 2)
    }

    return this.scanEntropyData(cursor)
  }

  /**
   * Read until the last two bytes seen form FFD9 and return the offset of
   * the D9 byte.
   */
  private async scanEntropyData(cursor: ScanCursor): Promise<number> {
    let previous = 0x00

    for (;;) {
      const current = await cursor.readByte()
      if (((previous << 8) | current) === JPEG_EOI_MARKER) {
        return cursor.position - 1
      }
      previous = current
    }
  }
}
