/**
 * MP4 Element Scanner
 *
 * MP4 has no end marker, so the box structure is not walked. Live photo
 * containers always store the video last; everything from the ftyp box to
 * the end of the file is taken as the video. Trailing data after the video,
 * or a video that is not last, is outside what this scanner supports.
 */

import type { ElementScanner, ScanCursor } from './base-scanner'

export class Mp4Scanner implements ElementScanner {
  readonly name = 'MP4 Scanner'
  readonly kind = 'Mp4' as const

  async scan(cursor: ScanCursor): Promise<number> {
    cursor.seekToEnd()
    return cursor.size - 1
  }
}
