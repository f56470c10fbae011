/**
 * ContainerParser - Splits a live photo file into its embedded elements.
 *
 * A live photo is a still image (JPEG or PNG) followed by the 8-byte
 * separator "LIVE_CVR" and an MP4 video, with no index of any kind. The
 * parser walks the file once, front to back: at each position it peeks 8
 * bytes, picks the scanner whose signature matches, and lets that scanner
 * consume the element. Separators are skipped and not recorded. Any other
 * byte pattern stops the parse with a {@link FormatError}.
 */

import type { ElementKind, LivePhotoElement, LookaheadSignature } from '../../shared/types'
import {
  JPEG_SOI,
  LIVE_CVR_SEPARATOR,
  LOOKAHEAD_SIZE,
  MP4_BOX_TYPE_OFFSET,
  MP4_FTYP,
  PNG_SIGNATURE,
  READ_BUFFER_SIZE
} from '../../shared/constants/live-photo-signatures'
import { FileCursor } from '../io/file-cursor'
import { FormatError } from '../errors'
import { createScannerMap, type ElementScanner, type ScanCursor } from './element-scanners'
import { createElement, LivePhotoContainer } from './live-photo-container'

// ─── Types ─────────────────────────────────────────────────────

export interface ContainerParserOptions {
  /** Read-ahead window of the file cursor in bytes. Default: 64 KB. */
  readBufferSize?: number
}

// ─── Signature Sniffing ────────────────────────────────────────

/**
 * Classify the 8 bytes at a parse position.
 *
 * JPEG is recognised by its first two bytes, PNG and the separator by all
 * eight, MP4 by an "ftyp" box type in bytes 4..7 (bytes 0..3 are the box
 * size and may hold anything).
 */
export function classifyLookahead(lookahead: Buffer): LookaheadSignature {
  if (lookahead.subarray(0, JPEG_SOI.length).equals(JPEG_SOI)) {
    return { type: 'element', kind: 'Jpg' }
  }
  if (lookahead.equals(PNG_SIGNATURE)) {
    return { type: 'element', kind: 'Png' }
  }
  if (
    lookahead
      .subarray(MP4_BOX_TYPE_OFFSET, MP4_BOX_TYPE_OFFSET + MP4_FTYP.length)
      .equals(MP4_FTYP)
  ) {
    return { type: 'element', kind: 'Mp4' }
  }
  if (lookahead.equals(LIVE_CVR_SEPARATOR)) {
    return { type: 'separator' }
  }
  return { type: 'unrecognized' }
}

// ─── ContainerParser ───────────────────────────────────────────

export class ContainerParser {
  private readonly scanners: Map<ElementKind, ElementScanner>
  private readonly readBufferSize: number

  constructor(options: ContainerParserOptions = {}) {
    this.scanners = createScannerMap()
    this.readBufferSize = options.readBufferSize ?? READ_BUFFER_SIZE
  }

  /**
   * Parse the live photo at `filePath`.
   *
   * The file is held open for the duration of the scan and closed on every
   * exit path.
   *
   * @throws {FormatError} If a position holds no recognised signature, or a
   *   scanner rejects its element's header.
   * @throws {TruncatedInputError} If the file ends inside a fixed-size read.
   * @throws {SourceMissingError} If the file does not exist.
   */
  async parse(filePath: string): Promise<LivePhotoContainer> {
    const cursor = new FileCursor(this.readBufferSize)
    await cursor.open(filePath)

    let elements: LivePhotoElement[]
    try {
      elements = await this.scanElements(cursor)
    } finally {
      await cursor.close()
    }

    console.log(
      `[parse] ${filePath}: ${elements.length} element(s)`,
      elements.map(e => `${e.kind}[${e.startPosition}..${e.endPosition}]`).join(', ')
    )

    return new LivePhotoContainer(filePath, elements)
  }

  /**
   * Walk `cursor` from its current position to the end of its data,
   * returning the elements found in order.
   */
  async scanElements(cursor: ScanCursor): Promise<LivePhotoElement[]> {
    const elements: LivePhotoElement[] = []

    while (cursor.position < cursor.size) {
      const start = cursor.position
      const signature = classifyLookahead(await cursor.peek(LOOKAHEAD_SIZE))

      switch (signature.type) {
        case 'element': {
          const scanner = this.scanners.get(signature.kind)
          if (!scanner) {
            throw new FormatError(`No scanner for ${signature.kind} elements`, start)
          }
          const end = await scanner.scan(cursor)
          elements.push(createElement(signature.kind, start, end))
          break
        }

        case 'separator':
          cursor.skip(LOOKAHEAD_SIZE)
          break

        case 'unrecognized':
          throw new FormatError('Unrecognized element signature', start)

        default: {
          // Exhaustive check
          const _exhaustive: never = signature
          throw new FormatError(`Unhandled signature ${JSON.stringify(_exhaustive)}`, start)
        }
      }
    }

    return elements
  }
}
