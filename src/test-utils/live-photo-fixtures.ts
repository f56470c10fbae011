import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'

import { TruncatedInputError } from '../core/errors'
import type { ScanCursor } from '../core/scanning/element-scanners'

// ─── Byte Builders ────────────────────────────────────────────

export function hex(s: string): Buffer {
  return Buffer.from(s.replace(/\s+/g, ''), 'hex')
}

export const SEPARATOR = Buffer.from('LIVE_CVR', 'ascii')

export const IEND_CHUNK = hex('00 00 00 00 49 45 4E 44 AE 42 60 82')

/**
 * 23-byte JPEG: SOI, a 6-byte APP0 segment, a 4-byte SOS segment, five bytes
 * of entropy data (including a stuffed FF 00) and EOI.
 */
export function minimalJpeg(): Buffer {
  return Buffer.concat([
    hex('FF D8'),
    hex('FF E0 00 06 4A 46 49 46'),
    hex('FF DA 00 04 01 02'),
    hex('11 22 FF 00 33'),
    hex('FF D9')
  ])
}

/** Build a PNG chunk with the given type and data and a placeholder CRC. */
export function pngChunk(type: string, data: Buffer): Buffer {
  const length = Buffer.alloc(4)
  length.writeUInt32BE(data.length, 0)
  return Buffer.concat([length, Buffer.from(type, 'ascii'), data, hex('DE AD BE EF')])
}

export const PNG_SIGNATURE = hex('89 50 4E 47 0D 0A 1A 0A')

/** 45-byte PNG: signature, a 13-byte IHDR chunk and IEND. */
export function minimalPng(): Buffer {
  return Buffer.concat([
    PNG_SIGNATURE,
    pngChunk('IHDR', hex('00 00 00 01 00 00 00 01 08 02 00 00 00')),
    IEND_CHUNK
  ])
}

/** 36-byte MP4: a 20-byte ftyp box and a 16-byte mdat box. */
export function minimalMp4(): Buffer {
  return Buffer.concat([
    hex('00 00 00 14'),
    Buffer.from('ftypisom', 'ascii'),
    hex('00 00 02 00'),
    Buffer.from('isom', 'ascii'),
    hex('00 00 00 10'),
    Buffer.from('mdat', 'ascii'),
    hex('01 02 03 04 05 06 07 08')
  ])
}

// ─── In-Memory Cursor ─────────────────────────────────────────

/** {@link ScanCursor} over a Buffer, for scanner tests. */
export class MemoryCursor implements ScanCursor {
  private cursor: number

  constructor(
    private readonly data: Buffer,
    start: number = 0
  ) {
    this.cursor = start
  }

  get position(): number {
    return this.cursor
  }

  get size(): number {
    return this.data.length
  }

  async read(length: number): Promise<Buffer> {
    const out = await this.peek(length)
    this.cursor += length
    return out
  }

  async readByte(): Promise<number> {
    const out = await this.read(1)
    return out[0]
  }

  async peek(length: number): Promise<Buffer> {
    const available = Math.max(0, this.data.length - this.cursor)
    if (available < length) {
      throw new TruncatedInputError(
        `Unexpected end of data: needed ${length} bytes, got ${available}`,
        this.cursor
      )
    }
    return Buffer.from(this.data.subarray(this.cursor, this.cursor + length))
  }

  skip(count: number): void {
    this.cursor += count
  }

  seekToEnd(): void {
    this.cursor = this.data.length
  }
}

// ─── Temporary Files ──────────────────────────────────────────

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'live-photo-'))
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

/** Write `data` to `name` inside `dir` and return the full path. */
export async function writeFixture(dir: string, name: string, data: Buffer): Promise<string> {
  const filePath = path.join(dir, name)
  await fs.writeFile(filePath, data)
  return filePath
}
