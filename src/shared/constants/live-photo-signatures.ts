// Helper to create a Buffer from hex string
function hex(s: string): Buffer {
  return Buffer.from(s.replace(/\s+/g, ''), 'hex')
}

// ─── Container Framing ────────────────────────────────────────

/** Number of bytes peeked at each parse position to pick a scanner. */
export const LOOKAHEAD_SIZE = 8

/** Vendor marker between the still image and the video: ASCII "LIVE_CVR". */
export const LIVE_CVR_SEPARATOR = Buffer.from('LIVE_CVR', 'ascii')

// ─── JPEG ─────────────────────────────────────────────────────

/** Start Of Image. */
export const JPEG_SOI = hex('FF D8')

/** Start Of Scan - entropy-coded data follows its segment. */
export const JPEG_SOS_MARKER = 0xffda

/** End Of Image. */
export const JPEG_EOI_MARKER = 0xffd9

// ─── PNG ──────────────────────────────────────────────────────

/** PNG signature: 89 50 4E 47 0D 0A 1A 0A */
export const PNG_SIGNATURE = hex('89 50 4E 47 0D 0A 1A 0A')

/** The complete IEND chunk: length=0, type=IEND, CRC=AE426082. */
export const PNG_IEND_CHUNK = hex('00 00 00 00 49 45 4E 44 AE 42 60 82')

// ─── MP4 ──────────────────────────────────────────────────────

/** ftyp box type; found at offset 4, after the box size. */
export const MP4_FTYP = Buffer.from('ftyp', 'ascii')

/** Offset of the box type within a box header. */
export const MP4_BOX_TYPE_OFFSET = 4

// ─── I/O ──────────────────────────────────────────────────────

/** Default read-ahead window of the parse cursor (64 KB). */
export const READ_BUFFER_SIZE = 64 * 1024

/** Default chunk size when copying an element to its own file (1 MB). */
export const COPY_CHUNK_SIZE = 1024 * 1024
