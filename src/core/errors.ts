import type { ElementKind } from '../shared/types'

// ─── Error Types ──────────────────────────────────────────────

export class LivePhotoError extends Error {
  public readonly code: string
  public override readonly cause?: unknown

  constructor(message: string, code: string, cause?: unknown) {
    super(message)
    this.name = 'LivePhotoError'
    this.code = code
    this.cause = cause
  }
}

/** The bytes at `offset` do not follow any supported format's framing. */
export class FormatError extends LivePhotoError {
  constructor(
    message: string,
    public readonly offset: number
  ) {
    super(`${message} (at offset ${offset})`, 'FORMAT')
    this.name = 'FormatError'
  }
}

/** A fixed-size read returned fewer bytes than required. */
export class TruncatedInputError extends LivePhotoError {
  constructor(
    message: string,
    public readonly offset: number
  ) {
    super(`${message} (at offset ${offset})`, 'TRUNCATED')
    this.name = 'TruncatedInputError'
  }
}

export class ElementNotFoundError extends LivePhotoError {
  constructor(public readonly kind: ElementKind) {
    super(`No ${kind} element found in the container`, 'ELEMENT_NOT_FOUND')
    this.name = 'ElementNotFoundError'
  }
}

/** The file backing a parsed container is gone. */
export class SourceMissingError extends LivePhotoError {
  constructor(
    public readonly sourcePath: string,
    cause?: unknown
  ) {
    super(`Source file "${sourcePath}" does not exist`, 'SOURCE_MISSING', cause)
    this.name = 'SourceMissingError'
  }
}

export class SourceOpenError extends LivePhotoError {
  constructor(
    public readonly sourcePath: string,
    cause?: unknown
  ) {
    super(
      `Failed to open "${sourcePath}": ${cause instanceof Error ? cause.message : String(cause)}`,
      'OPEN_FAILED',
      cause
    )
    this.name = 'SourceOpenError'
  }
}

export class InvalidRangeError extends LivePhotoError {
  constructor(message: string) {
    super(message, 'INVALID_RANGE')
    this.name = 'InvalidRangeError'
  }
}

export class ExtractionWriteError extends LivePhotoError {
  constructor(
    public readonly destinationPath: string,
    cause?: unknown
  ) {
    super(
      `Failed to write "${destinationPath}": ${cause instanceof Error ? cause.message : String(cause)}`,
      'WRITE_FAILED',
      cause
    )
    this.name = 'ExtractionWriteError'
  }
}

// ─── Helpers ──────────────────────────────────────────────────

/** True for a filesystem error raised because the path does not exist. */
export function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
