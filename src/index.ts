/**
 * Live photo container scanner.
 *
 *   const photo = await parseLivePhoto('IMG_0001.jpg')
 *   await extractFirst(photo, 'Mp4', 'IMG_0001.mp4')
 *   await extractAll(photo) // IMG_0001-01.Jpg, IMG_0001-02.Mp4
 */

import type { ElementKind, ExtractionResult } from './shared/types'
import { ContainerParser, type ContainerParserOptions } from './core/scanning/container-parser'
import type { LivePhotoContainer } from './core/scanning/live-photo-container'
import { ElementExtractor } from './core/extraction/element-extraction'

export type {
  ElementKind,
  ExtractionResult,
  LivePhotoElement,
  LookaheadSignature
} from './shared/types'

export {
  LivePhotoError,
  FormatError,
  TruncatedInputError,
  ElementNotFoundError,
  SourceMissingError,
  SourceOpenError,
  InvalidRangeError,
  ExtractionWriteError
} from './core/errors'

export { ContainerParser, classifyLookahead } from './core/scanning/container-parser'
export type { ContainerParserOptions } from './core/scanning/container-parser'
export { LivePhotoContainer } from './core/scanning/live-photo-container'
export { ElementExtractor, elementFileName } from './core/extraction/element-extraction'
export { ByteRangeExtractor } from './core/io/byte-range-extractor'
export type { ByteRangeCopier, ByteRangeExtractorOptions } from './core/io/byte-range-extractor'
export { FileCursor } from './core/io/file-cursor'
export type { ElementScanner, ScanCursor } from './core/scanning/element-scanners'

/** Parse the live photo at `filePath` into its elements. */
export function parseLivePhoto(
  filePath: string,
  options?: ContainerParserOptions
): Promise<LivePhotoContainer> {
  return new ContainerParser(options).parse(filePath)
}

/** Write the first element of `kind` in `container` to `destinationPath`. */
export function extractFirst(
  container: LivePhotoContainer,
  kind: ElementKind,
  destinationPath: string
): Promise<ExtractionResult> {
  return new ElementExtractor().extractFirst(container, kind, destinationPath)
}

/**
 * Write every element of `container` next to `basePath`, or next to the
 * container file when `basePath` is empty.
 */
export function extractAll(
  container: LivePhotoContainer,
  basePath?: string
): Promise<ExtractionResult[]> {
  return new ElementExtractor().extractAll(container, basePath)
}
