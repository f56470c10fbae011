/**
 * ElementExtractor - Writes elements of a parsed live photo to their own files.
 *
 * All writes go through a {@link ByteRangeCopier}, which re-opens the
 * container file for every element. Before each copy the container file is
 * checked for existence, since it may have been moved or deleted after it
 * was parsed.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import type { ElementKind, ExtractionResult, LivePhotoElement } from '../../shared/types'
import { ElementNotFoundError, SourceMissingError } from '../errors'
import { ByteRangeExtractor, type ByteRangeCopier } from '../io/byte-range-extractor'
import type { LivePhotoContainer } from '../scanning/live-photo-container'

// ─── Helpers ──────────────────────────────────────────────────

/**
 * Name of the `index`-th (1-based) extracted element.
 *
 * The extension of `basePath` is dropped and replaced by a two-digit running
 * index and the element kind: `/root/photo.jpg` -> `/root/photo-01.Jpg`.
 */
export function elementFileName(basePath: string, index: number, kind: ElementKind): string {
  const { dir, name } = path.parse(basePath)
  return path.join(dir, `${name}-${String(index).padStart(2, '0')}.${kind}`)
}

async function assertSourceExists(sourcePath: string): Promise<void> {
  try {
    const stat = await fs.stat(sourcePath)
    if (!stat.isFile()) {
      throw new SourceMissingError(sourcePath)
    }
  } catch (err) {
    if (err instanceof SourceMissingError) {
      throw err
    }
    throw new SourceMissingError(sourcePath, err)
  }
}

// ─── ElementExtractor ─────────────────────────────────────────

export class ElementExtractor {
  private readonly copier: ByteRangeCopier

  constructor(copier: ByteRangeCopier = new ByteRangeExtractor()) {
    this.copier = copier
  }

  /**
   * Write the first element of `kind` to `destinationPath`.
   *
   * @throws {ElementNotFoundError} If the container has no such element.
   * @throws {SourceMissingError} If the container file is gone.
   */
  async extractFirst(
    container: LivePhotoContainer,
    kind: ElementKind,
    destinationPath: string
  ): Promise<ExtractionResult> {
    const element = container.firstOf(kind)
    if (!element) {
      throw new ElementNotFoundError(kind)
    }

    return this.extractElement(container, element, destinationPath)
  }

  /** Write the still image to `destinationPath`. */
  extractJpeg(container: LivePhotoContainer, destinationPath: string): Promise<ExtractionResult> {
    return this.extractFirst(container, 'Jpg', destinationPath)
  }

  /** Write the video to `destinationPath`. */
  extractMp4(container: LivePhotoContainer, destinationPath: string): Promise<ExtractionResult> {
    return this.extractFirst(container, 'Mp4', destinationPath)
  }

  /**
   * Write every element, in order, next to `basePath` (see
   * {@link elementFileName}). A missing or blank `basePath` means the
   * container's own path.
   *
   * Stops at the first element that fails; files already written stay.
   */
  async extractAll(
    container: LivePhotoContainer,
    basePath?: string
  ): Promise<ExtractionResult[]> {
    const base = basePath !== undefined && basePath.trim() !== '' ? basePath : container.path
    const results: ExtractionResult[] = []

    let index = 1
    for (const element of container.elements) {
      const destinationPath = elementFileName(base, index, element.kind)
      index++
      results.push(await this.extractElement(container, element, destinationPath))
    }

    return results
  }

  // ── Private ─────────────────────────────────────────────

  private async extractElement(
    container: LivePhotoContainer,
    element: LivePhotoElement,
    destinationPath: string
  ): Promise<ExtractionResult> {
    await assertSourceExists(container.path)

    const result = await this.copier.extract(
      container.path,
      element.startPosition,
      element.endPosition,
      destinationPath
    )

    console.log(
      `[extract] ${element.kind} [${element.startPosition}..${element.endPosition}] -> ${result.destinationPath}`
    )

    return result
  }
}
