/**
 * Element Scanners - barrel export.
 *
 * Each scanner knows how to find the end of one embedded format given a
 * cursor positioned at its first byte.
 */

export type { ScanCursor, ElementScanner } from './base-scanner'

export { JpegScanner } from './jpeg-scanner'
export { PngScanner } from './png-scanner'
export { Mp4Scanner } from './mp4-scanner'

import type { ElementKind } from '../../../shared/types'
import type { ElementScanner } from './base-scanner'

import { JpegScanner } from './jpeg-scanner'
import { PngScanner } from './png-scanner'
import { Mp4Scanner } from './mp4-scanner'

/**
 * Create one scanner per element kind, keyed by the kind each scanner
 * reports.
 */
export function createScannerMap(): Map<ElementKind, ElementScanner> {
  const scanners: ElementScanner[] = [new JpegScanner(), new PngScanner(), new Mp4Scanner()]

  const map = new Map<ElementKind, ElementScanner>()

  for (const scanner of scanners) {
    map.set(scanner.kind, scanner)
  }

  return map
}
