import type { ElementKind, LivePhotoElement } from '../../shared/types'

/**
 * Build a frozen element record for the inclusive range `[start, end]`.
 */
export function createElement(
  kind: ElementKind,
  startPosition: number,
  endPosition: number
): LivePhotoElement {
  return Object.freeze({
    kind,
    startPosition,
    endPosition,
    length: endPosition - startPosition + 1
  })
}

/**
 * The result of parsing one live photo file: its path and the elements found
 * in it, in file order. Never modified after the parse that built it.
 */
export class LivePhotoContainer {
  readonly path: string
  readonly elements: readonly LivePhotoElement[]

  constructor(path: string, elements: readonly LivePhotoElement[]) {
    this.path = path
    this.elements = Object.freeze([...elements])
  }

  /** The first element of the given kind, if there is one. */
  firstOf(kind: ElementKind): LivePhotoElement | undefined {
    return this.elements.find(element => element.kind === kind)
  }
}
