import type { ElementKind } from '../../../shared/types'
import { JpegScanner, Mp4Scanner, PngScanner, createScannerMap } from './index'

describe('createScannerMap', () => {
  it('registers each scanner under the kind it reports', () => {
    const map = createScannerMap()
    const kinds: ElementKind[] = ['Jpg', 'Png', 'Mp4']

    expect([...map.keys()].sort()).toEqual([...kinds].sort())
    for (const kind of kinds) {
      expect(map.get(kind)?.kind).toBe(kind)
    }
    expect(map.get('Jpg')).toBeInstanceOf(JpegScanner)
    expect(map.get('Png')).toBeInstanceOf(PngScanner)
    expect(map.get('Mp4')).toBeInstanceOf(Mp4Scanner)
  })
})
