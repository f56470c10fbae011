import { MemoryCursor, hex, minimalJpeg, minimalMp4 } from '../../../test-utils/live-photo-fixtures'
import { Mp4Scanner } from './mp4-scanner'

describe('Mp4Scanner', () => {
  const scanner = new Mp4Scanner()

  it('takes everything up to the end of the data as the video', async () => {
    const cursor = new MemoryCursor(minimalMp4())

    expect(await scanner.scan(cursor)).toBe(35)
    expect(cursor.position).toBe(36)
  })

  it('ignores box sizes and interior content', async () => {
    // ftyp box claims 0xFFFF bytes; a JPEG end marker follows.
    const data = Buffer.concat([
      hex('00 00 FF FF'),
      Buffer.from('ftypmp42', 'ascii'),
      minimalJpeg()
    ])
    const cursor = new MemoryCursor(data, 0)

    expect(await scanner.scan(cursor)).toBe(data.length - 1)
  })

  it('reports fileLength - 1 when the video starts mid-file', async () => {
    const data = Buffer.concat([minimalJpeg(), minimalMp4()])
    const cursor = new MemoryCursor(data, 23)

    expect(await scanner.scan(cursor)).toBe(58)
  })
})
