import { FormatError, SourceMissingError, TruncatedInputError } from '../errors'
import { FileCursor } from '../io/file-cursor'
import {
  MemoryCursor,
  SEPARATOR,
  createTempDir,
  hex,
  minimalJpeg,
  minimalMp4,
  minimalPng,
  removeTempDir,
  writeFixture
} from '../../test-utils/live-photo-fixtures'
import { ContainerParser, classifyLookahead } from './container-parser'

describe('classifyLookahead', () => {
  it('recognises a JPEG by its first two bytes', () => {
    expect(classifyLookahead(hex('FF D8 00 00 00 00 00 00'))).toEqual({
      type: 'element',
      kind: 'Jpg'
    })
  })

  it('recognises the full PNG signature', () => {
    expect(classifyLookahead(hex('89 50 4E 47 0D 0A 1A 0A'))).toEqual({
      type: 'element',
      kind: 'Png'
    })
  })

  it('recognises an ftyp box whatever its size field holds', () => {
    expect(classifyLookahead(Buffer.from('\x12\x34\x56\x78ftyp', 'latin1'))).toEqual({
      type: 'element',
      kind: 'Mp4'
    })
  })

  it('recognises the separator', () => {
    expect(classifyLookahead(SEPARATOR)).toEqual({ type: 'separator' })
  })

  it('falls through to unrecognized', () => {
    expect(classifyLookahead(Buffer.from('GIF89a\x00\x00', 'latin1'))).toEqual({
      type: 'unrecognized'
    })
    expect(classifyLookahead(hex('89 50 4E 47 0D 0A 1A 00'))).toEqual({ type: 'unrecognized' })
  })
})

describe('ContainerParser', () => {
  let dir: string

  beforeEach(async () => {
    dir = await createTempDir()
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await removeTempDir(dir)
  })

  it('splits JPEG + separator + MP4 into two elements', async () => {
    const filePath = await writeFixture(
      dir,
      'photo.jpg',
      Buffer.concat([minimalJpeg(), SEPARATOR, minimalMp4()])
    )

    const container = await new ContainerParser().parse(filePath)

    expect(container.path).toBe(filePath)
    expect(container.elements).toEqual([
      { kind: 'Jpg', startPosition: 0, endPosition: 22, length: 23 },
      { kind: 'Mp4', startPosition: 31, endPosition: 66, length: 36 }
    ])
  })

  it('splits PNG + separator + MP4 into two elements', async () => {
    const filePath = await writeFixture(
      dir,
      'photo.png',
      Buffer.concat([minimalPng(), SEPARATOR, minimalMp4()])
    )

    const container = await new ContainerParser().parse(filePath)

    expect(container.elements).toEqual([
      { kind: 'Png', startPosition: 0, endPosition: 44, length: 45 },
      { kind: 'Mp4', startPosition: 53, endPosition: 88, length: 36 }
    ])
  })

  it('produces ordered, non-overlapping elements with consistent lengths', async () => {
    const data = Buffer.concat([
      minimalJpeg(),
      SEPARATOR,
      minimalPng(),
      minimalJpeg(),
      SEPARATOR,
      SEPARATOR,
      minimalMp4()
    ])
    const filePath = await writeFixture(dir, 'photo.jpg', data)

    const { elements } = await new ContainerParser({ readBufferSize: 7 }).parse(filePath)

    expect(elements.map(e => e.kind)).toEqual(['Jpg', 'Png', 'Jpg', 'Mp4'])
    for (const element of elements) {
      expect(element.length).toBe(element.endPosition - element.startPosition + 1)
      expect(element.length).toBeGreaterThanOrEqual(1)
    }
    for (let i = 1; i < elements.length; i++) {
      expect(elements[i].startPosition).toBeGreaterThan(elements[i - 1].endPosition)
    }
    expect(elements[elements.length - 1].endPosition).toBe(data.length - 1)
  })

  it('parses a standalone JPEG as a single element', async () => {
    const filePath = await writeFixture(dir, 'still.jpg', minimalJpeg())

    const container = await new ContainerParser().parse(filePath)

    expect(container.elements).toEqual([
      { kind: 'Jpg', startPosition: 0, endPosition: 22, length: 23 }
    ])
  })

  it('returns no elements for an empty file', async () => {
    const filePath = await writeFixture(dir, 'empty.jpg', Buffer.alloc(0))

    const container = await new ContainerParser().parse(filePath)

    expect(container.elements).toEqual([])
  })

  it('fails with FormatError when the file starts with an unknown signature', async () => {
    const filePath = await writeFixture(dir, 'image.gif', Buffer.from('GIF89a\x01\x00\x01\x00', 'latin1'))

    const error = await new ContainerParser().parse(filePath).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(FormatError)
    expect(error).toMatchObject({ offset: 0 })
  })

  it('fails with FormatError at the offset of unknown bytes after an element', async () => {
    const filePath = await writeFixture(
      dir,
      'photo.jpg',
      Buffer.concat([minimalJpeg(), Buffer.from('GARBAGE!', 'ascii')])
    )

    const error = await new ContainerParser().parse(filePath).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(FormatError)
    expect(error).toMatchObject({
      offset: 23,
      message: 'Unrecognized element signature (at offset 23)'
    })
  })

  it('fails with TruncatedInputError when fewer than 8 bytes follow an element', async () => {
    const filePath = await writeFixture(
      dir,
      'photo.jpg',
      Buffer.concat([minimalJpeg(), hex('FF D8 FF')])
    )

    const error = await new ContainerParser().parse(filePath).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(TruncatedInputError)
    expect(error).toMatchObject({ offset: 23 })
  })

  it('fails with TruncatedInputError when an element is cut short', async () => {
    const data = Buffer.concat([minimalPng(), SEPARATOR, minimalMp4()]).subarray(0, 40)
    const filePath = await writeFixture(dir, 'photo.png', data)

    await expect(new ContainerParser().parse(filePath)).rejects.toBeInstanceOf(TruncatedInputError)
  })

  it('closes the file when the scan fails', async () => {
    const close = vi.spyOn(FileCursor.prototype, 'close')
    const filePath = await writeFixture(dir, 'bad.jpg', Buffer.from('not a live photo', 'ascii'))

    await expect(new ContainerParser().parse(filePath)).rejects.toBeInstanceOf(FormatError)
    expect(close).toHaveBeenCalledTimes(1)
  })

  it('closes the file after a successful scan', async () => {
    const close = vi.spyOn(FileCursor.prototype, 'close')
    const filePath = await writeFixture(dir, 'photo.jpg', Buffer.concat([minimalJpeg(), SEPARATOR, minimalMp4()]))

    await new ContainerParser().parse(filePath)

    expect(close).toHaveBeenCalledTimes(1)
  })

  it('throws SourceMissingError for a missing file', async () => {
    await expect(new ContainerParser().parse(`${dir}/missing.jpg`)).rejects.toBeInstanceOf(
      SourceMissingError
    )
  })

  it('scans from an arbitrary cursor', async () => {
    const data = Buffer.concat([minimalJpeg(), SEPARATOR, minimalMp4()])

    const elements = await new ContainerParser().scanElements(new MemoryCursor(data, 23))

    expect(elements).toEqual([{ kind: 'Mp4', startPosition: 31, endPosition: 66, length: 36 }])
  })

  it('returns a container whose element list cannot be modified', async () => {
    const filePath = await writeFixture(dir, 'still.jpg', minimalJpeg())

    const container = await new ContainerParser().parse(filePath)

    expect(Object.isFrozen(container.elements)).toBe(true)
    expect(Object.isFrozen(container.elements[0])).toBe(true)
    expect(container.firstOf('Jpg')).toBe(container.elements[0])
    expect(container.firstOf('Mp4')).toBeUndefined()
  })
})
