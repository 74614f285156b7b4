import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import sharp from 'sharp'
import { SharpImageSource } from '../src/infra/image/SharpImageSource.js'

const LIMITS = { maxWidth: 1920, maxHeight: 1080, maxFileSizeMb: 50 }
const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])

describe('SharpImageSource', () => {
  let dir = ''

  beforeAll(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'schematic-img-'))
    await sharp({ create: { width: 3000, height: 1500, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 0 } } })
      .png()
      .toFile(path.join(dir, 'large.png'))
    await sharp({ create: { width: 100, height: 50, channels: 3, background: { r: 10, g: 20, b: 30 } } })
      .jpeg()
      .toFile(path.join(dir, 'small.jpg'))
    await sharp({ create: { width: 40, height: 40, channels: 3, background: { r: 100, g: 100, b: 100 } } })
      .png()
      .toFile(path.join(dir, 'gray.png'))
    fs.writeFileSync(path.join(dir, 'corrupt.png'), 'not an image')
  })

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('scales large images to fit inside the limits and encodes PNG', async () => {
    const img = await new SharpImageSource(LIMITS).prepare(path.join(dir, 'large.png'))
    expect(img).toMatchObject({ ready: true, width: 1920, height: 960, format: 'png' })
    expect(Buffer.from(img.encodedImage, 'base64').subarray(0, 8)).toEqual(PNG_SIGNATURE)
  })

  it('flattens transparency onto white', async () => {
    const img = await new SharpImageSource(LIMITS).prepare(path.join(dir, 'large.png'))
    const { data, info } = await sharp(Buffer.from(img.encodedImage, 'base64')).raw().toBuffer({ resolveWithObject: true })
    expect(info.channels).toBe(3)
    expect(Array.from(data.subarray(0, 3))).toEqual([255, 255, 255])
  })

  it('boosts contrast around mid-gray', async () => {
    const img = await new SharpImageSource(LIMITS).prepare(path.join(dir, 'gray.png'))
    const { data } = await sharp(Buffer.from(img.encodedImage, 'base64')).raw().toBuffer({ resolveWithObject: true })
    // 100 * 1.1 - 12.8 = 97.2
    expect(Array.from(data.subarray(0, 3))).toEqual([97, 97, 97])
  })

  it('does not enlarge small images', async () => {
    const img = await new SharpImageSource(LIMITS).prepare(path.join(dir, 'small.jpg'))
    expect(img).toMatchObject({ ready: true, width: 100, height: 50 })
  })

  it('reports unsupported, missing, oversized and corrupt inputs without throwing', async () => {
    const source = new SharpImageSource(LIMITS)
    await expect(source.prepare(path.join(dir, 'board.bmp'))).resolves.toEqual({
      encodedImage: '',
      ready: false,
      error: 'Unsupported image format: .bmp'
    })

    const missing = await source.prepare(path.join(dir, 'missing.png'))
    expect(missing.ready).toBe(false)
    expect(missing.error).toMatch(/^Cannot read image: /)

    const tiny = await new SharpImageSource({ ...LIMITS, maxFileSizeMb: 0.000001 }).prepare(path.join(dir, 'small.jpg'))
    expect(tiny.ready).toBe(false)
    expect(tiny.error).toMatch(/^File too large: /)

    const corrupt = await source.prepare(path.join(dir, 'corrupt.png'))
    expect(corrupt.ready).toBe(false)
    expect(corrupt.error).toMatch(/^Image processing failed: /)
  })
})
