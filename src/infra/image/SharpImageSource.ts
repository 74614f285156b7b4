/*
功能：原理图图像预处理（SharpImageSource）
用途：校验扩展名与文件大小，按 EXIF 旋转、去透明通道、等比缩放到上限内，轻度增强对比度与锐度后输出 PNG 的 base64 编码。
参数：
- constructor({ maxWidth, maxHeight, maxFileSizeMb })
- prepare(imagePath)
返回：
- Promise<PreparedImage>（失败时 ready=false 并附带 error，不抛出）
示例：
// const img = await new SharpImageSource(cfg.image).prepare('uploads/board.png')
*/
import fs from 'fs'
import path from 'path'
import sharp from 'sharp'
import type { ImageSource, PreparedImage } from '../../domain/contracts/index.js'
import { errorMessage, logger } from '../log/logger.js'

export const SUPPORTED_IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp', '.gif', '.tif', '.tiff']

// 中文注释：对比度以中灰为支点放大 10%；锐化取小半径，只加强线条边缘
const CONTRAST_GAIN = 1.1
const CONTRAST_OFFSET = 128 * (1 - CONTRAST_GAIN)
const SHARPEN_SIGMA = 0.6

export type ImageLimits = { maxWidth: number; maxHeight: number; maxFileSizeMb: number }

function notReady(error: string): PreparedImage {
  return { encodedImage: '', ready: false, error }
}

export class SharpImageSource implements ImageSource {
  constructor(private limits: ImageLimits) {}

  async prepare(imagePath: string): Promise<PreparedImage> {
    const ext = path.extname(imagePath).toLowerCase()
    if (!SUPPORTED_IMAGE_EXTENSIONS.includes(ext)) {
      return notReady(`Unsupported image format: ${ext || '(none)'}`)
    }

    let size: number
    try {
      size = (await fs.promises.stat(imagePath)).size
    } catch (e) {
      return notReady(`Cannot read image: ${errorMessage(e)}`)
    }
    const sizeMb = size / (1024 * 1024)
    if (sizeMb > this.limits.maxFileSizeMb) {
      return notReady(`File too large: ${sizeMb.toFixed(1)}MB (max ${this.limits.maxFileSizeMb}MB)`)
    }

    try {
      // 中文注释：透明区域铺白底，避免线条在黑底上不可见
      const { data, info } = await sharp(imagePath)
        .rotate()
        .flatten({ background: '#ffffff' })
        .resize(this.limits.maxWidth, this.limits.maxHeight, { fit: 'inside', withoutEnlargement: true })
        .linear(CONTRAST_GAIN, CONTRAST_OFFSET)
        .sharpen({ sigma: SHARPEN_SIGMA })
        .png()
        .toBuffer({ resolveWithObject: true })
      logger.debug('image.prepared', { imagePath, width: info.width, height: info.height, bytes: data.length })
      return {
        encodedImage: data.toString('base64'),
        ready: true,
        width: info.width,
        height: info.height,
        format: info.format
      }
    } catch (e) {
      logger.warn('image.prepare_failed', { imagePath, error: errorMessage(e) })
      return notReady(`Image processing failed: ${errorMessage(e)}`)
    }
  }
}
