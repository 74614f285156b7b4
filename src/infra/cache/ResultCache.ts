/*
功能：分析结果缓存（ResultCache）
用途：按 (图像身份, 分析类型, 数据表指纹, 自定义问题) 记忆已完成的结果，避免对相同请求重复调用模型。
参数：
- constructor({ maxEntries })
- get(fingerprint) / put(fingerprint, result) / clear()
- withLock(fn) 串行化“先查后写”，供共享同一实例的并发调用方使用
返回：
- AnalysisResult | undefined
示例：
// const key = await computeFingerprint({ imagePath, analysisType, datasheet, query })
// const hit = cache.get(key)
*/
import crypto from 'crypto'
import fs from 'fs'
import type { AnalysisResult, DatasheetRecord } from '../../domain/contracts/index.js'
import { isEmptyDatasheet } from '../../validators/datasheetValidator.js'
import { logger } from '../log/logger.js'

function sha256(text: string): string {
  return crypto.createHash('sha256').update(text).digest('hex')
}

// 中文注释：键排序后的 JSON，保证字段顺序不同的等价记录得到相同指纹
function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`
  }
  return JSON.stringify(value) ?? 'null'
}

export function datasheetHash(record: DatasheetRecord): string | undefined {
  if (isEmptyDatasheet(record)) return undefined
  return sha256(stableStringify(record))
}

/**
 * 图像身份取路径 + 文件大小 + 修改时间（不读取内容）；文件不可读时记为 unknown
 */
export async function imageIdentity(imagePath: string): Promise<string> {
  try {
    const st = await fs.promises.stat(imagePath)
    return `${imagePath}|${st.size}|${st.mtimeMs}`
  } catch {
    return `${imagePath}|unknown`
  }
}

// 中文注释：query 仅在 Custom Query 时传入（已套用默认问题），不同问题得到不同指纹
export async function computeFingerprint(input: {
  imagePath: string
  analysisType: string
  datasheet: DatasheetRecord
  query?: string
}): Promise<string> {
  const parts = [await imageIdentity(input.imagePath), input.analysisType]
  const dsHash = datasheetHash(input.datasheet)
  if (dsHash) parts.push(dsHash)
  if (input.query !== undefined) parts.push(sha256(input.query))
  return sha256(parts.join('|'))
}

export class ResultCache {
  private entries = new Map<string, AnalysisResult>()
  private tail: Promise<void> = Promise.resolve()
  readonly maxEntries: number

  constructor(opts?: { maxEntries?: number }) {
    this.maxEntries = Math.max(1, Math.floor(opts?.maxEntries ?? 100))
  }

  get size(): number {
    return this.entries.size
  }

  get(fingerprint: string): AnalysisResult | undefined {
    const hit = this.entries.get(fingerprint)
    if (!hit) return undefined
    // 刷新为最近使用：Map 按插入顺序迭代，重新插入即移到末尾
    this.entries.delete(fingerprint)
    this.entries.set(fingerprint, hit)
    logger.debug('cache.hit', { fingerprint })
    return hit
  }

  put(fingerprint: string, result: AnalysisResult): void {
    if (this.entries.has(fingerprint)) this.entries.delete(fingerprint)
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
      logger.debug('cache.evicted', { fingerprint: oldest.value })
    }
    this.entries.set(fingerprint, result)
  }

  clear(): void {
    this.entries.clear()
    logger.info('cache.cleared')
  }

  /**
   * 串行执行临界区：前一个持锁者结束（无论成功或失败）后才开始下一个
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.tail
    let release: () => void = () => {}
    this.tail = new Promise<void>((resolve) => { release = resolve })
    await prev
    try {
      return await fn()
    } finally {
      release()
    }
  }
}
