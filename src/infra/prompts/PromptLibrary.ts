/*
功能：分析模板库（PromptLibrary）
用途：从 prompts/ 目录读取各分析类型的 Markdown 模板并缓存；未识别的类型回退到 Custom Query 模板。
参数：
- constructor(promptDir?) 未提供时按源码/构建产物位置向上查找 prompts/
- getTemplate(category)
- preload({ strict })
返回：
- string 模板文本
示例：
// const lib = new PromptLibrary(); lib.preload({ strict: true }); lib.getTemplate('Power Supply Analysis')
*/
import * as fs from 'fs'
import * as path from 'path'
import { fileURLToPath } from 'url'
import { ANALYSIS_TYPES, CUSTOM_QUERY, type AnalysisType } from '../../domain/contracts/index.js'
import { resolveAnalysisType, slugOf } from '../../domain/analysisTypes.js'
import { errorMessage, logger } from '../log/logger.js'

/**
 * PromptLoadError - 模板加载错误
 */
export class PromptLoadError extends Error {
  constructor(message: string, public readonly path: string) {
    super(`${message} (path: ${path})`)
    this.name = 'PromptLoadError'
  }
}

function locatePromptDir(): string {
  // 中文注释：源码位于 src/infra/prompts，构建产物位于 dist/src/infra/prompts，两者都回溯到仓库根
  const here = path.dirname(fileURLToPath(import.meta.url))
  const candidates = [
    path.resolve(here, '..', '..', '..', 'prompts'),
    path.resolve(here, '..', '..', '..', '..', 'prompts')
  ]
  return candidates.find((p) => fs.existsSync(p)) ?? candidates[0]
}

export class PromptLibrary {
  private cache = new Map<AnalysisType, string>()
  readonly dir: string

  constructor(promptDir?: string) {
    this.dir = promptDir ? path.resolve(promptDir) : locatePromptDir()
  }

  categories(): readonly AnalysisType[] {
    return ANALYSIS_TYPES
  }

  isRecognized(category: string): boolean {
    return resolveAnalysisType(category) !== undefined
  }

  /**
   * 获取模板；未识别的类型返回 Custom Query 模板（约定的回退行为，不视为错误）
   * @throws PromptLoadError - 模板文件不存在或为空
   */
  getTemplate(category: string): string {
    const resolved = resolveAnalysisType(category) ?? CUSTOM_QUERY
    return this.load(resolved)
  }

  /**
   * 预热缓存（启动时加载全部模板）；严格模式下任一失败直接抛出
   */
  preload(options?: { strict?: boolean }): void {
    const strict = Boolean(options?.strict)
    for (const type of ANALYSIS_TYPES) {
      try {
        this.load(type)
      } catch (error) {
        if (strict) throw error
        logger.error('prompts.preload_failed', { type, error })
      }
    }
  }

  clearCache(): void {
    this.cache.clear()
  }

  private load(type: AnalysisType): string {
    const cached = this.cache.get(type)
    if (cached !== undefined) return cached

    const absolutePath = path.join(this.dir, `${slugOf(type)}.md`)
    if (!fs.existsSync(absolutePath)) {
      throw new PromptLoadError('Prompt file not found', absolutePath)
    }
    let content: string
    try {
      content = fs.readFileSync(absolutePath, 'utf-8').trim()
    } catch (error) {
      throw new PromptLoadError(`Failed to load prompt file: ${errorMessage(error)}`, absolutePath)
    }
    if (content.length === 0) {
      throw new PromptLoadError('Prompt file is empty', absolutePath)
    }
    this.cache.set(type, content)
    return content
  }
}
