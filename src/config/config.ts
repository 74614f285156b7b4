// 中文注释：集中配置读取，提供默认值，避免在业务代码中直接访问 process.env
/*
功能：配置加载（loadConfig）
用途：集中读取环境变量/默认值，构造一次后注入 AnalysisEngine/ContextBuilder/ModelGateway，不使用全局可变配置。
参数：
- env: 环境变量表（默认 process.env，测试中可传入普通对象）
返回：
- ServiceConfig 含端口、基础路径、模型端点、重试、缓存、图像限制等字段
示例：
// const cfg = loadConfig(); console.log(cfg.model.baseUrl)
*/
import type { GenerationOptions } from '../domain/contracts/index.js'

export type ServiceConfig = {
  port: number
  basePath: string
  storageRoot: string
  // 为空时由 PromptLibrary 自行在仓库内定位 prompts/ 目录
  promptDir?: string
  logLevel: 'debug' | 'info' | 'warn' | 'error'
  model: {
    baseUrl: string
    name: string
    timeoutMs: number
    probeTimeoutMs: number
  }
  analysis: {
    maxRetries: number
    retryDelayMs: number
    generation: GenerationOptions
  }
  cache: { enabled: boolean; maxEntries: number }
  image: { maxWidth: number; maxHeight: number; maxFileSizeMb: number }
}

type Env = Record<string, string | undefined>

function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback
  const n = Number(value)
  return Number.isFinite(n) ? n : fallback
}

function bool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback
  return value.trim().toLowerCase() !== 'false'
}

function level(value: string | undefined): ServiceConfig['logLevel'] {
  const v = String(value || '').toLowerCase()
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v
  return 'info'
}

export function loadConfig(env: Env = process.env): ServiceConfig {
  return {
    port: num(env.PORT, 4002),
    basePath: '/api/v1/schematic-agent',
    storageRoot: String(env.STORAGE_ROOT || 'storage'),
    promptDir: env.PROMPT_DIR && env.PROMPT_DIR.trim() ? env.PROMPT_DIR.trim() : undefined,
    logLevel: level(env.LOG_LEVEL),
    model: {
      baseUrl: String(env.OLLAMA_BASE_URL || 'http://localhost:11434').replace(/\/+$/, ''),
      name: String(env.OLLAMA_MODEL || 'llava'),
      timeoutMs: num(env.OLLAMA_TIMEOUT_MS, 60000),
      probeTimeoutMs: num(env.OLLAMA_PROBE_TIMEOUT_MS, 5000)
    },
    analysis: {
      maxRetries: num(env.ANALYSIS_MAX_RETRIES, 3),
      retryDelayMs: num(env.ANALYSIS_RETRY_DELAY_MS, 2000),
      // 低温度采样：技术评审追求一致性而非多样性
      generation: { temperature: 0.1, topP: 0.9, topK: 40, maxTokens: 2048 }
    },
    cache: {
      enabled: bool(env.RESULT_CACHE_ENABLED, true),
      maxEntries: num(env.RESULT_CACHE_MAX_ENTRIES, 100)
    },
    image: {
      maxWidth: 1920,
      maxHeight: 1080,
      maxFileSizeMb: num(env.MAX_FILE_SIZE_MB, 50)
    }
  }
}

// 中文注释：校验运行时关键配置的可用性与完整性。
// 返回错误消息数组；若数组为空表示校验通过。
export function validateRuntimeConfig(cfg: ServiceConfig): string[] {
  const errors: string[] = []

  try {
    const u = new URL(cfg.model.baseUrl)
    if (!(u.protocol === 'http:' || u.protocol === 'https:')) {
      errors.push('OLLAMA_BASE_URL appears invalid: scheme must be http:// or https://')
    }
  } catch {
    errors.push(`OLLAMA_BASE_URL is not a valid URL: ${cfg.model.baseUrl}`)
  }

  if (!cfg.model.name.trim()) errors.push('Missing OLLAMA_MODEL: model name must not be empty')
  if (!Number.isInteger(cfg.analysis.maxRetries) || cfg.analysis.maxRetries < 1) {
    errors.push('ANALYSIS_MAX_RETRIES must be an integer >= 1')
  }
  if (cfg.analysis.retryDelayMs < 0) errors.push('ANALYSIS_RETRY_DELAY_MS must be >= 0')
  if (cfg.model.timeoutMs <= 0) errors.push('OLLAMA_TIMEOUT_MS must be > 0')
  if (!Number.isInteger(cfg.cache.maxEntries) || cfg.cache.maxEntries < 1) {
    errors.push('RESULT_CACHE_MAX_ENTRIES must be an integer >= 1')
  }
  if (!cfg.storageRoot.trim()) errors.push('Missing STORAGE_ROOT: storage root path must be configured')

  return errors
}
