/*
功能：本地多模态生成网关（OllamaVisionGateway）
用途：封装 Ollama /api/tags 连通性探测与 /api/generate 图文生成；只做传输与响应校验，不做重试（重试策略在编排层）。
参数：
- constructor({ baseUrl, model, timeoutMs, probeTimeoutMs }, fetchFn?)
- checkConnection()
- generate(prompt, image, options, signal?)
返回：
- Promise<boolean> / Promise<string> 原始文本
示例：
// const gw = new OllamaVisionGateway(cfg.model)
// const text = await gw.generate(prompt, base64, cfg.analysis.generation)
*/
import { z } from 'zod'
import type { GatewayStatus, GenerationOptions, ModelGateway } from '../../domain/contracts/index.js'
import { GenerationError } from '../../domain/errors.js'
import { getJson, postJson, type FetchFn } from '../http/OllamaClient.js'
import { errorMessage, logger } from '../log/logger.js'

const tagsSchema = z.object({
  models: z.array(z.object({ name: z.string().optional(), model: z.string().optional() }).passthrough()).default([])
})

const generateSchema = z.object({
  response: z.string(),
  done: z.boolean().optional()
}).passthrough()

export type OllamaGatewayOptions = {
  baseUrl: string
  model: string
  timeoutMs: number
  probeTimeoutMs?: number
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/**
 * 模型可用：列表中某个名称包含目标模型名，或以目标模型族（冒号前部分）开头
 */
export function isModelListed(model: string, names: string[]): boolean {
  const family = model.split(':')[0]
  return names.some((n) => n.includes(model) || n.startsWith(family))
}

export class OllamaVisionGateway implements ModelGateway {
  private fetchFn: FetchFn

  constructor(private opts: OllamaGatewayOptions, fetchFn?: FetchFn) {
    this.fetchFn = fetchFn ?? globalThis.fetch
  }

  private url(p: string): string {
    return `${this.opts.baseUrl.replace(/\/+$/, '')}${p}`
  }

  async listModels(): Promise<string[]> {
    const resp = await getJson(this.fetchFn, this.url('/api/tags'), this.opts.probeTimeoutMs ?? 5000)
    if (!resp.ok) throw new GenerationError(`model list returned status ${resp.status}`)
    const parsed = tagsSchema.safeParse(parseJson(resp.text))
    if (!parsed.success) throw new GenerationError('model list response is malformed')
    return parsed.data.models.map((m) => m.name ?? m.model ?? '').filter(Boolean)
  }

  async status(): Promise<GatewayStatus> {
    try {
      const availableModels = await this.listModels()
      return {
        reachable: true,
        model: this.opts.model,
        modelAvailable: isModelListed(this.opts.model, availableModels),
        availableModels
      }
    } catch (e) {
      return { reachable: false, model: this.opts.model, modelAvailable: false, availableModels: [], error: errorMessage(e) }
    }
  }

  async checkConnection(): Promise<boolean> {
    const s = await this.status()
    if (!s.reachable) {
      logger.warn('gateway.unreachable', { baseUrl: this.opts.baseUrl, error: s.error })
      return false
    }
    if (!s.modelAvailable) {
      logger.warn('gateway.model_missing', { model: this.opts.model, available: s.availableModels })
      return false
    }
    return true
  }

  async generate(prompt: string, image: string, options: GenerationOptions, signal?: AbortSignal): Promise<string> {
    const body = {
      model: this.opts.model,
      prompt,
      images: [image],
      stream: false,
      options: {
        temperature: options.temperature,
        top_p: options.topP,
        top_k: options.topK,
        num_predict: options.maxTokens
      }
    }
    const started = Date.now()
    logger.info('gateway.generate.start', { model: this.opts.model, promptLength: prompt.length, imageLength: image.length })
    const resp = await postJson(this.fetchFn, this.url('/api/generate'), body, this.opts.timeoutMs, signal)
    if (!resp.ok) throw new GenerationError(`upstream ${resp.status}: ${resp.text.slice(0, 200)}`)
    const parsed = generateSchema.safeParse(parseJson(resp.text))
    if (!parsed.success) throw new GenerationError('model response is not a valid generate payload')
    logger.info('gateway.generate.done', { elapsedMs: Date.now() - started, responseLength: parsed.data.response.length })
    return parsed.data.response
  }
}
