/*
功能：分析编排（AnalysisEngine）
用途：按 校验 → 构建上下文 → 调用模型（带重试）→ 解析打分 的状态机执行一次原理图分析；
      任何阶段的异常都在此收敛为统一结构的失败结果，analyze() 本身永不 reject。
参数：
- constructor({ gateway, images, contexts, timeline, analysis, cache? })
- analyze(request: AnalysisRequest)
返回：
- Promise<AnalysisResult>（失败时 metadata.error = true）
示例：
// const result = await engine.analyze({ image: { path: 'board.png' }, analysisType: 'Power Supply Analysis' })
*/
import fs from 'fs'
import path from 'path'
import type {
  AnalysisContext,
  AnalysisRequest,
  AnalysisResult,
  AnalysisStage,
  AnalysisType,
  GenerationOptions,
  ImageSource,
  ModelGateway
} from '../../domain/contracts/index.js'
import { CUSTOM_QUERY } from '../../domain/contracts/index.js'
import { resolveAnalysisType } from '../../domain/analysisTypes.js'
import {
  AnalysisCancelledError,
  ContextBuildError,
  GenerationError,
  GenerationFailure,
  ValidationError,
  throwIfAborted
} from '../../domain/errors.js'
import { computeFingerprint, type ResultCache } from '../../infra/cache/ResultCache.js'
import { errorMessage, logger } from '../../infra/log/logger.js'
import { recordAnalysis } from '../../infra/metrics/runtimeMetrics.js'
import { RetryExhaustedError, retryWithDelay } from '../../utils/retry.js'
import { normalizeDatasheet } from '../../validators/datasheetValidator.js'
import { assessQuality, estimateConfidence } from '../services/AnalysisScoring.js'
import { effectiveCustomQuery, type ContextBuilder } from '../services/ContextBuilder.js'
import { parseAnalysisResponse } from '../services/ResponseParser.js'
import { createErrorResult, createSummary, formatAnalysisContent } from '../services/ResultFormatter.js'
import type { TimelineService } from '../services/TimelineService.js'

// 去除首尾空白后不超过该长度的响应视为空响应，计为一次失败尝试
export const MIN_RESPONSE_LENGTH = 10

export type AnalysisEngineDeps = {
  gateway: ModelGateway
  images: ImageSource
  contexts: ContextBuilder
  timeline: TimelineService
  analysis: { maxRetries: number; retryDelayMs: number; generation: GenerationOptions }
  cache?: ResultCache
  clock?: () => number
}

type PipelineOutcome =
  | { kind: 'done'; result: AnalysisResult }
  | { kind: 'failed'; stage: AnalysisStage; error: unknown }

// 中文注释：单次分析的阶段跟踪；每次切换写入时间线
class RunState {
  stage: AnalysisStage = 'idle'

  constructor(private timeline: TimelineService, private progressId: string | undefined) {}

  async enter(stage: AnalysisStage, meta?: Record<string, unknown>) {
    this.stage = stage
    await this.note(`analysis.${stage}`, meta)
  }

  async note(step: string, meta?: Record<string, unknown>) {
    await this.timeline.push(this.progressId, this.timeline.make(step, meta, { category: 'analysis' }))
  }
}

async function fileExists(p: string): Promise<boolean> {
  try {
    const st = await fs.promises.stat(p)
    return st.isFile()
  } catch {
    return false
  }
}

export class AnalysisEngine {
  private clock: () => number

  constructor(private deps: AnalysisEngineDeps) {
    this.clock = deps.clock ?? Date.now
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    const started = this.clock()
    const run = new RunState(this.deps.timeline, request.progressId)
    const schematicFile = request.image.filename || path.basename(request.image.path)
    logger.info('analysis.start', { analysisType: request.analysisType, schematicFile })

    let outcome: PipelineOutcome
    let cached = false
    try {
      const cache = this.deps.cache
      const analysisType = resolveAnalysisType(request.analysisType)
      if (cache && analysisType) {
        const fingerprint = await computeFingerprint({
          imagePath: request.image.path,
          analysisType,
          datasheet: normalizeDatasheet(request.datasheet),
          query: analysisType === CUSTOM_QUERY ? effectiveCustomQuery(request.customQuery) : undefined
        })
        // 中文注释：查缓存与写缓存在同一临界区内完成，并发调用方不会重复调用模型
        outcome = await cache.withLock<PipelineOutcome>(async () => {
          const hit = cache.get(fingerprint)
          if (hit) {
            cached = true
            return { kind: 'done', result: structuredClone(hit) }
          }
          const fresh = await this.runPipeline(request, run, started)
          if (fresh.kind === 'done') cache.put(fingerprint, structuredClone(fresh.result))
          return fresh
        })
      } else {
        outcome = await this.runPipeline(request, run, started)
      }
    } catch (error) {
      outcome = { kind: 'failed', stage: run.stage, error }
    }

    const result = await this.collapse(outcome, request, run, started, schematicFile, cached)
    recordAnalysis({ cached, failed: result.metadata.error === true })
    return result
  }

  private async collapse(
    outcome: PipelineOutcome,
    request: AnalysisRequest,
    run: RunState,
    started: number,
    schematicFile: string,
    cached: boolean
  ): Promise<AnalysisResult> {
    if (outcome.kind === 'done') {
      if (cached) {
        logger.info('analysis.cache_hit', { analysisType: outcome.result.analysisType, schematicFile })
        await run.note('analysis.cache_hit')
        return { ...outcome.result, metadata: { ...outcome.result.metadata, cached: true } }
      }
      await run.enter('done', { issues: outcome.result.issues.length, findings: outcome.result.findings.length })
      logger.info('analysis.done', {
        analysisType: outcome.result.analysisType,
        issues: outcome.result.issues.length,
        confidence: outcome.result.metadata.confidence,
        quality: outcome.result.metadata.analysisQuality,
        analysisTime: outcome.result.metadata.analysisTime
      })
      return outcome.result
    }

    const message = errorMessage(outcome.error)
    const failedStage = outcome.stage
    logger.error('analysis.failed', { stage: failedStage, error: outcome.error })
    await run.enter('errored', { stage: failedStage, error: message })
    return createErrorResult({
      message,
      analysisType: resolveAnalysisType(request.analysisType) ?? request.analysisType,
      schematicFile,
      stage: failedStage,
      analysisTime: this.elapsedSeconds(started)
    })
  }

  private async runPipeline(request: AnalysisRequest, run: RunState, started: number): Promise<PipelineOutcome> {
    try {
      const analysisType = await this.validate(request, run)
      const context = await this.buildContext(request, analysisType, run)
      const raw = await this.invoke(context, request.signal, run)
      await run.enter('parsing', { responseLength: raw.length })
      return { kind: 'done', result: this.assemble(context, raw, started) }
    } catch (error) {
      return { kind: 'failed', stage: run.stage, error }
    }
  }

  private async validate(request: AnalysisRequest, run: RunState): Promise<AnalysisType> {
    await run.enter('validating')
    throwIfAborted(request.signal)
    if (!(await fileExists(request.image.path))) {
      throw new ValidationError(`Schematic file not found: ${request.image.path}`, 'file_not_found')
    }
    const analysisType = resolveAnalysisType(request.analysisType)
    if (!analysisType) {
      throw new ValidationError(`Invalid analysis type: ${request.analysisType}`, 'invalid_category')
    }
    if (!(await this.deps.gateway.checkConnection())) {
      throw new ValidationError('Cannot connect to the model service. Please ensure it is running and the model is installed.', 'not_connected')
    }
    return analysisType
  }

  private async buildContext(request: AnalysisRequest, analysisType: AnalysisType, run: RunState): Promise<AnalysisContext> {
    await run.enter('building_context')
    try {
      throwIfAborted(request.signal)
      const image = await this.deps.images.prepare(request.image.path)
      if (!image.ready) throw new Error(image.error || 'Image not ready')
      return this.deps.contexts.build({
        schematic: request.image,
        image,
        datasheet: request.datasheet,
        analysisType,
        customQuery: request.customQuery
      })
    } catch (e) {
      if (e instanceof AnalysisCancelledError) throw e
      throw new ContextBuildError(`Failed to build analysis context: ${errorMessage(e)}`, e)
    }
  }

  private async invoke(context: AnalysisContext, signal: AbortSignal | undefined, run: RunState): Promise<string> {
    await run.enter('invoking')
    const { maxRetries, retryDelayMs, generation } = this.deps.analysis
    try {
      return await retryWithDelay(async (attempt) => {
        await run.note('analysis.attempt', { attempt })
        const text = await this.deps.gateway.generate(context.prompt, context.image.encodedImage, generation, signal)
        const length = text.trim().length
        if (length <= MIN_RESPONSE_LENGTH) throw new GenerationError(`Empty or too short response from model (${length} chars)`)
        return text
      }, {
        attempts: maxRetries,
        delayMs: retryDelayMs,
        signal,
        onAttemptFailed: (attempt, error) => logger.warn('analysis.attempt_failed', { attempt, maxRetries, error })
      })
    } catch (e) {
      if (e instanceof RetryExhaustedError) throw new GenerationFailure(e.attempts, e.lastError)
      throw e
    }
  }

  private assemble(context: AnalysisContext, raw: string, started: number): AnalysisResult {
    const { findings, recommendations, issues } = parseAnalysisResponse(raw)
    const confidence = estimateConfidence(raw, context.hasDatasheet)
    const quality = assessQuality(raw)
    return {
      analysisType: context.analysisType,
      summary: createSummary(findings, issues),
      content: formatAnalysisContent(raw, findings, recommendations),
      findings,
      recommendations,
      issues,
      rawResponse: raw,
      metadata: {
        schematicFile: context.schematic.filename,
        hasDatasheet: context.hasDatasheet,
        datasheetComponent: context.hasDatasheet && context.datasheet ? context.datasheet.componentName : 'N/A',
        confidence: confidence.level,
        confidenceScore: confidence.score,
        analysisQuality: quality.level,
        qualityScore: quality.score,
        analysisTime: this.elapsedSeconds(started),
        timestamp: context.timestamp,
        error: false
      }
    }
  }

  private elapsedSeconds(started: number): number {
    return Math.round(this.clock() - started) / 1000
  }
}
