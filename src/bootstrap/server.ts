import express from 'express'
import dotenv from 'dotenv'
import cors from 'cors'
import path from 'path'
import { loadConfig, validateRuntimeConfig } from '../config/config.js'
import { errorMessage, logger, setLogLevel } from '../infra/log/logger.js'
import { setPreloadMetrics } from '../infra/metrics/runtimeMetrics.js'
import { PromptLibrary } from '../infra/prompts/PromptLibrary.js'
import { OllamaVisionGateway } from '../infra/providers/OllamaVisionGateway.js'
import { SharpImageSource } from '../infra/image/SharpImageSource.js'
import { ResultCache } from '../infra/cache/ResultCache.js'
import { ProgressMemoryStore } from '../infra/progress/ProgressMemoryStore.js'
import { ArtifactStoreFs } from '../infra/storage/ArtifactStoreFs.js'
import { TimelineService } from '../app/services/TimelineService.js'
import { ContextBuilder } from '../app/services/ContextBuilder.js'
import { AnalysisEngine } from '../app/usecases/AnalysisEngine.js'
import { makeHealthHandler } from '../interface/http/routes/health.js'
import { analysisTypesHandler } from '../interface/http/routes/analysisTypes.js'
import { makeProgressHandler } from '../interface/http/routes/progress.js'
import { makeCacheClearHandler } from '../interface/http/routes/cache.js'
import { makeAnalyzeRouter } from '../interface/http/routes/analyze.js'

// 中文注释：加载环境变量
dotenv.config()

const cfg = loadConfig()
setLogLevel(cfg.logLevel)
const BASE_PATH = cfg.basePath

// 中文注释：配置问题只告警不退出，便于在模型服务尚未就绪时先启动服务
for (const problem of validateRuntimeConfig(cfg)) logger.warn('config.invalid', { problem })

// 中文注释：启动时预热全部分析模板；任一模板缺失则直接退出
const prompts = new PromptLibrary(cfg.promptDir)
const preloadStarted = Date.now()
try {
  prompts.preload({ strict: true })
  setPreloadMetrics({ durationMs: Date.now() - preloadStarted, at: new Date().toISOString(), ok: true })
  logger.info('prompts.preloaded', { dir: prompts.dir, durationMs: Date.now() - preloadStarted })
} catch (e) {
  setPreloadMetrics({ durationMs: Date.now() - preloadStarted, at: new Date().toISOString(), ok: false })
  logger.error('prompts.preload_failed', { dir: prompts.dir, error: errorMessage(e) })
  process.exit(1)
}

const app = express()

const corsOptions = {
  origin: ['http://localhost:3002', 'http://127.0.0.1:3002', 'http://localhost:5173', 'http://127.0.0.1:5173'],
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type'],
  optionsSuccessStatus: 204,
  maxAge: 86400,
}
app.use(cors(corsOptions))
app.options('*', cors(corsOptions))
app.use(express.json({ limit: '10mb' }))

const gateway = new OllamaVisionGateway({
  baseUrl: cfg.model.baseUrl,
  model: cfg.model.name,
  timeoutMs: cfg.model.timeoutMs,
  probeTimeoutMs: cfg.model.probeTimeoutMs
})
const cache = cfg.cache.enabled ? new ResultCache({ maxEntries: cfg.cache.maxEntries }) : undefined
const progressStore = new ProgressMemoryStore()
const timeline = new TimelineService(progressStore)
const artifact = new ArtifactStoreFs(cfg.storageRoot, BASE_PATH)
const engine = new AnalysisEngine({
  gateway,
  images: new SharpImageSource(cfg.image),
  contexts: new ContextBuilder(prompts),
  timeline,
  analysis: cfg.analysis,
  cache
})

app.get(`${BASE_PATH}/health`, makeHealthHandler({ gateway, cache }))
app.get(`${BASE_PATH}/analysis-types`, analysisTypesHandler)
app.get(`${BASE_PATH}/progress/:id`, makeProgressHandler(progressStore))
app.post(`${BASE_PATH}/cache/clear`, makeCacheClearHandler(cache))

const analyze = makeAnalyzeRouter({ engine, artifact, storageRoot: cfg.storageRoot, maxFileSizeMb: cfg.image.maxFileSizeMb })
app.post(`${BASE_PATH}/analyze`, analyze.upload.single('image'), analyze.handler)

// 中文注释：已保存的报告
app.use(`${BASE_PATH}/artifacts`, express.static(path.join(cfg.storageRoot, 'artifacts')))

// 中文注释：multer 超限等中间件错误统一返回 JSON
app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
  if (res.headersSent) return next(err)
  logger.warn('http.request_failed', { path: req.path, error: errorMessage(err) })
  res.status(400).json({ error: errorMessage(err) })
})

app.listen(cfg.port, () => {
  logger.info('server.listening', { url: `http://localhost:${cfg.port}${BASE_PATH}/health`, model: cfg.model.name })
})
