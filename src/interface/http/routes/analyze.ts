import type { Request, Response } from 'express'
import multer from 'multer'
import path from 'path'
import fs from 'fs'
import { randomUUID } from 'crypto'
import type { AnalysisEngine } from '../../../app/usecases/AnalysisEngine.js'
import { formatAnalysisReport } from '../../../app/services/ReportFormatter.js'
import type { ArtifactStore } from '../../../domain/contracts/index.js'
import { errorMessage, logger } from '../../../infra/log/logger.js'
import { validateAnalyzeRequest } from '../../../validators/analyzeRequestValidator.js'

// 中文注释：分析入口；支持 multipart 上传（字段 image）或 JSON 中的 imagePath。
// 同一时间只允许一个分析在执行，其余请求返回 409。
export function makeAnalyzeRouter(deps: {
  engine: AnalysisEngine
  artifact: ArtifactStore
  storageRoot: string
  maxFileSizeMb: number
}) {
  const uploadDir = path.join(deps.storageRoot, 'tmp')
  fs.mkdirSync(uploadDir, { recursive: true })
  // 中文注释：临时文件名保留原扩展名，图像预处理按扩展名判断格式
  const storage = multer.diskStorage({
    destination: uploadDir,
    filename: (_req, file, cb) => cb(null, `${randomUUID()}${path.extname(file.originalname).toLowerCase()}`)
  })
  const upload = multer({ storage, limits: { fileSize: deps.maxFileSizeMb * 1024 * 1024 } })
  let busy = false

  const handler = async (req: Request, res: Response) => {
    const uploaded = req.file
    try {
      if (busy) {
        res.status(409).json({ error: 'another analysis is already running' })
        return
      }
      const v = validateAnalyzeRequest(req.body)
      if (!v.valid) {
        res.status(400).json({ error: 'invalid request', details: v.errors })
        return
      }
      const imagePath = uploaded?.path ?? v.value.imagePath
      if (!imagePath) {
        res.status(400).json({ error: 'an image file or imagePath is required' })
        return
      }

      busy = true
      // 中文注释：客户端断开时取消分析（重试等待与模型调用都会响应取消）
      const controller = new AbortController()
      const onClose = () => {
        if (!res.writableFinished) controller.abort()
      }
      res.on('close', onClose)
      try {
        const result = await deps.engine.analyze({
          image: { path: imagePath, filename: uploaded?.originalname },
          analysisType: v.value.analysisType,
          customQuery: v.value.customQuery,
          datasheet: v.value.datasheet,
          progressId: v.value.progressId,
          signal: controller.signal
        })
        if (v.value.saveReport && !result.metadata.error) {
          const report = await deps.artifact.save(formatAnalysisReport(result), 'schematic_analysis_report', { ext: '.txt' })
          res.json({ ...result, report })
        } else {
          res.json(result)
        }
      } finally {
        busy = false
        res.off('close', onClose)
      }
    } catch (e) {
      logger.error('analyze.route_failed', { error: errorMessage(e) })
      res.status(500).json({ error: errorMessage(e) || 'internal error' })
    } finally {
      if (uploaded) {
        await fs.promises.unlink(uploaded.path).catch((e: unknown) => logger.warn('analyze.tmp_cleanup_failed', { path: uploaded.path, error: errorMessage(e) }))
      }
    }
  }

  return { upload, handler }
}
