import type { Request, Response } from 'express'
import type { ModelGateway } from '../../../domain/contracts/index.js'
import type { ResultCache } from '../../../infra/cache/ResultCache.js'
import { errorMessage, logger } from '../../../infra/log/logger.js'
import { getAnalysisCounters, getPreloadMetrics } from '../../../infra/metrics/runtimeMetrics.js'

// 中文注释：健康检查路由；附带模型服务状态、提示词预热与分析计数
export function makeHealthHandler(deps: { gateway: ModelGateway; cache?: ResultCache }) {
  return async function healthHandler(req: Request, res: Response) {
    try {
      const gateway = await deps.gateway.status()
      res.json({
        status: 'ok',
        service: 'schematic-agent',
        endpoint: 'health',
        gateway,
        preload: getPreloadMetrics(),
        analyses: getAnalysisCounters(),
        cache: { enabled: Boolean(deps.cache), size: deps.cache?.size ?? 0 }
      })
    } catch (e) {
      logger.error('health.failed', { error: errorMessage(e) })
      res.status(500).json({ error: 'failed to read service status' })
    }
  }
}
