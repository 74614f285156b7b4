import type { ProgressStore, TimelineItem } from '../../domain/contracts/index.js'
import { errorMessage, logger } from '../../infra/log/logger.js'

// 中文注释：统一时间线写入与构造；阶段切换都经由这里记录
export class TimelineService {
  constructor(private progress: ProgressStore) {}

  make(step: string, meta?: Record<string, unknown>, opts?: { origin?: TimelineItem['origin']; category?: string }): TimelineItem {
    return { step, ts: Date.now(), origin: opts?.origin ?? 'agent', category: opts?.category ?? 'state', meta: meta ?? {} }
  }

  // 中文注释：时间线写入失败只记日志，不影响分析主流程
  async push(progressId: string | undefined, item: TimelineItem) {
    if (!progressId) return
    try {
      await this.progress.push(progressId, item)
    } catch (e) {
      logger.warn('timeline.push_failed', { progressId, step: item.step, error: errorMessage(e) })
    }
  }
}
