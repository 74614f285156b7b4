import type { Request, Response } from 'express'
import type { ResultCache } from '../../../infra/cache/ResultCache.js'

// 中文注释：清空结果缓存；未启用缓存时返回 enabled=false
export function makeCacheClearHandler(cache?: ResultCache) {
  return function cacheClearHandler(req: Request, res: Response) {
    if (!cache) {
      res.json({ enabled: false, cleared: 0 })
      return
    }
    const cleared = cache.size
    cache.clear()
    res.json({ enabled: true, cleared })
  }
}
