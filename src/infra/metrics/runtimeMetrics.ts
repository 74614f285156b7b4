/*
功能：运行时指标（轻量级）
用途：记录提示词预热结果与分析计数（总数、缓存命中、失败），供健康端点返回。
参数：
- setPreloadMetrics({ durationMs, at, ok })
- recordAnalysis({ cached, failed })
返回：
- getPreloadMetrics() / getAnalysisCounters()
示例：
// recordAnalysis({ cached: false, failed: true })
*/
let lastPreloadDurationMs: number | undefined
let lastPreloadAtIso: string | undefined
let lastPreloadOk: boolean | undefined

const counters = { total: 0, cacheHits: 0, failed: 0 }

export function setPreloadMetrics(input: { durationMs?: number; at?: string; ok?: boolean }) {
  if (typeof input.durationMs === 'number') lastPreloadDurationMs = input.durationMs
  if (typeof input.at === 'string') lastPreloadAtIso = input.at
  if (typeof input.ok === 'boolean') lastPreloadOk = input.ok
}

export function getPreloadMetrics() {
  return {
    durationMs: lastPreloadDurationMs,
    at: lastPreloadAtIso,
    ok: lastPreloadOk,
  }
}

export function recordAnalysis(outcome: { cached: boolean; failed: boolean }) {
  counters.total += 1
  if (outcome.cached) counters.cacheHits += 1
  if (outcome.failed) counters.failed += 1
}

export function getAnalysisCounters() {
  return { ...counters }
}

export function resetAnalysisCounters() {
  counters.total = 0
  counters.cacheHits = 0
  counters.failed = 0
}
