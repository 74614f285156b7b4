import { AnalysisCancelledError, throwIfAborted } from '../domain/errors.js'

export type RetryOptions = {
  attempts: number
  delayMs: number
  signal?: AbortSignal
  // 每次失败后回调（用于日志/时间线），attempt 从 1 开始
  onAttemptFailed?: (attempt: number, error: unknown) => void
}

export class RetryExhaustedError extends Error {
  constructor(public readonly attempts: number, public readonly lastError: unknown) {
    super(`retry exhausted after ${attempts} attempts`)
    this.name = 'RetryExhaustedError'
  }
}

/**
 * 可取消的等待：signal 触发时以 AnalysisCancelledError 结束
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) return reject(new AnalysisCancelledError())
    const onAbort = () => {
      clearTimeout(timer)
      reject(new AnalysisCancelledError())
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * 固定间隔重试：失败后等待 delayMs 再试，最多 attempts 次；
 * 每次调用与每次等待前都检查取消信号。
 */
export async function retryWithDelay<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.floor(opts.attempts))
  let lastError: unknown
  let tried = 0
  for (let attempt = 1; attempt <= attempts; attempt++) {
    throwIfAborted(opts.signal)
    tried = attempt
    try {
      return await fn(attempt)
    } catch (e) {
      lastError = e
      opts.onAttemptFailed?.(attempt, e)
      if (e instanceof AnalysisCancelledError) throw e
      if (attempt < attempts) await sleep(opts.delayMs, opts.signal)
    }
  }
  throw new RetryExhaustedError(tried, lastError)
}
