// 中文注释：最小 Ollama HTTP 客户端；
// - 使用 Node 原生 fetch（可注入替身，测试无需真实网络）；
// - 超时通过 AbortController 实现，与调用方的取消信号合并；
// - 传输失败、超时、取消分别映射为可识别的错误类型，供上层重试循环计数。
import { AnalysisCancelledError, ConnectivityError, TimeoutError } from '../../domain/errors.js'
import { errorMessage } from '../log/logger.js'

export type FetchFn = typeof fetch

export type HttpResult = { ok: boolean; status: number; text: string }

async function request(
  fetchFn: FetchFn,
  url: string,
  init: { method: 'GET' | 'POST'; body?: unknown },
  timeoutMs: number,
  signal?: AbortSignal
): Promise<HttpResult> {
  if (signal?.aborted) throw new AnalysisCancelledError()

  const controller = new AbortController()
  let timedOut = false
  const timeoutHandle = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, timeoutMs)
  const onAbort = () => controller.abort()
  signal?.addEventListener('abort', onAbort, { once: true })

  try {
    const resp = await fetchFn(url, {
      method: init.method,
      headers: init.body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
      signal: controller.signal
    })
    const text = await resp.text()
    return { ok: resp.ok, status: resp.status, text }
  } catch (err) {
    if (timedOut) throw new TimeoutError(timeoutMs)
    if (signal?.aborted) throw new AnalysisCancelledError()
    throw new ConnectivityError(`Cannot reach model endpoint at ${url}: ${errorMessage(err)}`)
  } finally {
    clearTimeout(timeoutHandle)
    signal?.removeEventListener('abort', onAbort)
  }
}

export function getJson(fetchFn: FetchFn, url: string, timeoutMs: number, signal?: AbortSignal): Promise<HttpResult> {
  return request(fetchFn, url, { method: 'GET' }, timeoutMs, signal)
}

export function postJson(fetchFn: FetchFn, url: string, body: unknown, timeoutMs: number, signal?: AbortSignal): Promise<HttpResult> {
  return request(fetchFn, url, { method: 'POST', body }, timeoutMs, signal)
}
