import { describe, it, expect, vi } from 'vitest'
import { RetryExhaustedError, retryWithDelay, sleep } from '../src/utils/retry.js'
import { AnalysisCancelledError } from '../src/domain/errors.js'

describe('retryWithDelay', () => {
  it('returns the first successful value', async () => {
    let calls = 0
    const fn = async (attempt: number) => {
      calls++
      if (attempt < 3) throw new Error(`fail ${attempt}`)
      return 'ok'
    }
    await expect(retryWithDelay(fn, { attempts: 3, delayMs: 0 })).resolves.toBe('ok')
    expect(calls).toBe(3)
  })

  it('reports every failed attempt and throws after the budget', async () => {
    const onAttemptFailed = vi.fn()
    const err = await retryWithDelay(async () => { throw new Error('always') }, { attempts: 2, delayMs: 0, onAttemptFailed })
      .catch((e: unknown) => e)
    expect(err).toBeInstanceOf(RetryExhaustedError)
    if (err instanceof RetryExhaustedError) {
      expect(err.attempts).toBe(2)
      expect(err.lastError).toEqual(new Error('always'))
    }
    expect(onAttemptFailed).toHaveBeenCalledTimes(2)
    expect(onAttemptFailed).toHaveBeenNthCalledWith(1, 1, new Error('always'))
  })

  it('does not call fn once the signal is aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    const fn = vi.fn(async () => 'never')
    await expect(retryWithDelay(fn, { attempts: 3, delayMs: 0, signal: controller.signal })).rejects.toBeInstanceOf(AnalysisCancelledError)
    expect(fn).not.toHaveBeenCalled()
  })

  it('rethrows cancellation without further attempts', async () => {
    let calls = 0
    const fn = async () => { calls++; throw new AnalysisCancelledError() }
    await expect(retryWithDelay(fn, { attempts: 3, delayMs: 0 })).rejects.toBeInstanceOf(AnalysisCancelledError)
    expect(calls).toBe(1)
  })
})

describe('sleep', () => {
  it('rejects when aborted while waiting', async () => {
    const controller = new AbortController()
    const pending = sleep(10_000, controller.signal)
    controller.abort()
    await expect(pending).rejects.toBeInstanceOf(AnalysisCancelledError)
  })
})
