import { describe, it, expect, vi } from 'vitest'
import type { ProgressStore, TimelineItem } from '../src/domain/contracts/index.js'
import { ProgressMemoryStore } from '../src/infra/progress/ProgressMemoryStore.js'
import { TimelineService } from '../src/app/services/TimelineService.js'

const item = (step: string): TimelineItem => ({ step, ts: 1, origin: 'agent' })

describe('ProgressMemoryStore', () => {
  it('appends items per id and clears them', async () => {
    const store = new ProgressMemoryStore()
    await store.init('a')
    expect(await store.get('a')).toEqual([])
    await store.push('a', item('analysis.validating'))
    await store.push('a', item('analysis.done'))
    expect((await store.get('a')).map((i) => i.step)).toEqual(['analysis.validating', 'analysis.done'])
    await store.clear('a')
    expect(await store.get('a')).toEqual([])
  })

  it('keeps only the most recent ids', async () => {
    const store = new ProgressMemoryStore(2)
    await store.push('first', item('s1'))
    await store.push('second', item('s2'))
    await store.init('third')
    expect(await store.get('first')).toEqual([])
    expect(await store.get('second')).toEqual([item('s2')])
    expect(await store.get('third')).toEqual([])
  })
})

describe('TimelineService', () => {
  it('fills origin and category defaults', () => {
    vi.spyOn(Date, 'now').mockReturnValue(42)
    const timeline = new TimelineService(new ProgressMemoryStore())
    expect(timeline.make('analysis.attempt', { attempt: 1 })).toEqual({
      step: 'analysis.attempt',
      ts: 42,
      origin: 'agent',
      category: 'state',
      meta: { attempt: 1 }
    })
    vi.restoreAllMocks()
  })

  it('skips pushes without an id and survives store failures', async () => {
    const failing: ProgressStore = {
      init: async () => {},
      push: async () => { throw new Error('store down') },
      get: async () => [],
      clear: async () => {}
    }
    const timeline = new TimelineService(failing)
    await expect(timeline.push(undefined, item('x'))).resolves.toBeUndefined()
    await expect(timeline.push('run-1', item('x'))).resolves.toBeUndefined()
  })
})
