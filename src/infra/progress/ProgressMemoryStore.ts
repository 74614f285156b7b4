/*
功能：进度存储（内存实现）
用途：记录每次分析的阶段时间线，供前端按 progressId 轮询；超过容量时淘汰最早的会话。
参数：
- init(id) / push(id, item) / get(id) / clear(id)
返回：
- Promise<void> 或 TimelineItem[]
示例：
// const store = new ProgressMemoryStore(); await store.init(id); await store.push(id, item)
*/
import type { ProgressStore, TimelineItem } from '../../domain/contracts/index.js'

export class ProgressMemoryStore implements ProgressStore {
  private store: Map<string, TimelineItem[]> = new Map()

  constructor(private maxSessions = 500) {}

  private track(id: string, items: TimelineItem[]) {
    this.store.set(id, items)
    while (this.store.size > this.maxSessions) {
      const oldest = this.store.keys().next()
      if (oldest.done) break
      this.store.delete(oldest.value)
    }
  }

  async init(id: string): Promise<void> {
    if (!id) return
    if (!this.store.has(id)) this.track(id, [])
  }

  async push(id: string, item: TimelineItem): Promise<void> {
    if (!id) return
    const arr = this.store.get(id)
    if (arr) arr.push(item)
    else this.track(id, [item])
  }

  async get(id: string): Promise<TimelineItem[]> {
    return this.store.get(id) || []
  }

  async clear(id: string): Promise<void> {
    this.store.delete(id)
  }
}
