import fs from 'fs'
import path from 'path'
import type { ArtifactStore, SavedArtifact } from '../../domain/contracts/index.js'

// 中文注释：报告导出目录 <root>/artifacts，对外以 <urlBase>/artifacts/<filename> 静态提供
export class ArtifactStoreFs implements ArtifactStore {
  private readonly dir: string
  private readonly urlBase: string

  constructor(rootDir: string, urlBase: string) {
    this.dir = path.join(rootDir, 'artifacts')
    this.urlBase = urlBase.replace(/\/+$/, '')
  }

  async save(content: string, hint: string, opts?: { ext?: string }): Promise<SavedArtifact> {
    await fs.promises.mkdir(this.dir, { recursive: true })
    const stamp = new Date().toISOString().replace(/[:]/g, '-')
    const suffix = Math.floor(Math.random() * 0xffff).toString(16).padStart(4, '0')
    const base = (hint || 'report').replace(/[^a-zA-Z0-9._-]/g, '_').slice(0, 80)
    const filename = `${stamp}_${base}_${suffix}${opts?.ext ?? '.txt'}`
    await fs.promises.writeFile(path.join(this.dir, filename), content, 'utf8')
    return { url: `${this.urlBase}/artifacts/${filename}`, filename }
  }
}
