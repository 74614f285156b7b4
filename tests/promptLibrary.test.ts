import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { ANALYSIS_TYPES } from '../src/domain/contracts/index.js'
import { PromptLibrary, PromptLoadError } from '../src/infra/prompts/PromptLibrary.js'

describe('PromptLibrary with the bundled templates', () => {
  const lib = new PromptLibrary()

  it('loads a non-empty template for every analysis type', () => {
    for (const type of ANALYSIS_TYPES) expect(lib.getTemplate(type).length).toBeGreaterThan(0)
    expect(() => lib.preload({ strict: true })).not.toThrow()
  })

  it('resolves slugs and falls back to the custom query template', () => {
    expect(lib.getTemplate('power-supply-analysis')).toBe(lib.getTemplate('Power Supply Analysis'))
    expect(lib.getTemplate('Thermal Analysis')).toBe(lib.getTemplate('Custom Query'))
    expect(lib.isRecognized('Thermal Analysis')).toBe(false)
    expect(lib.isRecognized('design compliance')).toBe(true)
    expect(lib.categories()).toEqual(ANALYSIS_TYPES)
  })
})

describe('PromptLibrary strict behaviors', () => {
  let dir = ''

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'prompts-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('throws PromptLoadError when the file is missing', () => {
    const lib = new PromptLibrary(dir)
    expect(() => lib.getTemplate('Design Compliance')).toThrowError(PromptLoadError)
  })

  it('throws PromptLoadError when the file is blank', () => {
    fs.writeFileSync(path.join(dir, 'design-compliance.md'), '  \n', 'utf8')
    const lib = new PromptLibrary(dir)
    expect(() => lib.getTemplate('Design Compliance')).toThrowError('Prompt file is empty')
  })

  it('fails a strict preload but tolerates a lenient one', () => {
    fs.writeFileSync(path.join(dir, 'custom-query.md'), 'Answer the question.', 'utf8')
    const lib = new PromptLibrary(dir)
    expect(() => lib.preload({ strict: true })).toThrowError(PromptLoadError)
    expect(() => lib.preload()).not.toThrow()
    expect(lib.getTemplate('anything else')).toBe('Answer the question.')
  })

  it('serves cached text until the cache is cleared', () => {
    const file = path.join(dir, 'missing-components.md')
    fs.writeFileSync(file, 'first version\n', 'utf8')
    const lib = new PromptLibrary(dir)
    expect(lib.getTemplate('Missing Components')).toBe('first version')
    fs.writeFileSync(file, 'second version', 'utf8')
    expect(lib.getTemplate('Missing Components')).toBe('first version')
    lib.clearCache()
    expect(lib.getTemplate('Missing Components')).toBe('second version')
  })
})
