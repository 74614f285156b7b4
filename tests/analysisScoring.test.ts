import { describe, it, expect } from 'vitest'
import { assessQuality, estimateConfidence } from '../src/app/services/AnalysisScoring.js'

describe('estimateConfidence', () => {
  it('starts at 0.5 and rises with a usable datasheet', () => {
    expect(estimateConfidence('short reply', false)).toEqual({ score: 0.5, level: 'Low' })
    expect(estimateConfidence('short reply', true)).toEqual({ score: 0.8, level: 'High' })
  })

  it('adds length and designator bonuses', () => {
    const text = `R1 R2 R3 R4 ${'x'.repeat(500)}`
    expect(estimateConfidence(text, false)).toEqual({ score: 0.7, level: 'Medium' })
    expect(estimateConfidence(text, true)).toEqual({ score: 1, level: 'High' })
  })

  it('needs more than three distinct designators', () => {
    expect(estimateConfidence('R1 R2 R3 r1', false).score).toBe(0.5)
  })
})

describe('assessQuality', () => {
  it('rates an empty-ish reply as Basic', () => {
    expect(assessQuality('ok')).toEqual({ score: 0, level: 'Basic' })
  })

  it('counts terms, references and actionable words', () => {
    const text = 'The supply voltage of 5V at R1 should be verified; add a 10uF capacitor.'
    expect(assessQuality(text)).toEqual({ score: 5, level: 'Fair' })
  })

  it('caps each contribution', () => {
    const refs = Array.from({ length: 20 }, (_, i) => `R${i + 1}`).join(' ')
    const words = 'voltage current resistance capacitance frequency power recommend suggest should add remove change verify'
    const text = `${refs} ${words} ${'.'.repeat(600)}`
    // 5 terms + 10 references + 4 length + 5 actionable
    expect(assessQuality(text)).toEqual({ score: 24, level: 'Excellent' })
  })
})
