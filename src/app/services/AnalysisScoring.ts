// 中文注释：置信度与质量评估（启发式，基于输入丰富度与响应特征，并非模型给出的概率）
import type { ConfidenceLevel, QualityLevel } from '../../domain/contracts/index.js'
import { DESIGNATOR_PATTERN, distinctDesignators } from './ResponseParser.js'

export type Score<L> = { score: number; level: L }

const TECHNICAL_TERMS = ['voltage', 'current', 'resistance', 'capacitance', 'frequency', 'power']
const ACTIONABLE_WORDS = ['recommend', 'suggest', 'should', 'add', 'remove', 'change', 'verify']
const SPECIFIC_REFERENCE = new RegExp(`\\d+[kMGT]?[ΩFHVAWHz]|${DESIGNATOR_PATTERN.source}`, 'gi')

/**
 * 置信度：基线 0.5；有可用数据表 +0.3；响应长于 500 字符 +0.1；不同位号/引脚引用超过 3 个 +0.1。
 * 以十分位整数累计，避免浮点误差影响阈值判断。
 */
export function estimateConfidence(responseText: string, hasDatasheet: boolean): Score<ConfidenceLevel> {
  let tenths = 5
  if (hasDatasheet) tenths += 3
  if (responseText.length > 500) tenths += 1
  if (distinctDesignators(responseText).length > 3) tenths += 1
  const score = Math.max(0, Math.min(10, tenths)) / 10
  const level: ConfidenceLevel = score >= 0.8 ? 'High' : score >= 0.6 ? 'Medium' : 'Low'
  return { score, level }
}

function countDistinct(text: string, words: string[]): number {
  const lower = text.toLowerCase()
  return words.filter((w) => lower.includes(w)).length
}

export function assessQuality(responseText: string): Score<QualityLevel> {
  let score = Math.min(countDistinct(responseText, TECHNICAL_TERMS), 5)
  score += Math.min(Array.from(responseText.matchAll(SPECIFIC_REFERENCE)).length, 10)
  if (responseText.length > 300) score += 2
  if (responseText.length > 600) score += 2
  score += Math.min(countDistinct(responseText, ACTIONABLE_WORDS), 5)
  const level: QualityLevel = score >= 15 ? 'Excellent' : score >= 10 ? 'Good' : score >= 5 ? 'Fair' : 'Basic'
  return { score, level }
}
