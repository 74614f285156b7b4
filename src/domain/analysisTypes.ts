import { ANALYSIS_TYPES, type AnalysisType } from './contracts/index.js'

// 中文注释：分析类型的标签与 slug 互转（slug 同时作为模板文件名）

export function slugOf(type: AnalysisType): string {
  return type.toLowerCase().replace(/\s+/g, '-')
}

/**
 * 按标签或 slug（大小写不敏感）解析分析类型；无法识别时返回 undefined
 */
export function resolveAnalysisType(input: string | undefined | null): AnalysisType | undefined {
  const v = String(input ?? '').trim().toLowerCase()
  if (!v) return undefined
  return ANALYSIS_TYPES.find((t) => t.toLowerCase() === v || slugOf(t) === v)
}

export function listAnalysisTypes(): Array<{ label: AnalysisType; slug: string }> {
  return ANALYSIS_TYPES.map((label) => ({ label, slug: slugOf(label) }))
}
