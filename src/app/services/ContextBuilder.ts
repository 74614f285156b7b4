/*
功能：分析上下文构建（ContextBuilder）
用途：合并原理图元信息、数据表摘要与分析模板/自定义问题，生成一次请求所需的完整上下文（提示词 + 图像包）。
参数：
- build({ schematic, image, datasheet?, analysisType, customQuery? })
返回：
- AnalysisContext（构建后冻结，不再修改）
示例：
// const ctx = builder.build({ schematic: { path: 'a.png' }, image, datasheet, analysisType: 'Power Supply Analysis' })
*/
import * as path from 'path'
import {
  CUSTOM_QUERY,
  type AnalysisContext,
  type AnalysisType,
  type DatasheetContext,
  type DatasheetRecord,
  type PreparedImage,
  type SchematicRef
} from '../../domain/contracts/index.js'
import { isUsableDatasheet, normalizeDatasheet, UNKNOWN_COMPONENT } from '../../validators/datasheetValidator.js'
import type { PromptLibrary } from '../../infra/prompts/PromptLibrary.js'
import { logger } from '../../infra/log/logger.js'

export const DEFAULT_CUSTOM_QUERY = 'Please analyze this schematic for any issues or recommendations.'
export function effectiveCustomQuery(customQuery: string | undefined): string {
  return (customQuery ?? '').trim() || DEFAULT_CUSTOM_QUERY
}

export const LIMITED_DATASHEET_SUMMARY = 'Limited datasheet information available'

// 提示词中每个数据表区块的字符上限，保证整体落在模型有效上下文内
export const PROMPT_BLOCK_LIMIT = 500
const MAX_PIN_LINES = 20
const MAX_SPEC_LINES = 15
const MAX_CIRCUITS = 5
const SPEC_PRIORITY = ['voltage', 'current', 'power', 'frequency', 'temperature']
const PACKAGE_PLACEHOLDERS = new Set([UNKNOWN_COMPONENT, 'Package information not found'])

export function truncateBlock(text: string, limit = PROMPT_BLOCK_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text
}

export function summarizeDatasheet(record: DatasheetRecord): string {
  const parts: string[] = []
  if (record.componentName && record.componentName !== UNKNOWN_COMPONENT) parts.push(`Component: ${record.componentName}`)
  if (record.features && record.features.length > 0) parts.push(`Features: ${record.features.slice(0, 3).join(', ')}`)
  if (record.operatingConditions && Object.keys(record.operatingConditions).length > 0) {
    parts.push('Has operating conditions specifications')
  }
  if (record.packageInfo && !PACKAGE_PLACEHOLDERS.has(record.packageInfo)) parts.push(`Package: ${record.packageInfo}`)
  return parts.length > 0 ? parts.join(' | ') : LIMITED_DATASHEET_SUMMARY
}

export function formatPinConfig(pins: Record<string, string>): string {
  return Object.entries(pins)
    .slice(0, MAX_PIN_LINES)
    .map(([pin, desc]) => `${pin}: ${desc}`)
    .join('\n')
}

/**
 * 电气参数：按 voltage/current/power/frequency/temperature 优先排列（每项只出现一次），
 * 其余参数补足到总行数上限
 */
export function formatElectricalSpecs(specs: Record<string, string>): string {
  const entries = Object.entries(specs)
  const used = new Set<string>()
  const lines: string[] = []
  for (const key of SPEC_PRIORITY) {
    for (const [name, value] of entries) {
      if (used.has(name) || !name.toLowerCase().includes(key)) continue
      used.add(name)
      lines.push(`${name}: ${value}`)
    }
  }
  for (const [name, value] of entries) {
    if (lines.length >= MAX_SPEC_LINES) break
    if (used.has(name)) continue
    used.add(name)
    lines.push(`${name}: ${value}`)
  }
  return lines.join('\n')
}

export function formatRecommendedCircuits(circuits: string[]): string {
  return circuits.slice(0, MAX_CIRCUITS).map((c, i) => `${i + 1}. ${c}`).join('\n')
}

export type BuildInput = {
  schematic: SchematicRef
  image: PreparedImage
  datasheet?: unknown
  analysisType: AnalysisType
  customQuery?: string
}

export class ContextBuilder {
  constructor(private prompts: PromptLibrary, private now: () => Date = () => new Date()) {}

  build(input: BuildInput): AnalysisContext {
    const record = normalizeDatasheet(input.datasheet)
    const hasDatasheet = isUsableDatasheet(record)
    const datasheet = Object.keys(record).length > 0 ? this.datasheetContext(record) : undefined

    const prompt = input.analysisType === CUSTOM_QUERY
      ? this.buildCustomPrompt(hasDatasheet ? datasheet : undefined, input.customQuery)
      : this.buildPresetPrompt(hasDatasheet ? datasheet : undefined, input.analysisType)

    const context: AnalysisContext = {
      analysisType: input.analysisType,
      prompt,
      image: Object.freeze({ ...input.image }),
      hasDatasheet,
      schematic: Object.freeze({
        path: input.schematic.path,
        filename: input.schematic.filename || path.basename(input.schematic.path)
      }),
      datasheet: datasheet ? Object.freeze(datasheet) : undefined,
      timestamp: this.now().toISOString()
    }
    logger.debug('context.built', { analysisType: input.analysisType, hasDatasheet, promptLength: prompt.length })
    return Object.freeze(context)
  }

  private datasheetContext(record: DatasheetRecord): DatasheetContext {
    const out: DatasheetContext = {
      componentName: record.componentName || 'Unknown Component',
      summary: summarizeDatasheet(record)
    }
    if (record.pinConfig) out.pinConfiguration = formatPinConfig(record.pinConfig)
    if (record.electricalSpecs) out.keySpecifications = formatElectricalSpecs(record.electricalSpecs)
    if (record.recommendedCircuits) out.designGuidelines = formatRecommendedCircuits(record.recommendedCircuits)
    return out
  }

  private buildPresetPrompt(datasheet: DatasheetContext | undefined, analysisType: AnalysisType): string {
    const template = this.prompts.getTemplate(analysisType)
    const parts = ['You are analyzing an electronic schematic with the following context:', '']

    if (datasheet) {
      parts.push('DATASHEET INFORMATION:', `Component: ${datasheet.componentName}`, `Summary: ${datasheet.summary}`, '')
      if (datasheet.pinConfiguration) parts.push('PIN CONFIGURATION:', truncateBlock(datasheet.pinConfiguration), '')
      if (datasheet.keySpecifications) parts.push('KEY SPECIFICATIONS:', truncateBlock(datasheet.keySpecifications), '')
      if (datasheet.designGuidelines) parts.push('RECOMMENDED CIRCUITS:', truncateBlock(datasheet.designGuidelines), '')
    }

    parts.push('ANALYSIS REQUEST:', template, '', 'Please analyze the schematic image and provide specific, actionable feedback.')
    if (datasheet) parts.push('Reference the datasheet information where applicable.')
    return parts.join('\n')
  }

  private buildCustomPrompt(datasheet: DatasheetContext | undefined, customQuery: string | undefined): string {
    // 中文注释：空问题以默认占位问题替代，不视为错误
    if (!(customQuery ?? '').trim()) logger.warn('context.custom_query_defaulted')
    const query = effectiveCustomQuery(customQuery)

    let framing = 'You are analyzing an electronic schematic. '
    if (datasheet) {
      framing += `The schematic is for a ${datasheet.componentName}. `
      framing += 'I have provided relevant datasheet information below for reference. '
    }
    const parts = [framing, '', 'USER QUERY:', query, '']

    if (datasheet) {
      parts.push('DATASHEET CONTEXT:', `Component: ${datasheet.componentName}`, `Summary: ${datasheet.summary}`)
      if (datasheet.pinConfiguration) parts.push('', 'PIN CONFIGURATION:', truncateBlock(datasheet.pinConfiguration))
      parts.push('')
    }

    parts.push('Please analyze the schematic image and answer the user\'s query. Provide specific details and reference the datasheet where applicable.')
    return parts.join('\n')
  }
}
