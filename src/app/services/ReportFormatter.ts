/*
功能：纯文本评审报告（formatAnalysisReport）
用途：把 AnalysisResult 导出为可保存/打印的纯文本报告，问题按类别分组。
参数：
- result: AnalysisResult
返回：
- string 多行文本
示例：
// const txt = formatAnalysisReport(result); await artifact.save(txt, 'analysis_report', { ext: '.txt' })
*/
import type { AnalysisResult, Issue } from '../../domain/contracts/index.js'

const RULE = '='.repeat(60)
const THIN = '-'.repeat(40)

function titleCase(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1)
}

export function formatAnalysisReport(result: AnalysisResult): string {
  const meta = result.metadata
  const lines: string[] = [`Schematic Analysis Report: ${result.analysisType}`, RULE, '', `Summary: ${result.summary}`, '']

  lines.push('Analysis Details:')
  lines.push(`  Schematic: ${meta.schematicFile}`)
  lines.push(`  Datasheet Available: ${meta.hasDatasheet ? 'Yes' : 'No'}`)
  if (meta.datasheetComponent && meta.datasheetComponent !== 'N/A') lines.push(`  Component: ${meta.datasheetComponent}`)
  lines.push(`  Confidence: ${meta.confidence}`)
  lines.push(`  Quality: ${meta.analysisQuality}`)
  if (typeof meta.analysisTime === 'number') lines.push(`  Analysis Time: ${meta.analysisTime.toFixed(1)}s`)
  lines.push('')

  lines.push('Analysis Results:', THIN)
  lines.push(result.content || 'No analysis content available.')

  if (result.findings.length > 0) {
    lines.push('', 'Detailed Findings:', THIN)
    result.findings.forEach((f, i) => lines.push(`${i + 1}. [${f.severity}] ${f.description}`))
  }

  if (result.recommendations.length > 0) {
    lines.push('', 'Recommendations:', THIN)
    result.recommendations.forEach((r, i) => lines.push(`${i + 1}. ${r}`))
  }

  if (result.issues.length > 0) {
    lines.push('', 'Issues by Category:', THIN)
    const groups = new Map<string, Issue[]>()
    for (const issue of result.issues) {
      const list = groups.get(issue.category)
      if (list) list.push(issue)
      else groups.set(issue.category, [issue])
    }
    for (const [category, issues] of groups) {
      lines.push(`\n${titleCase(category)}:`)
      for (const issue of issues) lines.push(`  [${issue.severity}] ${issue.component}: ${issue.description}`)
    }
  }

  lines.push('', '-'.repeat(60))
  if (meta.timestamp) lines.push(`Generated: ${meta.timestamp}`)
  lines.push('Generated by schematic-agent')
  return lines.join('\n')
}
