// 中文注释：结果的展示文本（摘要、Markdown 内容）与失败结果的统一构造
import type { AnalysisResult, AnalysisStage, Finding, Issue, Severity } from '../../domain/contracts/index.js'

const SEVERITY_ICON: Record<Severity, string> = {
  CRITICAL: '🔴',
  HIGH: '🟠',
  MEDIUM: '🟡',
  LOW: '🟢',
  INFO: 'ℹ️'
}

export const ERROR_RECOMMENDATIONS = [
  'Retry the analysis',
  'Check that the model service is running and reachable',
  'Verify file formats'
]

export function createSummary(findings: Finding[], issues: Issue[]): string {
  const parts: string[] = []
  if (issues.length > 0) {
    parts.push(`Found ${issues.length} potential issues`)
    const critical = issues.filter((i) => i.severity === 'CRITICAL').length
    const high = issues.filter((i) => i.severity === 'HIGH').length
    if (critical > 0) parts.push(`${critical} critical`)
    if (high > 0) parts.push(`${high} high priority`)
  } else {
    parts.push('No significant issues identified')
  }
  const verified = findings.filter((f) => f.type === 'verification').length
  if (verified > 0) parts.push(`${verified} items verified as correct`)
  return `${parts.join('. ')}.`
}

export function formatAnalysisContent(rawResponse: string, findings: Finding[], recommendations: string[]): string {
  const parts: string[] = []
  if (findings.length > 0) {
    parts.push('## Key Findings\n')
    findings.forEach((f, i) => parts.push(`${i + 1}. ${SEVERITY_ICON[f.severity]} ${f.description}\n`))
  }
  if (recommendations.length > 0) {
    parts.push('\n## Recommendations\n')
    recommendations.forEach((r, i) => parts.push(`${i + 1}. 💡 ${r}\n`))
  }
  // 没有结构化内容时直接展示原始响应
  if (findings.length === 0 && recommendations.length === 0) parts.push(rawResponse)
  return parts.join('\n')
}

/**
 * 失败结果：与成功结果同构，保证界面总有可渲染内容
 */
export function createErrorResult(params: {
  message: string
  analysisType: string
  schematicFile?: string
  stage?: AnalysisStage
  timestamp?: string
  analysisTime?: number
}): AnalysisResult {
  const { message } = params
  return {
    analysisType: params.analysisType,
    summary: `Analysis failed: ${message}`,
    content: [
      '❌ **Analysis Error**',
      '',
      message,
      '',
      'Please check:',
      '• The model service is running and accessible',
      '• The schematic image is valid',
      '• Network connectivity is stable',
      '',
      'Try running the analysis again or contact support if the problem persists.'
    ].join('\n'),
    findings: [],
    recommendations: [...ERROR_RECOMMENDATIONS],
    issues: [{ description: `Analysis failed: ${message}`, severity: 'CRITICAL', component: 'System', category: 'general' }],
    rawResponse: `Error: ${message}`,
    metadata: {
      schematicFile: params.schematicFile || 'Unknown',
      hasDatasheet: false,
      datasheetComponent: 'N/A',
      confidence: 'N/A',
      analysisQuality: 'Error',
      analysisTime: params.analysisTime,
      timestamp: params.timestamp || new Date().toISOString(),
      error: true,
      errorMessage: message,
      failedStage: params.stage
    }
  }
}
