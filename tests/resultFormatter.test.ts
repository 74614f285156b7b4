import { describe, it, expect } from 'vitest'
import type { AnalysisResult } from '../src/domain/contracts/index.js'
import { ERROR_RECOMMENDATIONS, createErrorResult, createSummary, formatAnalysisContent } from '../src/app/services/ResultFormatter.js'
import { formatAnalysisReport } from '../src/app/services/ReportFormatter.js'

describe('createSummary', () => {
  it('reports issue counts and verified items', () => {
    const summary = createSummary(
      [{ description: 'C1 value matches datasheet.', severity: 'INFO', type: 'verification' }],
      [
        { description: 'R1 is missing', severity: 'CRITICAL', component: 'R1', category: 'components' },
        { description: 'pin 2 mismatch', severity: 'HIGH', component: 'pin 2', category: 'connectivity' },
        { description: 'minor label style', severity: 'LOW', component: 'General', category: 'general' }
      ]
    )
    expect(summary).toBe('Found 3 potential issues. 1 critical. 1 high priority. 1 items verified as correct.')
  })

  it('falls back to the no-issues sentence', () => {
    expect(createSummary([], [])).toBe('No significant issues identified.')
  })
})

describe('formatAnalysisContent', () => {
  it('renders findings and recommendations as markdown', () => {
    const content = formatAnalysisContent('raw', [{ description: 'R1 open', severity: 'HIGH', type: 'issue' }], ['add a pull-up'])
    expect(content).toBe('## Key Findings\n\n1. 🟠 R1 open\n\n\n## Recommendations\n\n1. 💡 add a pull-up\n')
  })

  it('returns the raw response when nothing was extracted', () => {
    expect(formatAnalysisContent('free text only', [], [])).toBe('free text only')
  })
})

describe('createErrorResult', () => {
  it('builds a renderable failure result', () => {
    const result = createErrorResult({
      message: 'model offline',
      analysisType: 'Design Compliance',
      schematicFile: 'board.png',
      stage: 'validating',
      timestamp: '2024-05-01T00:00:00.000Z'
    })
    expect(result.summary).toBe('Analysis failed: model offline')
    expect(result.rawResponse).toBe('Error: model offline')
    expect(result.recommendations).toEqual(ERROR_RECOMMENDATIONS)
    expect(result.issues).toEqual([{ description: 'Analysis failed: model offline', severity: 'CRITICAL', component: 'System', category: 'general' }])
    expect(result.content.split('\n')).toContain('• The schematic image is valid')
    expect(result.metadata).toMatchObject({
      schematicFile: 'board.png',
      confidence: 'N/A',
      analysisQuality: 'Error',
      error: true,
      errorMessage: 'model offline',
      failedStage: 'validating',
      timestamp: '2024-05-01T00:00:00.000Z'
    })
  })
})

describe('formatAnalysisReport', () => {
  const result: AnalysisResult = {
    analysisType: 'Power Supply Analysis',
    summary: 'Found 1 potential issues. 1 critical.',
    content: '## Key Findings',
    findings: [{ description: 'R1 is open', severity: 'CRITICAL', type: 'issue' }],
    recommendations: ['add a bleeder resistor'],
    issues: [{ description: 'R1 is open', severity: 'CRITICAL', component: 'R1', category: 'components' }],
    rawResponse: 'Issue: R1 is open',
    metadata: {
      schematicFile: 'psu.png',
      hasDatasheet: true,
      datasheetComponent: 'LM7805',
      confidence: 'High',
      analysisQuality: 'Fair',
      analysisTime: 1.5,
      timestamp: '2024-05-01T00:00:00.000Z'
    }
  }

  it('writes the header, details and grouped issues', () => {
    const lines = formatAnalysisReport(result).split('\n')
    expect(lines[0]).toBe('Schematic Analysis Report: Power Supply Analysis')
    expect(lines[1]).toBe('='.repeat(60))
    expect(lines).toContain('Summary: Found 1 potential issues. 1 critical.')
    expect(lines).toContain('  Component: LM7805')
    expect(lines).toContain('  Analysis Time: 1.5s')
    expect(lines).toContain('1. [CRITICAL] R1 is open')
    expect(lines).toContain('1. add a bleeder resistor')
    expect(lines).toContain('Components:')
    expect(lines).toContain('  [CRITICAL] R1: R1 is open')
    expect(lines).toContain('Generated: 2024-05-01T00:00:00.000Z')
    expect(lines[lines.length - 1]).toBe('Generated by schematic-agent')
  })

  it('omits empty sections', () => {
    const report = formatAnalysisReport({ ...result, findings: [], recommendations: [], issues: [] })
    expect(report.split('\n')).not.toContain('Detailed Findings:')
    expect(report.split('\n')).not.toContain('Issues by Category:')
  })
})
