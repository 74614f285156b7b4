/**
 * ResponseParser
 *
 * 将模型返回的自然语言文本解析为 Finding / 建议 / Issue 列表。
 * 模型输出视为不可信的自由文本：解析为尽力而为，任何输入都不会抛出异常，最差情况返回空列表。
 * 严重度与类别分类均为“有序 (谓词, 标签) 列表，首个命中即返回”。
 */
import type { Finding, Issue, IssueCategory, Severity } from '../../domain/contracts/index.js'

export const MAX_FINDINGS = 10
export const MAX_RECOMMENDATIONS = 8
export const MAX_ISSUES = 8
const MIN_BODY_LENGTH = 10
const MIN_SENTENCE_LENGTH = 10

type Rule<L> = { label: L; keywords: readonly string[] }

export const SEVERITY_RULES: readonly Rule<Exclude<Severity, 'INFO'>>[] = [
  { label: 'CRITICAL', keywords: ['missing', 'incorrect', 'wrong', 'error', 'fault', 'broken', 'failed'] },
  { label: 'HIGH', keywords: ['warning', 'concern', 'problem', 'issue', 'mismatch', 'violation'] },
  { label: 'MEDIUM', keywords: ['suboptimal', 'improvement', 'better', 'alternative', 'consider'] },
  { label: 'LOW', keywords: ['minor', 'cosmetic', 'style', 'preference', 'optional'] }
]

export const CATEGORY_RULES: readonly Rule<Exclude<IssueCategory, 'general'>>[] = [
  { label: 'connectivity', keywords: ['pin', 'connection', 'wire', 'trace'] },
  { label: 'power', keywords: ['voltage', 'power', 'supply', 'vcc', 'gnd'] },
  { label: 'components', keywords: ['capacitor', 'resistor', 'inductor', 'component'] },
  { label: 'specifications', keywords: ['value', 'rating', 'specification'] }
]

function firstMatch<L>(rules: readonly Rule<L>[], text: string): L | undefined {
  const lower = text.toLowerCase()
  return rules.find((r) => r.keywords.some((k) => lower.includes(k)))?.label
}

export function classifySeverity(text: string): Severity | undefined {
  return firstMatch(SEVERITY_RULES, text)
}

export function categorizeIssue(text: string): IssueCategory {
  return firstMatch(CATEGORY_RULES, text) ?? 'general'
}

// 器件位号（R1、U3…）或 "pin 4"
export const DESIGNATOR_PATTERN = /[RCLUQDJXY]\d+|pin\s*\d+/gi

export function extractComponentRef(sentence: string): string {
  const m = sentence.match(new RegExp(DESIGNATOR_PATTERN.source, 'i'))
  return m ? m[0] : 'General'
}

export function distinctDesignators(text: string): string[] {
  const seen = new Set<string>()
  for (const m of text.matchAll(new RegExp(DESIGNATOR_PATTERN.source, 'gi'))) {
    seen.add(m[0].toLowerCase().replace(/\s+/g, ' '))
  }
  return Array.from(seen)
}

// 中文注释：词首引导词（避免 incorrect 命中 correct）+ 可选复数 s + 可选冒号，惰性捕获到空行、换行后接字母或文本结尾
function leadIn(keyword: string, requireSpace = false): RegExp {
  const head = requireSpace ? `\\b${keyword}\\s+` : `\\b${keyword}s?\\s*:?\\s*`
  return new RegExp(`${head}([\\s\\S]+?)(?=\\n\\n|\\n[A-Z]|$)`, 'gi')
}

const ISSUE_PATTERNS = ['issue', 'problem', 'concern', 'warning', 'error'].map((k) => leadIn(k))
const VERIFICATION_PATTERNS = ['verified', 'correct', 'good'].map((k) => leadIn(k))
const RECOMMENDATION_PATTERNS = [leadIn('recommend'), leadIn('suggest'), leadIn('should', true), leadIn('consider', true)]

function collect(text: string, patterns: RegExp[]): string[] {
  const out: string[] = []
  for (const pattern of patterns) {
    for (const m of text.matchAll(pattern)) {
      const body = (m[1] ?? '').trim()
      if (body.length > MIN_BODY_LENGTH) out.push(body)
    }
  }
  return out
}

export function extractFindings(text: string): Finding[] {
  const issues = collect(text, ISSUE_PATTERNS).map((description): Finding => ({
    description,
    severity: classifySeverity(description) ?? 'INFO',
    type: 'issue'
  }))
  const verified = collect(text, VERIFICATION_PATTERNS).map((description): Finding => ({
    description,
    severity: 'INFO',
    type: 'verification'
  }))
  return [...issues, ...verified].slice(0, MAX_FINDINGS)
}

export function extractRecommendations(text: string): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const rec of collect(text, RECOMMENDATION_PATTERNS)) {
    const key = rec.toLowerCase()
    if (seen.has(key)) continue
    seen.add(key)
    out.push(rec)
  }
  return out.slice(0, MAX_RECOMMENDATIONS)
}

export function identifyIssues(text: string): Issue[] {
  const issues: Issue[] = []
  for (const raw of text.split(/[.!?]+/)) {
    const sentence = raw.trim()
    if (sentence.length < MIN_SENTENCE_LENGTH) continue
    const severity = classifySeverity(sentence)
    if (!severity) continue
    issues.push({
      description: sentence,
      severity,
      component: extractComponentRef(sentence),
      category: categorizeIssue(sentence)
    })
    if (issues.length >= MAX_ISSUES) break
  }
  return issues
}

export type ParsedResponse = { findings: Finding[]; recommendations: string[]; issues: Issue[] }

export function parseAnalysisResponse(text: string): ParsedResponse {
  const safe = typeof text === 'string' ? text : ''
  return {
    findings: extractFindings(safe),
    recommendations: extractRecommendations(safe),
    issues: identifyIssues(safe)
  }
}
