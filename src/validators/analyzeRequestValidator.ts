/**
 * 分析请求体校验
 *
 * multipart 表单字段全部是字符串：datasheet 以 JSON 字符串提交，saveReport 以 'true'/'1' 提交；
 * JSON 请求体则可直接携带对象与布尔值，两种形态在这里统一。
 */
import { z } from 'zod'

const TRUTHY = new Set(['true', '1', 'yes', 'on'])

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined))

const datasheetField = z
  .union([z.string(), z.record(z.string(), z.unknown())])
  .optional()
  .transform((v, ctx): unknown => {
    if (typeof v !== 'string') return v
    if (!v.trim()) return undefined
    try {
      const parsed: unknown = JSON.parse(v)
      return parsed
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'datasheet must be valid JSON' })
      return z.NEVER
    }
  })

const analyzeBodySchema = z.object({
  analysisType: z.string({ required_error: 'analysisType is required' }).trim().min(1, 'analysisType is required'),
  customQuery: z.string().optional(),
  datasheet: datasheetField,
  progressId: optionalText.pipe(z.string().max(128).optional()),
  imagePath: optionalText,
  saveReport: z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((v) => v === true || (typeof v === 'string' && TRUTHY.has(v.trim().toLowerCase())))
})

export type AnalyzeBody = z.infer<typeof analyzeBodySchema>

export function validateAnalyzeRequest(body: unknown): { valid: true; value: AnalyzeBody } | { valid: false; errors: string[] } {
  const parsed = analyzeBodySchema.safeParse(body ?? {})
  if (parsed.success) return { valid: true, value: parsed.data }
  return {
    valid: false,
    errors: parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
  }
}
