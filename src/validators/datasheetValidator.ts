/**
 * 数据表记录规范化
 *
 * 说明：datasheet 解析器的输出形态并不稳定（snake_case 字段、引脚表为数组、数值未转字符串等）。
 * 这里在 ContextBuilder 边界一次性规范化为 DatasheetRecord；非对象输入得到空记录，
 * 单个字段形态不符时仅丢弃该字段，不抛出异常。
 */
import { z } from 'zod'
import type { DatasheetRecord } from '../domain/contracts/index.js'

export const UNKNOWN_COMPONENT = 'Unknown'

const text = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v).trim())

const textMap = z
  .record(z.string(), z.unknown())
  .transform((obj) => {
    const out: Record<string, string> = {}
    for (const [k, v] of Object.entries(obj)) {
      const parsed = text.safeParse(v)
      if (parsed.success) out[k] = parsed.data
    }
    return out
  })

// 中文注释：引脚表兼容 [{ number, name, function }] 数组形式
const pinRow = z.object({
  number: text.optional(),
  name: text.optional(),
  function: text.optional(),
  description: text.optional()
})

const pinConfig = z.union([
  textMap,
  z.array(z.union([pinRow, text])).transform((rows) => {
    const out: Record<string, string> = {}
    rows.forEach((row, i) => {
      if (typeof row === 'string') {
        out[`Pin ${i + 1}`] = row
        return
      }
      const id = row.number ? `Pin ${row.number}` : `Pin ${i + 1}`
      const desc = [row.name, row.function ?? row.description].filter((s): s is string => Boolean(s)).join(' - ')
      out[id] = desc || 'N/A'
    })
    return out
  })
])

// 中文注释：推荐电路兼容 { name, description } 对象
const circuit = z.union([
  text,
  z.object({ name: text.optional(), description: text.optional() }).transform((c) => `${c.name ?? 'Circuit'}: ${c.description ?? 'N/A'}`)
])

const stringList = z.union([
  z.array(z.unknown()).transform((items) => items.flatMap((v) => {
    const parsed = text.safeParse(v)
    return parsed.success && parsed.data ? [parsed.data] : []
  })),
  z.string().transform((s) => (s.trim() ? [s.trim()] : []))
])

const circuitList = z.array(z.unknown()).transform((items) => items.flatMap((v) => {
  const parsed = circuit.safeParse(v)
  return parsed.success && parsed.data ? [parsed.data] : []
}))

const FIELDS = {
  componentName: { keys: ['componentName', 'component_name'], schema: text },
  pinConfig: { keys: ['pinConfig', 'pin_config'], schema: pinConfig },
  electricalSpecs: { keys: ['electricalSpecs', 'electrical_specs'], schema: textMap },
  features: { keys: ['features'], schema: stringList },
  recommendedCircuits: { keys: ['recommendedCircuits', 'recommended_circuits'], schema: circuitList },
  operatingConditions: { keys: ['operatingConditions', 'operating_conditions'], schema: textMap },
  packageInfo: { keys: ['packageInfo', 'package_info'], schema: text }
} as const

function pick(obj: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const k of keys) {
    if (obj[k] !== undefined && obj[k] !== null) return obj[k]
  }
  return undefined
}

const recordShape = z.record(z.string(), z.unknown())

export function normalizeDatasheet(input: unknown): DatasheetRecord {
  const root = recordShape.safeParse(input)
  if (!root.success || Array.isArray(input)) return {}
  const obj = root.data
  const out: DatasheetRecord = {}

  const componentName = FIELDS.componentName.schema.safeParse(pick(obj, FIELDS.componentName.keys))
  if (componentName.success && componentName.data) out.componentName = componentName.data
  const pins = FIELDS.pinConfig.schema.safeParse(pick(obj, FIELDS.pinConfig.keys))
  if (pins.success && Object.keys(pins.data).length > 0) out.pinConfig = pins.data
  const specs = FIELDS.electricalSpecs.schema.safeParse(pick(obj, FIELDS.electricalSpecs.keys))
  if (specs.success && Object.keys(specs.data).length > 0) out.electricalSpecs = specs.data
  const features = FIELDS.features.schema.safeParse(pick(obj, FIELDS.features.keys))
  if (features.success && features.data.length > 0) out.features = features.data
  const circuits = FIELDS.recommendedCircuits.schema.safeParse(pick(obj, FIELDS.recommendedCircuits.keys))
  if (circuits.success && circuits.data.length > 0) out.recommendedCircuits = circuits.data
  const conditions = FIELDS.operatingConditions.schema.safeParse(pick(obj, FIELDS.operatingConditions.keys))
  if (conditions.success && Object.keys(conditions.data).length > 0) out.operatingConditions = conditions.data
  const pkg = FIELDS.packageInfo.schema.safeParse(pick(obj, FIELDS.packageInfo.keys))
  if (pkg.success && pkg.data) out.packageInfo = pkg.data

  return out
}

/**
 * 记录可用：组件名非空且不是 "Unknown" 哨兵值
 */
export function isUsableDatasheet(record: DatasheetRecord): boolean {
  const name = record.componentName?.trim()
  return Boolean(name) && name !== UNKNOWN_COMPONENT
}

export function isEmptyDatasheet(record: DatasheetRecord): boolean {
  return Object.keys(record).length === 0
}
