/*
功能：轻量日志器（JSON 行）
用途：在控制台输出结构化日志，便于本地/CI/收集系统统一检索与分析。
参数：
- logger.debug/info/warn/error(message: string, meta?: unknown)
- setLogLevel(level) 由启动脚本按配置设置最低输出级别
返回：
- 无（副作用：输出一行 JSON 字符串到 stdout）
示例：
// logger.info('analysis.start', { analysisType })
*/
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }
let minLevel: LogLevel = 'info'

export function setLogLevel(level: LogLevel) {
  minLevel = level
}

function safeMeta(meta: unknown): unknown {
  if (meta === undefined) return undefined
  // 避免循环引用；Error 对象单独展开 message
  try {
    return JSON.parse(JSON.stringify(meta, (_k, v: unknown) => (v instanceof Error ? { name: v.name, message: v.message } : v)))
  } catch {
    return undefined
  }
}

function baseLog(level: LogLevel, message: string, meta?: unknown) {
  if (ORDER[level] < ORDER[minLevel]) return
  try {
    const line = { ts: new Date().toISOString(), level, message, meta: safeMeta(meta) }
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(line))
  } catch {
    // 忽略日志错误，避免影响主流程
  }
}

export const logger = {
  debug(message: string, meta?: unknown) { baseLog('debug', message, meta) },
  info(message: string, meta?: unknown) { baseLog('info', message, meta) },
  warn(message: string, meta?: unknown) { baseLog('warn', message, meta) },
  error(message: string, meta?: unknown) { baseLog('error', message, meta) }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
