// 中文注释：分析流水线的错误分类；仅 AnalysisEngine 负责把它们收敛为可渲染结果

export type ValidationReason = 'file_not_found' | 'invalid_category' | 'not_connected' | 'invalid_request'

/**
 * ValidationError - 输入校验失败（文件缺失、分析类型无效、模型服务不可达），不重试
 */
export class ValidationError extends Error {
  constructor(message: string, public readonly reason: ValidationReason) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * ContextBuildError - 组装提示词/图像包时的任何失败
 */
export class ContextBuildError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'ContextBuildError'
  }
}

/**
 * GenerationFailure - 重试预算耗尽，携带最后一次底层错误
 */
export class GenerationFailure extends Error {
  constructor(public readonly attempts: number, public readonly lastError: unknown) {
    super(`Model generation failed after ${attempts} attempts: ${lastError instanceof Error ? lastError.message : String(lastError)}`)
    this.name = 'GenerationFailure'
  }
}

// 以下为网关层错误：由 ModelGateway 抛出，在重试循环中计为失败的一次尝试

export class ConnectivityError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConnectivityError'
  }
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Model request timed out after ${timeoutMs}ms`)
    this.name = 'TimeoutError'
  }
}

export class GenerationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'GenerationError'
  }
}

/**
 * AnalysisCancelledError - 调用方通过 AbortSignal 主动取消
 */
export class AnalysisCancelledError extends Error {
  constructor(message = 'Analysis cancelled by caller') {
    super(message)
    this.name = 'AnalysisCancelledError'
  }
}

export function throwIfAborted(signal?: AbortSignal) {
  if (signal?.aborted) throw new AnalysisCancelledError()
}
