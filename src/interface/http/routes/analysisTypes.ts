import type { Request, Response } from 'express'
import { listAnalysisTypes } from '../../../domain/analysisTypes.js'

// 中文注释：分析类型列表（标签 + slug），供前端下拉框使用
export function analysisTypesHandler(req: Request, res: Response) {
  res.json({ types: listAnalysisTypes() })
}
