import { describe, it, expect } from 'vitest'
import { validateAnalyzeRequest } from '../src/validators/analyzeRequestValidator.js'

describe('validateAnalyzeRequest', () => {
  it('normalizes multipart string fields', () => {
    const v = validateAnalyzeRequest({
      analysisType: ' Design Compliance ',
      datasheet: '{"component_name":"LM7805"}',
      saveReport: 'TRUE',
      progressId: '  ',
      customQuery: ''
    })
    expect(v).toEqual({
      valid: true,
      value: { analysisType: 'Design Compliance', datasheet: { component_name: 'LM7805' }, saveReport: true, customQuery: '' }
    })
  })

  it('accepts JSON bodies with objects and booleans', () => {
    const v = validateAnalyzeRequest({ analysisType: 'custom-query', imagePath: '/data/board.png', datasheet: { componentName: 'NE555' }, saveReport: false })
    expect(v).toEqual({
      valid: true,
      value: { analysisType: 'custom-query', imagePath: '/data/board.png', datasheet: { componentName: 'NE555' }, saveReport: false }
    })
  })

  it('reports invalid datasheet JSON and missing analysis type', () => {
    expect(validateAnalyzeRequest({ datasheet: '{oops' })).toEqual({
      valid: false,
      errors: ['analysisType: analysisType is required', 'datasheet: datasheet must be valid JSON']
    })
    expect(validateAnalyzeRequest(undefined)).toEqual({ valid: false, errors: ['analysisType: analysisType is required'] })
  })
})
