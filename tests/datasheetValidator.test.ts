import { describe, it, expect } from 'vitest'
import { isEmptyDatasheet, isUsableDatasheet, normalizeDatasheet } from '../src/validators/datasheetValidator.js'

describe('normalizeDatasheet', () => {
  it('returns the empty record for non-object input', () => {
    expect(normalizeDatasheet(null)).toEqual({})
    expect(normalizeDatasheet('LM7805')).toEqual({})
    expect(normalizeDatasheet([{ componentName: 'LM7805' }])).toEqual({})
    expect(normalizeDatasheet(undefined)).toEqual({})
  })

  it('accepts parser output with snake_case keys and list-form pin tables', () => {
    const record = normalizeDatasheet({
      component_name: 'LM7805',
      pin_config: [
        { number: 1, name: 'IN', function: 'Input' },
        { number: 2, name: 'GND' }
      ],
      electrical_specs: { 'Output Voltage': '5V', 'Max Current': 1.5 },
      features: ['Thermal shutdown', 42, null],
      recommended_circuits: [{ name: 'Basic', description: 'Caps on input and output' }, 'Heatsink'],
      operating_conditions: { Temperature: '0-125C' },
      package_info: 'TO-220'
    })
    expect(record).toEqual({
      componentName: 'LM7805',
      pinConfig: { 'Pin 1': 'IN - Input', 'Pin 2': 'GND' },
      electricalSpecs: { 'Output Voltage': '5V', 'Max Current': '1.5' },
      features: ['Thermal shutdown', '42'],
      recommendedCircuits: ['Basic: Caps on input and output', 'Heatsink'],
      operatingConditions: { Temperature: '0-125C' },
      packageInfo: 'TO-220'
    })
  })

  it('drops malformed fields one by one', () => {
    expect(normalizeDatasheet({ componentName: 'NE555', pinConfig: 'nope', features: 'Timer' })).toEqual({
      componentName: 'NE555',
      features: ['Timer']
    })
  })

  it('numbers string pin lists by position', () => {
    expect(normalizeDatasheet({ pinConfig: ['VCC', 'GND'] })).toEqual({ pinConfig: { 'Pin 1': 'VCC', 'Pin 2': 'GND' } })
  })
})

describe('isUsableDatasheet', () => {
  it('needs a component name other than Unknown', () => {
    expect(isUsableDatasheet({ componentName: 'LM7805' })).toBe(true)
    expect(isUsableDatasheet({ componentName: 'Unknown' })).toBe(false)
    expect(isUsableDatasheet({ packageInfo: 'TO-220' })).toBe(false)
    expect(isEmptyDatasheet({})).toBe(true)
  })
})
