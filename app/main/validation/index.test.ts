import { describe, it, expect } from 'vitest'
import { createTable } from '../table'
import type { Table, ValidationRule } from '../types'
import {
  SchemaValidator,
  createPresetValidator,
  createProductsValidator,
  createSalesValidator,
  evaluateRule,
  validateTable
} from './index'

function salesTable(): Table {
  return createTable(['fecha', 'total', 'sku'], {
    fecha: ['2024-01-01', '2024-01-02', '2024-01-03', 'not a date'],
    total: [100, -5, 250, 80],
    sku: ['A-1', 'A-2', 'A-2', 'B-9']
  })
}

// =============================================================================
// RULE EVALUATION
// =============================================================================

describe('required rule', () => {
  it('should report an absent column with no affected rows', () => {
    const result = validateTable(salesTable(), [
      { name: 'need_store', ruleType: 'required', column: 'store', severity: 'error' }
    ])
    expect(result.violations).toHaveLength(1)
    expect(result.violations[0]?.message).toBe("Required column 'store' not found")
    expect(result.violations[0]?.affectedRows).toBe(0)
    expect(result.invalidRows).toBe(0)
    expect(result.isValid).toBe(false)
  })

  it('should pass when the column exists', () => {
    const result = validateTable(salesTable(), [
      { name: 'need_total', ruleType: 'required', column: 'total', severity: 'error' }
    ])
    expect(result.violations).toEqual([])
    expect(result.isValid).toBe(true)
  })
})

describe('type rule', () => {
  it('should accept numeric strings for a numeric column', () => {
    const table = createTable(['qty'], { qty: ['1', '2.5', null] })
    const violation = evaluateRule(table, { name: 't', ruleType: 'type', column: 'qty', expectedType: 'numeric', severity: 'error' })
    expect(violation).toBeNull()
  })

  it('should reject text in a numeric column with the first values as samples', () => {
    const table = createTable(['qty'], { qty: ['1', 'many', '3'] })
    const violation = evaluateRule(table, { name: 't', ruleType: 'type', column: 'qty', expectedType: 'numeric', severity: 'error' })
    expect(violation?.message).toBe('Wrong type: expected numeric, found string')
    expect(violation?.sampleValues).toEqual(['1', 'many', '3'])
    expect(violation?.affectedRows).toBe(0)
  })

  it('should reject a date column holding an unparseable value', () => {
    const table = createTable(['d'], { d: [1, '2024-01-01'] })
    const violation = evaluateRule(table, { name: 't', ruleType: 'type', column: 'd', expectedType: 'datetime', severity: 'warning' })
    expect(violation?.severity).toBe('warning')
  })

  it('should accept an all-null column for any type', () => {
    const table = createTable(['x'], { x: [null, null] })
    const violation = evaluateRule(table, { name: 't', ruleType: 'type', column: 'x', expectedType: 'boolean', severity: 'error' })
    expect(violation).toBeNull()
  })

  it('should ignore a missing column', () => {
    const violation = evaluateRule(salesTable(), { name: 't', ruleType: 'type', column: 'nope', expectedType: 'string', severity: 'error' })
    expect(violation).toBeNull()
  })
})

describe('range rule', () => {
  it('should list rows below the minimum', () => {
    const violation = evaluateRule(salesTable(), { name: 'r', ruleType: 'range', column: 'total', min: 0, severity: 'error' })
    expect(violation?.rowIndices).toEqual([1])
    expect(violation?.sampleValues).toEqual([-5])
    expect(violation?.message).toBe("Values of 'total' outside range [0, inf]")
  })

  it('should combine both bounds', () => {
    const violation = evaluateRule(salesTable(), { name: 'r', ruleType: 'range', column: 'total', min: 0, max: 200, severity: 'error' })
    expect(violation?.rowIndices).toEqual([1, 2])
    expect(violation?.affectedRows).toBe(2)
  })

  it('should turn a non-numeric value into an evaluation failure', () => {
    const violation = evaluateRule(salesTable(), { name: 'r', ruleType: 'range', column: 'sku', min: 0, severity: 'warning' })
    expect(violation?.severity).toBe('error')
    expect(violation?.message).toBe("Rule evaluation failed: Non-numeric value 'A-1' in column 'sku'")
  })
})

describe('pattern rule', () => {
  it('should anchor the match at the start of the value', () => {
    const table = createTable(['code'], { code: ['AB12', 'xAB12', 'AB99z', null] })
    const violation = evaluateRule(table, { name: 'p', ruleType: 'pattern', column: 'code', pattern: 'AB\\d\\d', severity: 'error' })
    expect(violation?.rowIndices).toEqual([1])
    expect(violation?.sampleValues).toEqual(['xAB12'])
  })

  it('should report an invalid regex as an evaluation failure', () => {
    const table = createTable(['code'], { code: ['a'] })
    const violation = evaluateRule(table, { name: 'p', ruleType: 'pattern', column: 'code', pattern: '(', severity: 'info' })
    expect(violation?.severity).toBe('error')
    expect(violation?.message.startsWith('Rule evaluation failed:')).toBe(true)
  })
})

describe('unique rule', () => {
  it('should mark every row sharing a duplicated value', () => {
    const violation = evaluateRule(salesTable(), { name: 'u', ruleType: 'unique', column: 'sku', severity: 'error' })
    expect(violation?.rowIndices).toEqual([1, 2])
    expect(violation?.sampleValues).toEqual(['A-2'])
  })

  it('should treat nulls as equal', () => {
    const table = createTable(['id'], { id: [null, 1, null] })
    const violation = evaluateRule(table, { name: 'u', ruleType: 'unique', column: 'id', severity: 'error' })
    expect(violation?.rowIndices).toEqual([0, 2])
  })
})

describe('custom rule', () => {
  it('should report the predicate outcome without a column', () => {
    const rule: ValidationRule = {
      name: 'even_rows',
      ruleType: 'custom',
      severity: 'warning',
      predicate: () => ({ valid: false, rowIndices: [0, 3], message: 'Rows need review' })
    }
    const violation = evaluateRule(salesTable(), rule)
    expect(violation).toEqual({
      ruleName: 'even_rows',
      ruleType: 'custom',
      column: null,
      severity: 'warning',
      message: 'Rows need review',
      affectedRows: 2,
      rowIndices: [0, 3],
      sampleValues: []
    })
  })

  it('should turn a throwing predicate into an error violation', () => {
    const rule: ValidationRule = {
      name: 'boom',
      ruleType: 'custom',
      severity: 'info',
      predicate: () => {
        throw new Error('bad predicate')
      }
    }
    const violation = evaluateRule(salesTable(), rule)
    expect(violation?.severity).toBe('error')
    expect(violation?.message).toBe('Rule evaluation failed: bad predicate')
  })
})

// =============================================================================
// VALIDATION RUN
// =============================================================================

describe('validateTable', () => {
  it('should union invalid rows and partition by severity', () => {
    const result = validateTable(salesTable(), [
      { name: 'range', ruleType: 'range', column: 'total', min: 0, severity: 'error' },
      { name: 'unique', ruleType: 'unique', column: 'sku', severity: 'warning' },
      { name: 'note', ruleType: 'custom', severity: 'info', predicate: () => ({ valid: false, rowIndices: [3], message: 'fyi' }) }
    ])

    expect(result.totalRows).toBe(4)
    expect(result.invalidRows).toBe(3)
    expect(result.validRows).toBe(1)
    expect(result.errors.map(v => v.ruleName)).toEqual(['range'])
    expect(result.warnings.map(v => v.ruleName)).toEqual(['unique'])
    expect(result.violations).toHaveLength(3)
    expect(result.summary).toEqual({
      columnsValidated: 3,
      rulesApplied: 3,
      rulesPassed: 0,
      rulesFailed: 3,
      validityRate: 25
    })
  })

  it('should stay valid when only warnings are raised', () => {
    const result = validateTable(salesTable(), [
      { name: 'unique', ruleType: 'unique', column: 'sku', severity: 'warning' }
    ])
    expect(result.isValid).toBe(true)
    expect(result.warnings).toHaveLength(1)
  })

  it('should report 100% validity for an empty table', () => {
    const table = createTable(['a'], { a: [] })
    const result = validateTable(table, [{ name: 'u', ruleType: 'unique', column: 'a', severity: 'error' }])
    expect(result.summary.validityRate).toBe(100)
    expect(result.isValid).toBe(true)
  })

  it('should not mutate the table', () => {
    const table = salesTable()
    validateTable(table, createSalesValidator().getRules())
    expect(table).toEqual(salesTable())
  })

  it('should report column types', () => {
    const result = validateTable(salesTable(), [])
    expect(result.columnTypes).toEqual({ fecha: 'string', total: 'integer', sku: 'string' })
  })
})

// =============================================================================
// BUILDER & PRESETS
// =============================================================================

describe('SchemaValidator', () => {
  it('should build rules in declaration order', () => {
    const validator = new SchemaValidator()
      .addRequiredColumns(['a', 'b'])
      .addTypeRule('a', 'numeric')
      .addUniqueRule('b', 'warning')
    expect(validator.getRules().map(r => r.name)).toEqual(['required_a', 'required_b', 'type_a', 'unique_b'])
  })

  it('should reject a range whose minimum exceeds its maximum', () => {
    expect(() => new SchemaValidator().addRangeRule('x', 10, 1)).toThrow("Range for 'x' has min 10 above max 1")
  })

  it('should reject an invalid pattern when it is added', () => {
    expect(() => new SchemaValidator().addPatternRule('x', '[')).toThrow("Invalid pattern for 'x'")
  })

  it('should produce the same result as validateTable', () => {
    const validator = new SchemaValidator().addRangeRule('total', 0)
    expect(validator.validate(salesTable())).toEqual(validateTable(salesTable(), validator.getRules()))
  })
})

describe('presets', () => {
  it('should flag negative totals in sales data', () => {
    const result = createSalesValidator().validate(salesTable())
    // Text columns are accepted as dates
    expect(result.errors.map(v => v.ruleName)).toEqual(['range_total'])
    expect(result.invalidRows).toBe(1)
  })

  it('should flag a sales date column holding numbers', () => {
    const numericDates = createTable(['fecha', 'total'], { fecha: [20240101, 20240102], total: [1, 2] })
    expect(createSalesValidator().validate(numericDates).errors.map(v => v.ruleName)).toEqual(['type_fecha'])
  })

  it('should require product columns', () => {
    const result = createProductsValidator().validate(salesTable())
    expect(result.errors.map(v => v.ruleName)).toEqual(['required_nombre', 'required_precio', 'unique_sku'])
  })

  it('should resolve presets by name', () => {
    expect(createPresetValidator('purchases').getRules()).toHaveLength(5)
  })
})
