// Schema validation: declarative rules evaluated into structured violations

import log from '../logger'
import { errorMessage, RuleDefinitionError } from '../errors'
import {
  cellKey,
  columnTypes,
  detectColumnType,
  getColumn,
  hasColumn,
  isNull,
  parseDateValue,
  parseNumber,
  rowCount
} from '../table'
import type {
  CellValue,
  ColumnType,
  CustomPredicate,
  CustomRule,
  ExpectedType,
  PatternRule,
  RangeRule,
  RequiredRule,
  Severity,
  Table,
  TypeRule,
  UniqueRule,
  ValidationPreset,
  ValidationResult,
  ValidationRule,
  ValidationViolation
} from '../types'

const MAX_ROW_INDICES = 100
const MAX_SAMPLE_VALUES = 5

// Detected column types accepted for each expected type
const ACCEPTED_TYPES: Record<ExpectedType, ColumnType[]> = {
  string: ['string', 'mixed'],
  integer: ['integer'],
  float: ['float'],
  numeric: ['integer', 'float'],
  date: ['datetime', 'string', 'mixed'],
  datetime: ['datetime'],
  boolean: ['boolean']
}

// =============================================================================
// RULE EVALUATION
// =============================================================================

function violationFrom(
  rule: ValidationRule,
  column: string | null,
  message: string,
  rowIndices: number[] = [],
  sampleValues: CellValue[] = [],
  affectedRows: number = rowIndices.length
): ValidationViolation {
  return {
    ruleName: rule.name,
    ruleType: rule.ruleType,
    column,
    severity: rule.severity,
    message: rule.message || message,
    affectedRows,
    rowIndices: rowIndices.slice(0, MAX_ROW_INDICES),
    sampleValues: sampleValues.slice(0, MAX_SAMPLE_VALUES)
  }
}

function checkRequired(table: Table, rule: RequiredRule): ValidationViolation | null {
  if (hasColumn(table, rule.column)) return null
  return violationFrom(rule, rule.column, `Required column '${rule.column}' not found`)
}

function isCoercible(values: CellValue[], expected: ExpectedType): boolean {
  const present = values.filter(v => !isNull(v))
  if (expected === 'numeric') {
    return present.every(v => parseNumber(v) !== null)
  }
  if (expected === 'date' || expected === 'datetime') {
    return present.every(v => parseDateValue(v) !== null)
  }
  return false
}

function checkType(table: Table, rule: TypeRule): ValidationViolation | null {
  if (!hasColumn(table, rule.column)) return null

  const values = getColumn(table, rule.column)
  const actual = detectColumnType(values)
  const accepted = ACCEPTED_TYPES[rule.expectedType]
  if (!accepted) {
    throw new RuleDefinitionError(`Unknown expected type '${String(rule.expectedType)}'`, rule.name)
  }

  if (actual === 'empty' || accepted.includes(actual)) return null
  if (isCoercible(values, rule.expectedType)) return null

  return violationFrom(
    rule,
    rule.column,
    `Wrong type: expected ${rule.expectedType}, found ${actual}`,
    [],
    values.slice(0, MAX_SAMPLE_VALUES),
    0
  )
}

function checkRange(table: Table, rule: RangeRule): ValidationViolation | null {
  if (!hasColumn(table, rule.column)) return null

  const min = rule.min ?? null
  const max = rule.max ?? null
  const values = getColumn(table, rule.column)
  const indices: number[] = []
  const samples: CellValue[] = []

  values.forEach((value, index) => {
    if (isNull(value)) return
    if (typeof value !== 'number') {
      throw new TypeError(`Non-numeric value '${String(value)}' in column '${rule.column}'`)
    }
    const belowMin = min !== null && value < min
    const aboveMax = max !== null && value > max
    if (belowMin || aboveMax) {
      indices.push(index)
      samples.push(value)
    }
  })

  if (indices.length === 0) return null
  return violationFrom(
    rule,
    rule.column,
    `Values of '${rule.column}' outside range [${min ?? '-inf'}, ${max ?? 'inf'}]`,
    indices,
    samples
  )
}

function checkPattern(table: Table, rule: PatternRule): ValidationViolation | null {
  if (!hasColumn(table, rule.column)) return null

  // Sticky flag anchors the match at the start of the text
  const regex = new RegExp(rule.pattern, 'y')
  const indices: number[] = []
  const samples: CellValue[] = []

  getColumn(table, rule.column).forEach((value, index) => {
    if (isNull(value)) return
    const text = value instanceof Date ? value.toISOString() : String(value)
    regex.lastIndex = 0
    if (!regex.test(text)) {
      indices.push(index)
      samples.push(text)
    }
  })

  if (indices.length === 0) return null
  return violationFrom(rule, rule.column, `Values of '${rule.column}' do not match pattern`, indices, samples)
}

function checkUnique(table: Table, rule: UniqueRule): ValidationViolation | null {
  if (!hasColumn(table, rule.column)) return null

  const values = getColumn(table, rule.column)
  const counts = new Map<string, number>()
  for (const value of values) {
    const key = cellKey(value)
    counts.set(key, (counts.get(key) ?? 0) + 1)
  }

  const indices: number[] = []
  const duplicated = new Map<string, CellValue>()
  values.forEach((value, index) => {
    const key = cellKey(value)
    if ((counts.get(key) ?? 0) > 1) {
      indices.push(index)
      if (!duplicated.has(key)) duplicated.set(key, value)
    }
  })

  if (indices.length === 0) return null
  return violationFrom(
    rule,
    rule.column,
    `Column '${rule.column}' contains duplicate values`,
    indices,
    Array.from(duplicated.values())
  )
}

function checkCustom(table: Table, rule: CustomRule): ValidationViolation | null {
  if (!rule.predicate) return null

  const outcome = rule.predicate(table)
  if (outcome.valid) return null

  return {
    ruleName: rule.name,
    ruleType: rule.ruleType,
    column: null,
    severity: rule.severity,
    message: outcome.message,
    affectedRows: outcome.rowIndices.length,
    rowIndices: outcome.rowIndices.slice(0, MAX_ROW_INDICES),
    sampleValues: []
  }
}

function ruleColumn(rule: ValidationRule): string | null {
  return rule.ruleType === 'custom' ? null : rule.column
}

/**
 * Evaluate one rule. Failures while evaluating become ERROR violations.
 */
export function evaluateRule(table: Table, rule: ValidationRule): ValidationViolation | null {
  try {
    let violation: ValidationViolation | null = null
    switch (rule.ruleType) {
      case 'required':
        violation = checkRequired(table, rule)
        break
      case 'type':
        violation = checkType(table, rule)
        break
      case 'range':
        violation = checkRange(table, rule)
        break
      case 'pattern':
        violation = checkPattern(table, rule)
        break
      case 'unique':
        violation = checkUnique(table, rule)
        break
      case 'custom':
        violation = checkCustom(table, rule)
        break
    }
    return violation
  } catch (error) {
    log.error(`[VALIDATION] Rule '${rule.name}' failed to evaluate:`, errorMessage(error))
    return {
      ruleName: rule.name,
      ruleType: rule.ruleType,
      column: ruleColumn(rule),
      severity: 'error',
      message: `Rule evaluation failed: ${errorMessage(error)}`,
      affectedRows: 0,
      rowIndices: [],
      sampleValues: []
    }
  }
}

// =============================================================================
// VALIDATION RUN
// =============================================================================

/**
 * Validate a table against rules, in declaration order. Never mutates the table.
 */
export function validateTable(table: Table, rules: ValidationRule[]): ValidationResult {
  const totalRows = rowCount(table)
  const violations: ValidationViolation[] = []
  const errors: ValidationViolation[] = []
  const warnings: ValidationViolation[] = []
  const invalid = new Set<number>()

  for (const rule of rules) {
    const violation = evaluateRule(table, rule)
    if (!violation) continue

    violations.push(violation)
    violation.rowIndices.forEach(i => invalid.add(i))

    if (violation.severity === 'error') {
      errors.push(violation)
    } else if (violation.severity === 'warning') {
      warnings.push(violation)
    }
  }

  const invalidRows = invalid.size
  const validRows = totalRows - invalidRows

  const result: ValidationResult = {
    isValid: errors.length === 0,
    totalRows,
    validRows,
    invalidRows,
    violations,
    errors,
    warnings,
    columnTypes: columnTypes(table),
    summary: {
      columnsValidated: table.columns.length,
      rulesApplied: rules.length,
      rulesPassed: rules.length - violations.length,
      rulesFailed: violations.length,
      validityRate: totalRows > 0 ? (validRows / totalRows) * 100 : 100
    }
  }

  log.info(
    `[VALIDATION] ${validRows}/${totalRows} valid rows, ${errors.length} errors, ${warnings.length} warnings`
  )

  return result
}

// =============================================================================
// RULE BUILDER
// =============================================================================

/**
 * Fluent rule set builder. Adds no semantics over validateTable.
 */
export class SchemaValidator {
  private rules: ValidationRule[]

  constructor(rules: ValidationRule[] = []) {
    this.rules = [...rules]
  }

  getRules(): ValidationRule[] {
    return [...this.rules]
  }

  addRule(rule: ValidationRule): this {
    this.rules.push(rule)
    return this
  }

  addRequiredColumns(columns: string[], severity: Severity = 'error'): this {
    for (const column of columns) {
      this.rules.push({
        name: `required_${column}`,
        ruleType: 'required',
        column,
        severity,
        message: `Required column '${column}' not found`
      })
    }
    return this
  }

  addTypeRule(column: string, expectedType: ExpectedType, severity: Severity = 'error'): this {
    this.rules.push({
      name: `type_${column}`,
      ruleType: 'type',
      column,
      expectedType,
      severity,
      message: `Column '${column}' must be of type ${expectedType}`
    })
    return this
  }

  addRangeRule(column: string, min: number | null = null, max: number | null = null, severity: Severity = 'error'): this {
    if (min !== null && max !== null && min > max) {
      throw new RuleDefinitionError(`Range for '${column}' has min ${min} above max ${max}`, `range_${column}`)
    }
    this.rules.push({
      name: `range_${column}`,
      ruleType: 'range',
      column,
      min,
      max,
      severity,
      message: `Values of '${column}' outside range [${min ?? '-inf'}, ${max ?? 'inf'}]`
    })
    return this
  }

  addPatternRule(column: string, pattern: string, severity: Severity = 'error', message?: string): this {
    try {
      new RegExp(pattern)
    } catch (error) {
      throw new RuleDefinitionError(`Invalid pattern for '${column}': ${errorMessage(error)}`, `pattern_${column}`)
    }
    this.rules.push({
      name: `pattern_${column}`,
      ruleType: 'pattern',
      column,
      pattern,
      severity,
      message: message ?? `Values of '${column}' do not match pattern`
    })
    return this
  }

  addUniqueRule(column: string, severity: Severity = 'error'): this {
    this.rules.push({
      name: `unique_${column}`,
      ruleType: 'unique',
      column,
      severity,
      message: `Column '${column}' contains duplicate values`
    })
    return this
  }

  addCustomRule(name: string, predicate: CustomPredicate, severity: Severity = 'error'): this {
    this.rules.push({ name, ruleType: 'custom', severity, predicate })
    return this
  }

  validate(table: Table): ValidationResult {
    return validateTable(table, this.rules)
  }
}

// =============================================================================
// PRESETS
// =============================================================================

export function createSalesValidator(): SchemaValidator {
  return new SchemaValidator()
    .addRequiredColumns(['fecha', 'total'])
    .addTypeRule('fecha', 'date')
    .addTypeRule('total', 'numeric')
    .addRangeRule('total', 0)
}

export function createPurchasesValidator(): SchemaValidator {
  return new SchemaValidator()
    .addRequiredColumns(['fecha', 'total'])
    .addTypeRule('fecha', 'date')
    .addTypeRule('total', 'numeric')
    .addRangeRule('total', 0)
}

export function createProductsValidator(): SchemaValidator {
  return new SchemaValidator()
    .addRequiredColumns(['sku', 'nombre', 'precio'])
    .addUniqueRule('sku')
    .addTypeRule('precio', 'numeric')
    .addRangeRule('precio', 0)
}

export function createPresetValidator(preset: ValidationPreset): SchemaValidator {
  switch (preset) {
    case 'sales':
      return createSalesValidator()
    case 'purchases':
      return createPurchasesValidator()
    case 'products':
      return createProductsValidator()
    default:
      throw new RuleDefinitionError(`Unknown validation preset '${String(preset)}'`)
  }
}
