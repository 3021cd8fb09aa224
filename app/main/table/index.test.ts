import { describe, it, expect } from 'vitest'
import {
  cellKey,
  cloneTable,
  compareCells,
  createTable,
  detectColumnType,
  getColumn,
  isNull,
  parseDateValue,
  parseNumber,
  removeColumn,
  rowCount,
  selectRows,
  setColumn,
  tableFromRows,
  tableToRows
} from './index'

// =============================================================================
// CELLS
// =============================================================================

describe('isNull', () => {
  it('should treat null, undefined and NaN as null', () => {
    expect(isNull(null)).toBe(true)
    expect(isNull(undefined)).toBe(true)
    expect(isNull(NaN)).toBe(true)
  })

  it('should not treat empty strings or zero as null', () => {
    expect(isNull('')).toBe(false)
    expect(isNull(0)).toBe(false)
    expect(isNull(false)).toBe(false)
  })
})

describe('parseNumber', () => {
  it('should parse trimmed numeric strings', () => {
    expect(parseNumber(' 12.5 ')).toBe(12.5)
  })

  it('should map booleans to 0 and 1', () => {
    expect(parseNumber(true)).toBe(1)
    expect(parseNumber(false)).toBe(0)
  })

  it('should reject text and dates', () => {
    expect(parseNumber('abc')).toBeNull()
    expect(parseNumber('')).toBeNull()
    expect(parseNumber(new Date(0))).toBeNull()
  })
})

describe('parseDateValue', () => {
  it('should read a plain date as UTC midnight', () => {
    expect(parseDateValue('2024-01-15')?.toISOString()).toBe('2024-01-15T00:00:00.000Z')
  })

  it('should accept slashes and a time', () => {
    expect(parseDateValue('2024/3/5 08:30')?.toISOString()).toBe('2024-03-05T08:30:00.000Z')
  })

  it('should apply an explicit offset', () => {
    expect(parseDateValue('2024-01-15T10:00:00+02:00')?.toISOString()).toBe('2024-01-15T08:00:00.000Z')
  })

  it('should reject impossible calendar dates', () => {
    expect(parseDateValue('2024-02-30')).toBeNull()
    expect(parseDateValue('2024-13-01')).toBeNull()
  })

  it('should reject non-date values', () => {
    expect(parseDateValue('hello')).toBeNull()
    expect(parseDateValue(20240115)).toBeNull()
    expect(parseDateValue('15/01/2024')).toBeNull()
  })
})

describe('cellKey', () => {
  it('should keep numbers and numeric strings apart', () => {
    expect(cellKey(1)).not.toBe(cellKey('1'))
  })

  it('should give equal dates the same key', () => {
    expect(cellKey(new Date('2024-01-01T00:00:00Z'))).toBe(cellKey(new Date('2024-01-01T00:00:00Z')))
  })

  it('should give every null the same key', () => {
    expect(cellKey(null)).toBe(cellKey(NaN))
  })
})

describe('compareCells', () => {
  it('should sort nulls last and numbers by value', () => {
    const sorted = [3, null, 1, 2].sort(compareCells)
    expect(sorted).toEqual([1, 2, 3, null])
  })

  it('should order booleans before numbers before text', () => {
    const sorted = ['b', 2, true, 'a'].sort(compareCells)
    expect(sorted).toEqual([true, 2, 'a', 'b'])
  })
})

// =============================================================================
// COLUMN TYPES
// =============================================================================

describe('detectColumnType', () => {
  it('should detect integer and float columns', () => {
    expect(detectColumnType([1, 2, null])).toBe('integer')
    expect(detectColumnType([1, 2.5])).toBe('float')
  })

  it('should detect boolean, datetime and string columns', () => {
    expect(detectColumnType([true, false])).toBe('boolean')
    expect(detectColumnType([new Date(0)])).toBe('datetime')
    expect(detectColumnType(['a', null, 'b'])).toBe('string')
  })

  it('should detect mixed and empty columns', () => {
    expect(detectColumnType([1, 'a'])).toBe('mixed')
    expect(detectColumnType([null, null])).toBe('empty')
    expect(detectColumnType([])).toBe('empty')
  })
})

// =============================================================================
// TABLES
// =============================================================================

describe('createTable', () => {
  it('should reject columns of different lengths', () => {
    expect(() => createTable(['a', 'b'], { a: [1, 2], b: [1] })).toThrow("Column 'b' has 1 values, expected 2")
  })

  it('should reject a column without values', () => {
    expect(() => createTable(['a'], {})).toThrow("Column 'a' has no values")
  })
})

describe('tableFromRows / tableToRows', () => {
  it('should collect columns in first-seen key order', () => {
    const table = tableFromRows([{ a: 1 }, { b: 'x', a: 2 }])
    expect(table.columns).toEqual(['a', 'b'])
    expect(table.data['b']).toEqual([null, 'x'])
  })

  it('should turn a table back into rows', () => {
    const table = createTable(['a', 'b'], { a: [1, 2], b: ['x', null] })
    expect(tableToRows(table)).toEqual([
      { a: 1, b: 'x' },
      { a: 2, b: null }
    ])
  })
})

describe('row and column operations', () => {
  it('should select rows in the given order', () => {
    const table = createTable(['a'], { a: [10, 20, 30] })
    expect(getColumn(selectRows(table, [2, 0]), 'a')).toEqual([30, 10])
  })

  it('should clone without sharing column arrays', () => {
    const table = createTable(['a'], { a: [1, 2] })
    const copy = cloneTable(table)
    setColumn(copy, 'a', [5, 6])
    expect(getColumn(table, 'a')).toEqual([1, 2])
  })

  it('should append new columns and remove them', () => {
    const table = createTable(['a'], { a: [1, 2] })
    setColumn(table, 'b', [true, false])
    expect(table.columns).toEqual(['a', 'b'])
    removeColumn(table, 'a')
    expect(table.columns).toEqual(['b'])
    expect(rowCount(table)).toBe(2)
  })

  it('should throw for an unknown column', () => {
    const table = createTable(['a'], { a: [1] })
    expect(() => getColumn(table, 'zzz')).toThrow("Column 'zzz' not found")
  })
})
