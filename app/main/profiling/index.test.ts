import { describe, it, expect } from 'vitest'
import { createTable } from '../table'
import { buildQualityReport, profileColumn, profileTable, qualityScore } from './index'

describe('profileColumn', () => {
  it('should summarise a text column', () => {
    expect(profileColumn(['a', null, 'a', 'b'])).toEqual({
      dtype: 'string',
      nullCount: 1,
      nullPercentage: 25,
      uniqueCount: 2,
      sampleValues: ['a', 'a', 'b'],
      suggestedType: 'string'
    })
  })

  it('should round the null percentage to two decimals', () => {
    expect(profileColumn([1, null, 3]).nullPercentage).toBe(33.33)
  })

  it('should suggest numeric for numbers and booleans', () => {
    expect(profileColumn([1.5, 2]).suggestedType).toBe('numeric')
    expect(profileColumn([true, false]).suggestedType).toBe('numeric')
  })

  it('should suggest datetime when more than 70% of sampled text parses as dates', () => {
    expect(profileColumn(['2024-01-01', '2024-01-02', '2024-01-03', 'x']).suggestedType).toBe('datetime')
    expect(profileColumn(['2024-01-01', '2024-01-02', 'x']).suggestedType).toBe('string')
  })
})

describe('profileTable', () => {
  it('should profile every column', () => {
    const table = createTable(['a', 'b'], { a: [1, 2], b: ['x', 'y'] })
    expect(Object.keys(profileTable(table))).toEqual(['a', 'b'])
  })
})

describe('qualityScore', () => {
  it('should weigh completeness and row uniqueness', () => {
    const table = createTable(['a'], { a: [1, 1] })
    // completeness 100, uniqueness 50
    expect(qualityScore(table)).toBe(80)
  })

  it('should be zero for an empty table', () => {
    expect(qualityScore(createTable(['a'], { a: [] }))).toBe(0)
  })
})

describe('buildQualityReport', () => {
  it('should report per-column metrics, issues and recommendations', () => {
    const table = createTable(['a', 'b'], {
      a: [1, 2, null, 4],
      b: ['x', 'x', 'y', 'z']
    })

    const report = buildQualityReport(table)

    expect(report.overallScore).toBe(92.5)
    expect(report.totalRows).toBe(4)
    expect(report.validRows).toBe(3)
    expect(report.metrics).toEqual([
      { column: 'a', completeness: 75, uniqueness: 75, validity: 75, outliersCount: 0 },
      { column: 'b', completeness: 100, uniqueness: 75, validity: 100, outliersCount: 0 }
    ])
    expect(report.issues).toEqual(["Column 'a' has 25.0% null values"])
    expect(report.recommendations).toEqual(['Some columns have many missing values'])
  })

  it('should count z-score outliers above 3', () => {
    const values = [...new Array<number>(20).fill(0), 100]
    const report = buildQualityReport(createTable(['v'], { v: values }))
    expect(report.metrics[0]?.outliersCount).toBe(1)
    expect(report.issues).toEqual(["Column 'v' has 1 outlier values"])
  })

  it('should recommend reviewing an empty source', () => {
    const report = buildQualityReport(createTable(['a'], { a: [] }))
    expect(report.overallScore).toBe(0)
    expect(report.issues).toEqual([])
    expect(report.recommendations).toEqual(['Consider reviewing the data source'])
  })
})
