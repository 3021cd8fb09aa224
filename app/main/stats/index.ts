// Descriptive statistics over numeric cells

import { isNull } from '../table'
import type { CellValue } from '../types'

/**
 * Non-null numeric values of a column, in row order
 */
export function numericValues(values: CellValue[]): number[] {
  const result: number[] = []
  for (const value of values) {
    if (typeof value === 'number' && !Number.isNaN(value)) {
      result.push(value)
    }
  }
  return result
}

export function mean(values: number[]): number {
  if (values.length === 0) return NaN
  let sum = 0
  for (const v of values) sum += v
  return sum / values.length
}

/**
 * Sample standard deviation (n - 1 denominator). NaN below two values.
 */
export function sampleStd(values: number[]): number {
  if (values.length < 2) return NaN
  const avg = mean(values)
  let squares = 0
  for (const v of values) {
    squares += (v - avg) ** 2
  }
  return Math.sqrt(squares / (values.length - 1))
}

/**
 * Quantile with linear interpolation between closest ranks
 */
export function quantile(values: number[], q: number): number {
  if (values.length === 0) return NaN
  const sorted = [...values].sort((a, b) => a - b)
  const position = (sorted.length - 1) * q
  const lower = Math.floor(position)
  const upper = Math.ceil(position)
  const lowerValue = sorted[lower] ?? NaN
  const upperValue = sorted[upper] ?? NaN
  if (lower === upper) return lowerValue
  return lowerValue + (upperValue - lowerValue) * (position - lower)
}

export function median(values: number[]): number {
  return quantile(values, 0.5)
}

export function min(values: number[]): number {
  return values.length === 0 ? NaN : values.reduce((a, b) => (b < a ? b : a))
}

export function max(values: number[]): number {
  return values.length === 0 ? NaN : values.reduce((a, b) => (b > a ? b : a))
}

// =============================================================================
// OUTLIER MASKS
// =============================================================================

/**
 * Flag cells whose |x - mean| / std exceeds the threshold.
 * Nothing is flagged when std is zero or undefined.
 */
export function zscoreMask(values: CellValue[], threshold: number): boolean[] {
  const nums = numericValues(values)
  const avg = mean(nums)
  const std = sampleStd(nums)

  if (!Number.isFinite(std) || std === 0) {
    return values.map(() => false)
  }

  return values.map(value => {
    if (typeof value !== 'number' || isNull(value)) return false
    return Math.abs(value - avg) / std > threshold
  })
}

/**
 * Flag cells outside [Q1 - k * IQR, Q3 + k * IQR]
 */
export function iqrMask(values: CellValue[], multiplier: number): boolean[] {
  const nums = numericValues(values)
  const q1 = quantile(nums, 0.25)
  const q3 = quantile(nums, 0.75)
  const iqr = q3 - q1
  const lowerBound = q1 - multiplier * iqr
  const upperBound = q3 + multiplier * iqr

  return values.map(value => {
    if (typeof value !== 'number' || isNull(value)) return false
    return value < lowerBound || value > upperBound
  })
}

export function countTrue(mask: boolean[]): number {
  let count = 0
  for (const flag of mask) {
    if (flag) count++
  }
  return count
}
