// Numeric scaling with captured, invertible parameters

import { TransformError } from '../errors'
import { isNull } from '../table'
import { max, mean, median, min, numericValues, quantile, sampleStd } from '../stats'
import type { CellValue, ScalingMethod, ScalingParams } from '../types'

export const SCALING_METHODS: readonly ScalingMethod[] = ['none', 'minmax', 'standard', 'robust', 'maxabs', 'log', 'sqrt']

function requireFinite(column: string, stats: Record<string, number>): void {
  for (const [name, value] of Object.entries(stats)) {
    if (!Number.isFinite(value)) {
      throw new TransformError(`Scaling statistic '${name}' of '${column}' is not finite`, column)
    }
  }
}

/**
 * Compute the statistics a scaling method needs for one column
 */
export function fitScaling(column: string, values: CellValue[], method: Exclude<ScalingMethod, 'none'>): ScalingParams {
  const invalid = values.find(v => !isNull(v) && typeof v !== 'number')
  if (invalid !== undefined) {
    throw new TransformError(`Column '${column}' holds non-numeric value '${String(invalid)}'`, column)
  }

  if (method === 'log') return { method: 'log' }
  if (method === 'sqrt') return { method: 'sqrt' }

  const nums = numericValues(values)
  if (nums.length === 0) {
    throw new TransformError(`Column '${column}' has no numeric values to scale`, column)
  }

  switch (method) {
    case 'minmax': {
      const stats = { min: min(nums), max: max(nums) }
      requireFinite(column, stats)
      return { method, ...stats }
    }
    case 'standard': {
      // A single value has no spread: treated like a constant column
      const std = nums.length < 2 ? 0 : sampleStd(nums)
      const stats = { mean: mean(nums), std }
      requireFinite(column, stats)
      return { method, ...stats }
    }
    case 'robust': {
      const stats = { median: median(nums), q1: quantile(nums, 0.25), q3: quantile(nums, 0.75) }
      requireFinite(column, stats)
      return { method, ...stats }
    }
    case 'maxabs': {
      const stats = { maxAbs: max(nums.map(Math.abs)) }
      requireFinite(column, stats)
      return { method, ...stats }
    }
    default:
      throw new TransformError(`Unknown scaling method '${String(method)}'`, column)
  }
}

function scaleValue(x: number, params: ScalingParams): number {
  switch (params.method) {
    case 'minmax': {
      const range = params.max - params.min
      return range === 0 ? 0 : (x - params.min) / range
    }
    case 'standard':
      return params.std === 0 ? 0 : (x - params.mean) / params.std
    case 'robust': {
      const iqr = params.q3 - params.q1
      return iqr === 0 ? 0 : (x - params.median) / iqr
    }
    case 'maxabs':
      return params.maxAbs === 0 ? 0 : x / params.maxAbs
    case 'log':
      return Math.log1p(Math.max(x, 0))
    case 'sqrt':
      return Math.sqrt(Math.max(x, 0))
  }
}

function unscaleValue(y: number, params: ScalingParams): number {
  switch (params.method) {
    case 'minmax':
      return y * (params.max - params.min) + params.min
    case 'standard':
      return y * params.std + params.mean
    case 'robust':
      return y * (params.q3 - params.q1) + params.median
    case 'maxabs':
      return y * params.maxAbs
    case 'log':
      return Math.expm1(y)
    case 'sqrt':
      return y ** 2
  }
}

export function applyScaling(column: string, values: CellValue[], params: ScalingParams): CellValue[] {
  return values.map(value => {
    if (isNull(value)) return null
    if (typeof value !== 'number') {
      throw new TransformError(`Column '${column}' holds non-numeric value '${String(value)}'`, column)
    }
    return scaleValue(value, params)
  })
}

/**
 * Algebraic inverse of applyScaling. Non-numeric cells pass through.
 */
export function invertScaling(values: CellValue[], params: ScalingParams): CellValue[] {
  return values.map(value => {
    if (isNull(value)) return null
    if (typeof value !== 'number') return value
    return unscaleValue(value, params)
  })
}
