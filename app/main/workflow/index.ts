// Workflow orchestration and pipeline execution

import path from 'node:path'
import * as fs from 'fs'
import * as crypto from 'crypto'
import log, { configureLogging } from '../logger'
import { FileParseError, errorMessage } from '../errors'
import { mapColumns, readTableFile, validateColumns } from '../parsers'
import { buildQualityReport } from '../profiling'
import { cleanTable } from '../cleaning'
import { createTimeSeriesFeatures, fitTransform } from '../transform'
import { createPresetValidator, validateTable } from '../validation'
import { rowCount, tableToRows } from '../table'
import { writeCsv, writeXlsx } from '../writers'
import type {
  CleaningReport,
  PipelineConfig,
  PipelineResult,
  ValidationResult,
  ValidationRule,
  TransformResult
} from '../types'

const SAMPLE_ROWS = 100

function collectRules(config: PipelineConfig): ValidationRule[] {
  const rules: ValidationRule[] = []
  if (config.validationPreset) {
    rules.push(...createPresetValidator(config.validationPreset).getRules())
  }
  if (config.rules) {
    rules.push(...config.rules)
  }
  return rules
}

/**
 * Run the complete data preparation pipeline: read, validate, clean,
 * transform, write, then record report.json in the artifact directory.
 */
export async function runPipeline(config: PipelineConfig): Promise<PipelineResult> {
  const timings: Record<string, number> = {}
  const notes: string[] = []
  let startTime: number

  // Ensure artifact directory exists
  fs.mkdirSync(config.artifactDir, { recursive: true })

  // Run log beside the report
  configureLogging({ filePath: path.join(config.artifactDir, 'run.log'), fileLevel: 'info' })

  try {
    log.info(`[PIPELINE] Input: ${config.inputPath}`)
    log.info(`[PIPELINE] Output: ${config.outputPath} (${config.outputFormat})`)

    // Step 1: Source - read input file
    startTime = Date.now()
    const parsed = readTableFile(config.inputPath, { sheetName: config.sheetName ?? undefined })
    notes.push(`Read ${parsed.totalRows} rows and ${parsed.table.columns.length} columns from ${parsed.name}`)

    // Map source columns to system fields, then check the expected ones
    const mappings = config.columnMappings ?? []
    const source = mappings.length > 0 ? mapColumns(parsed.table, mappings) : parsed.table
    const required = config.requiredColumns ?? []
    const optional = config.optionalColumns ?? []
    if (required.length > 0 || optional.length > 0) {
      const check = validateColumns(source, required, optional)
      if (!check.valid) {
        throw new FileParseError(`Missing required columns: ${check.missing.join(', ')}`, parsed.name)
      }
      notes.push(...check.warnings)
    }
    timings['source'] = Date.now() - startTime

    // Step 2: Quality report of the raw input
    startTime = Date.now()
    const quality = buildQualityReport(source)
    timings['quality'] = Date.now() - startTime
    notes.push(`Input quality score: ${quality.overallScore}`)

    // Step 3: Validate
    startTime = Date.now()
    const rules = collectRules(config)
    let validation: ValidationResult | null = null
    if (rules.length > 0) {
      validation = validateTable(source, rules)
      notes.push(`Validation: ${validation.errors.length} errors, ${validation.warnings.length} warnings`)
    } else {
      notes.push('Validation skipped: no rules')
    }
    timings['validate'] = Date.now() - startTime

    // Step 4: Clean
    startTime = Date.now()
    let table = source
    let cleaning: CleaningReport | null = null
    if (config.cleaning !== false) {
      const cleaned = cleanTable(table, config.cleaning ?? {})
      table = cleaned.table
      cleaning = cleaned.report
      notes.push(...cleaning.warnings, ...cleaning.errors)
    } else {
      notes.push('Cleaning skipped')
    }
    timings['clean'] = Date.now() - startTime

    // Step 5: Time-series features
    if (config.timeSeries) {
      startTime = Date.now()
      const before = table.columns.length
      table = createTimeSeriesFeatures(table, config.timeSeries)
      notes.push(`Added ${table.columns.length - before} time-series features for '${config.timeSeries.valueColumn}'`)
      timings['timeSeries'] = Date.now() - startTime
    }

    // Step 6: Transform
    startTime = Date.now()
    let transformResult: TransformResult | null = null
    if (config.transform !== false) {
      const transformed = fitTransform(table, config.transform ?? {}, config.targetColumn ?? null)
      table = transformed.table
      transformResult = transformed.result
      notes.push(...transformResult.warnings)
    } else {
      notes.push('Transformation skipped')
    }
    timings['transform'] = Date.now() - startTime

    // Step 7: Sink - write output file
    startTime = Date.now()
    fs.mkdirSync(path.dirname(config.outputPath), { recursive: true })
    if (config.outputFormat === 'xlsx') {
      writeXlsx(table, config.outputPath)
    } else {
      writeCsv(table, config.outputPath)
    }
    timings['sink'] = Date.now() - startTime

    // Calculate artifact hash
    const outputContent = fs.readFileSync(config.outputPath)
    const hash = crypto.createHash('sha256').update(outputContent).digest('hex')

    const errorCount = validation ? validation.errors.length : 0
    const result: PipelineResult = {
      ok: errorCount === 0,
      artifactDir: config.artifactDir,
      reportPath: path.join(config.artifactDir, 'report.json'),
      counts: {
        in: rowCount(source),
        out: rowCount(table),
        errors: errorCount,
        warnings: validation ? validation.warnings.length : 0
      },
      timings,
      notes,
      artifactHash: hash
    }

    // Write report.json with stage reports and an output sample
    const report = {
      ...result,
      validation,
      cleaning,
      transform: transformResult,
      quality,
      outputColumns: table.columns,
      outputDataSample: tableToRows(table).slice(0, SAMPLE_ROWS)
    }
    fs.writeFileSync(result.reportPath, JSON.stringify(report, null, 2), 'utf-8')

    log.info(`[PIPELINE] Completed: ${result.counts.in} rows in, ${result.counts.out} rows out, hash ${hash}`)
    return result
  } catch (error) {
    log.error(`[PIPELINE] Pipeline failed: ${errorMessage(error)}`)
    throw error
  } finally {
    configureLogging({ fileLevel: false })
  }
}

/**
 * Generate a unique artifact directory path with timestamp
 */
export function generateArtifactDir(baseDir: string = 'artifacts'): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').replace('Z', '')
  return path.join(baseDir, `run-${timestamp}`)
}
