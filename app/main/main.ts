#!/usr/bin/env node
import path from 'node:path'
import { parseArgs } from 'node:util'
import log, { configureLogging } from './logger'
import { AppError, errorMessage } from './errors'
import { listSheets } from './parsers'
import { SettingsManager } from './SettingsManager'
import { generateArtifactDir, runPipeline } from './workflow'
import type { AppSettings, OutputFormat, PipelineConfig, PipelineResult, ValidationPreset } from './types'

const USAGE = `Usage: dataprep <input> [options]

Options:
  -o, --output <path>       output file (default: inside the artifact directory)
  -f, --format <csv|xlsx>   output format
  -s, --settings <path>     settings file
  -p, --preset <name>       validation preset: sales, purchases, products
      --sheet <name>        workbook sheet to read (default: the first)
      --list-sheets         print the sheets of the input file and exit
  -t, --target <column>     target column for target encoding
      --no-clean            skip the cleaning stage
      --no-transform        skip the transformation stage
  -v, --verbose             log stage details
  -h, --help                show this help`

// =============================================================================
// ARGUMENTS
// =============================================================================

export interface CliOptions {
  input: string | null
  output: string | null
  format: OutputFormat | null
  settingsPath: string | null
  sheet: string | null
  listSheets: boolean
  preset: ValidationPreset | null
  target: string | null
  clean: boolean
  transform: boolean
  verbose: boolean
  help: boolean
}

function parseFormat(value: string | undefined): OutputFormat | null {
  if (value === undefined) return null
  if (value === 'csv' || value === 'xlsx') return value
  throw new AppError(`Unknown output format '${value}'`, 'CLI_USAGE')
}

function parsePreset(value: string | undefined): ValidationPreset | null {
  if (value === undefined) return null
  if (value === 'sales' || value === 'purchases' || value === 'products') return value
  throw new AppError(`Unknown validation preset '${value}'`, 'CLI_USAGE')
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o' },
      format: { type: 'string', short: 'f' },
      settings: { type: 'string', short: 's' },
      preset: { type: 'string', short: 'p' },
      sheet: { type: 'string' },
      'list-sheets': { type: 'boolean' },
      target: { type: 'string', short: 't' },
      'no-clean': { type: 'boolean' },
      'no-transform': { type: 'boolean' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' }
    }
  })
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof readArgs>
  try {
    parsed = readArgs(argv)
  } catch (error) {
    throw new AppError(errorMessage(error), 'CLI_USAGE')
  }

  const { values, positionals } = parsed
  if (positionals.length > 1) {
    throw new AppError(`Expected one input file, got ${positionals.length}`, 'CLI_USAGE')
  }

  return {
    input: positionals[0] ?? null,
    output: values.output ?? null,
    format: parseFormat(values.format),
    settingsPath: values.settings ?? null,
    sheet: values.sheet ?? null,
    listSheets: values['list-sheets'] ?? false,
    preset: parsePreset(values.preset),
    target: values.target ?? null,
    clean: !values['no-clean'],
    transform: !values['no-transform'],
    verbose: values.verbose ?? false,
    help: values.help ?? false
  }
}

/**
 * Combine command-line options with stored settings. Options win.
 */
export function buildPipelineConfig(options: CliOptions, settings: AppSettings, inputPath: string): PipelineConfig {
  const outputFormat = options.format ?? settings.outputFormat
  const artifactDir = generateArtifactDir(settings.artifactBaseDir)
  const stem = path.basename(inputPath, path.extname(inputPath))
  const outputPath = options.output ?? path.join(artifactDir, `${stem}_prepared.${outputFormat}`)

  return {
    inputPath,
    outputPath,
    outputFormat,
    artifactDir,
    sheetName: options.sheet,
    columnMappings: settings.columnMappings,
    requiredColumns: settings.requiredColumns,
    optionalColumns: settings.optionalColumns,
    validationPreset: options.preset ?? settings.validationPreset,
    cleaning: options.clean ? settings.cleaning : false,
    transform: options.transform ? settings.transform : false,
    timeSeries: settings.timeSeries,
    targetColumn: options.target ?? settings.targetColumn
  }
}

function printSummary(result: PipelineResult, outputPath: string): void {
  console.log(`Status:      ${result.ok ? 'ok' : 'validation errors'}`)
  console.log(`Rows:        ${result.counts.in} in, ${result.counts.out} out`)
  console.log(`Validation:  ${result.counts.errors} errors, ${result.counts.warnings} warnings`)
  console.log(`Output:      ${outputPath}`)
  console.log(`Report:      ${result.reportPath}`)
  console.log(`Hash:        ${result.artifactHash}`)
  for (const note of result.notes) {
    console.log(`  - ${note}`)
  }
}

// =============================================================================
// ENTRY POINT
// =============================================================================

/**
 * Run the command line. Resolves to the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  let options: CliOptions
  try {
    options = parseCliArgs(argv)
  } catch (error) {
    console.error(errorMessage(error))
    console.error(USAGE)
    return 1
  }

  if (options.help) {
    console.log(USAGE)
    return 0
  }
  if (!options.input) {
    console.error(USAGE)
    return 1
  }

  if (options.listSheets) {
    try {
      for (const sheet of listSheets(options.input)) {
        console.log(sheet)
      }
      return 0
    } catch (error) {
      console.error(`Failed: ${errorMessage(error)}`)
      return 1
    }
  }

  configureLogging({ consoleLevel: options.verbose ? 'info' : 'warn' })

  const settingsManager = options.settingsPath
    ? new SettingsManager(options.settingsPath)
    : new SettingsManager()
  const config = buildPipelineConfig(options, settingsManager.getSettings(), options.input)

  try {
    const result = await runPipeline(config)
    printSummary(result, config.outputPath)
    return result.ok ? 0 : 1
  } catch (error) {
    log.error('[ERROR] Run failed:', errorMessage(error))
    console.error(`Failed: ${errorMessage(error)}`)
    return 1
  }
}

if (typeof require !== 'undefined' && require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code
    })
    .catch(error => {
      console.error(errorMessage(error))
      process.exitCode = 1
    })
}
