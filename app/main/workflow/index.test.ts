import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import * as crypto from 'crypto'
import path from 'node:path'
import { FileParseError } from '../errors'
import { readTableFile } from '../parsers'
import { getColumn } from '../table'
import { generateArtifactDir, runPipeline } from './index'

const SALES_CSV = [
  'fecha,total,tienda',
  '2024-01-01,100,north',
  '2024-01-02,250,south',
  '2024-01-02,250,south',
  '2024-01-03,-5,north'
].join('\n')

describe('runPipeline', () => {
  let dir: string
  let inputPath: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dataprep-workflow-'))
    inputPath = path.join(dir, 'sales.csv')
    fs.writeFileSync(inputPath, SALES_CSV, 'utf-8')
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('should validate, clean, transform and write the output', async () => {
    const outputPath = path.join(dir, 'out', 'sales_prepared.csv')

    const result = await runPipeline({
      inputPath,
      outputPath,
      outputFormat: 'csv',
      artifactDir: path.join(dir, 'run'),
      validationPreset: 'sales'
    })

    expect(result.ok).toBe(false)
    expect(result.counts).toEqual({ in: 4, out: 3, errors: 1, warnings: 0 })
    expect(fs.readFileSync(outputPath, 'utf-8')).toBe([
      'fecha,total,tienda,fecha_year,fecha_month,fecha_day,fecha_dayofweek,fecha_quarter',
      '2024-01-01T00:00:00.000Z,100,0,2024,1,1,0,1',
      '2024-01-02T00:00:00.000Z,250,1,2024,1,2,1,1',
      '2024-01-03T00:00:00.000Z,-5,0,2024,1,3,2,1',
      ''
    ].join('\n'))
    expect(result.notes).toContain('Read 4 rows and 3 columns from sales.csv')
    expect(result.notes).toContain('Validation: 1 errors, 0 warnings')
  })

  it('should hash the written artifact', async () => {
    const outputPath = path.join(dir, 'out.csv')

    const result = await runPipeline({ inputPath, outputPath, outputFormat: 'csv', artifactDir: path.join(dir, 'run') })

    const expected = crypto.createHash('sha256').update(fs.readFileSync(outputPath)).digest('hex')
    expect(result.artifactHash).toBe(expected)
    expect(result.ok).toBe(true)
  })

  it('should write report.json with the stage reports', async () => {
    const artifactDir = path.join(dir, 'run')

    const result = await runPipeline({
      inputPath,
      outputPath: path.join(dir, 'out.csv'),
      outputFormat: 'csv',
      artifactDir,
      validationPreset: 'sales'
    })

    expect(result.reportPath).toBe(path.join(artifactDir, 'report.json'))
    const report: unknown = JSON.parse(fs.readFileSync(result.reportPath, 'utf-8'))
    expect(report).toMatchObject({
      ok: false,
      counts: { in: 4, out: 3, errors: 1, warnings: 0 },
      validation: { errors: [{ ruleName: 'range_total' }] },
      cleaning: { originalRows: 4, cleanedRows: 3, duplicatesRemoved: 1 },
      transform: { dateColumns: ['fecha'] },
      quality: { totalRows: 4 },
      outputColumns: ['fecha', 'total', 'tienda', 'fecha_year', 'fecha_month', 'fecha_day', 'fecha_dayofweek', 'fecha_quarter']
    })
  })

  it('should skip disabled stages', async () => {
    const outputPath = path.join(dir, 'out.csv')

    const result = await runPipeline({
      inputPath,
      outputPath,
      outputFormat: 'csv',
      artifactDir: path.join(dir, 'run'),
      cleaning: false,
      transform: false
    })

    expect(result.counts).toEqual({ in: 4, out: 4, errors: 0, warnings: 0 })
    expect(result.notes).toContain('Validation skipped: no rules')
    expect(result.notes).toContain('Cleaning skipped')
    expect(result.notes).toContain('Transformation skipped')
  })

  it('should write XLSX output', async () => {
    const outputPath = path.join(dir, 'out.xlsx')

    await runPipeline({
      inputPath,
      outputPath,
      outputFormat: 'xlsx',
      artifactDir: path.join(dir, 'run'),
      cleaning: false,
      transform: false
    })

    const { table } = readTableFile(outputPath)
    expect(getColumn(table, 'total')).toEqual([100, 250, 250, -5])
  })

  it('should write a run log in the artifact directory', async () => {
    const artifactDir = path.join(dir, 'run')

    await runPipeline({ inputPath, outputPath: path.join(dir, 'out.csv'), outputFormat: 'csv', artifactDir })

    const runLog = path.join(artifactDir, 'run.log')
    expect(fs.existsSync(runLog)).toBe(true)
    expect(fs.readFileSync(runLog, 'utf-8')).toContain(`[PIPELINE] Input: ${inputPath}`)
  })

  it('should map columns and check expected ones', async () => {
    const outputPath = path.join(dir, 'out.csv')

    const result = await runPipeline({
      inputPath,
      outputPath,
      outputFormat: 'csv',
      artifactDir: path.join(dir, 'run'),
      columnMappings: [{ sourceColumn: 'tienda', targetField: 'store' }],
      requiredColumns: ['FECHA', 'store'],
      optionalColumns: ['cliente'],
      cleaning: false,
      transform: false
    })

    expect(fs.readFileSync(outputPath, 'utf-8').split('\n')[0]).toBe('fecha,total,store')
    expect(result.notes).toContain('Optional column not found: cliente')
  })

  it('should fail when a required column is missing', async () => {
    await expect(runPipeline({
      inputPath,
      outputPath: path.join(dir, 'out.csv'),
      outputFormat: 'csv',
      artifactDir: path.join(dir, 'run'),
      requiredColumns: ['cliente']
    })).rejects.toThrow('Missing required columns: cliente')
  })

  it('should add time-series features when configured', async () => {
    const outputPath = path.join(dir, 'out.csv')

    const result = await runPipeline({
      inputPath,
      outputPath,
      outputFormat: 'csv',
      artifactDir: path.join(dir, 'run'),
      cleaning: false,
      transform: false,
      timeSeries: { dateColumn: 'fecha', valueColumn: 'total', lags: [1], rollingWindows: [2] }
    })

    expect(result.notes).toContain("Added 7 time-series features for 'total'")
    const { table } = readTableFile(outputPath)
    expect(getColumn(table, 'total_lag_1')).toEqual([null, 100, 250, 250])
    expect(getColumn(table, 'total_diff_1')).toEqual([null, 150, 0, -255])
  })

  it('should reject when the input cannot be read', async () => {
    await expect(runPipeline({
      inputPath: path.join(dir, 'missing.csv'),
      outputPath: path.join(dir, 'out.csv'),
      outputFormat: 'csv',
      artifactDir: path.join(dir, 'run')
    })).rejects.toThrow(FileParseError)
  })
})

describe('generateArtifactDir', () => {
  it('should name a timestamped run directory under the base', () => {
    const dir = generateArtifactDir('base')
    expect(path.dirname(dir)).toBe('base')
    expect(path.basename(dir)).toMatch(/^run-\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-\d{3}$/)
  })
})
