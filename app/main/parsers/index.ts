// File parsers for CSV and XLSX files

import * as fs from 'fs'
import * as path from 'path'
import * as XLSX from 'xlsx'
import log from '../logger'
import { FileParseError, errorMessage } from '../errors'
import { createTable, getColumn, parseDateValue } from '../table'
import { profileTable } from '../profiling'
import type { CellValue, ColumnCheck, ColumnMapping, FileType, ParseResult, Table } from '../types'

export const NA_VALUES: readonly string[] = ['', 'NA', 'N/A', 'null', 'NULL', 'None']

const EXTENSIONS: Record<string, FileType> = {
  '.csv': 'csv',
  '.xlsx': 'xlsx',
  '.xls': 'xls'
}

export interface ParseOptions {
  sheetName?: string
}

export function detectFileType(filename: string): FileType {
  const ext = path.extname(filename).toLowerCase()
  const fileType = Object.prototype.hasOwnProperty.call(EXTENSIONS, ext) ? EXTENSIONS[ext] : undefined
  if (!fileType) {
    throw new FileParseError(`Unsupported file type '${ext || filename}'`, filename)
  }
  return fileType
}

/**
 * Normalize a CSV cell: NA markers become null, then booleans, numbers and
 * year-first dates (as ISO strings) are recognised. Anything else is trimmed text.
 */
export function normalizeCsvValue(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null
  }

  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (NA_VALUES.includes(trimmed)) return null

    // Check for boolean
    if (trimmed.toLowerCase() === 'true') return true
    if (trimmed.toLowerCase() === 'false') return false

    // Check for number
    const num = Number(trimmed)
    if (!Number.isNaN(num)) {
      return num
    }

    // Check for date (year first)
    const date = parseDateValue(trimmed)
    if (date) {
      return date.toISOString()
    }

    return trimmed
  }

  return normalizeWorkbookValue(value)
}

/**
 * Normalize a spreadsheet cell. Typed cells are kept; text only loses NA markers and padding.
 */
export function normalizeWorkbookValue(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null
  }

  // Handle dates
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value
  }

  if (typeof value === 'number') {
    return Number.isNaN(value) ? null : value
  }

  if (typeof value === 'boolean') {
    return value
  }

  const trimmed = String(value).trim()
  return NA_VALUES.includes(trimmed) ? null : trimmed
}

/**
 * Header names: trimmed, blanks named by position, repeats suffixed `.1`, `.2`, ...
 */
function headerNames(headerRow: unknown[]): string[] {
  const seen = new Map<string, number>()
  return headerRow.map((cell, index) => {
    const base = cell === null || cell === undefined || String(cell).trim() === ''
      ? `Unnamed: ${index}`
      : String(cell).trim()
    const count = seen.get(base) ?? 0
    seen.set(base, count + 1)
    return count === 0 ? base : `${base}.${count}`
  })
}

function sheetToResult(
  workbook: XLSX.WorkBook,
  name: string,
  fileType: FileType,
  normalize: (value: unknown) => CellValue,
  options: ParseOptions
): ParseResult {
  const sheetName = options.sheetName ?? workbook.SheetNames[0]
  if (!sheetName) {
    throw new FileParseError('No sheets found in workbook', name)
  }

  const worksheet = workbook.Sheets[sheetName]
  if (!worksheet) {
    throw new FileParseError(`Sheet '${sheetName}' not found`, name)
  }

  // Arrays of cells, first row is the header
  const rows = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    raw: fileType !== 'csv',
    defval: null,
    blankrows: false
  })

  const headerRow = rows[0]
  if (!headerRow || headerRow.length === 0) {
    throw new FileParseError('File contains no data', name)
  }

  const columns = headerNames(headerRow)
  const data: Record<string, CellValue[]> = {}
  columns.forEach((column, index) => {
    data[column] = rows.slice(1).map(row => normalize(row[index]))
  })

  const table = createTable(columns, data)
  const totalRows = rows.length - 1
  log.info(`[PARSER] Parsed ${name}: ${totalRows} rows, ${columns.length} columns`)

  return {
    name,
    fileType,
    totalRows,
    table,
    columnInfo: profileTable(table)
  }
}

/**
 * Parse CSV text. Cells are read as text and typed by normalizeCsvValue.
 */
export function parseCsvText(text: string, name: string = 'data.csv'): ParseResult {
  let workbook: XLSX.WorkBook
  try {
    workbook = XLSX.read(text, { type: 'string', raw: true })
  } catch (error) {
    throw new FileParseError(`Could not read CSV data: ${errorMessage(error)}`, name)
  }
  return sheetToResult(workbook, name, 'csv', normalizeCsvValue, {})
}

export function parseWorkbook(content: Buffer, name: string, options: ParseOptions = {}): ParseResult {
  const fileType = detectFileType(name)
  if (fileType === 'csv') {
    return parseCsvText(decodeText(content), name)
  }

  let workbook: XLSX.WorkBook
  try {
    workbook = XLSX.read(content, { type: 'buffer', cellDates: true })
  } catch (error) {
    throw new FileParseError(`Could not read workbook: ${errorMessage(error)}`, name)
  }
  return sheetToResult(workbook, name, fileType, normalizeWorkbookValue, options)
}

/**
 * UTF-8 first, Latin-1 when the bytes are not valid UTF-8
 */
function decodeText(content: Buffer): string {
  const utf8 = content.toString('utf-8').replace(/^\uFEFF/, '')
  return utf8.includes('\uFFFD') ? content.toString('latin1') : utf8
}

export function readTableFile(filePath: string, options: ParseOptions = {}): ParseResult {
  const name = path.basename(filePath)
  detectFileType(name)

  let content: Buffer
  try {
    content = fs.readFileSync(filePath)
  } catch (error) {
    throw new FileParseError(`Could not read file: ${errorMessage(error)}`, name)
  }

  return parseWorkbook(content, name, options)
}

/**
 * Sheet names of a workbook file. A CSV file has one sheet.
 */
export function listSheets(filePath: string): string[] {
  const name = path.basename(filePath)
  if (detectFileType(name) === 'csv') return ['Sheet1']
  try {
    return XLSX.read(fs.readFileSync(filePath), { type: 'buffer', bookSheets: true }).SheetNames
  } catch (error) {
    throw new FileParseError(`Could not read workbook: ${errorMessage(error)}`, name)
  }
}

// =============================================================================
// COLUMN MAPPING
// =============================================================================

/**
 * Rename source columns to system fields. Mappings whose source column is
 * absent are ignored. Returns a new table.
 */
export function mapColumns(table: Table, mappings: ColumnMapping[]): Table {
  const renames = new Map<string, string>()
  for (const mapping of mappings) {
    if (table.columns.includes(mapping.sourceColumn)) {
      renames.set(mapping.sourceColumn, mapping.targetField)
    }
  }

  const columns = table.columns.map(column => renames.get(column) ?? column)
  const duplicate = columns.find((column, index) => columns.indexOf(column) !== index)
  if (duplicate !== undefined) {
    throw new FileParseError(`Column mapping produces duplicate column '${duplicate}'`)
  }

  const data: Record<string, CellValue[]> = {}
  table.columns.forEach((column, index) => {
    const target = columns[index] ?? column
    data[target] = [...getColumn(table, column)]
  })

  if (renames.size > 0) {
    log.info(`[PARSER] Mapped ${renames.size} columns`)
  }
  return createTable(columns, data)
}

/**
 * Check required and optional columns, ignoring case. Missing optional
 * columns only produce warnings.
 */
export function validateColumns(table: Table, required: string[], optional: string[] = []): ColumnCheck {
  const present = new Set(table.columns.map(column => column.toLowerCase()))
  const missing = required.filter(column => !present.has(column.toLowerCase()))
  const warnings = optional
    .filter(column => !present.has(column.toLowerCase()))
    .map(column => `Optional column not found: ${column}`)

  return { valid: missing.length === 0, missing, warnings }
}
