// File writers for CSV and XLSX

import * as fs from 'fs'
import * as XLSX from 'xlsx'
import { AppError } from '../errors'
import { getColumn, rowCount } from '../table'
import type { CellValue, Table } from '../types'

function outputValue(value: CellValue): string | number | boolean | null {
  if (value instanceof Date) return value.toISOString()
  if (typeof value === 'number' && Number.isNaN(value)) return null
  return value
}

function escapeCsvValue(value: CellValue): string {
  const plain = outputValue(value)
  if (plain === null) {
    return ''
  }

  const str = String(plain)

  // If contains comma, quote, or newline, wrap in quotes and escape quotes
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`
  }

  return str
}

function requireRows(table: Table, format: string): void {
  if (rowCount(table) === 0) {
    throw new AppError(`Cannot write empty dataset to ${format}`, 'EMPTY_OUTPUT')
  }
}

/**
 * CSV text: header line, one line per row, trailing newline
 */
export function tableToCsv(table: Table): string {
  const lines: string[] = []

  // Add header row
  lines.push(table.columns.map(escapeCsvValue).join(','))

  // Add data rows
  const count = rowCount(table)
  for (let i = 0; i < count; i++) {
    lines.push(table.columns.map(column => escapeCsvValue(getColumn(table, column)[i] ?? null)).join(','))
  }

  return lines.join('\n') + '\n'
}

/**
 * Write a table to a CSV file
 */
export function writeCsv(table: Table, outputPath: string): void {
  requireRows(table, 'CSV')
  fs.writeFileSync(outputPath, tableToCsv(table), 'utf-8')
}

/**
 * Write a table to an XLSX file (sheet "Results")
 */
export function writeXlsx(table: Table, outputPath: string): void {
  requireRows(table, 'XLSX')

  const rows: Array<Array<string | number | boolean | null>> = [table.columns]
  const count = rowCount(table)
  for (let i = 0; i < count; i++) {
    rows.push(table.columns.map(column => outputValue(getColumn(table, column)[i] ?? null)))
  }

  const workbook = XLSX.utils.book_new()
  const worksheet = XLSX.utils.aoa_to_sheet(rows)
  XLSX.utils.book_append_sheet(workbook, worksheet, 'Results')
  XLSX.writeFile(workbook, outputPath)
}
