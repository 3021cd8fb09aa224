import path from 'node:path'
import * as os from 'os'
import * as fs from 'fs'
import log from './logger'
import { AppError } from './errors'
import { createCleaningConfig } from './cleaning'
import { createTransformConfig } from './transform'
import type { AppSettings, ColumnMapping, OutputFormat, ValidationPreset } from './types'

const OUTPUT_FORMATS: readonly OutputFormat[] = ['csv', 'xlsx']
const PRESETS: readonly ValidationPreset[] = ['sales', 'purchases', 'products']

export const DEFAULT_SETTINGS: AppSettings = {
  outputFormat: 'csv',
  artifactBaseDir: 'artifacts',
  validationPreset: null,
  targetColumn: null,
  cleaning: {},
  transform: {},
  columnMappings: [],
  requiredColumns: [],
  optionalColumns: [],
  timeSeries: null
}

export function defaultSettingsPath(): string {
  return path.join(os.homedir(), '.dataprep', 'settings.json')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isColumnMapping(value: unknown): value is ColumnMapping {
  return isRecord(value) && typeof value['sourceColumn'] === 'string' && typeof value['targetField'] === 'string'
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

/**
 * Reject settings no run could use. Stage options go through the same
 * checks the stages apply.
 */
function checkSettings(settings: AppSettings): void {
  if (!OUTPUT_FORMATS.includes(settings.outputFormat)) {
    throw new AppError(`Unknown output format '${String(settings.outputFormat)}'`, 'SETTINGS_ERROR')
  }
  if (settings.validationPreset !== null && !PRESETS.includes(settings.validationPreset)) {
    throw new AppError(`Unknown validation preset '${String(settings.validationPreset)}'`, 'SETTINGS_ERROR')
  }
  if (typeof settings.artifactBaseDir !== 'string' || settings.artifactBaseDir === '') {
    throw new AppError('artifactBaseDir must be a non-empty string', 'SETTINGS_ERROR')
  }
  if (!isRecord(settings.cleaning) || !isRecord(settings.transform)) {
    throw new AppError('cleaning and transform must be objects', 'SETTINGS_ERROR')
  }
  createCleaningConfig(settings.cleaning)
  createTransformConfig(settings.transform)

  const mappings: unknown = settings.columnMappings
  if (!Array.isArray(mappings) || !mappings.every(isColumnMapping)) {
    throw new AppError('columnMappings must be a list of { sourceColumn, targetField }', 'SETTINGS_ERROR')
  }
  if (!isStringArray(settings.requiredColumns) || !isStringArray(settings.optionalColumns)) {
    throw new AppError('requiredColumns and optionalColumns must be lists of column names', 'SETTINGS_ERROR')
  }
  const timeSeries: unknown = settings.timeSeries
  if (timeSeries !== null) {
    if (!isRecord(timeSeries) || typeof timeSeries['dateColumn'] !== 'string' || typeof timeSeries['valueColumn'] !== 'string') {
      throw new AppError('timeSeries needs dateColumn and valueColumn', 'SETTINGS_ERROR')
    }
  }
}

export class SettingsManager {
  private settingsPath: string
  private settings: AppSettings

  constructor(settingsPath: string = defaultSettingsPath()) {
    this.settingsPath = settingsPath
    this.settings = this.loadSettings()
  }

  private loadSettings(): AppSettings {
    try {
      if (fs.existsSync(this.settingsPath)) {
        const data = fs.readFileSync(this.settingsPath, 'utf-8')
        const parsed: unknown = JSON.parse(data)
        if (!isRecord(parsed)) {
          throw new AppError('Settings file must hold a JSON object', 'SETTINGS_ERROR')
        }
        const loaded = parsed as Partial<AppSettings>

        // Merge with defaults to ensure all fields exist
        const settings: AppSettings = {
          ...DEFAULT_SETTINGS,
          ...loaded
        }
        checkSettings(settings)
        return settings
      }
    } catch (error) {
      log.error('[ERROR] Failed to load settings:', error)
    }

    return { ...DEFAULT_SETTINGS }
  }

  private saveSettings(): void {
    try {
      fs.mkdirSync(path.dirname(this.settingsPath), { recursive: true })
      fs.writeFileSync(this.settingsPath, JSON.stringify(this.settings, null, 2), 'utf-8')
    } catch (error) {
      log.error('[ERROR] Failed to save settings:', error)
      throw error
    }
  }

  getSettingsPath(): string {
    return this.settingsPath
  }

  getSettings(): AppSettings {
    return { ...this.settings }
  }

  updateSettings(updates: Partial<AppSettings>): void {
    this.settings = {
      ...this.settings,
      ...updates
    }
    this.saveSettings()
  }

  resetSettings(): void {
    this.settings = { ...DEFAULT_SETTINGS }
    this.saveSettings()
  }
}
