// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

// Core data types
export type CellValue = string | number | boolean | Date | null

export type DataRow = Record<string, unknown>

/**
 * In-memory table: ordered column names over equal-length value arrays
 */
export interface Table {
  columns: string[]
  data: Record<string, CellValue[]>
}

export type ColumnType = 'integer' | 'float' | 'boolean' | 'datetime' | 'string' | 'mixed' | 'empty'

export type SuggestedType = 'numeric' | 'datetime' | 'string'

export interface ColumnInfo {
  dtype: ColumnType
  nullCount: number
  nullPercentage: number
  uniqueCount: number
  sampleValues: CellValue[]
  suggestedType: SuggestedType
}

export interface QualityMetric {
  column: string
  completeness: number
  uniqueness: number
  validity: number
  outliersCount: number
}

export interface QualityReport {
  overallScore: number
  totalRows: number
  validRows: number
  metrics: QualityMetric[]
  issues: string[]
  recommendations: string[]
}

// =============================================================================
// VALIDATION
// =============================================================================

export type RuleType = 'required' | 'type' | 'range' | 'pattern' | 'unique' | 'custom'

export type Severity = 'error' | 'warning' | 'info'

export type ExpectedType = 'string' | 'integer' | 'float' | 'numeric' | 'date' | 'datetime' | 'boolean'

interface RuleBase {
  name: string
  severity: Severity
  message?: string
}

export interface RequiredRule extends RuleBase {
  ruleType: 'required'
  column: string
}

export interface TypeRule extends RuleBase {
  ruleType: 'type'
  column: string
  expectedType: ExpectedType
}

export interface RangeRule extends RuleBase {
  ruleType: 'range'
  column: string
  min?: number | null
  max?: number | null
}

export interface PatternRule extends RuleBase {
  ruleType: 'pattern'
  column: string
  pattern: string
}

export interface UniqueRule extends RuleBase {
  ruleType: 'unique'
  column: string
}

export interface CustomRuleOutcome {
  valid: boolean
  rowIndices: number[]
  message: string
}

export type CustomPredicate = (table: Table) => CustomRuleOutcome

export interface CustomRule extends RuleBase {
  ruleType: 'custom'
  predicate?: CustomPredicate
}

export type ValidationRule = RequiredRule | TypeRule | RangeRule | PatternRule | UniqueRule | CustomRule

export interface ValidationViolation {
  ruleName: string
  ruleType: RuleType
  column: string | null
  severity: Severity
  message: string
  affectedRows: number
  rowIndices: number[]
  sampleValues: CellValue[]
}

export interface ValidationSummary {
  columnsValidated: number
  rulesApplied: number
  rulesPassed: number
  rulesFailed: number
  validityRate: number
}

export interface ValidationResult {
  isValid: boolean
  totalRows: number
  validRows: number
  invalidRows: number
  violations: ValidationViolation[]
  errors: ValidationViolation[]
  warnings: ValidationViolation[]
  columnTypes: Record<string, ColumnType>
  summary: ValidationSummary
}

// =============================================================================
// CLEANING
// =============================================================================

export type NullStrategy =
  | 'drop'
  | 'fill_zero'
  | 'fill_mean'
  | 'fill_median'
  | 'fill_mode'
  | 'fill_forward'
  | 'fill_backward'
  | 'fill_interpolate'

export type OutlierMethod = 'zscore' | 'iqr'

export type KeepDuplicate = 'first' | 'last' | 'none'

export interface CleaningConfig {
  // Duplicates
  removeDuplicates: boolean
  duplicateSubset: string[] | null
  keepDuplicate: KeepDuplicate

  // Nulls
  handleNulls: boolean
  nullStrategy: NullStrategy
  nullThreshold: number
  requiredColumns: string[]

  // Outliers
  detectOutliers: boolean
  outlierMethod: OutlierMethod
  outlierThreshold: number
  iqrMultiplier: number
  removeOutliers: boolean

  // Text
  normalizeText: boolean
  stripWhitespace: boolean
  lowercaseText: boolean

  // Retention
  minRetentionRate: number
}

export interface CleaningReport {
  originalRows: number
  originalColumns: number
  cleanedRows: number
  cleanedColumns: number
  duplicatesFound: number
  duplicatesRemoved: number
  nullsFound: number
  nullsHandled: number
  columnsDroppedNulls: string[]
  outliersDetected: number
  outliersRemoved: number
  outlierDetails: Record<string, number>
  retentionRate: number
  meetsRetentionRequirement: boolean
  warnings: string[]
  errors: string[]
}

export interface CleaningOutput {
  table: Table
  report: CleaningReport
}

export interface OutlierColumnSummary {
  count: number
  mean: number
  std: number
  min: number
  max: number
  q1: number
  q3: number
  iqr: number
  zscoreOutliers: number
  iqrOutliers: number
  outlierValuesZscore: number[]
}

// =============================================================================
// TRANSFORMATION
// =============================================================================

export type ScalingMethod = 'none' | 'minmax' | 'standard' | 'robust' | 'maxabs' | 'log' | 'sqrt'

export type EncodingMethod = 'label' | 'onehot' | 'ordinal' | 'frequency' | 'target'

export type DateFeature =
  | 'year'
  | 'month'
  | 'day'
  | 'dayofweek'
  | 'quarter'
  | 'weekofyear'
  | 'hour'
  | 'is_weekend'
  | 'is_month_start'
  | 'is_month_end'

export interface TransformConfig {
  // Scaling
  scalingMethod: ScalingMethod
  scalingColumns: string[] | null

  // Categorical encoding
  encodingMethod: EncodingMethod
  encodingColumns: string[] | null
  maxCategories: number
  ordinalOrder: Record<string, string[]>

  // Dates
  extractDateFeatures: boolean
  dateColumns: string[] | null
  dateFeatures: DateFeature[]

  // Special values
  handleInfinity: boolean
  infinityReplacement: number | null
}

export type ScalingParams =
  | { method: 'minmax'; min: number; max: number }
  | { method: 'standard'; mean: number; std: number }
  | { method: 'robust'; median: number; q1: number; q3: number }
  | { method: 'maxabs'; maxAbs: number }
  | { method: 'log' }
  | { method: 'sqrt' }

export interface EncodingMap {
  method: EncodingMethod
  categories: string[]
  codes: Record<string, number>
}

export interface TransformResult {
  originalColumns: string[]
  transformedColumns: string[]
  newColumns: string[]
  removedColumns: string[]
  dateColumns: string[]
  scalingParams: Record<string, ScalingParams>
  encodingMaps: Record<string, EncodingMap>
  transformationsApplied: string[]
  warnings: string[]
  config: TransformConfig
}

/**
 * Lag, rolling, difference and percent-change features of one value column,
 * computed in date order
 */
export interface TimeSeriesConfig {
  dateColumn: string
  valueColumn: string
  lags?: number[]
  rollingWindows?: number[]
}

export interface TransformOutput {
  table: Table
  result: TransformResult
}

// =============================================================================
// FILES & PIPELINE
// =============================================================================

export type FileType = 'csv' | 'xlsx' | 'xls'

export type OutputFormat = 'xlsx' | 'csv'

export interface ParseResult {
  name: string
  fileType: FileType
  totalRows: number
  table: Table
  columnInfo: Record<string, ColumnInfo>
}

export type ValidationPreset = 'sales' | 'purchases' | 'products'

export interface ColumnMapping {
  sourceColumn: string
  targetField: string
}

export interface ColumnCheck {
  valid: boolean
  missing: string[]
  warnings: string[]
}

// Settings
export interface AppSettings {
  outputFormat: OutputFormat
  artifactBaseDir: string
  validationPreset: ValidationPreset | null
  targetColumn: string | null
  cleaning: Partial<CleaningConfig>
  transform: Partial<TransformConfig>
  columnMappings: ColumnMapping[]
  requiredColumns: string[]
  optionalColumns: string[]
  timeSeries: TimeSeriesConfig | null
}

export interface PipelineConfig {
  inputPath: string
  outputPath: string
  outputFormat: OutputFormat
  artifactDir: string
  sheetName?: string | null
  columnMappings?: ColumnMapping[]
  requiredColumns?: string[]
  optionalColumns?: string[]
  validationPreset?: ValidationPreset | null
  rules?: ValidationRule[]
  cleaning?: Partial<CleaningConfig> | false
  transform?: Partial<TransformConfig> | false
  timeSeries?: TimeSeriesConfig | null
  targetColumn?: string | null
}

export interface PipelineResult {
  ok: boolean
  artifactDir: string
  reportPath: string
  counts: {
    in: number
    out: number
    errors: number
    warnings: number
  }
  timings: Record<string, number>
  notes: string[]
  artifactHash: string
}
