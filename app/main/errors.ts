// Application error types

export type ErrorDetails = Record<string, unknown>

/**
 * Base error carrying a stable code and structured details
 */
export class AppError extends Error {
  readonly code: string
  readonly details: ErrorDetails

  constructor(message: string, code: string = 'APP_ERROR', details: ErrorDetails = {}) {
    super(message)
    this.name = new.target.name
    this.code = code
    this.details = details
  }
}

export class FileParseError extends AppError {
  readonly filename: string | null

  constructor(message: string, filename: string | null = null, details: ErrorDetails = {}) {
    super(message, 'FILE_PARSE_ERROR', { filename, ...details })
    this.filename = filename
  }
}

export class RuleDefinitionError extends AppError {
  readonly ruleName: string | null

  constructor(message: string, ruleName: string | null = null, details: ErrorDetails = {}) {
    super(message, 'RULE_DEFINITION_ERROR', { ruleName, ...details })
    this.ruleName = ruleName
  }
}

export class DataCleaningError extends AppError {
  readonly column: string | null

  constructor(message: string, column: string | null = null, details: ErrorDetails = {}) {
    super(message, 'DATA_CLEANING_ERROR', { column, ...details })
    this.column = column
  }
}

export class TransformError extends AppError {
  readonly column: string | null

  constructor(message: string, column: string | null = null, details: ErrorDetails = {}) {
    super(message, 'TRANSFORM_ERROR', { column, ...details })
    this.column = column
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
