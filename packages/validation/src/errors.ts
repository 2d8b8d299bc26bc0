import type { RuleCode } from './types/lint.js'
import type { SegmentType } from './types/segment.js'

// --- Base Error ---

export class SqlLintError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SqlLintError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Config Error ---

export interface ConfigErrorEntry {
  code: 'INVALID_ALIAS_USAGE_STYLE' | 'INVALID_FORBIDDEN_COLUMNS' | 'UNKNOWN_OPTION' | 'UNKNOWN_RULE'
  message: string
  details: {
    option?: string | undefined
    rule?: string | undefined
    expected?: string | undefined
    actual?: string | undefined
  }
}

export class ConfigError extends SqlLintError {
  declare readonly code: 'CONFIG_INVALID'
  readonly errors: readonly ConfigErrorEntry[]

  constructor(errors: readonly ConfigErrorEntry[]) {
    super('CONFIG_INVALID', `Config invalid: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'ConfigError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Rule Context Error ---

export interface RuleContextErrorDetails {
  rule: RuleCode
  expected: SegmentType
  actual: SegmentType
}

/**
 * Raised when the crawler hands a rule a segment it never asked for.
 * This is a host wiring fault; rules do not try to recover from it.
 */
export class RuleContextError extends SqlLintError {
  declare readonly code: 'UNEXPECTED_SEGMENT'
  readonly details: RuleContextErrorDetails

  constructor(details: RuleContextErrorDetails) {
    super(
      'UNEXPECTED_SEGMENT',
      `Rule ${details.rule} expects a '${details.expected}' segment, got '${details.actual}'`,
    )
    this.name = 'RuleContextError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Fix Error ---

export type FixErrorDetails =
  | { code: 'FIX_TARGET_MISSING'; kind: 'insertAfter' | 'delete'; segmentType: SegmentType }
  | { code: 'FIX_CONFLICT'; segmentType: SegmentType }

export class FixError extends SqlLintError {
  declare readonly code: 'FIX_TARGET_MISSING' | 'FIX_CONFLICT'
  readonly details: FixErrorDetails

  constructor(details: FixErrorDetails) {
    super(details.code, defaultFixMessage(details))
    this.name = 'FixError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Helpers ---

function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof SqlLintError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

function defaultFixMessage(details: FixErrorDetails): string {
  switch (details.code) {
    case 'FIX_TARGET_MISSING':
      return `Fix target '${details.segmentType}' for ${details.kind} is not part of the tree`
    case 'FIX_CONFLICT':
      return `Conflicting fixes: '${details.segmentType}' is both deleted and used as an insert anchor`
  }
}
