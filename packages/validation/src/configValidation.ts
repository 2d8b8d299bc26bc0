import type { ConfigErrorEntry } from './errors.js'
import { ConfigError } from './errors.js'
import type { AliasUsageStyle, ConfigOptionInfo, RawRuleConfig, RuleConfig } from './types/config.js'

// --- Option Definitions ---

export const ALIAS_USAGE_STYLES: readonly AliasUsageStyle[] = ['always', 'consistent_clause', 'consistent_file']

export const CONFIG_INFO: Readonly<Record<'forbidden_columns' | 'alias_usage_style', ConfigOptionInfo>> = {
  forbidden_columns: { definition: 'A list of column to forbid' },
  alias_usage_style: {
    definition: 'Whether columns always carry an alias, or follow the first column of the clause or file',
    validValues: ALIAS_USAGE_STYLES,
  },
}

export const DEFAULT_RULE_CONFIG: { readonly alias_usage_style: AliasUsageStyle; readonly forbidden_columns: string } = {
  alias_usage_style: 'consistent_file',
  forbidden_columns: '',
}

const KNOWN_OPTIONS = new Set(Object.keys(CONFIG_INFO))

// --- Config Validation ---

export function validateRuleConfig(raw: RawRuleConfig): ConfigError | null {
  const errors: ConfigErrorEntry[] = []

  for (const option of Object.keys(raw)) {
    if (!KNOWN_OPTIONS.has(option)) {
      errors.push({
        code: 'UNKNOWN_OPTION',
        message: `Unknown rule option '${option}'`,
        details: { option },
      })
    }
  }

  if (raw.alias_usage_style !== undefined && !isAliasUsageStyle(raw.alias_usage_style)) {
    errors.push({
      code: 'INVALID_ALIAS_USAGE_STYLE',
      message: `alias_usage_style must be one of ${ALIAS_USAGE_STYLES.join(', ')}, got '${String(raw.alias_usage_style)}'`,
      details: {
        option: 'alias_usage_style',
        expected: ALIAS_USAGE_STYLES.join(' | '),
        actual: String(raw.alias_usage_style),
      },
    })
  }

  if (raw.forbidden_columns !== undefined && parseColumnList(raw.forbidden_columns) === null) {
    errors.push({
      code: 'INVALID_FORBIDDEN_COLUMNS',
      message: 'forbidden_columns must be a comma-separated string or a list of strings',
      details: { option: 'forbidden_columns', expected: 'string | string[]', actual: typeof raw.forbidden_columns },
    })
  }

  if (errors.length === 0) {
    return null
  }

  return new ConfigError(errors)
}

/**
 * Merges host settings over the defaults and returns the typed config.
 * Throws `ConfigError` on any invalid setting.
 */
export function resolveRuleConfig(raw: RawRuleConfig = {}): RuleConfig {
  const err = validateRuleConfig(raw)
  if (err !== null) throw err

  return {
    aliasUsageStyle: isAliasUsageStyle(raw.alias_usage_style)
      ? raw.alias_usage_style
      : DEFAULT_RULE_CONFIG.alias_usage_style,
    forbiddenColumns: parseColumnList(raw.forbidden_columns ?? DEFAULT_RULE_CONFIG.forbidden_columns) ?? [],
  }
}

// --- Helpers ---

export function isAliasUsageStyle(value: unknown): value is AliasUsageStyle {
  return ALIAS_USAGE_STYLES.some((style) => style === value)
}

export function parseColumnList(value: unknown): string[] | null {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((c) => c.trim())
      .filter((c) => c.length > 0)
  }
  if (Array.isArray(value) && value.every((c): c is string => typeof c === 'string')) {
    return value.map((c) => c.trim()).filter((c) => c.length > 0)
  }
  return null
}
