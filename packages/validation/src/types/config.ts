// --- Options ---

export type AliasUsageStyle = 'always' | 'consistent_clause' | 'consistent_file'

/**
 * Keyword settings as the host hands them over, before validation.
 * Values are usually strings; `forbidden_columns` may also arrive as a list.
 */
export interface RawRuleConfig {
  readonly alias_usage_style?: unknown
  readonly forbidden_columns?: unknown
  readonly [option: string]: unknown
}

export interface RuleConfig {
  readonly aliasUsageStyle: AliasUsageStyle
  readonly forbiddenColumns: readonly string[]
}

export interface ConfigOptionInfo {
  readonly definition: string
  readonly validValues?: readonly string[] | undefined
}
