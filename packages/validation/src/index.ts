// Config validation
export {
  ALIAS_USAGE_STYLES,
  CONFIG_INFO,
  DEFAULT_RULE_CONFIG,
  isAliasUsageStyle,
  parseColumnList,
  resolveRuleConfig,
  validateRuleConfig,
} from './configValidation.js'

// Errors
export type { ConfigErrorEntry, FixErrorDetails, RuleContextErrorDetails } from './errors.js'
export { ConfigError, FixError, RuleContextError, SqlLintError } from './errors.js'

// Types — config
export type { AliasUsageStyle, ConfigOptionInfo, RawRuleConfig, RuleConfig } from './types/config.js'
// Types — debug
export type { DebugLogEntry } from './types/debug.js'
// Types — lint
export type { AliasDecision, DeleteEdit, InsertAfterEdit, LintEdit, LintResult, RuleCode } from './types/lint.js'
// Types — segments
export type {
  CompositeSegmentType,
  LeafSegmentType,
  Segment,
  SegmentType,
  SourcePosition,
} from './types/segment.js'
