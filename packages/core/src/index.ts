// Re-export shared types from the validation package
export type {
  AliasDecision,
  AliasUsageStyle,
  ConfigErrorEntry,
  ConfigOptionInfo,
  DebugLogEntry,
  DeleteEdit,
  InsertAfterEdit,
  LintEdit,
  LintResult,
  RawRuleConfig,
  RuleCode,
  RuleConfig,
  Segment,
  SegmentType,
  SourcePosition,
} from '@hnl-sql/validation'
// Re-export config helpers and errors
export {
  ConfigError,
  DEFAULT_RULE_CONFIG,
  FixError,
  RuleContextError,
  resolveRuleConfig,
  SqlLintError,
  validateRuleConfig,
} from '@hnl-sql/validation'
// Debug
export { debugEntry, withDebugLog } from './debug/logger.js'
// Fixes
export { applyFixes } from './fixes/apply.js'
export { addAliasFix, removeAliasFix } from './fixes/synthesizer.js'
// Identifiers
export type { Identifier, QuoteStyle } from './identifiers/extractor.js'
export { extractIdentifier, quoteName, stripQuotes } from './identifiers/extractor.js'
// Linter
export type { CreateLinterOptions, FixReport, Linter, LintReport } from './linter.js'
export { createLinter } from './linter.js'
export type { CrawlMatch } from './linter/crawler.js'
export { crawlSegments } from './linter/crawler.js'
export type { MemoryKey } from './linter/memory.js'
export { ScopeMemory } from './linter/memory.js'
// Rules
export type { ColumnExpression } from './rules/aliasUsage.js'
export { aliasUsageRule, checkAliasConsistency, columnExpressions } from './rules/aliasUsage.js'
export type { OrderCategory, OrderedColumn } from './rules/columnOrder.js'
export {
  canonicalOrder,
  columnOrderRule,
  compareColumnNames,
  findMisplacedColumns,
  orderCategory,
  orderedColumns,
} from './rules/columnOrder.js'
export { getConfigInfo, getRules, selectRules } from './rules/registry.js'
// Suppression
export type { NoqaDirective } from './suppression/noqa.js'
export { collectSuppressedLines, parseNoqa, suppresses } from './suppression/noqa.js'
// Tree
export { assignPositions } from './tree/positions.js'
export {
  createNode,
  createToken,
  findAll,
  findAncestor,
  getChild,
  getChildren,
  isType,
  lineOf,
  rawSegments,
} from './tree/segments.js'
export { identifierToken, keywordToken, whitespaceToken } from './tree/tokens.js'
// Rule interfaces
export type { LintRule, RuleContext } from './types/rule.js'
