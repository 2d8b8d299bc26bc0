import type { Segment } from './segment.js'

// --- Rule Codes ---

export type RuleCode = 'HNL_A001' | 'HNL_A002'

// --- Edits ---

export interface InsertAfterEdit {
  readonly kind: 'insertAfter'
  readonly target: Segment
  readonly segments: readonly Segment[]
}

export interface DeleteEdit {
  readonly kind: 'delete'
  readonly target: Segment
}

export type LintEdit = InsertAfterEdit | DeleteEdit

// --- Results ---

export interface LintResult {
  readonly ruleCode: RuleCode
  readonly anchor: Segment
  readonly description: string
  readonly fixes: readonly LintEdit[]
}

// --- Alias Consistency ---

export type AliasDecision = 'must-have-alias' | 'must-not-have-alias'
