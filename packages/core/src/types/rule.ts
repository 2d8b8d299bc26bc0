import type { LintResult, RuleCode, RuleConfig, Segment, SegmentType } from '@hnl-sql/validation'

import type { ScopeMemory } from '../linter/memory.js'

// --- RuleContext (built by the linter for every crawled segment) ---

export interface RuleContext {
  readonly segment: Segment
  /** Ancestors of `segment`, outermost first. */
  readonly parentStack: readonly Segment[]
  readonly config: RuleConfig
  /** Per-rule state for the current file pass. */
  readonly memory: ScopeMemory
}

// --- LintRule (implemented by each rule module) ---

export interface LintRule {
  readonly code: RuleCode
  readonly name: string
  readonly description: string
  readonly groups: readonly string[]
  readonly crawlTypes: ReadonlySet<SegmentType>
  readonly fixCompatible: boolean
  evaluate(context: RuleContext): LintResult[]
}
