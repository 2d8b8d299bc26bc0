import type { AliasDecision, AliasUsageStyle, LintResult, Segment, SegmentType } from '@hnl-sql/validation'
import { RuleContextError } from '@hnl-sql/validation'

import { addAliasFix, removeAliasFix } from '../fixes/synthesizer.js'
import { extractIdentifier } from '../identifiers/extractor.js'
import type { ScopeMemory } from '../linter/memory.js'
import { getChild, getChildren } from '../tree/segments.js'
import type { LintRule, RuleContext } from '../types/rule.js'

// ── Column Expressions ─────────────────────────────────────────

export interface ColumnExpression {
  readonly element: Segment
  readonly columnReference: Segment | undefined
  readonly aliasExpression: Segment | undefined
}

export function columnExpressions(selectClause: Segment): ColumnExpression[] {
  return getChildren(selectClause, 'select_clause_element').map((element) => ({
    element,
    columnReference: getChild(element, 'column_reference'),
    aliasExpression: getChild(element, 'alias_expression'),
  }))
}

// ── Decision Resolution ────────────────────────────────────────

function initialDecision(style: AliasUsageStyle, memory: ScopeMemory): AliasDecision | undefined {
  switch (style) {
    case 'always':
      return 'must-have-alias'
    case 'consistent_clause':
      return undefined
    case 'consistent_file':
      return memory.recall('alias_usage')
  }
}

function descriptionFor(style: AliasUsageStyle, decision: AliasDecision): string {
  const verb = decision === 'must-have-alias' ? 'should be aliased' : 'should not be aliased'
  switch (style) {
    case 'always':
      return 'Column should always use an alias.'
    case 'consistent_clause':
      return `Column ${verb} to stay consistent within the clause.`
    case 'consistent_file':
      return `Column ${verb} to stay consistent within the file.`
  }
}

// ── Alias Consistency Engine ───────────────────────────────────

/**
 * Classifies every select element of one clause against the configured alias
 * policy. Under `consistent_file` the first decision is stored in `memory` and
 * governs every later clause of the file.
 */
export function checkAliasConsistency(
  selectClause: Segment,
  style: AliasUsageStyle,
  memory: ScopeMemory,
): LintResult[] {
  const results: LintResult[] = []
  let decision = initialDecision(style, memory)

  for (const column of columnExpressions(selectClause)) {
    const hasAlias = column.aliasExpression !== undefined

    if (decision === undefined) {
      decision = hasAlias ? 'must-have-alias' : 'must-not-have-alias'
      if (style === 'consistent_file') {
        decision = memory.remember('alias_usage', decision)
      }
    }

    if (decision === 'must-have-alias' && !hasAlias) {
      if (column.columnReference === undefined) {
        // Expression column: the intended name cannot be inferred
        results.push(violation(column.element, descriptionFor(style, decision), []))
        continue
      }
      const identifier = extractIdentifier(column.columnReference)
      if (identifier === null) continue
      results.push(
        violation(column.element, descriptionFor(style, decision), [addAliasFix(column.columnReference, identifier)]),
      )
    } else if (decision === 'must-not-have-alias' && column.aliasExpression !== undefined) {
      results.push(violation(column.element, descriptionFor(style, decision), [removeAliasFix(column.aliasExpression)]))
    }
  }

  return results
}

function violation(element: Segment, description: string, fixes: LintResult['fixes']): LintResult {
  return { ruleCode: 'HNL_A001', anchor: element, description, fixes }
}

// ── Rule ───────────────────────────────────────────────────────

export const aliasUsageRule: LintRule = {
  code: 'HNL_A001',
  name: 'aliasing.column_alias_usage',
  description: 'Column aliasing should follow the configured alias_usage_style.',
  groups: ['all', 'aliasing'],
  crawlTypes: new Set<SegmentType>(['select_clause']),
  fixCompatible: true,

  evaluate(context: RuleContext): LintResult[] {
    if (context.segment.type !== 'select_clause') {
      throw new RuleContextError({ rule: 'HNL_A001', expected: 'select_clause', actual: context.segment.type })
    }
    return checkAliasConsistency(context.segment, context.config.aliasUsageStyle, context.memory)
  },
}
