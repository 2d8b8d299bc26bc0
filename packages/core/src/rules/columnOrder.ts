import type { LintResult, Segment, SegmentType } from '@hnl-sql/validation'
import { RuleContextError } from '@hnl-sql/validation'

import { extractIdentifier } from '../identifiers/extractor.js'
import { collectSuppressedLines } from '../suppression/noqa.js'
import { findAncestor, lineOf } from '../tree/segments.js'
import type { LintRule, RuleContext } from '../types/rule.js'
import { columnExpressions } from './aliasUsage.js'

// ── Category ───────────────────────────────────────────────────

export type OrderCategory = 0 | 1 | 2 | 3 | 4

/**
 * Business keys first, then ids, then the source-system key pair, then
 * everything else, with `SourceSystemCode` last.
 */
export function orderCategory(name: string): OrderCategory {
  if (name === 'BKSourceSystem' || name === 'SourceSystemID') return 2
  if (name === 'SourceSystemCode') return 4
  if (name.startsWith('BK')) return 0
  if (name.endsWith('ID')) return 1
  return 3
}

export function compareColumnNames(a: string, b: string): number {
  const byCategory = orderCategory(a) - orderCategory(b)
  if (byCategory !== 0) return byCategory
  const la = a.toLowerCase()
  const lb = b.toLowerCase()
  if (la < lb) return -1
  if (la > lb) return 1
  return 0
}

// ── Ordering Comparator ────────────────────────────────────────

export interface OrderedColumn {
  readonly name: string
  readonly element: Segment
}

/** Stable canonical ordering. */
export function canonicalOrder(columns: readonly OrderedColumn[]): OrderedColumn[] {
  return [...columns].sort((a, b) => compareColumnNames(a.name, b.name))
}

/**
 * Position-wise diff of observed against canonical order: every column whose
 * slot holds a different element in the canonical order is out of place.
 */
export function findMisplacedColumns(columns: readonly OrderedColumn[]): Array<{
  actual: OrderedColumn
  expected: OrderedColumn
}> {
  const sorted = canonicalOrder(columns)
  const misplaced: Array<{ actual: OrderedColumn; expected: OrderedColumn }> = []
  for (let i = 0; i < columns.length; i++) {
    const actual = columns[i]
    const expected = sorted[i]
    if (actual === undefined || expected === undefined) continue
    if (actual.element !== expected.element || actual.name !== expected.name) {
      misplaced.push({ actual, expected })
    }
  }
  return misplaced
}

/** Display names of a clause; alias wins over the referenced column. */
export function orderedColumns(selectClause: Segment, suppressedLines: ReadonlySet<number>): OrderedColumn[] {
  const columns: OrderedColumn[] = []
  for (const column of columnExpressions(selectClause)) {
    const line = lineOf(column.element)
    if (line !== undefined && suppressedLines.has(line)) continue

    const source = column.aliasExpression ?? column.columnReference
    if (source === undefined) continue
    const identifier = extractIdentifier(source)
    if (identifier === null) continue

    columns.push({ name: identifier.name, element: column.element })
  }
  return columns
}

// ── Rule ───────────────────────────────────────────────────────

export const columnOrderRule: LintRule = {
  code: 'HNL_A002',
  name: 'structure.column_order',
  description: 'Columns should be ordered: business keys, ids, source-system keys, others, SourceSystemCode.',
  groups: ['all', 'structure'],
  crawlTypes: new Set<SegmentType>(['select_clause']),
  fixCompatible: false,

  evaluate(context: RuleContext): LintResult[] {
    if (context.segment.type !== 'select_clause') {
      throw new RuleContextError({ rule: 'HNL_A002', expected: 'select_clause', actual: context.segment.type })
    }

    const statement = findAncestor(context.parentStack, 'statement') ?? context.segment
    const suppressed = collectSuppressedLines(statement, 'HNL_A002')
    const columns = orderedColumns(context.segment, suppressed)

    return findMisplacedColumns(columns).map(({ actual, expected }): LintResult => ({
      ruleCode: 'HNL_A002',
      anchor: actual.element,
      description: `Column '${actual.name}' is out of order; expected '${expected.name}' at this position.`,
      fixes: [],
    }))
  },
}
