import type { AliasUsageStyle, LintResult, Segment } from '@hnl-sql/validation'
import { RuleContextError } from '@hnl-sql/validation'
import { describe, expect, it } from 'vitest'
import { applyFixes } from '../../src/fixes/apply.js'
import { ScopeMemory } from '../../src/linter/memory.js'
import { aliasUsageRule, checkAliasConsistency, columnExpressions } from '../../src/rules/aliasUsage.js'
import { findAll } from '../../src/tree/segments.js'
import {
  colRef,
  element,
  fnCall,
  positional,
  selectClause,
  selectClauses,
  selectFile,
} from '../fixtures/sqlTree.js'

// ── Helpers ────────────────────────────────────────────────────

function lintFile(tree: Segment, style: AliasUsageStyle, memory = new ScopeMemory()): LintResult[] {
  return selectClauses(tree).flatMap((clause) => checkAliasConsistency(clause, style, memory))
}

function fixFile(tree: Segment, style: AliasUsageStyle): Segment {
  return applyFixes(tree, lintFile(tree, style).flatMap((r) => r.fixes))
}

// ── columnExpressions ──────────────────────────────────────────

describe('columnExpressions', () => {
  it('pairs each element with its column reference and alias', () => {
    const tree = selectFile(
      selectClause([element(colRef('a')), element(colRef('b'), 'bee'), element(fnCall('MAX', 'x'))]),
    )
    const [clause] = selectClauses(tree)
    if (clause === undefined) throw new Error('no select clause')

    const columns = columnExpressions(clause)
    expect(columns).toHaveLength(3)
    expect(columns[0]?.columnReference?.raw).toBe('a')
    expect(columns[0]?.aliasExpression).toBeUndefined()
    expect(columns[1]?.aliasExpression?.raw).toBe('AS bee')
    expect(columns[2]?.columnReference).toBeUndefined()
    expect(columns[2]?.element.raw).toBe('MAX(x)')
  })

  it('returns nothing for an empty clause', () => {
    const tree = selectFile(selectClause([]))
    const [clause] = selectClauses(tree)
    if (clause === undefined) throw new Error('no select clause')
    expect(columnExpressions(clause)).toEqual([])
  })
})

// ── always ─────────────────────────────────────────────────────

describe('alias_usage_style = always', () => {
  it('flags every unaliased column', () => {
    const tree = selectFile(selectClause([element(colRef('a')), element(colRef('b')), element(colRef('c'))]))
    const results = lintFile(tree, 'always')
    expect(results).toHaveLength(3)
    expect(results.map((r) => r.anchor.raw)).toEqual(['a', 'b', 'c'])
    expect(results.every((r) => r.description === 'Column should always use an alias.')).toBe(true)
    expect(results.every((r) => r.ruleCode === 'HNL_A001')).toBe(true)
  })

  it('reports nothing when every column is aliased', () => {
    const tree = selectFile(selectClause([element(colRef('a'), 'a'), element(colRef('b'), 'x')]))
    expect(lintFile(tree, 'always')).toEqual([])
  })

  it('does not infer from the first column', () => {
    const tree = selectFile(selectClause([element(colRef('a')), element(colRef('b'), 'b')]))
    const results = lintFile(tree, 'always')
    expect(results).toHaveLength(1)
    expect(results[0]?.anchor.raw).toBe('a')
  })

  it('self-aliases a qualified reference with its column name', () => {
    const tree = selectFile(selectClause([element(colRef('a', 'col_a'))]))
    expect(fixFile(tree, 'always').raw).toBe('SELECT\n    a.col_a AS col_a\nFROM tbl;\n')
  })

  it('names the alias after the column of a quoted qualifier', () => {
    const tree = selectFile(selectClause([element(colRef('"t"', 'col'))]))
    expect(fixFile(tree, 'always').raw).toBe('SELECT\n    "t".col AS col\nFROM tbl;\n')
  })

  it('keeps quoting when aliasing a quoted column', () => {
    const tree = selectFile(selectClause([element(colRef('t', '"My Col"'))]))
    expect(fixFile(tree, 'always').raw).toBe('SELECT\n    t."My Col" AS "My Col"\nFROM tbl;\n')
  })

  it('inserts the alias before the separating comma', () => {
    const tree = selectFile(selectClause([element(colRef('a')), element(colRef('b'), 'b')]))
    expect(fixFile(tree, 'always').raw).toBe('SELECT\n    a AS a,\n    b AS b\nFROM tbl;\n')
  })

  it('flags expression columns without a fix', () => {
    const tree = selectFile(selectClause([element(fnCall('COUNT', '*'))]))
    const results = lintFile(tree, 'always')
    expect(results).toHaveLength(1)
    expect(results[0]?.anchor.raw).toBe('COUNT(*)')
    expect(results[0]?.fixes).toEqual([])
  })

  it('skips positional references', () => {
    const tree = selectFile(selectClause([element(positional('$1')), element(colRef('b'))]))
    const results = lintFile(tree, 'always')
    expect(results).toHaveLength(1)
    expect(results[0]?.anchor.raw).toBe('b')
  })

  it('reports nothing for an empty clause', () => {
    expect(lintFile(selectFile(selectClause([])), 'always')).toEqual([])
  })
})

// ── consistent_clause ──────────────────────────────────────────

describe('alias_usage_style = consistent_clause', () => {
  it('accepts clauses that disagree with each other but are internally consistent', () => {
    const tree = selectFile(
      selectClause([element(colRef('a'), 'a'), element(colRef('b'), 'b')]),
      selectClause([element(colRef('c')), element(colRef('d'))]),
    )
    expect(lintFile(tree, 'consistent_clause')).toEqual([])
  })

  it('adds aliases when the first column is aliased', () => {
    const tree = selectFile(selectClause([element(colRef('a'), 'a'), element(colRef('b'))]))
    const results = lintFile(tree, 'consistent_clause')
    expect(results).toHaveLength(1)
    expect(results[0]?.anchor.raw).toBe('b')
    expect(results[0]?.description).toBe('Column should be aliased to stay consistent within the clause.')
    expect(results[0]?.fixes[0]?.kind).toBe('insertAfter')
  })

  it('removes aliases when the first column is not aliased', () => {
    const tree = selectFile(selectClause([element(colRef('a')), element(colRef('b'), 'bee')]))
    const results = lintFile(tree, 'consistent_clause')
    expect(results).toHaveLength(1)
    expect(results[0]?.anchor.raw).toBe('b AS bee')
    expect(results[0]?.description).toBe('Column should not be aliased to stay consistent within the clause.')
    expect(results[0]?.fixes).toEqual([{ kind: 'delete', target: findAll(tree, 'alias_expression')[0] }])
  })

  it('decides each clause from its own first column', () => {
    const tree = selectFile(
      selectClause([element(colRef('a')), element(colRef('b'), 'b')]),
      selectClause([element(colRef('c'), 'c'), element(colRef('d'))]),
    )
    const results = lintFile(tree, 'consistent_clause')
    expect(results.map((r) => r.anchor.raw)).toEqual(['b AS b', 'd'])
  })

  it('never writes to scope memory', () => {
    const memory = new ScopeMemory()
    const tree = selectFile(selectClause([element(colRef('a'))]))
    lintFile(tree, 'consistent_clause', memory)
    expect(memory.recall('alias_usage')).toBeUndefined()
  })
})

// ── consistent_file ────────────────────────────────────────────

describe('alias_usage_style = consistent_file', () => {
  it('lets the first clause govern later clauses', () => {
    const tree = selectFile(
      selectClause([element(colRef('a')), element(colRef('b'), 'bee')]),
      selectClause([element(colRef('c'), 'c'), element(colRef('d'))]),
    )
    const results = lintFile(tree, 'consistent_file')
    expect(results.map((r) => r.anchor.raw)).toEqual(['b AS bee', 'c AS c'])
    expect(results.every((r) => r.fixes[0]?.kind === 'delete')).toBe(true)
    expect(results[0]?.description).toBe('Column should not be aliased to stay consistent within the file.')
  })

  it('adds aliases across clauses when the first column is aliased', () => {
    const tree = selectFile(
      selectClause([element(colRef('a'), 'a')]),
      selectClause([element(colRef('c')), element(colRef('d'), 'd')]),
    )
    const results = lintFile(tree, 'consistent_file')
    expect(results.map((r) => r.anchor.raw)).toEqual(['c'])
    expect(results[0]?.description).toBe('Column should be aliased to stay consistent within the file.')
  })

  it('remembers the decision in scope memory', () => {
    const memory = new ScopeMemory()
    const tree = selectFile(selectClause([element(colRef('a'), 'a')]))
    lintFile(tree, 'consistent_file', memory)
    expect(memory.recall('alias_usage')).toBe('must-have-alias')
  })

  it('applies a decision already in memory to the first column', () => {
    const memory = new ScopeMemory()
    memory.remember('alias_usage', 'must-not-have-alias')
    const tree = selectFile(selectClause([element(colRef('a'), 'a')]))
    const results = lintFile(tree, 'consistent_file', memory)
    expect(results).toHaveLength(1)
    expect(memory.recall('alias_usage')).toBe('must-not-have-alias')
  })

  it('starts over with a fresh memory', () => {
    const tree = selectFile(selectClause([element(colRef('a'), 'a'), element(colRef('b'))]))
    expect(lintFile(tree, 'consistent_file', new ScopeMemory())).toHaveLength(1)
    const other = selectFile(selectClause([element(colRef('x')), element(colRef('y'))]))
    expect(lintFile(other, 'consistent_file', new ScopeMemory())).toEqual([])
  })
})

// ── Idempotence ────────────────────────────────────────────────

describe('fixes', () => {
  const styles: AliasUsageStyle[] = ['always', 'consistent_clause', 'consistent_file']

  for (const style of styles) {
    it(`leave nothing to report under ${style}`, () => {
      const tree = selectFile(
        selectClause([element(colRef('t', 'a'), 'a'), element(colRef('b')), element(colRef('"Quoted Col"'))]),
        selectClause([element(colRef('c')), element(colRef('d'), 'dee')]),
      )
      const fixed = fixFile(tree, style)
      expect(lintFile(fixed, style)).toEqual([])
    })
  }

  it('remove the alias unit and keep the separator', () => {
    const tree = selectFile(selectClause([element(colRef('a')), element(colRef('b'), 'bee'), element(colRef('c'))]))
    expect(fixFile(tree, 'consistent_clause').raw).toBe('SELECT\n    a,\n    b ,\n    c\nFROM tbl;\n')
  })
})

// ── Rule ───────────────────────────────────────────────────────

describe('aliasUsageRule', () => {
  it('rejects segments other than select clauses', () => {
    const tree = selectFile(selectClause([element(colRef('a'))]))
    const [reference] = findAll(tree, 'column_reference')
    if (reference === undefined) throw new Error('no column reference')

    expect(() =>
      aliasUsageRule.evaluate({
        segment: reference,
        parentStack: [],
        config: { aliasUsageStyle: 'always', forbiddenColumns: [] },
        memory: new ScopeMemory(),
      }),
    ).toThrow(RuleContextError)
  })

  it('reads the policy from the context config', () => {
    const tree = selectFile(selectClause([element(colRef('a')), element(colRef('b'))]))
    const [clause] = selectClauses(tree)
    if (clause === undefined) throw new Error('no select clause')

    const results = aliasUsageRule.evaluate({
      segment: clause,
      parentStack: [],
      config: { aliasUsageStyle: 'always', forbiddenColumns: [] },
      memory: new ScopeMemory(),
    })
    expect(results).toHaveLength(2)
  })
})
