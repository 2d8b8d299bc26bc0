// --- Segment Types ---

export type LeafSegmentType =
  | 'keyword'
  | 'whitespace'
  | 'newline'
  | 'comma'
  | 'dot'
  | 'symbol'
  | 'naked_identifier'
  | 'quoted_identifier'
  | 'parameter'
  | 'literal'
  | 'comment'

export type CompositeSegmentType =
  | 'file'
  | 'statement'
  | 'select_statement'
  | 'select_clause'
  | 'select_clause_modifier'
  | 'select_clause_element'
  | 'column_reference'
  | 'alias_expression'
  | 'function'
  | 'expression'
  | 'bracketed'
  | 'from_clause'
  | 'table_reference'
  | 'where_clause'

export type SegmentType = LeafSegmentType | CompositeSegmentType

// --- Position ---

/** 1-based line and column of the first character of a segment. */
export interface SourcePosition {
  readonly line: number
  readonly column: number
}

// --- Segment ---

/**
 * A node of the host's concrete syntax tree. Segments are immutable; rules only
 * read them and describe changes through `LintEdit` values.
 *
 * Tokens built by fix synthesis carry no position until the host re-indexes the
 * rewritten tree.
 */
export interface Segment {
  readonly type: SegmentType
  readonly raw: string
  readonly children: readonly Segment[]
  readonly position: SourcePosition | undefined
}
