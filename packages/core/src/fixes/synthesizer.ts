import type { DeleteEdit, InsertAfterEdit, Segment } from '@hnl-sql/validation'

import type { Identifier } from '../identifiers/extractor.js'
import { createNode } from '../tree/segments.js'
import { identifierToken, keywordToken, whitespaceToken } from '../tree/tokens.js'

/**
 * `col` → `col AS col`. The edit anchors on the column reference rather than the
 * whole select element so trailing tokens inside the element stay after the alias.
 * The inserted name is wrapped in an `alias_expression`, the shape a parse of the
 * rewritten text yields, so the next lint pass sees the column as aliased.
 */
export function addAliasFix(columnReference: Segment, identifier: Identifier): InsertAfterEdit {
  return {
    kind: 'insertAfter',
    target: columnReference,
    segments: [
      whitespaceToken(),
      createNode('alias_expression', [keywordToken('AS'), whitespaceToken(), identifierToken(identifier)]),
    ],
  }
}

/** Deletes the alias unit (`AS`, its whitespace and the name) in one edit. */
export function removeAliasFix(aliasExpression: Segment): DeleteEdit {
  return { kind: 'delete', target: aliasExpression }
}
