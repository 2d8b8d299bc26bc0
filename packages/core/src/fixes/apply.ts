import type { LintEdit, Segment } from '@hnl-sql/validation'
import { FixError } from '@hnl-sql/validation'

import { assignPositions } from '../tree/positions.js'

/**
 * Applies edits to a tree and returns the rewritten, re-positioned copy.
 * Edits target segments by identity, so every target must come from `root`.
 */
export function applyFixes(root: Segment, edits: readonly LintEdit[]): Segment {
  if (edits.length === 0) return root

  const deletes = new Set<Segment>()
  const inserts = new Map<Segment, Segment[]>()
  for (const edit of edits) {
    if (edit.kind === 'delete') {
      deletes.add(edit.target)
    } else {
      const pending = inserts.get(edit.target) ?? []
      pending.push(...edit.segments)
      inserts.set(edit.target, pending)
    }
  }

  for (const target of deletes) {
    if (inserts.has(target)) {
      throw new FixError({ code: 'FIX_CONFLICT', segmentType: target.type })
    }
  }

  const seen = new Set<Segment>()

  const rebuild = (segment: Segment): Segment => {
    if (segment.children.length === 0) return segment

    let changed = false
    const children: Segment[] = []
    for (const child of segment.children) {
      if (deletes.has(child)) {
        seen.add(child)
        changed = true
        continue
      }
      const next = rebuild(child)
      if (next !== child) changed = true
      children.push(next)

      const inserted = inserts.get(child)
      if (inserted !== undefined) {
        seen.add(child)
        changed = true
        children.push(...inserted)
      }
    }

    if (!changed) return segment
    return { ...segment, raw: children.map((c) => c.raw).join(''), children }
  }

  const rewritten = rebuild(root)

  for (const edit of edits) {
    if (!seen.has(edit.target)) {
      throw new FixError({ code: 'FIX_TARGET_MISSING', kind: edit.kind, segmentType: edit.target.type })
    }
  }

  return assignPositions(rewritten)
}
