import type { RuleCode, Segment } from '@hnl-sql/validation'

import { findAll, lineOf } from '../tree/segments.js'

export interface NoqaDirective {
  readonly rules: 'all' | readonly string[]
}

const NOQA_PATTERN = /^noqa(?:\s*:\s*(.*))?$/i

/**
 * Parses `-- noqa` and `-- noqa: HNL_A002, HNL_A001`, in line or block comments.
 * Codes are separated by commas or whitespace, so `-- noqa: HNL_A002 reason`
 * still names HNL_A002. Returns `null` for any other comment.
 */
export function parseNoqa(commentRaw: string): NoqaDirective | null {
  let body = commentRaw.trim()
  if (body.startsWith('--')) {
    body = body.slice(2)
  } else if (body.startsWith('/*') && body.endsWith('*/')) {
    body = body.slice(2, -2)
  } else {
    return null
  }

  const match = NOQA_PATTERN.exec(body.trim())
  if (match === null) return null

  const list = match[1]
  if (list === undefined || list.trim().length === 0) return { rules: 'all' }

  const rules = list
    .split(/[\s,]+/)
    .map((r) => r.trim().toUpperCase())
    .filter((r) => r.length > 0)
  return { rules }
}

export function suppresses(directive: NoqaDirective, ruleCode: RuleCode): boolean {
  return directive.rules === 'all' || directive.rules.includes(ruleCode)
}

/** Lines inside `scope` that carry a comment suppressing `ruleCode`. */
export function collectSuppressedLines(scope: Segment, ruleCode: RuleCode): Set<number> {
  const lines = new Set<number>()
  for (const comment of findAll(scope, 'comment')) {
    const directive = parseNoqa(comment.raw)
    const line = lineOf(comment)
    if (directive !== null && line !== undefined && suppresses(directive, ruleCode)) {
      lines.add(line)
    }
  }
  return lines
}
