import type { Segment, SourcePosition } from '@hnl-sql/validation'

/**
 * Returns a copy of the tree with every segment positioned from the raw text,
 * starting at line 1, column 1. Used after fixes rewrite a tree.
 */
export function assignPositions(root: Segment): Segment {
  let line = 1
  let column = 1

  const visit = (segment: Segment): Segment => {
    const position: SourcePosition = { line, column }

    if (segment.children.length === 0) {
      for (const ch of segment.raw) {
        if (ch === '\n') {
          line++
          column = 1
        } else {
          column++
        }
      }
      return { ...segment, position }
    }

    const children = segment.children.map(visit)
    return { ...segment, children, position }
  }

  return visit(root)
}
