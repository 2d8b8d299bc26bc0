import type { Segment, SegmentType } from '@hnl-sql/validation'

export interface CrawlMatch {
  readonly segment: Segment
  readonly parentStack: readonly Segment[]
}

/**
 * Visits the tree depth-first in document order and yields every segment whose
 * type is in `types`. Matches are recursed into, so nested selects are found too.
 */
export function* crawlSegments(root: Segment, types: ReadonlySet<SegmentType>): Generator<CrawlMatch> {
  const stack: Segment[] = []

  function* visit(segment: Segment): Generator<CrawlMatch> {
    if (types.has(segment.type)) {
      yield { segment, parentStack: [...stack] }
    }
    stack.push(segment)
    for (const child of segment.children) {
      yield* visit(child)
    }
    stack.pop()
  }

  yield* visit(root)
}
