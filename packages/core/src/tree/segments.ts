import type { CompositeSegmentType, LeafSegmentType, Segment, SegmentType, SourcePosition } from '@hnl-sql/validation'

// --- Construction ---

export function createToken(type: LeafSegmentType, raw: string, position?: SourcePosition | undefined): Segment {
  return { type, raw, children: [], position }
}

/**
 * Builds a composite segment. Its raw text is the concatenation of its
 * children and its position defaults to that of its first child.
 */
export function createNode(
  type: CompositeSegmentType,
  children: readonly Segment[],
  position?: SourcePosition | undefined,
): Segment {
  return {
    type,
    raw: children.map((c) => c.raw).join(''),
    children,
    position: position ?? children[0]?.position,
  }
}

// --- Queries ---

export function isType(segment: Segment, ...types: SegmentType[]): boolean {
  return types.includes(segment.type)
}

export function getChild(segment: Segment, ...types: SegmentType[]): Segment | undefined {
  return segment.children.find((c) => types.includes(c.type))
}

export function getChildren(segment: Segment, ...types: SegmentType[]): Segment[] {
  return segment.children.filter((c) => types.includes(c.type))
}

/** Leaf tokens of a subtree in document order. */
export function rawSegments(segment: Segment): Segment[] {
  if (segment.children.length === 0) return [segment]
  return segment.children.flatMap(rawSegments)
}

/** Every descendant (self included) of one of the given types, in document order. */
export function findAll(segment: Segment, ...types: SegmentType[]): Segment[] {
  const found: Segment[] = []
  const visit = (s: Segment): void => {
    if (types.includes(s.type)) found.push(s)
    for (const c of s.children) visit(c)
  }
  visit(segment)
  return found
}

/** Nearest ancestor of the given type, searching the parent stack from the innermost entry. */
export function findAncestor(parentStack: readonly Segment[], type: SegmentType): Segment | undefined {
  for (let i = parentStack.length - 1; i >= 0; i--) {
    const parent = parentStack[i]
    if (parent !== undefined && parent.type === type) return parent
  }
  return undefined
}

export function lineOf(segment: Segment): number | undefined {
  return segment.position?.line
}
