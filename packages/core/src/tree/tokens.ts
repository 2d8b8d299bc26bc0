import type { Segment } from '@hnl-sql/validation'

import type { Identifier } from '../identifiers/extractor.js'
import { quoteName } from '../identifiers/extractor.js'
import { createToken } from './segments.js'

export function whitespaceToken(raw = ' '): Segment {
  return createToken('whitespace', raw)
}

export function keywordToken(raw: string): Segment {
  return createToken('keyword', raw)
}

/** Fresh identifier token that keeps the delimiter style of the source identifier. */
export function identifierToken(identifier: Identifier): Segment {
  if (identifier.quote === null) {
    return createToken('naked_identifier', identifier.name)
  }
  return createToken('quoted_identifier', quoteName(identifier.name, identifier.quote))
}
