import type { Segment } from '@hnl-sql/validation'

import { getChildren } from '../tree/segments.js'

// --- Types ---

export type QuoteStyle = '"' | "'" | '`' | '['

export interface Identifier {
  /** Name without delimiters, e.g. `My Col` for `"My Col"`. */
  readonly name: string
  /** Delimiter the source used, `null` for a naked identifier. */
  readonly quote: QuoteStyle | null
  readonly segment: Segment
}

// --- Quoting ---

const CLOSING_QUOTE: Readonly<Record<QuoteStyle, string>> = {
  '"': '"',
  "'": "'",
  '`': '`',
  '[': ']',
}

export function isQuoteStyle(value: string): value is QuoteStyle {
  return value === '"' || value === "'" || value === '`' || value === '['
}

export function stripQuotes(raw: string): { name: string; quote: QuoteStyle | null } {
  const open = raw.charAt(0)
  if (raw.length >= 2 && isQuoteStyle(open) && raw.endsWith(CLOSING_QUOTE[open])) {
    return { name: raw.slice(1, -1), quote: open }
  }
  return { name: raw, quote: null }
}

export function quoteName(name: string, quote: QuoteStyle | null): string {
  return quote === null ? name : `${quote}${name}${CLOSING_QUOTE[quote]}`
}

// --- Extraction ---

/**
 * Display identifier of a column reference or alias expression.
 *
 * Leading parts of a qualified name are table or alias qualifiers, so the
 * rightmost identifier names the column: `a.col_a` gives `col_a`. Quoted parts
 * are returned without their delimiters. Returns `null` when the node holds no
 * identifier at all, as with positional references like `$1`.
 */
export function extractIdentifier(segment: Segment): Identifier | null {
  const parts = getChildren(segment, 'naked_identifier', 'quoted_identifier')
  const last = parts[parts.length - 1]
  if (last === undefined) return null

  const { name, quote } = last.type === 'quoted_identifier' ? stripQuotes(last.raw) : { name: last.raw, quote: null }
  if (name.length === 0) return null

  return { name, quote, segment: last }
}
