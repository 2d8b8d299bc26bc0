import type { AliasDecision } from '@hnl-sql/validation'

export type MemoryKey = 'alias_usage'

/**
 * Mutable state one rule carries between invocations over the same file.
 * The linter creates a fresh instance per rule for every file pass.
 */
export class ScopeMemory {
  private readonly decisions = new Map<MemoryKey, AliasDecision>()

  recall(key: MemoryKey): AliasDecision | undefined {
    return this.decisions.get(key)
  }

  /** Stores `decision` unless the key is already set; returns the stored value. */
  remember(key: MemoryKey, decision: AliasDecision): AliasDecision {
    const existing = this.decisions.get(key)
    if (existing !== undefined) return existing
    this.decisions.set(key, decision)
    return decision
  }
}
