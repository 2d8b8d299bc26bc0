import type { ConfigOptionInfo } from '@hnl-sql/validation'
import { CONFIG_INFO, ConfigError } from '@hnl-sql/validation'

import type { LintRule } from '../types/rule.js'
import { aliasUsageRule } from './aliasUsage.js'
import { columnOrderRule } from './columnOrder.js'

const RULES: readonly LintRule[] = [aliasUsageRule, columnOrderRule]

/** Every rule the package provides, in evaluation order. */
export function getRules(): readonly LintRule[] {
  return RULES
}

/** Option definitions the host shows next to the rule config. */
export function getConfigInfo(): Readonly<Record<string, ConfigOptionInfo>> {
  return CONFIG_INFO
}

/**
 * Narrows the registry to `codes`, keeping registry order.
 * Throws `ConfigError` listing every unknown code.
 */
export function selectRules(codes: readonly string[] | undefined): readonly LintRule[] {
  if (codes === undefined) return RULES

  const unknown = codes.filter((code) => !RULES.some((r) => r.code === code))
  if (unknown.length > 0) {
    throw new ConfigError(
      unknown.map((code) => ({
        code: 'UNKNOWN_RULE' as const,
        message: `Unknown rule '${code}'`,
        details: { rule: code, expected: RULES.map((r) => r.code).join(' | ') },
      })),
    )
  }

  return RULES.filter((r) => codes.includes(r.code))
}

