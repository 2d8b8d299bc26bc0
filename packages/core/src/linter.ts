import type { DebugLogEntry, LintEdit, LintResult, RawRuleConfig, RuleConfig, Segment } from '@hnl-sql/validation'
import { resolveRuleConfig } from '@hnl-sql/validation'

import { debugEntry, withDebugLog } from './debug/logger.js'
import { applyFixes } from './fixes/apply.js'
import { crawlSegments } from './linter/crawler.js'
import { ScopeMemory } from './linter/memory.js'
import { selectRules } from './rules/registry.js'
import { collectSuppressedLines } from './suppression/noqa.js'
import { findAncestor, lineOf } from './tree/segments.js'
import type { LintRule } from './types/rule.js'

// ── Public Types ───────────────────────────────────────────────

export interface CreateLinterOptions {
  readonly config?: RawRuleConfig | undefined
  /** Rule codes to run; defaults to every registered rule. */
  readonly rules?: readonly string[] | undefined
  readonly debug?: boolean | undefined
  readonly maxFixLoops?: number | undefined
}

export interface LintReport {
  results: LintResult[]
  debugLog?: DebugLogEntry[]
}

export interface FixReport {
  /** The rewritten tree, positions reassigned. */
  tree: Segment
  /** Violations still present in `tree`. */
  results: LintResult[]
  appliedFixes: number
  loops: number
  debugLog?: DebugLogEntry[]
}

export interface Linter {
  readonly config: RuleConfig
  readonly rules: readonly LintRule[]
  /** One call is one file pass: scope memory starts empty. */
  lint(tree: Segment): LintReport
  fix(tree: Segment): FixReport
}

const DEFAULT_MAX_FIX_LOOPS = 10

// ── createLinter ───────────────────────────────────────────────

export function createLinter(options: CreateLinterOptions = {}): Linter {
  const debug = options.debug === true
  const maxFixLoops = options.maxFixLoops ?? DEFAULT_MAX_FIX_LOOPS

  // Config problems surface here, before any file is linted
  const t0 = Date.now()
  const config = resolveRuleConfig(options.config)
  const rules = selectRules(options.rules)
  const setupLog: DebugLogEntry[] = []
  if (debug) {
    setupLog.push(
      debugEntry('config', `Resolved config (${rules.map((r) => r.code).join(', ')})`, Date.now() - t0, config),
    )
  }

  return {
    config,
    rules,

    lint(tree: Segment): LintReport {
      const log: DebugLogEntry[] = [...setupLog]
      const results = runRules(tree, rules, config, debug, log)
      return withDebugLog<LintReport>({ results }, debug, log)
    },

    fix(tree: Segment): FixReport {
      const log: DebugLogEntry[] = [...setupLog]
      let current = tree
      let appliedFixes = 0
      let loops = 0
      let results = runRules(current, rules, config, debug, log)

      while (loops < maxFixLoops) {
        const edits = fixableEdits(results, rules)
        if (edits.length === 0) break

        const t1 = Date.now()
        current = applyFixes(current, edits)
        appliedFixes += edits.length
        loops++
        if (debug) log.push(debugEntry('fix', `Loop ${loops}: applied ${edits.length} edits`, Date.now() - t1))

        results = runRules(current, rules, config, debug, log)
      }

      return withDebugLog<FixReport>({ tree: current, results, appliedFixes, loops }, debug, log)
    },
  }
}

// ── Rule Evaluation ────────────────────────────────────────────

function runRules(
  tree: Segment,
  rules: readonly LintRule[],
  config: RuleConfig,
  debug: boolean,
  log: DebugLogEntry[],
): LintResult[] {
  const results: LintResult[] = []

  for (const rule of rules) {
    const t0 = Date.now()
    const memory = new ScopeMemory()
    let visited = 0
    let found = 0

    for (const { segment, parentStack } of crawlSegments(tree, rule.crawlTypes)) {
      visited++
      const ruleResults = rule.evaluate({ segment, parentStack, config, memory })
      const kept = withoutSuppressed(ruleResults, findAncestor(parentStack, 'statement') ?? segment, rule)
      found += kept.length
      results.push(...kept)
    }

    if (debug) {
      log.push(debugEntry('rule', `${rule.code}: ${visited} segments, ${found} violations`, Date.now() - t0))
    }
  }

  return results
}

/** Drops results anchored on a line whose noqa comment names the rule. */
function withoutSuppressed(results: LintResult[], scope: Segment, rule: LintRule): LintResult[] {
  if (results.length === 0) return results
  const suppressed = collectSuppressedLines(scope, rule.code)
  if (suppressed.size === 0) return results
  return results.filter((r) => {
    const line = lineOf(r.anchor)
    return line === undefined || !suppressed.has(line)
  })
}

function fixableEdits(results: readonly LintResult[], rules: readonly LintRule[]): LintEdit[] {
  const fixable = new Set(rules.filter((r) => r.fixCompatible).map((r) => r.code))
  return results.filter((r) => fixable.has(r.ruleCode)).flatMap((r) => r.fixes)
}
