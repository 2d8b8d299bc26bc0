import type { DebugLogEntry } from '@hnl-sql/validation'

export function debugEntry(
  phase: DebugLogEntry['phase'],
  message: string,
  durationMs: number,
  details?: unknown,
): DebugLogEntry {
  const result: DebugLogEntry = {
    timestamp: Date.now(),
    phase,
    message: `${message} (${durationMs.toFixed(1)}ms)`,
  }
  if (details !== undefined) result.details = details
  return result
}

export function withDebugLog<T extends { debugLog?: DebugLogEntry[] }>(
  report: T,
  debug: boolean,
  log: DebugLogEntry[],
): T {
  if (debug && log.length > 0) {
    return { ...report, debugLog: log }
  }
  return report
}
