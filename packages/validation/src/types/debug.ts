export interface DebugLogEntry {
  timestamp: number
  phase: 'config' | 'rule' | 'fix'
  message: string
  details?: unknown
}
