const TAG = '[bodyText]'

// Non-fatal: something degraded to "no annotation".
export function failDebug(message: string, error?: unknown) {
  if (error === undefined) console.warn(TAG, message)
  else console.warn(TAG, message, error)
}

// Upstream invariant check. Logs, never throws.
export function assertDebug(condition: boolean, message: string) {
  if (condition) return
  console.error(TAG, 'assertion failed:', message)
}
