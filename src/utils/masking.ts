/**
 * Credential masking for displayed config and pino redaction.
 *
 * Secrets (hosting tokens, provider keys, submission secrets) must never
 * appear in logs, CLI output or status views.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Patterns that look like credentials inside free text.
 */
export const SECRET_PATTERNS: RegExp[] = [
  // OpenAI-compatible keys: sk-...
  /sk-[A-Za-z0-9_-]{20,}/g,
  // GitHub tokens: ghp_, gho_, ghs_, github_pat_
  /\b(?:gh[pousr]_[A-Za-z0-9]{20,}|github_pat_[A-Za-z0-9_]{20,})\b/g,
  // Bearer headers copied into error strings
  /Bearer\s+[A-Za-z0-9._~+/-]+=*/g,
  // Generic 40-char hex tokens (classic PATs)
  /\b[A-Fa-f0-9]{40}\b/g,
]

/**
 * Redaction paths handed to `pino({ redact })`.
 */
export const PINO_REDACT_PATHS: string[] = [
  'secret',
  'token',
  'apiKey',
  'api_key',
  'authorization',
  '*.secret',
  '*.token',
  '*.apiKey',
  '*.api_key',
  '*.authorization',
  'headers.authorization',
  'submission.secret',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace recognizable credentials in a string with `***`.
 * Best-effort: used on provider and hosting error messages before they are
 * stored on a record.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of SECRET_PATTERNS) {
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

// ---------------------------------------------------------------------------
// Object masking (for config display)
// ---------------------------------------------------------------------------

const CREDENTIAL_FIELDS = new Set([
  'api_key',
  'apiKey',
  'token',
  'secret',
  'password',
  'authorization',
])

/**
 * Deep-clone a plain-object tree replacing credential fields with `***`.
 * Fields that only name an environment variable (`*_env`) stay visible.
 */
export function deepMask<T>(value: T): T
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (Array.isArray(value)) return value.map((item: unknown) => deepMask(item))
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      masked[k] = CREDENTIAL_FIELDS.has(k) ? MASKED_VALUE : deepMask(v)
    }
    return masked
  }
  return value
}
