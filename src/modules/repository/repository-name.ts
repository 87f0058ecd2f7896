/**
 * Repository naming: a task name maps deterministically to a candidate name.
 */

export const MAX_REPOSITORY_NAME_LENGTH = 100

function trimSeparators(value: string): string {
  return value.replace(/^[-.]+/, '').replace(/[-.]+$/, '')
}

/**
 * `[prefix-]taskName`, lowercased, anything outside `[a-z0-9._-]` replaced
 * by `-`, dash runs collapsed, leading/trailing separators trimmed, capped at
 * 100 characters.
 */
export function repositoryName(taskName: string, prefix = ''): string {
  const raw = prefix.trim() === '' ? taskName : `${prefix.trim()}-${taskName}`
  const sanitized = trimSeparators(
    raw
      .toLowerCase()
      .replace(/[^a-z0-9._-]+/g, '-')
      .replace(/-{2,}/g, '-')
  )
  const capped = trimSeparators(sanitized.slice(0, MAX_REPOSITORY_NAME_LENGTH))
  return capped === '' ? 'task' : capped
}

/**
 * The name tried on attempt `attempt` (1-indexed): the base name first, then
 * `base-2`, `base-3`, … still within the length cap.
 */
export function candidateName(base: string, attempt: number): string {
  if (attempt <= 1) return base
  const suffix = `-${String(attempt)}`
  return `${trimSeparators(base.slice(0, MAX_REPOSITORY_NAME_LENGTH - suffix.length))}${suffix}`
}
