/**
 * Captures process.stdout / process.stderr writes made by CLI actions.
 */

import { vi } from 'vitest'

export interface CapturedOutput {
  stdout: () => string
  stderr: () => string
  restore: () => void
}

export function captureOutput(): CapturedOutput {
  let stdout = ''
  let stderr = ''
  const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : Buffer.from(data).toString()
    return true
  })
  const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : Buffer.from(data).toString()
    return true
  })
  return {
    stdout: () => stdout,
    stderr: () => stderr,
    restore: (): void => {
      stdoutSpy.mockRestore()
      stderrSpy.mockRestore()
    },
  }
}
