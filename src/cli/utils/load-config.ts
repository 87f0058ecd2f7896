/**
 * Shared configuration loading for CLI commands.
 */

import { ConfigError } from '../../core/errors.js'
import type { PagesmithConfig } from '../../modules/config/config-schema.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('cli')

export interface ConfigLocationOptions {
  /** Path to the project .pagesmith/ directory */
  projectConfigDir?: string
  /** Path to the global .pagesmith/ directory */
  globalConfigDir?: string
  /** Environment for `PAGESMITH_*` overrides and credentials (default: process.env) */
  env?: NodeJS.ProcessEnv
}

export type LoadedConfig =
  | { ok: true; system: ConfigSystem; config: PagesmithConfig }
  | { ok: false; invalid: boolean }

/**
 * Load the merged configuration, reporting failures on stderr.
 * `invalid` distinguishes a bad configuration from an unexpected error.
 */
export async function loadCliConfig(opts: ConfigLocationOptions): Promise<LoadedConfig> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })

  try {
    await system.load()
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return { ok: false, invalid: true }
    }
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${errorMessage(err)}\n`)
    return { ok: false, invalid: false }
  }

  return { ok: true, system, config: system.getConfig() }
}

/** Location flags shared by every command that reads configuration */
export interface ConfigLocationFlags {
  projectConfigDir?: string
  globalConfigDir?: string
}

export function locationOptions(flags: ConfigLocationFlags): ConfigLocationOptions {
  return {
    ...(flags.projectConfigDir !== undefined && { projectConfigDir: flags.projectConfigDir }),
    ...(flags.globalConfigDir !== undefined && { globalConfigDir: flags.globalConfigDir }),
  }
}
