/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { PagesmithConfig, PartialPagesmithConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .pagesmith/ directory (default: <cwd>/.pagesmith) */
  projectConfigDir?: string
  /** Path to the global user-level .pagesmith/ directory (default: ~/.pagesmith) */
  globalConfigDir?: string
  /** Highest-priority values, typically from CLI flags */
  cliOverrides?: PartialPagesmithConfig
  /** Environment to read `PAGESMITH_*` overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): PagesmithConfig

  /**
   * Return a single value by dot-notation key (e.g. "hosting.owner").
   */
  get(key: string): unknown

  /** Merged config with credential fields masked, for display */
  getMasked(): PagesmithConfig

  readonly isLoaded: boolean
}
