/**
 * ConfigSystem implementation: loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.pagesmith/config.yaml)
 *     → project config      (./.pagesmith/config.yaml)
 *     → environment vars    (PAGESMITH_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { deepMask } from '../../utils/masking.js'
import { ConfigError } from '../../core/errors.js'
import {
  PagesmithConfigSchema,
  PartialPagesmithConfigSchema,
  type PagesmithConfig,
  type PartialPagesmithConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of PAGESMITH_ environment variable names to config paths.
 * Only scalar values can be overridden this way.
 */
const ENV_VAR_MAP: Record<string, string> = {
  PAGESMITH_LOG_LEVEL: 'global.log_level',
  PAGESMITH_MAX_CONCURRENT_TASKS: 'global.max_concurrent_tasks',
  PAGESMITH_TASK_BUDGET_MS: 'global.task_budget_ms',
  PAGESMITH_LLM_BASE_URL: 'generation.base_url',
  PAGESMITH_LLM_MODEL: 'generation.model',
  PAGESMITH_LLM_TIMEOUT_MS: 'generation.timeout_ms',
  PAGESMITH_HOSTING_OWNER: 'hosting.owner',
  PAGESMITH_HOSTING_OWNER_TYPE: 'hosting.owner_type',
  PAGESMITH_HOSTING_API_URL: 'hosting.api_base_url',
  PAGESMITH_REPO_PREFIX: 'hosting.repo_prefix',
  PAGESMITH_MAX_RETRIES: 'hosting.max_retries',
  PAGESMITH_CALLBACK_MAX_ATTEMPTS: 'callback.max_attempts',
  PAGESMITH_BRIEF_POLICY: 'rounds.brief_policy',
}

function coerceEnvValue(raw: string): unknown {
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (/^\d+$/.test(raw)) return parseInt(raw, 10)
  if (/^\d*\.\d+$/.test(raw)) return parseFloat(raw)
  return raw
}

/**
 * Read `PAGESMITH_*` variables into a partial config overlay.
 * Invalid overrides are logged and ignored as a whole.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): PartialPagesmithConfig {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue

    const [section, field] = configPath.split('.')
    if (section === undefined || field === undefined) continue
    const current = overrides[section]
    const sectionObj: Record<string, unknown> = isPlainObject(current) ? current : {}
    sectionObj[field] = coerceEnvValue(rawValue)
    overrides[section] = sectionObj
  }

  const parsed = PartialPagesmithConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: PagesmithConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialPagesmithConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.pagesmith')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.pagesmith')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, 'config.yaml'))
    if (globalConfig !== null) merged = deepMerge(merged, globalConfig)

    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))
    if (projectConfig !== null) merged = deepMerge(merged, projectConfig)

    const envOverrides = readEnvOverrides(this._env)
    if (Object.keys(envOverrides).length > 0) merged = deepMerge(merged, envOverrides)

    if (Object.keys(this._cliOverrides).length > 0) merged = deepMerge(merged, this._cliOverrides)

    const result = PagesmithConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): PagesmithConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  getMasked(): PagesmithConfig {
    return deepMask(this.getConfig())
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialPagesmithConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file parses to undefined
    if (parsed === undefined || parsed === null) return {}

    const result = PartialPagesmithConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(
        `Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`,
        { filePath, issues: result.error.issues }
      )
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
