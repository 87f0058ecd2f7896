/**
 * Built-in default values for the Pagesmith configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type {
  PagesmithConfig,
  GlobalSettings,
  GenerationConfig,
  HostingConfig,
  CallbackConfig,
} from './config-schema.js'

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'info',
  max_concurrent_tasks: 4,
  task_budget_ms: 600_000,
}

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = {
  model: 'gpt-4o-mini',
  api_key_env: 'OPENAI_API_KEY',
  timeout_ms: 120_000,
  max_attachment_chars: 4_000,
  min_document_chars: 100,
}

export const DEFAULT_HOSTING_CONFIG: HostingConfig = {
  owner_type: 'user',
  token_env: 'GITHUB_TOKEN',
  api_base_url: 'https://api.github.com',
  default_branch: 'main',
  repo_prefix: '',
  private: false,
  max_name_attempts: 5,
  max_retries: 3,
  retry_base_ms: 1_000,
  retry_max_ms: 30_000,
}

export const DEFAULT_CALLBACK_CONFIG: CallbackConfig = {
  timeout_ms: 10_000,
  max_attempts: 5,
  retry_base_ms: 1_000,
  retry_max_ms: 30_000,
}

// ---------------------------------------------------------------------------
// Full default config document
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: PagesmithConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  generation: DEFAULT_GENERATION_CONFIG,
  hosting: DEFAULT_HOSTING_CONFIG,
  pages: { path: '/' },
  callback: DEFAULT_CALLBACK_CONFIG,
  rounds: { brief_policy: 'replace' },
  submission: { secret_env: 'PAGESMITH_SUBMISSION_SECRET' },
}
