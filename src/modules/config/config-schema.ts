/**
 * Zod validation schemas for the Pagesmith configuration system.
 *
 * Sections:
 *  - global       log level, concurrency, per-task budget
 *  - generation   generative provider endpoint and document rules
 *  - hosting      source-hosting account, naming and retry policy
 *  - pages        static hosting source
 *  - callback     evaluation callback delivery
 *  - rounds       how later rounds treat earlier briefs
 *  - submission   inbound secret verification
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    max_concurrent_tasks: z.number().int().min(1).max(64),
    /** Wall-clock budget from acceptance to a terminal state */
    task_budget_ms: z.number().int().min(1000),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

export const GenerationConfigSchema = z
  .object({
    /** OpenAI-compatible endpoint; omitted means the SDK default */
    base_url: z.string().url().optional(),
    model: z.string().min(1),
    /** Name of the environment variable holding the provider key */
    api_key_env: z.string().min(1),
    timeout_ms: z.number().int().positive(),
    /** Per-attachment ceiling for text embedded in the prompt */
    max_attachment_chars: z.number().int().min(0),
    /** Shortest response accepted as a document */
    min_document_chars: z.number().int().min(0),
  })
  .strict()

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>

// ---------------------------------------------------------------------------
// Hosting
// ---------------------------------------------------------------------------

export const OwnerTypeSchema = z.enum(['user', 'org'])
export type OwnerType = z.infer<typeof OwnerTypeSchema>

export const HostingConfigSchema = z
  .object({
    /** Account or organisation that owns created repositories */
    owner: z.string().optional(),
    owner_type: OwnerTypeSchema,
    token_env: z.string().min(1),
    api_base_url: z.string().url(),
    default_branch: z.string().min(1),
    repo_prefix: z.string(),
    private: z.boolean(),
    max_name_attempts: z.number().int().min(1).max(50),
    max_retries: z.number().int().min(0).max(10),
    retry_base_ms: z.number().int().min(0),
    retry_max_ms: z.number().int().min(0),
    /** Copyright holder written into LICENSE; defaults to the owner */
    license_holder: z.string().optional(),
  })
  .strict()

export type HostingConfig = z.infer<typeof HostingConfigSchema>

// ---------------------------------------------------------------------------
// Pages, callback, rounds, submission
// ---------------------------------------------------------------------------

export const PagesConfigSchema = z
  .object({
    path: z.enum(['/', '/docs']),
  })
  .strict()

export type PagesConfig = z.infer<typeof PagesConfigSchema>

export const CallbackConfigSchema = z
  .object({
    timeout_ms: z.number().int().positive(),
    max_attempts: z.number().int().min(1).max(20),
    retry_base_ms: z.number().int().min(0),
    retry_max_ms: z.number().int().min(0),
  })
  .strict()

export type CallbackConfig = z.infer<typeof CallbackConfigSchema>

export const BriefPolicySchema = z.enum(['replace', 'merge'])
export type BriefPolicy = z.infer<typeof BriefPolicySchema>

export const RoundsConfigSchema = z
  .object({
    brief_policy: BriefPolicySchema,
  })
  .strict()

export type RoundsConfig = z.infer<typeof RoundsConfigSchema>

export const SubmissionConfigSchema = z
  .object({
    /** Environment variable holding the shared submission secret; unset disables the check */
    secret_env: z.string().min(1),
  })
  .strict()

export type SubmissionConfig = z.infer<typeof SubmissionConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const PagesmithConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    generation: GenerationConfigSchema,
    hosting: HostingConfigSchema,
    pages: PagesConfigSchema,
    callback: CallbackConfigSchema,
    rounds: RoundsConfigSchema,
    submission: SubmissionConfigSchema,
  })
  .strict()

export type PagesmithConfig = z.infer<typeof PagesmithConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files and overrides before merging)
// ---------------------------------------------------------------------------

export const PartialPagesmithConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    generation: GenerationConfigSchema.partial().optional(),
    hosting: HostingConfigSchema.partial().optional(),
    pages: PagesConfigSchema.partial().optional(),
    callback: CallbackConfigSchema.partial().optional(),
    rounds: RoundsConfigSchema.partial().optional(),
    submission: SubmissionConfigSchema.partial().optional(),
  })
  .strict()

export type PartialPagesmithConfig = z.infer<typeof PartialPagesmithConfigSchema>
