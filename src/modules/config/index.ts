/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, readEnvOverrides } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  PagesmithConfigSchema,
  PartialPagesmithConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type {
  PagesmithConfig,
  PartialPagesmithConfig,
  GenerationConfig,
  HostingConfig,
  CallbackConfig,
  BriefPolicy,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
