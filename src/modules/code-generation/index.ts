/**
 * Barrel exports for the code-generation module.
 */

export type { CodeGenerator } from './code-generator.js'
export { CodeGeneratorImpl, createCodeGenerator } from './code-generator-impl.js'
export type { CodeGeneratorOptions } from './code-generator-impl.js'
export { AiSdkProvider } from './ai-sdk-provider.js'
export type { AiSdkProviderOptions } from './ai-sdk-provider.js'
export { decodeAttachments, parseDataUrl } from './attachments.js'
export type { DecodeResult, SkippedAttachment } from './attachments.js'
export { extractElementSpecs, checkSource } from './element-specs.js'
export { extractHtmlDocument, escapeHtml } from './html-document.js'
export { buildPrompt, summarizeAttachment } from './prompt-builder.js'
export { renderFallbackPage, renderElement } from './fallback-generator.js'
export type {
  GenerativeProvider,
  GenerationInput,
  GenerationResult,
  FallbackReason,
  PreviousBrief,
  ElementSpec,
} from './types.js'
