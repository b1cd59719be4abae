export {
  buildCompatibilityUserPrompt,
  classifyOracleFailure,
  createLlmCompatibilityOracle,
  createStaticCompatibilityOracle,
  DEFAULT_ORACLE_TIMEOUT_MS,
  FALLBACK_COMPATIBILITY_RESULT,
  type CompatibilityContext,
  type CompatibilityOracle,
  type CreateLlmCompatibilityOracleOptions,
  type OracleFailureCode,
  type OracleLogger,
  type StaticCompatibilityResolver,
} from "./compatibility-oracle.ts";
export {
  buildEmbeddingTexts,
  createOpenAiEmbeddingProvider,
  DEFAULT_EMBEDDING_TIMEOUT_MS,
  type EmbeddableProfile,
  type EmbeddingFailureCode,
  type EmbeddingProvider,
} from "./embedding-provider.ts";
export {
  COMPATIBILITY_PROMPT_VERSION,
  COMPATIBILITY_SYSTEM_PROMPT,
  PROMPT_VERSION,
} from "./prompts/compatibility-system-prompt.ts";
export {
  OUTPUT_VALIDATOR_VERSION,
  PAIRING_TEXT_PROHIBITED_PATTERNS,
  PAIRING_TEXT_PROHIBITED_PATTERNS_VERSION,
  stripMarkdownFence,
  validateModelOutput,
  type OutputViolation,
  type ValidateModelOutputResult,
} from "./output-validator.ts";
export {
  MAX_PAIRING_TEXT_LENGTH,
  OracleParseError,
  parseCompatibilityOutput,
  type CompatibilityOutput,
} from "./schemas/compatibility-output.schema.ts";
export {
  createAnthropicProvider,
  getDefaultLlmProvider,
  isAbortError,
  LlmProviderError,
  type LlmProvider,
  type LlmProviderRequest,
  type LlmProviderResponse,
} from "./provider.ts";
