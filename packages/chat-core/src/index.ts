export type { LLMClient, LLMRequest, LLMResponse, LLMUsage } from './llm/types.js';
export {
  DEFAULT_CHAT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  OpenAICompatibleClient,
  type OpenAICompatibleClientOptions,
} from './llm/openaiCompatibleClient.js';
export { ChatCoreError, isChatCoreError, type ChatCoreErrorCode } from './errors.js';
export type {
  ChatPrompt,
  CostEstimate,
  ExtractionFailure,
  ExtractionFailureCode,
  ExtractionResult,
  InvalidImage,
  PricingEntry,
  PropertyRecord,
  SamplingOptions,
  SearchRequest,
  SessionTally,
  TaskKind,
} from './usecases/search.types.js';
export { TASK_KINDS } from './usecases/search.types.js';
export {
  DEFAULT_TEMPERATURE,
  buildChatRequest,
  buildPrompt,
  createSearchRequest,
  isTaskKind,
} from './usecases/requestBuilder.js';
export {
  DEFAULT_RECOVERY_STRATEGIES,
  NOT_AVAILABLE,
  extractPropertyRecord,
  stripControlCharacters,
  type RecoveryStrategy,
} from './usecases/propertyExtraction.js';
export { IMAGE_EXTENSIONS, extractImageUrls, isImageUrl } from './usecases/imageUrlScan.js';
export {
  DEFAULT_RATE,
  approximateTokenCount,
  estimateCost,
  formatUsd,
  listKnownModels,
  lookupRate,
  type ModelRate,
} from './usecases/costEstimator.js';
export { createSessionTally, recordCost } from './usecases/sessionTally.js';
export {
  searchProperty,
  type PropertySearchOptions,
  type SearchOutcome,
  type SearchResult,
} from './usecases/propertySearch.js';
