// Primary
export {
  ContextCompressor,
  formatSummaryTurn,
  toTurns,
  totalChars,
  KEEP_RECENT_MESSAGES,
  MAX_CHARS_BEFORE_COMPRESS,
  SUMMARY_END,
  SUMMARY_MAX_CHARS,
  SUMMARY_START,
} from './compressor.js';
export { simpleTruncate, TRUNCATE_SAFETY_MARGIN } from './truncate.js';

// Summary strategies
export {
  buildSummaryPrompt,
  createExtractiveStrategy,
  createLlmSummaryStrategy,
  extractiveSummary,
  renderTranscript,
  runSummaryChain,
  EXTRACTIVE_HEADING,
} from './summarizer.js';

// Errors
export { MalformedProviderResponseError, ProviderUnavailableError, toError } from './errors.js';

// Types
export type {
  CompletionProvider,
  CompletionRequest,
  CompressorLogger,
  CompressorOptions,
  ExtractiveOptions,
  LlmSummaryOptions,
  Message,
  Role,
  StrategyResult,
  SummaryInput,
  SummaryStrategy,
  Turn,
} from './types.js';
