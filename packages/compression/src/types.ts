export type Role = 'user' | 'assistant' | 'system';

export type Message = {
  role: Role;
  content: string;
  /** ISO-8601 time the message was appended. Dropped by every projection. */
  timestamp?: string;
};

/** What a model call receives: a message reduced to role and content. */
export type Turn = {
  role: Role;
  content: string;
};

export type CompletionRequest = {
  model: string;
  systemPrompt: string;
  messages: Turn[];
  temperature?: number;
  maxTokens?: number;
  /** Aborted when the caller's deadline passes. */
  signal?: AbortSignal;
};

export interface CompletionProvider {
  complete(request: CompletionRequest): Promise<string>;
}

export type SummaryInput = {
  messages: Message[];
  /** Rendered `Label: content` lines of `messages`. */
  transcript: string;
  topicHint: string;
};

export type StrategyResult = { ok: true; text: string } | { ok: false; error: Error };

export interface SummaryStrategy {
  readonly name: string;
  summarize(input: SummaryInput): Promise<StrategyResult>;
}

export type CompressorLogger = {
  info(message: string): void;
  warn(message: string): void;
};

export type ExtractiveOptions = {
  /** How many of the latest user messages to keep. Default: 5. */
  userMessages?: number;
  /** Per-message character cap. Default: 200. */
  messageChars?: number;
};

export type LlmSummaryOptions = {
  /** Model id (or alias the provider resolves). Default: 'flash'. */
  model?: string;
  /** Default: 0.3. */
  temperature?: number;
  /** Default: 1000. */
  maxTokens?: number;
  /** Deadline for the provider call. Default: 15000. */
  timeoutMs?: number;
};

export type CompressorOptions = {
  /** Total content length above which history is compressed. Default: 30000. */
  maxCharsBeforeCompress?: number;
  /** Messages kept verbatim at the end of the transcript. Default: 8. */
  keepRecentMessages?: number;
  /** Summaries longer than this are clipped before splicing. Default: 2000. */
  summaryMaxChars?: number;
  summaryModel?: string;
  summaryTemperature?: number;
  summaryMaxTokens?: number;
  summaryTimeoutMs?: number;
  fallbackUserMessages?: number;
  fallbackMessageChars?: number;
  /** Replaces the default chain (LLM when a provider is given, then extractive). */
  strategies?: SummaryStrategy[];
  logger?: CompressorLogger;
};
