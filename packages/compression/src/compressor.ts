import {
  createExtractiveStrategy,
  createLlmSummaryStrategy,
  renderTranscript,
  runSummaryChain,
} from './summarizer.js';
import type {
  CompletionProvider,
  CompressorLogger,
  CompressorOptions,
  ExtractiveOptions,
  Message,
  SummaryStrategy,
  Turn,
} from './types.js';

export const MAX_CHARS_BEFORE_COMPRESS = 30_000;
export const KEEP_RECENT_MESSAGES = 8;
export const SUMMARY_MAX_CHARS = 2_000;

export const SUMMARY_START = '[Summary of the earlier conversation]';
export const SUMMARY_END = '[End of summary. The recent conversation follows.]';
const SUMMARY_INSTRUCTION = 'Continue from this summary. Do not ask again for information it already contains.';

export function toTurns(messages: Message[]): Turn[] {
  return messages.map(m => ({ role: m.role, content: m.content }));
}

export function totalChars(messages: ReadonlyArray<{ content: string }>): number {
  return messages.reduce((sum, m) => sum + m.content.length, 0);
}

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, Math.max(0, max - 1))}…` : text;
}

export function formatSummaryTurn(summary: string): Turn {
  return {
    role: 'system',
    content: `${SUMMARY_START}\n${summary}\n${SUMMARY_END}\n${SUMMARY_INSTRUCTION}`,
  };
}

/**
 * Keeps a transcript inside the model's input budget: the first message and
 * the latest `keepRecentMessages` stay verbatim, everything between is
 * replaced by one summary turn. Never writes to the messages it is given.
 */
export class ContextCompressor {
  private readonly maxChars: number;
  private readonly keepRecent: number;
  private readonly summaryMaxChars: number;
  private readonly strategies: SummaryStrategy[];
  private readonly fallback: ExtractiveOptions;
  private readonly logger?: CompressorLogger;

  constructor(provider?: CompletionProvider, options: CompressorOptions = {}) {
    this.maxChars = options.maxCharsBeforeCompress ?? MAX_CHARS_BEFORE_COMPRESS;
    this.keepRecent = Math.max(0, options.keepRecentMessages ?? KEEP_RECENT_MESSAGES);
    this.summaryMaxChars = options.summaryMaxChars ?? SUMMARY_MAX_CHARS;
    this.logger = options.logger;
    this.fallback = {
      userMessages: options.fallbackUserMessages,
      messageChars: options.fallbackMessageChars,
    };

    if (options.strategies) {
      this.strategies = [...options.strategies];
    } else {
      this.strategies = [createExtractiveStrategy(this.fallback)];
      if (provider) {
        this.strategies.unshift(
          createLlmSummaryStrategy(provider, {
            model: options.summaryModel,
            temperature: options.summaryTemperature,
            maxTokens: options.summaryMaxTokens,
            timeoutMs: options.summaryTimeoutMs,
          }),
        );
      }
    }
  }

  shouldCompress(messages: Message[]): boolean {
    if (messages.length <= this.keepRecent + 2) return false;
    return totalChars(messages) > this.maxChars;
  }

  async summarize(messages: Message[], topicHint = ''): Promise<string> {
    if (messages.length === 0) return '';
    const input = { messages, transcript: renderTranscript(messages), topicHint };
    return runSummaryChain(this.strategies, input, this.logger, this.fallback);
  }

  async compress(messages: Message[], topicHint = '', force = false): Promise<Turn[]> {
    if (!Array.isArray(messages)) {
      throw new TypeError('compress expects an array of messages');
    }
    if (!force && !this.shouldCompress(messages)) return toTurns(messages);
    if (messages.length === 0) return [];

    const head = messages[0];
    const tailStart = Math.max(1, messages.length - this.keepRecent);
    const middle = messages.slice(1, tailStart);
    const tail = messages.slice(tailStart);

    this.logger?.info(`compressing ${messages.length} messages (${middle.length} summarised)`);

    const result: Turn[] = [{ role: head.role, content: head.content }];

    if (middle.length > 0) {
      const summary = await this.summarize(middle, topicHint);
      if (summary) result.push(formatSummaryTurn(clip(summary, this.summaryMaxChars)));
    }

    result.push(...toTurns(tail));

    this.logger?.info(`compressed to ${result.length} turns, ${totalChars(result)} chars`);
    return result;
  }
}
