import { MalformedProviderResponseError, ProviderUnavailableError, toError } from './errors.js';
import type {
  CompletionProvider,
  CompressorLogger,
  ExtractiveOptions,
  LlmSummaryOptions,
  Message,
  Role,
  StrategyResult,
  SummaryInput,
  SummaryStrategy,
} from './types.js';

const DEFAULT_SUMMARY_MODEL = 'flash';
const DEFAULT_TEMPERATURE = 0.3;
const DEFAULT_MAX_TOKENS = 1000;
const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_FALLBACK_USER_MESSAGES = 5;
const DEFAULT_FALLBACK_MESSAGE_CHARS = 200;

export const EXTRACTIVE_HEADING = '## User history summary';

const ROLE_LABELS: Record<Role, string> = {
  user: 'User',
  assistant: 'Assistant',
  system: 'System',
};

export function renderTranscript(messages: Message[]): string {
  return messages.map(m => `${ROLE_LABELS[m.role]}: ${m.content}`).join('\n');
}

export function buildSummaryPrompt(topicHint: string): string {
  const topicLine = topicHint ? `\nThe conversation is about: ${topicHint}.\n` : '';

  return `You condense chat transcripts into a brief the assistant can continue from.
${topicLine}
Rules:
1. Extract every concrete fact the user has stated (names, numbers, requirements)
2. Note which stage the discussion has reached
3. Note the conclusions or recommendations already given
4. Organise the result as a short list
5. Stay under 500 words

Output format:
## Collected information
- fact: value

## Current stage
Discussing: ...

## Conclusions
- conclusion`;
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

async function withDeadline<T>(timeoutMs: number, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // reject first so the race settles with the timeout, not the abort error
      reject(new ProviderUnavailableError(`summary request timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export function createLlmSummaryStrategy(
  provider: CompletionProvider,
  options: LlmSummaryOptions = {},
): SummaryStrategy {
  const model = options.model ?? DEFAULT_SUMMARY_MODEL;
  const temperature = options.temperature ?? DEFAULT_TEMPERATURE;
  const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return {
    name: 'llm',
    async summarize(input: SummaryInput): Promise<StrategyResult> {
      let text: unknown;
      try {
        text = await withDeadline(timeoutMs, signal =>
          provider.complete({
            model,
            systemPrompt: buildSummaryPrompt(input.topicHint),
            messages: [{ role: 'user', content: `Summarize the following conversation:\n\n${input.transcript}` }],
            temperature,
            maxTokens,
            signal,
          }),
        );
      } catch (err) {
        const error = err instanceof ProviderUnavailableError || err instanceof MalformedProviderResponseError
          ? err
          : new ProviderUnavailableError(toError(err).message, { cause: err });
        return { ok: false, error };
      }

      if (typeof text !== 'string') {
        return { ok: false, error: new MalformedProviderResponseError(`expected text, got ${typeof text}`) };
      }
      if (text.trim().length === 0) {
        return { ok: false, error: new MalformedProviderResponseError('empty summary') };
      }
      return { ok: true, text: text.trim() };
    },
  };
}

/**
 * Deterministic summary: the latest user messages as a bullet list.
 * Touches nothing but `messages`, so it cannot fail.
 */
export function extractiveSummary(messages: Message[], options: ExtractiveOptions = {}): string {
  const count = options.userMessages ?? DEFAULT_FALLBACK_USER_MESSAGES;
  const cap = options.messageChars ?? DEFAULT_FALLBACK_MESSAGE_CHARS;

  const lines = messages
    .filter(m => m.role === 'user')
    .slice(-count)
    .map(m => `- ${m.content.slice(0, cap)}`);

  return [EXTRACTIVE_HEADING, ...lines].join('\n');
}

export function createExtractiveStrategy(options: ExtractiveOptions = {}): SummaryStrategy {
  return {
    name: 'extractive',
    async summarize(input: SummaryInput): Promise<StrategyResult> {
      return { ok: true, text: extractiveSummary(input.messages, options) };
    },
  };
}

// ---------------------------------------------------------------------------
// Chain
// ---------------------------------------------------------------------------

/**
 * Tries each strategy in order; the first non-empty success wins.
 * When every strategy fails the extractive summary is returned.
 */
export async function runSummaryChain(
  strategies: SummaryStrategy[],
  input: SummaryInput,
  logger?: CompressorLogger,
  fallback: ExtractiveOptions = {},
): Promise<string> {
  for (const strategy of strategies) {
    let result: StrategyResult;
    try {
      result = await strategy.summarize(input);
    } catch (err) {
      result = { ok: false, error: toError(err) };
    }

    if (result.ok && result.text.length > 0) {
      logger?.info(`summary from ${strategy.name}: ${result.text.length} chars`);
      return result.text;
    }
    if (!result.ok) {
      logger?.warn(`summary strategy ${strategy.name} failed: ${result.error.name}: ${result.error.message}`);
    }
  }

  return extractiveSummary(input.messages, fallback);
}
