import type { Message, Turn } from './types.js';

/** Headroom left for the system prompt the caller wraps around the history. */
export const TRUNCATE_SAFETY_MARGIN = 1_000;
const MAX_RECALLED_USER_MESSAGES = 10;
const RECALLED_MESSAGE_CHARS = 300;

const RECALL_HEADING = '[History summary] Information the user provided earlier:';
const RECALL_INSTRUCTION = 'Continue from this information. Do not ask again for anything it already covers.';

/**
 * Budgeted truncation with no model call: first message, a recap of recent
 * user input, then as many of the latest messages as fit. The summed content
 * length of the result never exceeds `maxChars`.
 */
export function simpleTruncate(messages: Message[], maxChars: number): Turn[] {
  if (messages.length === 0 || !(maxChars > 0)) return [];

  const budget = Math.floor(maxChars);
  const [first, ...rest] = messages;

  const result: Turn[] = [{ role: first.role, content: first.content.slice(0, budget) }];
  let used = result[0].content.length;

  const recalled = rest
    .filter(m => m.role === 'user')
    .slice(-MAX_RECALLED_USER_MESSAGES)
    .map(m => `- ${m.content.slice(0, RECALLED_MESSAGE_CHARS)}`);

  if (recalled.length > 0) {
    const recap = `${RECALL_HEADING}\n${recalled.join('\n')}\n\n${RECALL_INSTRUCTION}`.slice(0, budget - used);
    if (recap.length > 0) {
      result.push({ role: 'system', content: recap });
      used += recap.length;
    }
  }

  let remaining = budget - used - TRUNCATE_SAFETY_MARGIN;
  const recent: Turn[] = [];

  for (let i = rest.length - 1; i >= 0; i--) {
    const length = rest[i].content.length;
    if (length > remaining) break;
    recent.push({ role: rest[i].role, content: rest[i].content });
    remaining -= length;
  }

  return [...result, ...recent.reverse()];
}
