export const KEY_PREFIX_LEN = 12;

export const DEFAULT_LIST_LIMIT = 20;
export const MAX_LIST_LIMIT = 100;

export const MAX_TOPIC_LENGTH = 100;
export const MAX_MESSAGE_LENGTH = 20_000;

export const CHAT_TEMPERATURE = 0.7;
export const CHAT_MAX_TOKENS = 4_000;
