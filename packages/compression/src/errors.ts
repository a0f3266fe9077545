/** Timeout, connection failure or a non-success status from the completion API. */
export class ProviderUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProviderUnavailableError';
  }
}

/** The completion API answered, but not with usable text. */
export class MalformedProviderResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedProviderResponseError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
