import type { CompletionProvider, CompletionRequest } from '@threadkeep/compression';

export interface StreamingCompletionProvider extends CompletionProvider {
    readonly name: string;
    /** Yields text deltas. Throws before the first delta when the endpoint is unusable. */
    stream(request: CompletionRequest): AsyncIterable<string>;
}
