import { ProviderUnavailableError, toError, type CompletionRequest } from '@threadkeep/compression';

import type { StreamingCompletionProvider } from './types';

/**
 * Tries each provider in order and returns the first usable answer.
 * Streams fall through to the next provider only while nothing has been sent.
 */
export class FallbackProvider implements StreamingCompletionProvider {
    readonly name = 'fallback';

    constructor(private providers: StreamingCompletionProvider[]) {}

    async complete(request: CompletionRequest): Promise<string> {
        const failures: string[] = [];

        for (const provider of this.providers) {
            try {
                return await provider.complete(request);
            } catch (error) {
                const message = toError(error).message;
                failures.push(message);
                console.error(`Completion via ${provider.name} failed (model ${request.model}): ${message}`);
            }
        }

        throw this.exhausted(failures);
    }

    async *stream(request: CompletionRequest): AsyncGenerator<string> {
        const failures: string[] = [];

        for (const provider of this.providers) {
            let emitted = false;
            try {
                for await (const delta of provider.stream(request)) {
                    emitted = true;
                    yield delta;
                }
            } catch (error) {
                if (emitted) throw error;
                const message = toError(error).message;
                failures.push(message);
                console.error(`Stream via ${provider.name} failed (model ${request.model}): ${message}`);
                continue;
            }

            if (emitted) return;
            failures.push(`${provider.name} returned an empty stream`);
            console.error(`Stream via ${provider.name} returned no content`);
        }

        throw this.exhausted(failures);
    }

    private exhausted(failures: string[]): ProviderUnavailableError {
        if (this.providers.length === 0) {
            return new ProviderUnavailableError('No completion provider is configured');
        }
        return new ProviderUnavailableError(`All completion providers failed: ${failures.join('; ')}`);
    }
}
