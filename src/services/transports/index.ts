import type { AppConfig } from '../../config';
import { GeminiTransport } from './gemini';
import { OpenAITransport } from './openai';
import type { CompletionTransport } from './types';

export type { CompletionTransport } from './types';

export function createTransport(config: AppConfig): CompletionTransport {
    switch (config.provider) {
        case 'openai':
            return new OpenAITransport({
                apiKey: config.apiKey,
                model: config.model,
                ...(config.baseUrl ? { baseUrl: config.baseUrl } : {}),
                ...(config.timeoutMs ? { timeoutMs: config.timeoutMs } : {})
            });
        case 'gemini':
            return new GeminiTransport({
                apiKey: config.apiKey,
                model: config.model,
                ...(config.timeoutMs ? { timeoutMs: config.timeoutMs } : {})
            });
    }
}
