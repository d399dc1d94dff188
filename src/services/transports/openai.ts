import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { ChatMessage, ContentPart } from '../../types/grading';
import type { CompletionTransport } from './types';

export interface OpenAITransportOptions {
    apiKey: string;
    model: string;
    baseUrl?: string;
    timeoutMs?: number;
}

function textOf(content: string | ContentPart[]): string {
    if (typeof content === 'string') return content;
    return content
        .map((part) => (part.type === 'text' ? part.text : ''))
        .filter((text) => text.length > 0)
        .join('\n');
}

export function toOpenAIMessages(messages: ChatMessage[]): ChatCompletionMessageParam[] {
    return messages.map((message): ChatCompletionMessageParam => {
        switch (message.role) {
            case 'user':
                return { role: 'user', content: message.content };
            case 'system':
                return { role: 'system', content: textOf(message.content) };
            case 'assistant':
                return { role: 'assistant', content: textOf(message.content) };
        }
    });
}

export class OpenAITransport implements CompletionTransport {
    readonly name = 'openai';
    private readonly client: OpenAI;
    private readonly model: string;

    constructor(opts: OpenAITransportOptions) {
        this.model = opts.model;
        this.client = new OpenAI({
            apiKey: opts.apiKey,
            // Each call is attempted once
            maxRetries: 0,
            ...(opts.baseUrl ? { baseURL: opts.baseUrl } : {}),
            ...(opts.timeoutMs ? { timeout: opts.timeoutMs } : {})
        });
    }

    async complete(messages: ChatMessage[]): Promise<string> {
        const response = await this.client.chat.completions.create({
            model: this.model,
            messages: toOpenAIMessages(messages)
        });
        const content = response.choices[0]?.message.content;
        if (!content) {
            throw new Error(`Empty completion from ${this.model}`);
        }
        return content;
    }
}
