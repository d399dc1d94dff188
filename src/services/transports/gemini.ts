import { GoogleGenerativeAI } from '@google/generative-ai';
import type { Content, GenerateContentRequest, GenerativeModel, Part } from '@google/generative-ai';
import type { ChatMessage, ContentPart } from '../../types/grading';
import type { CompletionTransport } from './types';

export interface GeminiTransportOptions {
    apiKey: string;
    model: string;
    timeoutMs?: number;
}

const DATA_URI = /^data:([^;,]+);base64,(.*)$/s;

function toPart(part: ContentPart): Part {
    if (part.type === 'text') return { text: part.text };
    const match = DATA_URI.exec(part.image_url.url);
    if (!match) {
        throw new Error('Gemini transport only accepts base64 data URIs for images');
    }
    return { inlineData: { mimeType: match[1], data: match[2] } };
}

function toParts(content: string | ContentPart[]): Part[] {
    return typeof content === 'string' ? [{ text: content }] : content.map(toPart);
}

/**
 * System turns become the system instruction. Gemini needs at least one
 * content turn, so a system-only conversation is sent as a user turn instead.
 */
export function toGeminiRequest(messages: ChatMessage[]): GenerateContentRequest {
    const systemParts: Part[] = [];
    const contents: Content[] = [];

    for (const message of messages) {
        if (message.role === 'system') {
            systemParts.push(...toParts(message.content));
        } else {
            contents.push({ role: message.role === 'assistant' ? 'model' : 'user', parts: toParts(message.content) });
        }
    }

    if (contents.length === 0) {
        return { contents: [{ role: 'user', parts: systemParts }] };
    }
    if (systemParts.length === 0) {
        return { contents };
    }
    return { contents, systemInstruction: { role: 'system', parts: systemParts } };
}

export class GeminiTransport implements CompletionTransport {
    readonly name = 'gemini';
    private readonly generativeModel: GenerativeModel;

    constructor(opts: GeminiTransportOptions) {
        const genAI = new GoogleGenerativeAI(opts.apiKey);
        this.generativeModel = genAI.getGenerativeModel(
            { model: opts.model },
            opts.timeoutMs ? { timeout: opts.timeoutMs } : undefined
        );
    }

    async complete(messages: ChatMessage[]): Promise<string> {
        const result = await this.generativeModel.generateContent(toGeminiRequest(messages));
        const text = result.response.text();
        if (!text) {
            throw new Error(`Empty completion from ${this.generativeModel.model}`);
        }
        return text;
    }
}
