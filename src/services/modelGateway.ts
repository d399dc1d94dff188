import { describeError } from '../types/errors';
import type { ChatMessage, ModelCallKind, ModelResult } from '../types/grading';
import type { CompletionTransport } from './transports';

export const CHAT_FAILURE_TEXT = '[ERROR: Chat API failed]';
export const VISION_FAILURE_TEXT = '[ERROR: Vision API failed]';

/**
 * Renders a result the way it appears in the saved outputs.
 */
export function completionText(result: ModelResult): string {
    if (result.ok) return result.text;
    return result.kind === 'vision' ? VISION_FAILURE_TEXT : CHAT_FAILURE_TEXT;
}

export function visionMessages(promptText: string, imageBase64: string): ChatMessage[] {
    return [
        {
            role: 'user',
            content: [
                { type: 'text', text: promptText },
                { type: 'image_url', image_url: { url: `data:image/png;base64,${imageBase64}` } }
            ]
        }
    ];
}

/**
 * Best-effort access to the completion service. Every call is attempted once;
 * failures come back as `{ ok: false }` and are never thrown.
 */
export class ModelGateway {
    constructor(private readonly transport: CompletionTransport) {}

    completeChat(messages: ChatMessage[]): Promise<ModelResult> {
        return this.call('chat', messages);
    }

    completeVision(promptText: string, imageBase64: string): Promise<ModelResult> {
        return this.call('vision', visionMessages(promptText, imageBase64));
    }

    private async call(kind: ModelCallKind, messages: ChatMessage[]): Promise<ModelResult> {
        try {
            const text = await this.transport.complete(messages);
            return { ok: true, text };
        } catch (error) {
            const message = describeError(error);
            console.warn(`[ModelGateway] ${kind === 'vision' ? 'Vision' : 'Chat'} API call failed (${this.transport.name}): ${message}`);
            return { ok: false, kind, message };
        }
    }
}
