import type { ChatMessage } from '../../types/grading';

/**
 * One completion request against a provider. Implementations throw on any
 * transport or API failure; ModelGateway owns the failure policy.
 */
export interface CompletionTransport {
    readonly name: string;
    complete(messages: ChatMessage[]): Promise<string>;
}
