import { Role } from '../memory/types';

/** Transcript roles plus the provider-side roles a client may receive. */
export type ChatMessage = {
    role: Role | 'assistant' | 'system';
    content: string;
};

export interface ChatCompletionOptions {
    modelName?: string;
    /** Sequences at which the model stops generating */
    stop?: string[];
}

/**
 * A chat-completion backend the agent loop can call.
 */
export interface ILLMClient {
    /**
     * Sends the replayed history followed by one new user prompt and returns the reply text.
     * @throws Error when the provider call fails or the reply is empty
     */
    chatCompletion(
        history: ChatMessage[],
        prompt: string,
        options?: ChatCompletionOptions
    ): Promise<string>;
}
