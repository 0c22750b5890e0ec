import { dbg, errorMessage } from "../utils";
import { OpenAIClient } from './OpenAIClient';
import { ILLMClient, ChatMessage } from './ILLMClient';
import { Turn } from '../memory/types';

export type HistoryMessage = Pick<Turn, 'role' | 'content'>;

// Singleton instance for the LLM client
let clientInstance: ILLMClient | null = null;

/**
 * Factory function to get the process-wide LLM client, created on first call from environment variables.
 * @throws MissingCredentialError if the API key is missing.
 */
export function getLLMClient(): ILLMClient {
    if (!clientInstance) {
        clientInstance = new OpenAIClient();
    }
    return clientInstance;
}

/** Forgets the cached client so the next call to getLLMClient builds a fresh one. */
export function resetLLMClient() {
    clientInstance = null;
}

export interface CallOptions {
    modelName?: string;
    stop?: string[];
    /** Client to use instead of the process-wide one */
    client?: ILLMClient;
}

/**
 * Calls the configured LLM with the replayed history and one new prompt.
 *
 * Internal roles ('user', 'agent') are mapped to the chat roles ('user', 'assistant') the clients expect.
 * @throws Error if the API call fails or the response is empty.
 */
export async function callTheLLM(
    history: HistoryMessage[],
    prompt: string,
    options: CallOptions = {}
): Promise<string> {
    const client = options.client ?? getLLMClient();

    const mappedHistory: ChatMessage[] = history.map(msg => ({
        role: msg.role === 'agent' ? 'assistant' : 'user',
        content: msg.content
    }));

    // Pass undefined to let clients handle defaults.
    const effectiveModel = options.modelName && options.modelName.trim() !== '' ? options.modelName : undefined;

    try {
        dbg(`Model requested: ${effectiveModel || 'Provider Default'}`);
        const responseContent = await client.chatCompletion(mappedHistory, prompt, { modelName: effectiveModel, stop: options.stop });
        if (!responseContent) {
            throw new Error("LLM call returned empty content.");
        }
        return responseContent;
    } catch (error) {
        throw new Error(`LLM API call failed: ${errorMessage(error)}`);
    }
}
