import OpenAI from "openai";
import { ILLMClient, ChatMessage, ChatCompletionOptions } from "./ILLMClient";
import { OPENAI_API_KEY_ENV_VAR, OPENAI_BASE_URL_ENV_VAR, DEFAULT_MODEL_NAME, AGENT_TEMPERATURE, AGENT_MAX_TOKENS } from "./llmConstants";
import { MissingCredentialError } from "../errors";
import { dbg, errorMessage } from "../utils";

/** The slice of the OpenAI SDK this client talks to */
export interface ChatCompletionsApi {
    create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion>;
}

export interface OpenAIClientOptions {
    apiKey?: string;
    baseURL?: string;
    completions?: ChatCompletionsApi;
}

/**
 * OpenAIClient implements the ILLMClient interface on top of OpenAI's chat completions API.
 * Key and base URL come from the options, falling back to environment variables.
 */
export class OpenAIClient implements ILLMClient {
    private completions: ChatCompletionsApi;

    /**
     * @throws MissingCredentialError if no API key is given or set in the environment
     */
    constructor(options: OpenAIClientOptions = {}) {
        const apiKey = options.apiKey || process.env[OPENAI_API_KEY_ENV_VAR] || '';
        if (!apiKey) {
            throw new MissingCredentialError(OPENAI_API_KEY_ENV_VAR);
        }

        if (options.completions) {
            this.completions = options.completions;
            return;
        }

        const baseURL = options.baseURL || process.env[OPENAI_BASE_URL_ENV_VAR] || '';
        if (!baseURL) {
            dbg(`${OPENAI_BASE_URL_ENV_VAR} is not set. Using default OpenAI URL.`);
            this.completions = new OpenAI({ apiKey }).chat.completions;
        }
        else {
            dbg(`Using base URL: ${baseURL}`);
            this.completions = new OpenAI({ apiKey, baseURL }).chat.completions;
        }
    }

    async chatCompletion(
        history: ChatMessage[],
        prompt: string,
        options?: ChatCompletionOptions
    ): Promise<string> {

        const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
            ...history.map((msg): OpenAI.Chat.ChatCompletionMessageParam => {
                switch (msg.role) {
                    case 'user':
                        return { role: 'user', content: msg.content };
                    case 'system':
                        return { role: 'system', content: msg.content };
                    default:
                        return { role: 'assistant', content: msg.content };
                }
            }),
            { role: 'user', content: prompt }
        ];

        const effectiveModel = options?.modelName && options.modelName.trim() !== ''
            ? options.modelName
            : DEFAULT_MODEL_NAME;

        let completion: OpenAI.Chat.ChatCompletion;
        try {
            dbg(`--- Calling OpenAI API (model: ${effectiveModel}) ---`);
            completion = await this.completions.create({
                model: effectiveModel,
                messages: messages,
                temperature: AGENT_TEMPERATURE,
                max_tokens: AGENT_MAX_TOKENS,
                ...(options?.stop && options.stop.length > 0 ? { stop: options.stop } : {}),
            });
            dbg('--- OpenAI API Call Complete ---');
        } catch (error) {
            throw new Error(`Failed to communicate with OpenAI: ${errorMessage(error)}`);
        }

        const responseContent = completion.choices[0]?.message?.content;
        if (!responseContent) {
            throw new Error("OpenAI API call returned successfully but contained no content.");
        }
        return responseContent;
    }
}
