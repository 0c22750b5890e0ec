import { ChatOpenAI } from "@langchain/openai";
import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { StringOutputParser } from "@langchain/core/output_parsers";
import { PromptService } from "../services/PromptService";
import { PromptContext } from "../services/promptTypes";
import { DEFAULT_MODEL_NAME } from "../agents/llmConstants";
import { dbg } from "../utils";

/** Builds a chat model for a given sampling temperature. */
export type ChatModelFactory = (temperature: number) => BaseChatModel;

export interface ChatModelSettings {
    apiKey: string;
    baseURL?: string;
    modelName?: string;
}

export function createChatModelFactory(settings: ChatModelSettings): ChatModelFactory {
    return (temperature: number) => new ChatOpenAI({
        model: settings.modelName || DEFAULT_MODEL_NAME,
        temperature,
        apiKey: settings.apiKey,
        ...(settings.baseURL ? { configuration: { baseURL: settings.baseURL } } : {}),
    });
}

/**
 * Formats a stored prompt and runs it through `model | StringOutputParser` in a single call.
 */
export async function runPromptChain(
    model: BaseChatModel,
    promptService: PromptService,
    prompt: { agent: string; key: string },
    context: PromptContext
): Promise<string> {
    const promptText = await promptService.getFormattedPrompt(prompt.agent, prompt.key, context);
    dbg(`Running ${prompt.agent}/${prompt.key} prompt (${promptText.length} chars)`);
    const chain = model.pipe(new StringOutputParser());
    const output = await chain.invoke(promptText);
    return output.trim();
}
