import * as uuid from 'uuid';
import { RunnableConfig } from '@langchain/core/runnables';
import { PromptService } from './services/PromptService';
import { ILLMClient } from './agents/ILLMClient';
import { ToolRegistry } from './tools/ToolRegistry';

export interface AppGraphConfigurable {
    thread_id: string;
    promptService?: PromptService;
    llmClient?: ILLMClient;
    toolRegistry?: ToolRegistry;
}

export interface AppRunnableConfig extends RunnableConfig {
    configurable: AppGraphConfigurable;
}

let verbose = false;

/**
 * Turns debug output on or off for the whole process.
 */
export function setVerbose(enabled: boolean) {
    verbose = enabled;
}

export function dbg(s: string) {
    if (verbose) {
        console.debug(s);
    }
}

export function say(s: string) {
    console.log(s);
}

export function newGraphConfig(): AppRunnableConfig {
    const thread_id = uuid.v4();
    const configurable: AppGraphConfigurable = { thread_id };
    return { configurable };
}

/**
 * Narrows the config handed to a graph node down to the application's own configurable fields.
 * Falls back to a fresh thread id when the caller did not provide one.
 */
export function safeAppConfig(config?: RunnableConfig): AppRunnableConfig {
    const configurable = config?.configurable ?? {};
    const threadId = typeof configurable.thread_id === 'string' ? configurable.thread_id : uuid.v4();
    return {
        ...config,
        configurable: {
            thread_id: threadId,
            promptService: hasMethod<PromptService>(configurable.promptService, 'getFormattedPrompt') ? configurable.promptService : undefined,
            llmClient: hasMethod<ILLMClient>(configurable.llmClient, 'chatCompletion') ? configurable.llmClient : undefined,
            toolRegistry: hasMethod<ToolRegistry>(configurable.toolRegistry, 'invoke') ? configurable.toolRegistry : undefined,
        },
    };
}

function hasMethod<T>(value: unknown, method: keyof T & string): value is T {
    return typeof value === 'object' && value !== null && typeof Reflect.get(value, method) === 'function';
}

/**
 * Returns the message of anything thrown, without assuming it is an Error.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
