import { app as defaultAgentApp, AgentApp, recursionLimitFor } from "../agents/graph";
import { ILLMClient } from "../agents/ILLMClient";
import { ConversationMemory } from "../memory/ConversationMemory";
import { PromptService } from "../services/PromptService";
import { ToolRegistry } from "../tools/ToolRegistry";
import { ToolInvocationRecord } from "../tools/types";
import { DEFAULT_MAX_STEPS } from "../config";
import { DEFAULT_MODEL_NAME } from "../agents/llmConstants";
import { dbg, newGraphConfig } from "../utils";

export interface TurnResult {
    answer: string;
    /** Tools called during the turn, in call order */
    invocations: ToolInvocationRecord[];
    /** Model calls made during the turn */
    stepCount: number;
}

export interface ResearchSessionOptions {
    llmClient: ILLMClient;
    toolRegistry: ToolRegistry;
    promptService: PromptService;
    modelName?: string;
    maxSteps?: number;
    memory?: ConversationMemory;
    agentApp?: AgentApp;
}

/**
 * One interactive session: the transcript plus everything the agent loop needs.
 * Turns run one at a time.
 */
export class ResearchSession {
    readonly memory: ConversationMemory;
    readonly toolRegistry: ToolRegistry;
    private readonly llmClient: ILLMClient;
    private readonly promptService: PromptService;
    private readonly modelName: string;
    private readonly maxSteps: number;
    private readonly agentApp: AgentApp;

    constructor(options: ResearchSessionOptions) {
        this.llmClient = options.llmClient;
        this.toolRegistry = options.toolRegistry;
        this.promptService = options.promptService;
        this.modelName = options.modelName ?? DEFAULT_MODEL_NAME;
        this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
        this.memory = options.memory ?? new ConversationMemory();
        this.agentApp = options.agentApp ?? defaultAgentApp;
    }

    /**
     * Runs the agent loop on one utterance. The user and agent turns are appended only
     * once the loop has produced an answer; a failed turn leaves the transcript untouched.
     */
    async ask(userInput: string): Promise<TurnResult> {
        const input = userInput.trim();
        if (!input) {
            throw new Error("No input provided.");
        }

        const config = newGraphConfig();
        config.configurable.llmClient = this.llmClient;
        config.configurable.toolRegistry = this.toolRegistry;
        config.configurable.promptService = this.promptService;
        config.recursionLimit = recursionLimitFor(this.maxSteps);
        dbg(`Invoking agent graph (thread ${config.configurable.thread_id}) with input: "${input}"`);

        const result = await this.agentApp.invoke({
            userInput: input,
            transcript: this.memory.toHistory(),
            modelName: this.modelName,
            maxSteps: this.maxSteps,
        }, config);

        this.memory.append('user', input);
        this.memory.append('agent', result.finalAnswer);

        return {
            answer: result.finalAnswer,
            invocations: result.invocations,
            stepCount: result.stepCount,
        };
    }

    /** Ends the session, discarding the transcript. */
    end() {
        this.memory.clear();
    }
}
