import { RunnableConfig } from "@langchain/core/runnables";
import { AppState } from "./graph";
import { callTheLLM } from "./LLMUtils";
import { parseAgentOutput, formatScratchpad, STOP_SEQUENCES } from "./agentUtils";
import { PromptService } from "../services/PromptService";
import { AGENT_PROMPT } from "../services/promptTypes";
import { dbg, safeAppConfig } from "../utils";

/**
 * One think step: formats the ReAct prompt with the tools and this turn's scratchpad,
 * replays the transcript, and records what the model decided.
 */
export async function agentStepNode(state: AppState, config?: RunnableConfig): Promise<Partial<AppState>> {
    const appConfig = safeAppConfig(config);
    const { toolRegistry, llmClient } = appConfig.configurable;
    if (!toolRegistry) {
        throw new Error("Agent step requires a tool registry in the graph config.");
    }
    const promptService = appConfig.configurable.promptService ?? new PromptService();

    const stepCount = state.stepCount + 1;
    dbg(`--- Agent step ${stepCount}/${state.maxSteps} (thread ${appConfig.configurable.thread_id}) ---`);

    const prompt = await promptService.getFormattedPrompt(AGENT_PROMPT.agent, AGENT_PROMPT.key, {
        tools: toolRegistry.describe(),
        toolNames: toolRegistry.names().join(', '),
        input: state.userInput,
        scratchpad: formatScratchpad(state.steps),
    });

    const reply = await callTheLLM(state.transcript, prompt, {
        modelName: state.modelName,
        stop: STOP_SEQUENCES,
        client: llmClient,
    });
    const decision = parseAgentOutput(reply);
    dbg(`Agent decision: ${decision.kind}${decision.kind === 'action' ? ` -> ${decision.tool}` : ''}`);

    if (decision.kind === 'final') {
        return { stepCount, pendingDecision: null, finalAnswer: decision.answer };
    }
    return { stepCount, pendingDecision: decision };
}
