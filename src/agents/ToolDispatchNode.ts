import { RunnableConfig } from "@langchain/core/runnables";
import { AppState } from "./graph";
import { AgentStep, INVALID_FORMAT_OBSERVATION } from "./agentUtils";
import { dbg, safeAppConfig } from "../utils";

/**
 * Act and observe: runs the tool the model asked for, or answers an unparseable reply
 * with a format reminder. Either way the outcome becomes the step's observation.
 */
export async function toolDispatchNode(state: AppState, config?: RunnableConfig): Promise<Partial<AppState>> {
    const decision = state.pendingDecision;
    if (!decision || decision.kind === 'final') {
        return { pendingDecision: null };
    }

    if (decision.kind === 'invalid') {
        dbg("Model reply did not follow the expected format");
        const step: AgentStep = { log: decision.log, observation: INVALID_FORMAT_OBSERVATION };
        return { steps: [step], pendingDecision: null };
    }

    const { toolRegistry } = safeAppConfig(config).configurable;
    if (!toolRegistry) {
        throw new Error("Tool dispatch requires a tool registry in the graph config.");
    }

    const record = await toolRegistry.invoke(decision.tool, decision.toolInput);
    dbg(`Observation from ${record.tool} (${record.status}): ${record.output.substring(0, 200)}`);

    const step: AgentStep = {
        log: decision.log,
        observation: record.output,
        tool: record.tool,
        toolInput: record.input,
    };
    return { steps: [step], invocations: [record], pendingDecision: null };
}
