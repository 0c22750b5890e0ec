import { StateGraph, END, START } from "@langchain/langgraph";
import { RunnableConfig } from "@langchain/core/runnables";
import { agentStepNode } from "./AgentStepNode";
import { toolDispatchNode } from "./ToolDispatchNode";
import { stepLimitNode } from "./StepLimitNode";
import { AgentDecision, AgentStep } from "./agentUtils";
import { HistoryMessage } from "./LLMUtils";
import { ToolInvocationRecord } from "../tools/types";
import { DEFAULT_MAX_STEPS } from "../config";
import { dbg } from "../utils";

// Node names
export const AGENT_STEP = "agentStep";
export const TOOL_DISPATCH = "toolDispatch";
export const STEP_LIMIT = "stepLimit";

export type NodeName = typeof AGENT_STEP | typeof TOOL_DISPATCH | typeof STEP_LIMIT;

// The state that flows through the graph during one user turn
export interface AppState {
  userInput: string;
  transcript: HistoryMessage[];   // Earlier turns, replayed to the model
  modelName: string;
  maxSteps: number;
  stepCount: number;              // Model calls made so far this turn
  pendingDecision: AgentDecision | null; // Action or invalid reply awaiting an observation
  steps: AgentStep[];             // Scratchpad of this turn
  invocations: ToolInvocationRecord[];
  finalAnswer: string;
}

export type NodeFunction = (state: AppState, config?: RunnableConfig) => Promise<Partial<AppState>>;

export type WorkflowNodes = Record<NodeName, NodeFunction>;

const DEFAULT_NODES: WorkflowNodes = {
  [AGENT_STEP]: agentStepNode,
  [TOOL_DISPATCH]: toolDispatchNode,
  [STEP_LIMIT]: stepLimitNode,
};

export function routeAfterAgentStep(state: AppState): typeof TOOL_DISPATCH | typeof END {
  return state.pendingDecision ? TOOL_DISPATCH : END;
}

export function routeAfterToolDispatch(state: AppState): typeof AGENT_STEP | typeof STEP_LIMIT {
  return state.stepCount >= state.maxSteps ? STEP_LIMIT : AGENT_STEP;
}

/**
 * Builds the agent loop: think, act, observe, until a final answer or the step limit.
 *
 *   START -> agentStep -> (final answer) -> END
 *                      -> toolDispatch -> agentStep ...
 *                                      -> stepLimit -> END
 */
export function createWorkflow(nodes: WorkflowNodes = DEFAULT_NODES) {
  return new StateGraph<AppState>({
      channels: {
        userInput: { value: (x: string, y?: string) => y ?? x, default: () => "" },
        transcript: { value: (x: HistoryMessage[], y?: HistoryMessage[]) => y ?? x, default: () => [] },
        modelName: { value: (x: string, y?: string) => y ?? x, default: () => "" },
        maxSteps: { value: (x: number, y?: number) => y ?? x, default: () => DEFAULT_MAX_STEPS },
        stepCount: { value: (x: number, y?: number) => y ?? x, default: () => 0 },
        pendingDecision: { value: (x: AgentDecision | null, y?: AgentDecision | null) => y === undefined ? x : y, default: () => null },
        steps: { value: (x: AgentStep[], y?: AgentStep[]) => x.concat(y ?? []), default: () => [] },            // Append
        invocations: { value: (x: ToolInvocationRecord[], y?: ToolInvocationRecord[]) => x.concat(y ?? []), default: () => [] }, // Append
        finalAnswer: { value: (x: string, y?: string) => y ?? x, default: () => "" },
      },
    })
    .addNode(AGENT_STEP, nodes[AGENT_STEP])
    .addNode(TOOL_DISPATCH, nodes[TOOL_DISPATCH])
    .addNode(STEP_LIMIT, nodes[STEP_LIMIT])
    .addEdge(START, AGENT_STEP)
    .addConditionalEdges(AGENT_STEP,
      (state: AppState) => {
        const next = routeAfterAgentStep(state);
        dbg(`Routing after ${AGENT_STEP}: ${next}`);
        return next;
      },
      {
        [TOOL_DISPATCH]: TOOL_DISPATCH,
        [END]: END,
      }
    )
    .addConditionalEdges(TOOL_DISPATCH,
      (state: AppState) => {
        const next = routeAfterToolDispatch(state);
        dbg(`Routing after ${TOOL_DISPATCH}: ${next} (step ${state.stepCount}/${state.maxSteps})`);
        return next;
      },
      {
        [AGENT_STEP]: AGENT_STEP,
        [STEP_LIMIT]: STEP_LIMIT,
      }
    )
    .addEdge(STEP_LIMIT, END);
}

export const app = createWorkflow().compile();

export type AgentApp = typeof app;

/** Supersteps needed for `maxSteps` iterations: one think and one act each, plus the final step. */
export function recursionLimitFor(maxSteps: number): number {
  return maxSteps * 2 + 5;
}
