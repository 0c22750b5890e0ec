import { AppState } from "./graph";
import { couldNotCompleteMessage } from "./agentUtils";

/**
 * Ends a turn that used up its steps without a final answer.
 */
export async function stepLimitNode(state: AppState): Promise<Partial<AppState>> {
    console.warn(`Agent stopped after ${state.stepCount} steps without a final answer.`);
    return { finalAnswer: couldNotCompleteMessage(state.maxSteps), pendingDecision: null };
}
