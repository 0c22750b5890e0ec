export const FINAL_ANSWER_MARKER = 'Final Answer:';
export const OBSERVATION_MARKER = 'Observation:';
export const STOP_SEQUENCES = [`\n${OBSERVATION_MARKER}`];

export const INVALID_FORMAT_OBSERVATION =
    "Invalid format: reply with either an 'Action:' line followed by an 'Action Input:' line, or a 'Final Answer:'.";

/**
 * What the model decided at one step of the loop.
 */
export type AgentDecision =
    | { kind: 'final'; answer: string; log: string }
    | { kind: 'action'; tool: string; toolInput: string; log: string }
    | { kind: 'invalid'; log: string };

/**
 * One completed iteration: the model's text and what it observed afterwards.
 */
export interface AgentStep {
    log: string;
    observation: string;
    tool?: string;
    toolInput?: string;
}

const ACTION_PATTERN = /Action\s*\d*\s*:[ \t]*(.*?)[ \t]*\n+\s*Action\s*\d*\s*Input\s*\d*\s*:[ \t]*([\s\S]*)/;

/**
 * Parses a ReAct-style reply.
 *
 * A `Final Answer:` wins over an action in the same reply. Action input is cut at any
 * `Observation:` the model wrote itself, and stripped of wrapping quotes.
 */
export function parseAgentOutput(text: string): AgentDecision {
    const log = text.trim();

    const finalIndex = text.lastIndexOf(FINAL_ANSWER_MARKER);
    if (finalIndex !== -1) {
        return { kind: 'final', answer: text.substring(finalIndex + FINAL_ANSWER_MARKER.length).trim(), log };
    }

    const match = text.match(ACTION_PATTERN);
    if (!match) {
        return { kind: 'invalid', log };
    }

    const tool = match[1].trim();
    let toolInput = match[2];
    const observationIndex = toolInput.indexOf(OBSERVATION_MARKER);
    if (observationIndex !== -1) {
        toolInput = toolInput.substring(0, observationIndex);
    }
    toolInput = stripQuotes(toolInput.trim());

    if (!tool) {
        return { kind: 'invalid', log };
    }
    return { kind: 'action', tool, toolInput, log };
}

function stripQuotes(value: string): string {
    if (value.length >= 2 && ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))) {
        return value.slice(1, -1).trim();
    }
    return value;
}

/**
 * Renders previous steps the way the model wrote them, each followed by its observation
 * and a fresh `Thought:` for the model to continue from.
 */
export function formatScratchpad(steps: AgentStep[]): string {
    return steps
        .map(step => ` ${step.log}\n${OBSERVATION_MARKER} ${step.observation}\nThought:`)
        .join('');
}

export function couldNotCompleteMessage(maxSteps: number): string {
    return `I could not complete this request within ${maxSteps} steps. Try asking a narrower question.`;
}
