import { Tool } from '@langchain/core/tools';
import { ToolInvocationRecord } from './types';
import { ToolExecutionError, UnknownToolError } from '../errors';
import { dbg, errorMessage } from '../utils';

type Clock = () => Date;

/**
 * Fixed set of tools the agent can call, resolved by name.
 * The set cannot change after construction.
 */
export class ToolRegistry {
    private readonly tools: ReadonlyMap<string, Tool>;
    private readonly now: Clock;

    /**
     * @throws Error when two tools share a name
     */
    constructor(tools: Tool[], now: Clock = () => new Date()) {
        const byName = new Map<string, Tool>();
        for (const tool of tools) {
            if (byName.has(tool.name)) {
                throw new Error(`Duplicate tool name: ${tool.name}`);
            }
            byName.set(tool.name, tool);
        }
        this.tools = byName;
        this.now = now;
    }

    names(): string[] {
        return [...this.tools.keys()];
    }

    /** One `name: description` line per tool, in registration order. */
    describe(): string {
        return [...this.tools.values()].map(tool => `${tool.name}: ${tool.description}`).join('\n');
    }

    /**
     * Runs the named tool. Never throws: unknown names and tool failures come back as records
     * whose output is the message the agent should observe.
     */
    async invoke(name: string, input: string): Promise<ToolInvocationRecord> {
        const tool = this.tools.get(name);
        if (!tool) {
            const error = new UnknownToolError(name, this.names());
            dbg(`ToolRegistry: ${error.message}`);
            return this.record(name, input, error.message, 'unknown-tool');
        }

        try {
            dbg(`ToolRegistry: invoking ${name} with input "${input}"`);
            const output: unknown = await tool.invoke(input);
            return this.record(name, input, stringifyOutput(output), 'ok');
        } catch (error) {
            const failure = new ToolExecutionError(name, errorMessage(error));
            console.warn(failure.message);
            return this.record(name, input, failure.message, 'failed');
        }
    }

    private record(tool: string, input: string, output: string, status: ToolInvocationRecord['status']): ToolInvocationRecord {
        return { tool, input, output, status, timestamp: this.now() };
    }
}

function stringifyOutput(output: unknown): string {
    if (typeof output === 'string') {
        return output;
    }
    if (typeof output === 'object' && output !== null && 'content' in output && typeof output.content === 'string') {
        // ToolMessage, when a tool is invoked with a tool call
        return output.content;
    }
    return JSON.stringify(output);
}
