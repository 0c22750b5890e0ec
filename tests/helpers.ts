import sinon from 'sinon';
import { DynamicTool } from '@langchain/core/tools';
import { ILLMClient } from '../src/agents/ILLMClient';
import { ToolRegistry } from '../src/tools/ToolRegistry';

export const FIXED_TIME = new Date('2024-01-01T00:00:00.000Z');

/**
 * An LLM client whose replies are played back in order; the last one repeats.
 */
export function scriptedClient(replies: string[]): { client: ILLMClient; chatCompletion: sinon.SinonStub } {
    const chatCompletion = sinon.stub();
    replies.forEach((reply, index) => chatCompletion.onCall(index).resolves(reply));
    chatCompletion.resolves(replies[replies.length - 1]);
    return { client: { chatCompletion }, chatCompletion };
}

export function echoTool(): DynamicTool {
    return new DynamicTool({
        name: 'Echo',
        description: 'Repeats its input.',
        func: async (input: string) => `echo:${input}`,
    });
}

export function brokenTool(message = 'service timeout'): DynamicTool {
    return new DynamicTool({
        name: 'Broken',
        description: 'Always fails.',
        func: async () => {
            throw new Error(message);
        },
    });
}

export function testRegistry(): ToolRegistry {
    return new ToolRegistry([echoTool(), brokenTool()], () => FIXED_TIME);
}
