import { expect } from 'chai';
import * as sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import OpenAI from 'openai';
import { OpenAIClient } from '../../src/agents/OpenAIClient';
import { DEFAULT_MODEL_NAME, AGENT_TEMPERATURE, AGENT_MAX_TOKENS, OPENAI_API_KEY_ENV_VAR } from '../../src/agents/llmConstants';
import { MissingCredentialError } from '../../src/errors';

const originalEnv = { ...process.env };

function completionWith(content: string | null): OpenAI.Chat.ChatCompletion {
    return {
        id: 'chatcmpl-test',
        object: 'chat.completion',
        created: 0,
        model: 'test-model',
        choices: [{
            index: 0,
            finish_reason: 'stop',
            logprobs: null,
            message: { role: 'assistant', content, refusal: null },
        }],
    };
}

describe('OpenAIClient', () => {
    let create: sinon.SinonStub;
    let client: OpenAIClient;

    beforeEach(() => {
        create = sinon.stub().resolves(completionWith('Final Answer: hi'));
        client = new OpenAIClient({ apiKey: 'test-key', completions: { create } });
    });

    afterEach(() => {
        process.env = { ...originalEnv };
        sinon.restore();
    });

    it('should throw when no API key is available', () => {
        delete process.env[OPENAI_API_KEY_ENV_VAR];
        expect(() => new OpenAIClient()).to.throw(MissingCredentialError);
    });

    it('should send the history followed by the prompt', async () => {
        const reply = await client.chatCompletion(
            [
                { role: 'system', content: 'be brief' },
                { role: 'user', content: 'q1' },
                { role: 'assistant', content: 'a1' },
            ],
            'q2'
        );

        expect(reply).to.equal('Final Answer: hi');
        expect(create.firstCall.args[0]).to.deep.equal({
            model: DEFAULT_MODEL_NAME,
            messages: [
                { role: 'system', content: 'be brief' },
                { role: 'user', content: 'q1' },
                { role: 'assistant', content: 'a1' },
                { role: 'user', content: 'q2' },
            ],
            temperature: AGENT_TEMPERATURE,
            max_tokens: AGENT_MAX_TOKENS,
        });
    });

    it('should use the requested model and stop sequences', async () => {
        await client.chatCompletion([], 'p', { modelName: 'gpt-4o-mini', stop: ['\nObservation:'] });
        expect(create.firstCall.args[0]).to.include({ model: 'gpt-4o-mini' });
        expect(create.firstCall.args[0].stop).to.deep.equal(['\nObservation:']);
    });

    it('should leave out an empty stop list', async () => {
        await client.chatCompletion([], 'p', { stop: [] });
        expect(create.firstCall.args[0]).to.not.have.property('stop');
    });

    it('should wrap API errors', async () => {
        create.rejects(new Error('401 Incorrect API key provided'));
        try {
            await client.chatCompletion([], 'p');
            expect.fail('Should have thrown an error');
        } catch (error) {
            expect(error).to.have.property('message', 'Failed to communicate with OpenAI: 401 Incorrect API key provided');
        }
    });

    it('should reject a completion without content', async () => {
        create.resolves(completionWith(null));
        try {
            await client.chatCompletion([], 'p');
            expect.fail('Should have thrown an error');
        } catch (error) {
            expect(error).to.have.property('message', 'OpenAI API call returned successfully but contained no content.');
        }
    });
});
