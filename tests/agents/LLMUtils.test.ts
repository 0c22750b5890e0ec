import { expect } from 'chai';
import * as sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { callTheLLM, getLLMClient, resetLLMClient } from '../../src/agents/LLMUtils';
import { OpenAIClient } from '../../src/agents/OpenAIClient';
import { OPENAI_API_KEY_ENV_VAR } from '../../src/agents/llmConstants';
import { MissingCredentialError } from '../../src/errors';

// Keep track of original env vars to restore them
const originalEnv = { ...process.env };

describe('LLMUtils', () => {

    describe('getLLMClient', () => {
        beforeEach(() => {
            process.env = { ...originalEnv };
            delete process.env[OPENAI_API_KEY_ENV_VAR];
            resetLLMClient();
        });

        afterEach(() => {
            process.env = { ...originalEnv };
            resetLLMClient();
        });

        it('should build an OpenAIClient from the environment and reuse it', () => {
            process.env[OPENAI_API_KEY_ENV_VAR] = 'test-key';
            const first = getLLMClient();
            expect(first).to.be.instanceOf(OpenAIClient);
            expect(getLLMClient()).to.equal(first);
        });

        it('should throw when the API key is missing', () => {
            expect(() => getLLMClient()).to.throw(MissingCredentialError, 'OPENAI_API_KEY is not set in environment variables.');
        });
    });

    describe('callTheLLM', () => {
        let chatCompletion: sinon.SinonStub;

        beforeEach(() => {
            chatCompletion = sinon.stub().resolves('reply');
        });

        afterEach(() => {
            sinon.restore();
        });

        it('should map agent turns to assistant messages', async () => {
            await callTheLLM(
                [{ role: 'user', content: 'q1' }, { role: 'agent', content: 'a1' }],
                'q2',
                { client: { chatCompletion } }
            );
            expect(chatCompletion.firstCall.args[0]).to.deep.equal([
                { role: 'user', content: 'q1' },
                { role: 'assistant', content: 'a1' },
            ]);
            expect(chatCompletion.firstCall.args[1]).to.equal('q2');
        });

        it('should pass the model name and stop sequences through', async () => {
            const reply = await callTheLLM([], 'p', { client: { chatCompletion }, modelName: 'model-x', stop: ['\nObservation:'] });
            expect(reply).to.equal('reply');
            expect(chatCompletion.firstCall.args[2]).to.deep.equal({ modelName: 'model-x', stop: ['\nObservation:'] });
        });

        it('should leave a blank model name for the client to default', async () => {
            await callTheLLM([], 'p', { client: { chatCompletion }, modelName: '  ' });
            expect(chatCompletion.firstCall.args[2]).to.deep.equal({ modelName: undefined, stop: undefined });
        });

        it('should treat an empty reply as a failure', async () => {
            chatCompletion.resolves('');
            try {
                await callTheLLM([], 'p', { client: { chatCompletion } });
                expect.fail('Should have thrown an error');
            } catch (error) {
                expect(error).to.have.property('message', 'LLM API call failed: LLM call returned empty content.');
            }
        });

        it('should wrap client errors', async () => {
            chatCompletion.rejects(new Error('Failed to communicate with OpenAI: 401'));
            try {
                await callTheLLM([], 'p', { client: { chatCompletion } });
                expect.fail('Should have thrown an error');
            } catch (error) {
                expect(error).to.have.property('message', 'LLM API call failed: Failed to communicate with OpenAI: 401');
            }
        });
    });
});
