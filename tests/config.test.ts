import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { loadConfig, DEFAULT_MAX_STEPS, DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_MAX_CONTENT_LENGTH } from '../src/config';
import { ConfigError, MissingCredentialError } from '../src/errors';
import { loadConfigOrExit } from '../src/cli/startup';
import stripAnsi from 'strip-ansi';

describe('loadConfig', () => {
    it('should apply defaults when only the key is set', () => {
        expect(loadConfig({ OPENAI_API_KEY: 'test-key' })).to.deep.equal({
            apiKey: 'test-key',
            baseURL: undefined,
            modelName: 'gpt-3.5-turbo',
            maxSteps: DEFAULT_MAX_STEPS,
            fetchTimeoutMs: DEFAULT_FETCH_TIMEOUT_MS,
            maxContentLength: DEFAULT_MAX_CONTENT_LENGTH,
            promptsConfigPath: undefined,
            verbose: false,
        });
    });

    it('should read every setting from the environment', () => {
        const config = loadConfig({
            OPENAI_API_KEY: ' test-key ',
            BASE_URL: 'http://localhost:4000',
            MODEL_NAME: 'gpt-4o-mini',
            AGENT_MAX_STEPS: '3',
            FETCH_TIMEOUT_MS: '500',
            MAX_CONTENT_LENGTH: '100',
            PROMPTS_CONFIG: 'prompts.json',
            VERBOSE: 'TRUE',
        });
        expect(config).to.deep.equal({
            apiKey: 'test-key',
            baseURL: 'http://localhost:4000',
            modelName: 'gpt-4o-mini',
            maxSteps: 3,
            fetchTimeoutMs: 500,
            maxContentLength: 100,
            promptsConfigPath: 'prompts.json',
            verbose: true,
        });
    });

    it('should fail with a hint when the key is missing', () => {
        try {
            loadConfig({ OPENAI_API_KEY: '  ' });
            expect.fail('Should have thrown an error');
        } catch (error) {
            expect(error).to.be.instanceOf(MissingCredentialError);
            expect(error).to.include({
                message: 'OPENAI_API_KEY is not set in environment variables.',
                hint: 'Create a .env file with content: OPENAI_API_KEY=your-key-here',
                code: 1,
            });
        }
    });

    it('should reject a step limit that is not a positive integer', () => {
        for (const bad of ['0', '-2', '2.5', 'many']) {
            expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', AGENT_MAX_STEPS: bad }))
                .to.throw(ConfigError, `AGENT_MAX_STEPS must be a positive integer, got "${bad}".`);
        }
    });

    it('should reject a fetch timeout or content length that is not a positive integer', () => {
        expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', FETCH_TIMEOUT_MS: 'soon' }))
            .to.throw(ConfigError, 'FETCH_TIMEOUT_MS must be a positive integer, got "soon".');
        expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', MAX_CONTENT_LENGTH: '0' }))
            .to.throw(ConfigError, 'MAX_CONTENT_LENGTH must be a positive integer, got "0".');
    });

    it('should report every malformed setting once, one per line', () => {
        try {
            loadConfig({ OPENAI_API_KEY: 'test-key', AGENT_MAX_STEPS: '-2.5', MAX_CONTENT_LENGTH: 'lots' });
            expect.fail('Should have thrown an error');
        } catch (error) {
            expect(error).to.be.instanceOf(ConfigError);
            expect(error).to.include({
                message: 'AGENT_MAX_STEPS must be a positive integer, got "-2.5".\n' +
                    'MAX_CONTENT_LENGTH must be a positive integer, got "lots".',
                code: 2,
            });
        }
    });

    it('should treat blank values as unset', () => {
        const config = loadConfig({ OPENAI_API_KEY: 'test-key', AGENT_MAX_STEPS: '  ', MODEL_NAME: '' });
        expect(config.maxSteps).to.equal(DEFAULT_MAX_STEPS);
        expect(config.modelName).to.equal('gpt-3.5-turbo');
    });
});

describe('loadConfigOrExit', () => {
    let exitStub: sinon.SinonStub;
    let errorStub: sinon.SinonStub;

    beforeEach(() => {
        exitStub = sinon.stub(process, 'exit');
        errorStub = sinon.stub(console, 'error');
    });

    afterEach(() => {
        sinon.restore();
    });

    it('should return the config without exiting', () => {
        expect(loadConfigOrExit({ OPENAI_API_KEY: 'test-key' }).apiKey).to.equal('test-key');
        expect(exitStub.called).to.be.false;
    });

    it('should exit with code 1 when the key is missing', () => {
        loadConfigOrExit({});
        expect(exitStub.calledOnceWith(1)).to.be.true;
        expect(stripAnsi(errorStub.firstCall.args[0])).to.equal(
            'Error: OPENAI_API_KEY is not set in environment variables.\n' +
            'Create a .env file with content: OPENAI_API_KEY=your-key-here'
        );
    });

    it('should exit with code 2 on a malformed setting', () => {
        loadConfigOrExit({ OPENAI_API_KEY: 'test-key', AGENT_MAX_STEPS: 'many' });
        expect(exitStub.calledOnceWith(2)).to.be.true;
        expect(stripAnsi(errorStub.firstCall.args[0])).to.equal(
            'Error: AGENT_MAX_STEPS must be a positive integer, got "many".\n' +
            'Check the values in your .env file'
        );
    });
});
