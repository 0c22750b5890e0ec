import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { DynamicTool } from '@langchain/core/tools';
import { ToolRegistry } from '../src/tools/ToolRegistry';
import { echoTool, brokenTool, testRegistry, FIXED_TIME } from './helpers';

describe('ToolRegistry', () => {
    let warnStub: sinon.SinonStub;

    beforeEach(() => {
        warnStub = sinon.stub(console, 'warn');
    });

    afterEach(() => {
        sinon.restore();
    });

    it('should list tools in registration order', () => {
        const registry = testRegistry();
        expect(registry.names()).to.deep.equal(['Echo', 'Broken']);
    });

    it('should describe each tool on its own line', () => {
        expect(testRegistry().describe()).to.equal('Echo: Repeats its input.\nBroken: Always fails.');
    });

    it('should match tool names exactly', async () => {
        const record = await testRegistry().invoke('echo', 'hello');
        expect(record.status).to.equal('unknown-tool');
    });

    it('should reject duplicate tool names', () => {
        expect(() => new ToolRegistry([echoTool(), echoTool()])).to.throw('Duplicate tool name: Echo');
    });

    it('should record a successful invocation', async () => {
        const record = await testRegistry().invoke('Echo', 'hello');
        expect(record).to.deep.equal({
            tool: 'Echo',
            input: 'hello',
            output: 'echo:hello',
            status: 'ok',
            timestamp: FIXED_TIME,
        });
    });

    it('should turn an unknown tool into an unknown-tool record', async () => {
        const record = await testRegistry().invoke('Nope', 'x');
        expect(record).to.deep.equal({
            tool: 'Nope',
            input: 'x',
            output: 'Unknown tool "Nope". Available tools: Echo, Broken.',
            status: 'unknown-tool',
            timestamp: FIXED_TIME,
        });
    });

    it('should turn a thrown error into a failed record attributed to the tool', async () => {
        const record = await new ToolRegistry([brokenTool('HTTP 429 rate limited')], () => FIXED_TIME).invoke('Broken', 'x');
        expect(record.status).to.equal('failed');
        expect(record.tool).to.equal('Broken');
        expect(record.output).to.equal('Tool "Broken" failed: HTTP 429 rate limited');
        expect(warnStub.calledWith('Tool "Broken" failed: HTTP 429 rate limited')).to.be.true;
    });

    it('should serialize non-string tool output as JSON', async () => {
        const jsonTool = new DynamicTool({
            name: 'Json',
            description: 'Returns an object.',
            func: async () => ({ answer: 42 }),
        });
        const record = await new ToolRegistry([jsonTool]).invoke('Json', '');
        expect(record.output).to.equal('{"answer":42}');
    });
});
