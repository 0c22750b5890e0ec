import * as fs from 'fs/promises';
import * as path from 'path';
import { FullPromptsConfig, PromptContext, PromptsConfigSchema } from './promptTypes';
import { DEFAULT_PROMPTS_DIR, PROMPTS_CONFIG_ENV_VAR } from '../config';
import { ConfigError } from '../errors';
import { errorMessage } from '../utils';

export interface PromptServiceDependencies {
    readFileFn?: (path: string, encoding: BufferEncoding) => Promise<string>;
    resolvePathFn?: (...paths: string[]) => string;
    dirnameFn?: (p: string) => string;
    isAbsoluteFn?: (p: string) => boolean;
    /** Directory holding the built-in `<agent>/<key>.txt` prompts, relative to the working directory */
    promptsDir?: string;
}

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

/**
 * Loads prompt templates and fills in their `{{placeholders}}`.
 * Prompts named in the optional JSON config replace the built-in ones.
 */
export class PromptService {
    private loadedConfig?: FullPromptsConfig;
    private readonly configFilePath?: string;
    private readonly configDir?: string;
    private readonly promptsDir: string;
    private readonly templateCache = new Map<string, string>();

    private readonly readFileFn: (path: string, encoding: BufferEncoding) => Promise<string>;
    private readonly resolvePathFn: (...paths: string[]) => string;
    private readonly dirnameFn: (p: string) => string;
    private readonly isAbsoluteFn: (p: string) => boolean;

    constructor(configFilePath?: string, deps?: PromptServiceDependencies) {
        this.readFileFn = deps?.readFileFn || fs.readFile;
        this.resolvePathFn = deps?.resolvePathFn || path.resolve;
        this.dirnameFn = deps?.dirnameFn || path.dirname;
        this.isAbsoluteFn = deps?.isAbsoluteFn || path.isAbsolute;
        this.promptsDir = deps?.promptsDir || DEFAULT_PROMPTS_DIR;

        if (configFilePath) {
            this.configFilePath = this.resolvePathFn(configFilePath);
            this.configDir = this.dirnameFn(this.configFilePath);
        }
    }

    private async _ensureConfigLoaded(): Promise<void> {
        if (this.configFilePath && !this.loadedConfig) {
            let parsed: unknown;
            try {
                const fileContent = await this._readFile(this.configFilePath);
                parsed = JSON.parse(fileContent);
            } catch (error) {
                throw new Error(`Failed to load or parse prompt configuration file: ${this.configFilePath}. Original error: ${errorMessage(error)}`);
            }
            const validation = PromptsConfigSchema.safeParse(parsed);
            if (!validation.success) {
                const issues = validation.error.issues
                    .map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
                    .join('\n');
                throw new ConfigError(
                    `Invalid prompt configuration file ${this.configFilePath}:\n${issues}`,
                    `Fix the file named by ${PROMPTS_CONFIG_ENV_VAR}`
                );
            }
            this.loadedConfig = validation.data;
        }
    }

    public async getFormattedPrompt(
        agentName: string,
        promptKey: string,
        context: PromptContext
    ): Promise<string> {
        await this._ensureConfigLoaded();

        const customPromptConfig = this.loadedConfig?.prompts?.[agentName]?.[promptKey];
        let promptPath: string;
        if (customPromptConfig) {
            const missing = customPromptConfig.inputs.filter(input => !(input in context));
            if (missing.length > 0) {
                throw new Error(`Custom prompt ${agentName}/${promptKey} expects inputs not provided: ${missing.join(', ')}`);
            }
            promptPath = this._resolvePath(customPromptConfig.path);
        } else {
            promptPath = this.resolvePathFn(this.promptsDir, agentName, `${promptKey}.txt`);
        }

        const promptText = await this._loadTemplate(promptPath, agentName, promptKey, customPromptConfig !== undefined);
        if (!promptText) {
            throw new Error(`Failed to load prompt for agent ${agentName}, prompt ${promptKey}.`);
        }

        // Single pass, so substituted values are never scanned for placeholders themselves.
        return promptText.replace(PLACEHOLDER, (match, key: string) =>
            Object.prototype.hasOwnProperty.call(context, key) ? String(context[key]) : match
        );
    }

    private async _loadTemplate(promptPath: string, agentName: string, promptKey: string, custom: boolean): Promise<string> {
        const cached = this.templateCache.get(promptPath);
        if (cached !== undefined) {
            return cached;
        }
        try {
            const text = await this._readFile(promptPath);
            this.templateCache.set(promptPath, text);
            return text;
        } catch (error) {
            const kind = custom ? 'custom' : 'default';
            throw new Error(`Error loading ${kind} prompt file ${promptPath} for agent ${agentName}, prompt ${promptKey}. Original error: ${errorMessage(error)}`);
        }
    }

    private async _readFile(filePath: string): Promise<string> {
        try {
            return await this.readFileFn(filePath, 'utf-8');
        } catch (error) {
            throw new Error(`Reading file ${filePath} failed: ${errorMessage(error)}`);
        }
    }

    private _resolvePath(promptPath: string): string {
        if (this.isAbsoluteFn(promptPath)) {
            return promptPath;
        }
        // Relative custom prompt paths are relative to the config file.
        if (this.configDir) {
            return this.resolvePathFn(this.configDir, promptPath);
        }
        return this.resolvePathFn(promptPath);
    }
}
