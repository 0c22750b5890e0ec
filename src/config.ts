import { z } from 'zod';
import { ConfigError, MissingCredentialError } from './errors';
import { DEFAULT_MODEL_NAME, MODEL_NAME_ENV_VAR, OPENAI_API_KEY_ENV_VAR, OPENAI_BASE_URL_ENV_VAR } from './agents/llmConstants';

// Defaults
export const DEFAULT_MAX_STEPS = 8;
export const DEFAULT_FETCH_TIMEOUT_MS = 15000;
export const DEFAULT_MAX_CONTENT_LENGTH = 8000;
export const DEFAULT_PROMPTS_DIR = 'src/prompts';

export const MAX_STEPS_ENV_VAR = 'AGENT_MAX_STEPS';
export const FETCH_TIMEOUT_ENV_VAR = 'FETCH_TIMEOUT_MS';
export const MAX_CONTENT_LENGTH_ENV_VAR = 'MAX_CONTENT_LENGTH';
export const PROMPTS_CONFIG_ENV_VAR = 'PROMPTS_CONFIG';
export const VERBOSE_ENV_VAR = 'VERBOSE';

const POSITIVE_INT = 'must be a positive integer';
const TRUTHY = ['1', 'true', 'yes'];

// Blank values count as unset
const optionalText = z.string().trim().optional().transform(value => value || undefined);

const positiveInt = (fallback: number) => optionalText.pipe(
    z.coerce.number({ invalid_type_error: POSITIVE_INT })
        .int(POSITIVE_INT)
        .positive(POSITIVE_INT)
        .default(fallback)
);

export const EnvSchema = z.object({
    [OPENAI_API_KEY_ENV_VAR]: optionalText,
    [OPENAI_BASE_URL_ENV_VAR]: optionalText,
    [MODEL_NAME_ENV_VAR]: optionalText,
    [MAX_STEPS_ENV_VAR]: positiveInt(DEFAULT_MAX_STEPS),
    [FETCH_TIMEOUT_ENV_VAR]: positiveInt(DEFAULT_FETCH_TIMEOUT_MS),
    [MAX_CONTENT_LENGTH_ENV_VAR]: positiveInt(DEFAULT_MAX_CONTENT_LENGTH),
    [PROMPTS_CONFIG_ENV_VAR]: optionalText,
    [VERBOSE_ENV_VAR]: optionalText.transform(value => value !== undefined && TRUTHY.includes(value.toLowerCase())),
});

export interface AppConfig {
    apiKey: string;
    baseURL?: string;
    modelName: string;
    /** Upper bound on model calls per user turn */
    maxSteps: number;
    fetchTimeoutMs: number;
    /** Characters of page text kept before summarization */
    maxContentLength: number;
    promptsConfigPath?: string;
    verbose: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Builds the application config from environment variables.
 * @throws ConfigError when a numeric setting is not a positive integer
 * @throws MissingCredentialError when the API key is absent
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        const reported = new Set<string>();
        const lines: string[] = [];
        for (const issue of result.error.issues) {
            const name = issue.path.join('.');
            if (reported.has(name)) {
                continue;
            }
            reported.add(name);
            lines.push(`${name} ${issue.message}, got "${env[name]?.trim() ?? ''}".`);
        }
        throw new ConfigError(lines.join('\n'));
    }

    const vars = result.data;
    const apiKey = vars[OPENAI_API_KEY_ENV_VAR];
    if (!apiKey) {
        throw new MissingCredentialError(OPENAI_API_KEY_ENV_VAR);
    }

    return {
        apiKey,
        baseURL: vars[OPENAI_BASE_URL_ENV_VAR],
        modelName: vars[MODEL_NAME_ENV_VAR] ?? DEFAULT_MODEL_NAME,
        maxSteps: vars[MAX_STEPS_ENV_VAR],
        fetchTimeoutMs: vars[FETCH_TIMEOUT_ENV_VAR],
        maxContentLength: vars[MAX_CONTENT_LENGTH_ENV_VAR],
        promptsConfigPath: vars[PROMPTS_CONFIG_ENV_VAR],
        verbose: vars[VERBOSE_ENV_VAR],
    };
}
