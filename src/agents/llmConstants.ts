export const OPENAI_API_KEY_ENV_VAR = 'OPENAI_API_KEY';
export const OPENAI_BASE_URL_ENV_VAR = 'BASE_URL';
export const MODEL_NAME_ENV_VAR = 'MODEL_NAME';
export const DEFAULT_MODEL_NAME = 'gpt-3.5-turbo'; // General default

export const AGENT_TEMPERATURE = 0.7;
export const AGENT_MAX_TOKENS = 1500;
export const GENERATOR_TEMPERATURE = 0.2;
export const SUMMARY_TEMPERATURE = 0;
