import { z } from 'zod';

/** One overridden prompt: the placeholders it expects and the file holding its text. */
export const PromptConfigEntrySchema = z.object({
  inputs: z.array(z.string()).default([]),
  path: z.string().min(1),
});

export const AgentPromptsConfigSchema = z.record(z.string(), PromptConfigEntrySchema);

/** Shape of the JSON file named by PROMPTS_CONFIG. */
export const PromptsConfigSchema = z.object({
  prompts: z.record(z.string(), AgentPromptsConfigSchema),
});

export type PromptConfigEntry = z.infer<typeof PromptConfigEntrySchema>;
export type AgentPromptsConfig = z.infer<typeof AgentPromptsConfigSchema>;
export type FullPromptsConfig = z.infer<typeof PromptsConfigSchema>;

/** Values substituted into `{{name}}` placeholders. */
export type PromptContext = Record<string, string | number>;

// Built-in prompts, as `<agent>/<key>.txt` under the prompts directory
export const AGENT_PROMPT = { agent: 'agent', key: 'react' } as const;
export const SUMMARY_PROMPT = { agent: 'summarizer', key: 'summarize' } as const;
export const RESEARCH_NOTES_PROMPT = { agent: 'researchNotes', key: 'notes' } as const;
export const KNOWLEDGE_GRAPH_PROMPT = { agent: 'knowledgeGraph', key: 'triples' } as const;
