import { AppConfig } from "../config";
import { OpenAIClient } from "../agents/OpenAIClient";
import { GENERATOR_TEMPERATURE, SUMMARY_TEMPERATURE } from "../agents/llmConstants";
import { PromptService } from "../services/PromptService";
import { DocumentRetriever } from "../retrieval/DocumentRetriever";
import { WebpageSummarizer } from "../retrieval/WebpageSummarizer";
import { ResearchNotesGenerator } from "../generators/ResearchNotesGenerator";
import { KnowledgeGraphGenerator } from "../generators/KnowledgeGraphGenerator";
import { createChatModelFactory } from "../generators/chatModel";
import { KnowledgeGraphFragment } from "../knowledge/KnowledgeGraph";
import { createDefaultTools } from "../tools";
import { duckDuckGoSource, wikipediaSource } from "../tools/webSearch";
import { ToolRegistry } from "../tools/ToolRegistry";
import { ResearchSession } from "./ResearchSession";

export interface SessionHooks {
    onKnowledgeGraph?: (fragment: KnowledgeGraphFragment) => void;
}

/**
 * Wires the model clients, prompts and default tools into a ready session.
 */
export function createResearchSession(config: AppConfig, hooks: SessionHooks = {}): ResearchSession {
    const llmClient = new OpenAIClient({ apiKey: config.apiKey, baseURL: config.baseURL });
    const chatModel = createChatModelFactory({ apiKey: config.apiKey, baseURL: config.baseURL, modelName: config.modelName });
    const promptService = new PromptService(config.promptsConfigPath);

    const retriever = new DocumentRetriever({
        timeoutMs: config.fetchTimeoutMs,
        maxContentLength: config.maxContentLength,
    });

    const tools = createDefaultTools({
        searchSources: [wikipediaSource(), duckDuckGoSource()],
        summarizer: new WebpageSummarizer(retriever, chatModel(SUMMARY_TEMPERATURE), promptService),
        notesGenerator: new ResearchNotesGenerator(chatModel(GENERATOR_TEMPERATURE), promptService),
        graphGenerator: new KnowledgeGraphGenerator(chatModel(GENERATOR_TEMPERATURE), promptService),
        onKnowledgeGraph: hooks.onKnowledgeGraph,
    });

    return new ResearchSession({
        llmClient,
        toolRegistry: new ToolRegistry(tools),
        promptService,
        modelName: config.modelName,
        maxSteps: config.maxSteps,
    });
}
