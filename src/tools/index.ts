import { DynamicTool, Tool } from "@langchain/core/tools";
import { SearchSource, searchAll } from "./webSearch";
import { WebpageSummarizer, renderSummary } from "../retrieval/WebpageSummarizer";
import { ResearchNotesGenerator } from "../generators/ResearchNotesGenerator";
import { KnowledgeGraphGenerator } from "../generators/KnowledgeGraphGenerator";
import { KnowledgeGraphFragment, renderKnowledgeGraph } from "../knowledge/KnowledgeGraph";
import { RetrievalError } from "../errors";

export const WEB_SEARCH_TOOL = 'Web_Search';
export const PROCESS_WEBPAGE_TOOL = 'Process_Webpage';
export const RESEARCH_NOTES_TOOL = 'Generate_Research_Notes';
export const KNOWLEDGE_GRAPH_TOOL = 'Generate_Knowledge_Graph';

export interface DefaultToolDependencies {
    searchSources: SearchSource[];
    summarizer: WebpageSummarizer;
    notesGenerator: ResearchNotesGenerator;
    graphGenerator: KnowledgeGraphGenerator;
    /** Called with every generated graph, before it is rendered for the agent */
    onKnowledgeGraph?: (fragment: KnowledgeGraphFragment) => void;
}

export function createWebSearchTool(sources: SearchSource[]): Tool {
    return new DynamicTool({
        name: WEB_SEARCH_TOOL,
        description: 'Search the web for information about a topic or question. Input is a search query.',
        func: (query: string) => searchAll(query, sources),
    });
}

/**
 * Retrieval problems come back as text for the agent to read; model failures propagate.
 */
export function createProcessWebpageTool(summarizer: WebpageSummarizer): Tool {
    return new DynamicTool({
        name: PROCESS_WEBPAGE_TOOL,
        description: 'Process a webpage URL and extract key information. Input is a single http(s) URL.',
        func: async (url: string) => {
            try {
                return renderSummary(await summarizer.summarize(url));
            } catch (error) {
                if (error instanceof RetrievalError) {
                    return `Error processing webpage: ${error.message}`;
                }
                throw error;
            }
        },
    });
}

export function createResearchNotesTool(generator: ResearchNotesGenerator): Tool {
    return new DynamicTool({
        name: RESEARCH_NOTES_TOOL,
        description: 'Generate structured research notes on a specific topic. Input is the topic.',
        func: (topic: string) => generator.generate(topic),
    });
}

export function createKnowledgeGraphTool(
    generator: KnowledgeGraphGenerator,
    onKnowledgeGraph?: (fragment: KnowledgeGraphFragment) => void
): Tool {
    return new DynamicTool({
        name: KNOWLEDGE_GRAPH_TOOL,
        description: 'Create a visual knowledge graph about a topic showing relationships between key concepts. Input is the topic.',
        func: async (topic: string) => {
            const fragment = await generator.generate(topic);
            onKnowledgeGraph?.(fragment);
            return renderKnowledgeGraph(fragment);
        },
    });
}

export function createDefaultTools(deps: DefaultToolDependencies): Tool[] {
    return [
        createWebSearchTool(deps.searchSources),
        createProcessWebpageTool(deps.summarizer),
        createResearchNotesTool(deps.notesGenerator),
        createKnowledgeGraphTool(deps.graphGenerator, deps.onKnowledgeGraph),
    ];
}
