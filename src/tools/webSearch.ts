import { WikipediaQueryRun } from "@langchain/community/tools/wikipedia_query_run";
import { DuckDuckGoSearch } from "@langchain/community/tools/duckduckgo_search";
import { dbg, errorMessage } from "../utils";

const WIKIPEDIA_TOP_K = 2;
const WIKIPEDIA_MAX_DOC_LENGTH = 4000;
const DUCKDUCKGO_MAX_RESULTS = 5;

/** A search backend the web search tool fans out to. */
export interface SearchSource {
    label: string;
    search(query: string): Promise<string>;
}

export function wikipediaSource(): SearchSource {
    const tool = new WikipediaQueryRun({ topKResults: WIKIPEDIA_TOP_K, maxDocContentLength: WIKIPEDIA_MAX_DOC_LENGTH });
    return {
        label: 'Wikipedia',
        search: async (query: string) => String(await tool.invoke(query)),
    };
}

export function duckDuckGoSource(): SearchSource {
    const tool = new DuckDuckGoSearch({ maxResults: DUCKDUCKGO_MAX_RESULTS });
    return {
        label: 'DuckDuckGo',
        search: async (query: string) => String(await tool.invoke(query)),
    };
}

/**
 * Queries every source in turn and joins the results under one heading per source.
 * A failing source is reported inline; only when all of them fail does the search throw.
 */
export async function searchAll(query: string, sources: SearchSource[]): Promise<string> {
    const cleanQuery = query.trim();
    if (!cleanQuery) {
        throw new Error('Search query is empty.');
    }

    const sections: string[] = [];
    const failures: string[] = [];
    for (const source of sources) {
        dbg(`Searching ${source.label} for: ${cleanQuery}`);
        try {
            const result = (await source.search(cleanQuery)).trim();
            sections.push(`### ${source.label}:\n${result || 'No results found.'}`);
        } catch (error) {
            const message = errorMessage(error);
            failures.push(`${source.label}: ${message}`);
            sections.push(`### ${source.label}:\nSearch error: ${message}`);
        }
    }

    if (sources.length === 0 || failures.length === sources.length) {
        throw new Error(`All search sources failed (${failures.join('; ') || 'no sources configured'})`);
    }
    return sections.join('\n\n');
}
