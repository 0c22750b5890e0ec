import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { DocumentRetriever } from "./DocumentRetriever";
import { PromptService } from "../services/PromptService";
import { SUMMARY_PROMPT } from "../services/promptTypes";
import { runPromptChain } from "../generators/chatModel";

export interface WebpageSummary {
    url: string;
    summary: string;
    /** Whether the page text was cut before summarizing */
    truncated: boolean;
}

/**
 * Retrieves a page and asks the model for a concise summary of its text.
 */
export class WebpageSummarizer {
    constructor(
        private readonly retriever: DocumentRetriever,
        private readonly model: BaseChatModel,
        private readonly promptService: PromptService
    ) {}

    /**
     * @throws RetrievalError when the page cannot be retrieved
     */
    async summarize(url: string): Promise<WebpageSummary> {
        const page = await this.retriever.retrieve(url);
        const summary = await runPromptChain(this.model, this.promptService, SUMMARY_PROMPT, { content: page.text });
        return { url: page.url, summary, truncated: page.truncated };
    }
}

export function renderSummary(summary: WebpageSummary): string {
    return `### Summary of ${summary.url}\n\n${summary.summary}`;
}
