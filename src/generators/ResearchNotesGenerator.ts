import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { PromptService } from "../services/PromptService";
import { RESEARCH_NOTES_PROMPT } from "../services/promptTypes";
import { runPromptChain } from "./chatModel";

export class ResearchNotesGenerator {
    constructor(
        private readonly model: BaseChatModel,
        private readonly promptService: PromptService
    ) {}

    /** Structured notes: overview, key concepts, facts, implications and open questions. */
    async generate(topic: string): Promise<string> {
        const cleanTopic = topic.trim();
        const notes = await runPromptChain(this.model, this.promptService, RESEARCH_NOTES_PROMPT, { topic: cleanTopic });
        return `### Research Notes: ${cleanTopic}\n\n${notes}`;
    }
}
