import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { PromptService } from "../services/PromptService";
import { KNOWLEDGE_GRAPH_PROMPT } from "../services/promptTypes";
import { KnowledgeGraphFragment, parseTriples } from "../knowledge/KnowledgeGraph";
import { runPromptChain } from "./chatModel";
import { dbg } from "../utils";

/**
 * Asks the model for entity-relation triples about a topic and parses the reply into a fragment.
 */
export class KnowledgeGraphGenerator {
    constructor(
        private readonly model: BaseChatModel,
        private readonly promptService: PromptService
    ) {}

    async generate(topic: string): Promise<KnowledgeGraphFragment> {
        const cleanTopic = topic.trim();
        const reply = await runPromptChain(this.model, this.promptService, KNOWLEDGE_GRAPH_PROMPT, { topic: cleanTopic });
        const triples = parseTriples(reply);
        dbg(`KnowledgeGraphGenerator: parsed ${triples.length} triples for "${cleanTopic}"`);
        return { topic: cleanTopic, triples };
    }
}
