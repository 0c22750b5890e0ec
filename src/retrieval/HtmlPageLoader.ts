import { Document } from "@langchain/core/documents";
import * as cheerio from "cheerio";
import { RetrievalError } from "../errors";
import type { PageLoader } from "./DocumentRetriever";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HtmlPageLoaderOptions {
    timeout: number;
    fetchFn?: FetchFn;
}

const HIDDEN_ELEMENTS = 'script, style, noscript, template';

/** Media types whose body is worth reading as a page. */
export function isTextContent(mediaType: string): boolean {
    return mediaType.startsWith('text/') || mediaType === 'application/xhtml+xml';
}

/**
 * Loads one page over HTTP and keeps the text of its body.
 */
export class HtmlPageLoader implements PageLoader {
    private readonly fetchFn: FetchFn;

    constructor(private readonly url: string, private readonly options: HtmlPageLoaderOptions) {
        this.fetchFn = options.fetchFn ?? fetch;
    }

    /**
     * @throws RetrievalError when the server answers with a non-2xx status or with content that is not text
     */
    async load(): Promise<Document[]> {
        const response = await this.fetchFn(this.url, { signal: AbortSignal.timeout(this.options.timeout) });
        if (!response.ok) {
            throw new RetrievalError(this.url, `HTTP ${response.status}`);
        }

        const mediaType = (response.headers.get('content-type') ?? '').split(';')[0].trim().toLowerCase();
        if (!isTextContent(mediaType)) {
            throw new RetrievalError(this.url, `non-text content (${mediaType || 'unknown'})`);
        }

        const $ = cheerio.load(await response.text());
        $(HIDDEN_ELEMENTS).remove();
        const title = $('title').first().text().trim();
        return [new Document({ pageContent: $('body').text(), metadata: { source: this.url, title } })];
    }
}
