import { Document } from "@langchain/core/documents";
import { RetrievalError } from "../errors";
import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_MAX_CONTENT_LENGTH } from "../config";
import { dbg, errorMessage } from "../utils";
import { HtmlPageLoader } from "./HtmlPageLoader";

export const TRUNCATION_MARKER = '...';

export interface PageLoader {
    load(): Promise<Document[]>;
}

export type PageLoaderFactory = (url: string, options: { timeout: number }) => PageLoader;

export interface RetrievedPage {
    url: string;
    title?: string;
    text: string;
    /** Whether `text` was cut to the length limit */
    truncated: boolean;
}

export interface DocumentRetrieverOptions {
    timeoutMs?: number;
    maxContentLength?: number;
    loaderFactory?: PageLoaderFactory;
}

const htmlLoaderFactory: PageLoaderFactory = (url, options) => new HtmlPageLoader(url, options);

/**
 * Fetches a web page and reduces it to the visible text a model can take.
 */
export class DocumentRetriever {
    private readonly timeoutMs: number;
    private readonly maxContentLength: number;
    private readonly loaderFactory: PageLoaderFactory;

    constructor(options: DocumentRetrieverOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
        this.maxContentLength = options.maxContentLength ?? DEFAULT_MAX_CONTENT_LENGTH;
        this.loaderFactory = options.loaderFactory ?? htmlLoaderFactory;
    }

    /**
     * @throws RetrievalError for malformed URLs, fetch failures, error statuses, non-text content and pages without readable text
     */
    async retrieve(rawUrl: string): Promise<RetrievedPage> {
        const url = parseHttpUrl(rawUrl);
        dbg(`DocumentRetriever: loading ${url} (timeout ${this.timeoutMs} ms)`);

        let docs: Document[];
        try {
            docs = await this.loaderFactory(url, { timeout: this.timeoutMs }).load();
        } catch (error) {
            if (error instanceof RetrievalError) {
                throw error;
            }
            throw new RetrievalError(url, errorMessage(error));
        }

        const text = normalizeWhitespace(docs.map(doc => doc.pageContent).join('\n'));
        if (!text) {
            throw new RetrievalError(url, 'no readable text found');
        }

        const title = docs[0]?.metadata?.title;
        const truncated = text.length > this.maxContentLength;
        return {
            url,
            title: typeof title === 'string' && title ? title : undefined,
            text: truncated ? text.substring(0, this.maxContentLength) + TRUNCATION_MARKER : text,
            truncated,
        };
    }
}

/**
 * Trims the input, drops wrapping quotes or angle brackets, and accepts only http(s) URLs.
 * @throws RetrievalError when the input is not such a URL
 */
export function parseHttpUrl(rawUrl: string): string {
    const candidate = rawUrl.trim().replace(/^["'<]+|["'>]+$/g, '');
    let parsed: URL;
    try {
        parsed = new URL(candidate);
    } catch {
        throw new RetrievalError(candidate || rawUrl, 'not a valid URL');
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        throw new RetrievalError(candidate, `unsupported protocol ${parsed.protocol}`);
    }
    return parsed.toString();
}

/** Collapses runs of spaces and tabs, and keeps at most one blank line between paragraphs. */
export function normalizeWhitespace(text: string): string {
    return text
        .split('\n')
        .map(line => line.replace(/[ \t\f\v\r]+/g, ' ').trim())
        .join('\n')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}
