import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { RetrievalConfig } from "../config/types";
import type { ConversationStore, DocumentStore, RankedResult, SourceType } from "../database/types";
import { BANKING_SYSTEM_PROMPT } from "../llm/prompt";
import { isGenerationError, type LLMClientBundle } from "../llm/types";
import { moduleLogger } from "../utils/logger";
import { assembleContext, buildContext, buildConversationContext } from "./context";
import { InvalidQueryError } from "./errors";
import { SimilaritySearchGateway } from "./searchGateway";

const SNIPPET_LENGTH = 150;

/** Width of `chat_history.session_id`; also fits a generated UUID. */
export const MAX_SESSION_ID_LENGTH = 36;

export interface AskAiOptions {
    query: string;
    sessionId?: string;
    sourceType?: SourceType;
    signal?: AbortSignal;
}

export interface SourceReference {
    sourceType: SourceType;
    sourceId: string;
    similarity: number;
    snippet: string;
}

export interface QueryResponse {
    answer: string;
    sessionId: string;
    sources: SourceReference[];
    documentsRetrieved: number;
    latencyMs: number;
    embeddingProvider: string;
    llmProvider: string;
}

export interface RagServices {
    llm: LLMClientBundle;
    documents: DocumentStore;
    conversations: ConversationStore;
    retrieval: RetrievalConfig;
    logger?: Logger;
}

export function snippetOf(content: string): string {
    if (content.length <= SNIPPET_LENGTH) {
        return content;
    }
    return `${content.slice(0, SNIPPET_LENGTH)}...`;
}

function toSourceReference(result: RankedResult): SourceReference {
    return {
        sourceType: result.sourceType,
        sourceId: result.sourceId,
        similarity: result.similarity,
        snippet: snippetOf(result.content),
    };
}

function validateQuery(query: string, maxLength: number): string {
    const trimmed = query.trim();
    if (!trimmed) {
        throw new InvalidQueryError("Query cannot be empty.");
    }
    if (trimmed.length > maxLength) {
        throw new InvalidQueryError(`Query exceeds the maximum length of ${maxLength} characters.`);
    }
    return trimmed;
}

function resolveSessionId(sessionId: string | undefined): string {
    const trimmed = sessionId?.trim();
    if (!trimmed) {
        return randomUUID();
    }
    if (trimmed.length > MAX_SESSION_ID_LENGTH) {
        throw new InvalidQueryError(`Session id exceeds the maximum length of ${MAX_SESSION_ID_LENGTH} characters.`);
    }
    return trimmed;
}

/**
 * Answers one query: embed, retrieve, assemble context, generate, then record
 * the user and assistant turns under the session. Embedding failures reject;
 * search and generation failures degrade into the answer text.
 */
export async function askAi(services: RagServices, options: AskAiOptions): Promise<QueryResponse> {
    const startedAt = Date.now();
    const logger = moduleLogger("rag", services.logger);
    const { llm, retrieval } = services;

    const query = validateQuery(options.query, retrieval.maxQueryLength);
    const sessionId = resolveSessionId(options.sessionId);

    logger.info({ sessionId, sourceType: options.sourceType }, `RAG query: ${query}`);

    const queryEmbedding = await llm.embedding.embed(query, { signal: options.signal });
    logger.debug({ dimension: queryEmbedding.length }, "Query embedded");

    const gateway = new SimilaritySearchGateway(services.documents, logger);
    const results = await gateway.search(queryEmbedding, {
        topK: retrieval.topK,
        threshold: retrieval.similarityThreshold,
        sourceType: options.sourceType,
    });
    logger.info(
        `Retrieved ${results.length} relevant document${results.length === 1 ? "" : "s"} (threshold: ${retrieval.similarityThreshold})`
    );

    let conversationContext = "";
    try {
        conversationContext = await buildConversationContext(
            services.conversations,
            sessionId,
            retrieval.historyWindow
        );
    } catch (error) {
        logger.error({ err: error, sessionId }, "Failed to load conversation history");
    }
    const context = assembleContext(buildContext(results), conversationContext);
    logger.debug({ contextLength: context.length, withHistory: conversationContext.length > 0 }, "Context assembled");

    const answer = await llm.chat.generate({
        systemPrompt: BANKING_SYSTEM_PROMPT,
        query,
        context,
        signal: options.signal,
    });
    if (isGenerationError(answer)) {
        logger.warn({ provider: llm.chat.name }, "Generation backend returned an error answer");
    }

    try {
        await services.conversations.appendMany([
            { sessionId, role: "user", content: query },
            { sessionId, role: "assistant", content: answer },
        ]);
    } catch (error) {
        logger.error({ err: error, sessionId }, "Failed to persist conversation turns");
    }

    const latencyMs = Date.now() - startedAt;
    logger.info({ sessionId, latencyMs }, "RAG response generated");

    return {
        answer,
        sessionId,
        sources: results.map(toSourceReference),
        documentsRetrieved: results.length,
        latencyMs,
        embeddingProvider: llm.embedding.name,
        llmProvider: llm.chat.name,
    };
}
