export interface LoggingConfig {
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace";
    pretty: boolean;
}

export interface ServerConfig {
    port: number;
    apiKey?: string;
}

export interface DatabaseConfig {
    databaseUrl: string;
    documentsTable: string;
    conversationsTable: string;
    queryTimeoutMs: number;
}

export interface RetrievalConfig {
    topK: number;
    similarityThreshold: number;
    historyWindow: number;
    maxQueryLength: number;
}

export interface IndexingConfig {
    pageSize: number;
    onStartup: boolean;
}

export type EmbeddingProviderName =
    | "local"
    | "openai"
    | "google";

export type ChatProviderName =
    | "mock"
    | "openai"
    | "google"
    | "anthropic"
    | "ollama";

export interface ProviderLimitsConfig {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface BaseModelConfig {
    model: string;
    apiKey?: string;
    baseUrl?: string;
    timeoutMs: number;
    limits?: ProviderLimitsConfig;
}

export interface EmbeddingModelConfig extends BaseModelConfig {
    provider: EmbeddingProviderName;
    dimension: number;
}

export interface ChatModelConfig extends BaseModelConfig {
    provider: ChatProviderName;
    maxOutputTokens?: number;
    temperature: number;
}

export interface LLMConfig {
    embedding: EmbeddingModelConfig;
    chat: ChatModelConfig;
}

export interface AppConfig {
    logging: LoggingConfig;
    server: ServerConfig;
    database: DatabaseConfig;
    retrieval: RetrievalConfig;
    indexing: IndexingConfig;
    llm: LLMConfig;
}
