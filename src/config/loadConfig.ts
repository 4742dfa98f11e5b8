import { config as loadDotenv } from "dotenv";
import path from "node:path";
import type { AppConfig, ChatProviderName, EmbeddingProviderName, LoggingConfig } from "./types";

const PACKAGE_ROOT = path.resolve(__dirname, "..", "..");

const EMBEDDING_PROVIDERS: readonly EmbeddingProviderName[] = ["local", "openai", "google"];
const CHAT_PROVIDERS: readonly ChatProviderName[] = ["mock", "openai", "google", "anthropic", "ollama"];
const LOG_LEVELS: readonly LoggingConfig["level"][] = ["fatal", "error", "warn", "info", "debug", "trace"];

const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProviderName, string> = {
    local: "fingerprint",
    openai: "text-embedding-3-small",
    google: "text-embedding-004",
};

const DEFAULT_CHAT_MODELS: Record<ChatProviderName, string> = {
    mock: "formatting",
    openai: "gpt-4o-mini",
    google: "gemini-1.5-flash",
    anthropic: "claude-3-5-haiku-latest",
    ollama: "llama3",
};

function getEnv(key: string, required = true): string | undefined {
    const value = process.env[key];
    if (required && !value) {
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value || undefined;
}

function getEnvNumber(key: string): number | undefined;
function getEnvNumber(key: string, defaultValue: number): number;
function getEnvNumber(key: string, defaultValue?: number): number | undefined {
    const value = process.env[key];
    if (!value) {
        return defaultValue;
    }
    const parsed = Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a valid number, got: ${value}`);
    }
    return parsed;
}

function getEnvPositiveInteger(key: string, defaultValue: number): number {
    const value = getEnvNumber(key, defaultValue);
    if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${key} must be a positive integer, got: ${value}`);
    }
    return value;
}

function getEnvBoolean(key: string, defaultValue = false): boolean {
    const value = process.env[key];
    if (!value) {
        return defaultValue;
    }
    const lowered = value.toLowerCase().trim();
    return lowered === "true" || lowered === "1" || lowered === "yes";
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
    const value = process.env[key]?.trim().toLowerCase();
    if (!value) {
        return defaultValue;
    }
    const match = choices.find((choice) => choice === value);
    if (!match) {
        throw new Error(`Environment variable ${key} must be one of ${choices.join(", ")}, got: ${value}`);
    }
    return match;
}

export function resolveConfigPath(providedPath?: string): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    if (process.env.BANKRAG_CONFIG_PATH) {
        return path.resolve(process.cwd(), process.env.BANKRAG_CONFIG_PATH);
    }

    return path.join(PACKAGE_ROOT, ".env");
}

export async function loadAppConfig(configPath?: string): Promise<AppConfig> {
    const envPath = configPath ?? resolveConfigPath();
    const result = loadDotenv({ path: envPath });

    if (result.error) {
        // Only fail if an explicit path was provided, otherwise env vars may already be loaded
        if (configPath) {
            throw new Error(`Failed to load environment file from "${configPath}": ${result.error.message}`);
        }
    }

    const databaseUrl = getEnv("BANKRAG_DATABASE_URL");
    if (!databaseUrl) {
        throw new Error("Database configuration requires BANKRAG_DATABASE_URL.");
    }

    const embeddingProvider = getEnvChoice("BANKRAG_LLM_EMBEDDING_PROVIDER", EMBEDDING_PROVIDERS, "local");
    const chatProvider = getEnvChoice("BANKRAG_LLM_CHAT_PROVIDER", CHAT_PROVIDERS, "mock");

    const dimension = getEnvPositiveInteger("BANKRAG_LLM_EMBEDDING_DIMENSION", 384);

    const config: AppConfig = {
        logging: {
            level: getEnvChoice("BANKRAG_LOGGING_LEVEL", LOG_LEVELS, "info"),
            pretty: getEnvBoolean("BANKRAG_LOGGING_PRETTY", true),
        },
        server: {
            port: getEnvNumber("BANKRAG_SERVER_PORT", 8080),
            apiKey: getEnv("BANKRAG_SERVER_API_KEY", false),
        },
        database: {
            databaseUrl,
            documentsTable: getEnv("BANKRAG_DATABASE_DOCUMENTS_TABLE", false) ?? "document_embeddings",
            conversationsTable: getEnv("BANKRAG_DATABASE_CONVERSATIONS_TABLE", false) ?? "chat_history",
            queryTimeoutMs: getEnvNumber("BANKRAG_DATABASE_QUERY_TIMEOUT_MS", 10_000),
        },
        retrieval: {
            topK: getEnvPositiveInteger("BANKRAG_RETRIEVAL_TOP_K", 5),
            similarityThreshold: getEnvNumber("BANKRAG_RETRIEVAL_SIMILARITY_THRESHOLD", 0.3),
            historyWindow: getEnvPositiveInteger("BANKRAG_RETRIEVAL_HISTORY_WINDOW", 6),
            maxQueryLength: getEnvPositiveInteger("BANKRAG_RETRIEVAL_MAX_QUERY_LENGTH", 2000),
        },
        indexing: {
            pageSize: getEnvPositiveInteger("BANKRAG_INDEXING_PAGE_SIZE", 500),
            onStartup: getEnvBoolean("BANKRAG_INDEXING_ON_STARTUP", false),
        },
        llm: {
            embedding: {
                provider: embeddingProvider,
                model: getEnv("BANKRAG_LLM_EMBEDDING_MODEL", false) ?? DEFAULT_EMBEDDING_MODELS[embeddingProvider],
                dimension,
                apiKey: getEnv("BANKRAG_LLM_EMBEDDING_API_KEY", false),
                baseUrl: getEnv("BANKRAG_LLM_EMBEDDING_BASE_URL", false),
                timeoutMs: getEnvNumber("BANKRAG_LLM_EMBEDDING_TIMEOUT_MS", 30_000),
                limits: {
                    batchSize: getEnvNumber("BANKRAG_LLM_EMBEDDING_LIMITS_BATCH_SIZE"),
                    concurrency: getEnvNumber("BANKRAG_LLM_EMBEDDING_LIMITS_CONCURRENCY"),
                    maxRequestsPerMinute: getEnvNumber("BANKRAG_LLM_EMBEDDING_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getEnvNumber("BANKRAG_LLM_EMBEDDING_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getEnvNumber("BANKRAG_LLM_EMBEDDING_LIMITS_RETRIES"),
                },
            },
            chat: {
                provider: chatProvider,
                model: getEnv("BANKRAG_LLM_CHAT_MODEL", false) ?? DEFAULT_CHAT_MODELS[chatProvider],
                apiKey: getEnv("BANKRAG_LLM_CHAT_API_KEY", false),
                baseUrl: getEnv("BANKRAG_LLM_CHAT_BASE_URL", false),
                timeoutMs: getEnvNumber("BANKRAG_LLM_CHAT_TIMEOUT_MS", 60_000),
                temperature: getEnvNumber("BANKRAG_LLM_CHAT_TEMPERATURE", 0.3),
                maxOutputTokens: getEnvNumber("BANKRAG_LLM_CHAT_MAX_OUTPUT_TOKENS", 1000),
                limits: {
                    concurrency: getEnvNumber("BANKRAG_LLM_CHAT_LIMITS_CONCURRENCY"),
                    maxRequestsPerMinute: getEnvNumber("BANKRAG_LLM_CHAT_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getEnvNumber("BANKRAG_LLM_CHAT_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getEnvNumber("BANKRAG_LLM_CHAT_LIMITS_RETRIES"),
                },
            },
        },
    };

    return config;
}
