import type { Pool } from "pg";
import type { Logger } from "pino";
import type { AppConfig } from "../../config/types";
import type { BankingDataSource } from "../../database/banking";
import type { ConversationStore, DocumentStore } from "../../database/types";
import type { LLMClientBundle } from "../../llm/types";

export type RagStore = DocumentStore & ConversationStore;

export interface ServerContext {
    config: AppConfig;
    llm: LLMClientBundle;
    store: RagStore;
    banking: BankingDataSource;
    logger: Logger;
    indexingBusy: boolean;
    pool?: Pool;
}

export interface RouterContext {
    config: AppConfig;
    llm: LLMClientBundle;
    store: RagStore;
    banking: BankingDataSource;
    isIndexingBusy: () => boolean;
    setIndexingBusy: (busy: boolean) => void;
}

export function createRouterContext(context: ServerContext): RouterContext {
    return {
        config: context.config,
        llm: context.llm,
        store: context.store,
        banking: context.banking,
        isIndexingBusy: () => context.indexingBusy,
        setIndexingBusy: (busy: boolean) => {
            context.indexingBusy = busy;
        },
    };
}
