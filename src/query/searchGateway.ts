import type { Logger } from "pino";
import { CHAT_SOURCE_TYPE, type DocumentStore, type RankedResult, type SearchOptions } from "../database/types";
import { moduleLogger } from "../utils/logger";

function isZeroVector(vector: number[]): boolean {
    return vector.every((value) => value === 0);
}

/**
 * Nearest-neighbour lookup over a {@link DocumentStore}. Results are ordered by
 * descending similarity, bounded by `topK` and never below `threshold`.
 * Conversational documents only come back when asked for by type. A failing
 * store yields no results instead of an error.
 */
export class SimilaritySearchGateway {
    private readonly logger: Logger;

    constructor(private readonly store: DocumentStore, logger?: Logger) {
        this.logger = moduleLogger("search", logger);
    }

    async search(queryVector: number[], options: SearchOptions): Promise<RankedResult[]> {
        if (options.topK <= 0 || queryVector.length === 0 || isZeroVector(queryVector)) {
            return [];
        }

        let results: RankedResult[];
        try {
            results = await this.store.search(queryVector, options);
        } catch (error) {
            this.logger.error({ err: error, sourceType: options.sourceType }, "Similarity search failed");
            return [];
        }

        return results
            .filter((result) =>
                options.sourceType
                    ? result.sourceType === options.sourceType
                    : result.sourceType !== CHAT_SOURCE_TYPE
            )
            .filter((result) => result.similarity >= options.threshold)
            .sort((a, b) => b.similarity - a.similarity)
            .slice(0, options.topK);
    }
}
