import type { Queryable } from "./queryable";
import { toVectorLiteral } from "./queryable";
import { CHAT_SOURCE_TYPE, isSourceType, type DocumentMetadata, type RankedResult, type SearchOptions } from "./types";

interface DocumentMatchRow {
    id: string;
    content: string;
    source_type: string;
    source_id: string;
    metadata: DocumentMetadata | null;
    similarity: number;
}

function rowToResult(row: DocumentMatchRow): RankedResult {
    if (!isSourceType(row.source_type)) {
        throw new Error(`Document ${row.id} has unknown source type "${row.source_type}"`);
    }

    return {
        id: String(row.id),
        content: row.content,
        sourceType: row.source_type,
        sourceId: row.source_id,
        metadata: row.metadata ?? {},
        similarity: Number(row.similarity),
    };
}

/**
 * Cosine search through pgvector's `<=>` distance. Without a source type the
 * conversational documents are excluded; with one, only that type matches.
 */
export async function matchDocuments(
    pool: Queryable,
    table: string,
    embedding: number[],
    options: SearchOptions
): Promise<RankedResult[]> {
    const typeClause = options.sourceType ? "d.source_type = $2" : "d.source_type <> $2";

    const sql = `
        WITH query_vec AS (
            SELECT $1::vector AS vec
        )
        SELECT d.id, d.content, d.source_type, d.source_id, d.metadata,
               1 - (d.embedding <=> q.vec) AS similarity
        FROM ${table} d, query_vec q
        WHERE ${typeClause}
          AND 1 - (d.embedding <=> q.vec) >= $3
        ORDER BY d.embedding <=> q.vec
        LIMIT $4
    `;

    const result = await pool.query<DocumentMatchRow>(sql, [
        toVectorLiteral(embedding),
        options.sourceType ?? CHAT_SOURCE_TYPE,
        options.threshold,
        options.topK,
    ]);

    return result.rows.map(rowToResult);
}
