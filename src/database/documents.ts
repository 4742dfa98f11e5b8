import type { Logger } from "pino";
import type { Queryable } from "./queryable";
import { toVectorLiteral } from "./queryable";
import type { NewDocument } from "./types";

// 5 parameters per row keeps a full batch well under Postgres' 65535 bind limit
const INSERT_BATCH_SIZE = 500;

function documentValues(document: NewDocument): unknown[] {
    return [
        document.content,
        document.sourceType,
        document.sourceId,
        JSON.stringify(document.metadata ?? {}),
        toVectorLiteral(document.embedding),
    ];
}

export async function insertDocuments(
    pool: Queryable,
    logger: Logger,
    table: string,
    documents: NewDocument[]
): Promise<void> {
    for (let start = 0; start < documents.length; start += INSERT_BATCH_SIZE) {
        const batch = documents.slice(start, start + INSERT_BATCH_SIZE);
        const values: unknown[] = [];
        const placeholders: string[] = [];

        batch.forEach((document) => {
            const offset = values.length;
            placeholders.push(
                `($${offset + 1}, $${offset + 2}, $${offset + 3}, $${offset + 4}::jsonb, $${offset + 5}::vector, NOW())`
            );
            values.push(...documentValues(document));
        });

        await pool.query(
            `INSERT INTO ${table} (content, source_type, source_id, metadata, embedding, created_at) VALUES ${placeholders.join(", ")}`,
            values
        );
    }

    logger.debug(`Inserted ${documents.length} document${documents.length === 1 ? "" : "s"}`);
}

export async function countDocuments(pool: Queryable, table: string): Promise<number> {
    const result = await pool.query<{ count: string }>(`SELECT COUNT(*) AS count FROM ${table}`);
    return Number(result.rows[0]?.count ?? 0);
}

export async function deleteAllDocuments(pool: Queryable, logger: Logger, table: string): Promise<void> {
    await pool.query(`DELETE FROM ${table}`);
    logger.info(`Deleted all documents from ${table}`);
}
