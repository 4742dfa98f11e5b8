import type { QueryResultRow } from "pg";

/** The slice of `pg.Pool` the stores use. */
export interface Queryable {
    query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<{ rows: R[] }>;
}

export function toVectorLiteral(embedding: number[]): string {
    return `[${embedding.join(",")}]`;
}
