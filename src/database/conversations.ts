import type { Queryable } from "./queryable";
import type { ConversationRole, ConversationTurn, NewConversationTurn } from "./types";

interface ConversationRow {
    session_id: string;
    role: string;
    content: string;
    created_at: Date;
}

const ROLES: readonly ConversationRole[] = ["user", "assistant", "system"];

function toRole(value: string): ConversationRole {
    const role = ROLES.find((candidate) => candidate === value.toLowerCase());
    if (!role) {
        throw new Error(`Unknown conversation role "${value}"`);
    }
    return role;
}

export async function appendTurn(pool: Queryable, table: string, turn: NewConversationTurn): Promise<void> {
    await pool.query(
        `INSERT INTO ${table} (session_id, role, content, created_at) VALUES ($1, $2, $3, NOW())`,
        [turn.sessionId, turn.role.toUpperCase(), turn.content]
    );
}

export async function appendTurns(pool: Queryable, table: string, turns: NewConversationTurn[]): Promise<void> {
    if (turns.length === 0) {
        return;
    }

    const values: unknown[] = [];
    const rows = turns.map((turn, index) => {
        const base = index * 3;
        values.push(turn.sessionId, turn.role.toUpperCase(), turn.content);
        return `($${base + 1}, $${base + 2}, $${base + 3}, NOW())`;
    });

    await pool.query(
        `INSERT INTO ${table} (session_id, role, content, created_at) VALUES ${rows.join(", ")}`,
        values
    );
}

export async function fetchRecentTurns(
    pool: Queryable,
    table: string,
    sessionId: string,
    limit: number
): Promise<ConversationTurn[]> {
    const result = await pool.query<ConversationRow>(
        `SELECT session_id, role, content, created_at FROM (
            SELECT id, session_id, role, content, created_at
            FROM ${table}
            WHERE session_id = $1
            ORDER BY created_at DESC, id DESC
            LIMIT $2
        ) recent
        ORDER BY created_at ASC, id ASC`,
        [sessionId, limit]
    );

    return result.rows.map((row) => ({
        sessionId: row.session_id,
        role: toRole(row.role),
        content: row.content,
        createdAt: row.created_at,
    }));
}
