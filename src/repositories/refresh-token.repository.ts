import { Database } from '../config/database';
import { RefreshTokenStore } from '../core/auth/stores';
import { RefreshTokenRecord } from '../core/auth/types';

interface RefreshTokenRow {
    token_id: string;
    user_id: string;
    family_id: string;
    token_hash: string;
    expires_at: Date;
    is_revoked: boolean;
    replaced_by: string | null;
    created_at: Date;
}

const COLUMNS = `token_id::text AS token_id, user_id::text AS user_id, family_id::text AS family_id,
    token_hash, expires_at, is_revoked, replaced_by::text AS replaced_by, created_at`;

function toRecord(row: RefreshTokenRow): RefreshTokenRecord {
    return {
        tokenId: row.token_id,
        subjectId: row.user_id,
        familyId: row.family_id,
        tokenHash: row.token_hash,
        expiresAt: row.expires_at,
        revoked: row.is_revoked,
        replacedBy: row.replaced_by,
        createdAt: row.created_at,
    };
}

export function createRefreshTokenRepository(db: Database): RefreshTokenStore {
    return {
        async create(record) {
            await db.write((client) =>
                client.query(
                    `INSERT INTO refresh_tokens
                        (token_id, user_id, family_id, token_hash, expires_at, is_revoked, replaced_by, created_at)
                     VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
                    [
                        record.tokenId,
                        record.subjectId,
                        record.familyId,
                        record.tokenHash,
                        record.expiresAt,
                        record.revoked,
                        record.replacedBy,
                        record.createdAt,
                    ]
                )
            );
        },

        // Rotation decisions must see the latest write, so this reads the primary
        async findByHash(tokenHash) {
            const result = await db.write((client) =>
                client.query<RefreshTokenRow>(`SELECT ${COLUMNS} FROM refresh_tokens WHERE token_hash = $1`, [tokenHash])
            );
            return result.rows.length > 0 ? toRecord(result.rows[0]) : null;
        },

        // Row lock serializes concurrent callers; the loser re-evaluates
        // is_revoked after the winner commits and updates nothing
        async revokeIfLatest(familyId, tokenId) {
            const result = await db.write((client) =>
                client.query(
                    `UPDATE refresh_tokens SET is_revoked = TRUE
                     WHERE family_id = $1 AND token_id = $2 AND is_revoked = FALSE
                     RETURNING token_id`,
                    [familyId, tokenId]
                )
            );
            return result.rowCount === 1;
        },

        async linkReplacement(tokenId, replacedBy) {
            await db.write((client) =>
                client.query('UPDATE refresh_tokens SET replaced_by = $2 WHERE token_id = $1', [tokenId, replacedBy])
            );
        },

        // Both updates run in one statement, so the pair lands or neither does
        async voidReplacement(tokenId, successorId) {
            await db.write((client) =>
                client.query(
                    `WITH voided AS (
                        UPDATE refresh_tokens SET is_revoked = TRUE WHERE token_id = $2 RETURNING token_id
                     )
                     UPDATE refresh_tokens SET replaced_by = NULL
                     WHERE token_id = $1 AND replaced_by = $2`,
                    [tokenId, successorId]
                )
            );
        },

        async revokeFamily(familyId) {
            const result = await db.write((client) =>
                client.query('UPDATE refresh_tokens SET is_revoked = TRUE WHERE family_id = $1 AND is_revoked = FALSE', [
                    familyId,
                ])
            );
            return result.rowCount ?? 0;
        },

        async revokeAllForSubject(subjectId) {
            const result = await db.write((client) =>
                client.query<{ family_id: string }>(
                    `UPDATE refresh_tokens SET is_revoked = TRUE
                     WHERE user_id = $1 AND is_revoked = FALSE
                     RETURNING family_id::text AS family_id`,
                    [subjectId]
                )
            );
            return Array.from(new Set(result.rows.map((row) => row.family_id)));
        },

        async deleteExpired(before) {
            const result = await db.write((client) =>
                client.query('DELETE FROM refresh_tokens WHERE expires_at < $1', [before])
            );
            return result.rowCount ?? 0;
        },
    };
}
