import { validate as isUuid } from 'uuid';
import { Database } from '../config/database';
import { PrincipalStore } from '../core/auth/stores';
import { Principal } from '../core/auth/types';
import { ConflictError } from '../shared/errors/conflict.error';

interface PrincipalRow {
    id: string;
    email: string;
    hashed_password: string;
    is_active: boolean;
    first_name: string | null;
    last_name: string | null;
    last_login: Date | null;
    role_name: string | null;
}

const PRINCIPAL_COLUMNS = `u.id::text AS id, u.email, u.hashed_password, u.is_active,
           u.first_name, u.last_name, u.last_login, r.name AS role_name`;

const SELECT_PRINCIPAL = `
    SELECT ${PRINCIPAL_COLUMNS}
    FROM users u
    LEFT JOIN roles r ON r.id = u.role_id`;

const UNIQUE_VIOLATION = '23505';

function toPrincipal(row: PrincipalRow): Principal {
    return {
        id: row.id,
        email: row.email,
        passwordHash: row.hashed_password,
        isActive: row.is_active,
        roleName: row.role_name,
        firstName: row.first_name,
        lastName: row.last_name,
        lastLoginAt: row.last_login,
    };
}

function isUniqueViolation(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

// users.id is a UUID column; other ids cannot match and are not sent, so
// every lookup compares the indexed column directly
export function createPrincipalRepository(db: Database): PrincipalStore {
    return {
        async findByEmail(email) {
            const result = await db.read((client) =>
                client.query<PrincipalRow>(`${SELECT_PRINCIPAL} WHERE u.email = $1`, [email])
            );
            return result.rows.length > 0 ? toPrincipal(result.rows[0]) : null;
        },

        async findById(id) {
            if (!isUuid(id)) return null;

            const result = await db.read((client) =>
                client.query<PrincipalRow>(`${SELECT_PRINCIPAL} WHERE u.id = $1`, [id])
            );
            return result.rows.length > 0 ? toPrincipal(result.rows[0]) : null;
        },

        async updatePasswordHash(id, passwordHash) {
            if (!isUuid(id)) return;

            await db.write((client) =>
                client.query('UPDATE users SET hashed_password = $2, updated_at = NOW() WHERE id = $1', [id, passwordHash])
            );
        },

        async recordLogin(id, at) {
            if (!isUuid(id)) return;

            await db.write((client) => client.query('UPDATE users SET last_login = $2 WHERE id = $1', [id, at]));
        },

        async create(principal) {
            try {
                const result = await db.write((client) =>
                    client.query<PrincipalRow>(
                        `WITH u AS (
                            INSERT INTO users (email, hashed_password, role_id, first_name, last_name)
                            VALUES ($1, $2, (SELECT id FROM roles WHERE name = $3), $4, $5)
                            RETURNING *
                         )
                         SELECT ${PRINCIPAL_COLUMNS} FROM u LEFT JOIN roles r ON r.id = u.role_id`,
                        [principal.email, principal.passwordHash, principal.roleName, principal.firstName, principal.lastName]
                    )
                );
                return toPrincipal(result.rows[0]);
            } catch (error) {
                if (isUniqueViolation(error)) {
                    throw new ConflictError('Email already registered', { email: principal.email });
                }
                throw error;
            }
        },

        async list({ offset, limit }) {
            return db.read(async (client) => {
                const rows = await client.query<PrincipalRow>(
                    `${SELECT_PRINCIPAL} ORDER BY u.created_at DESC OFFSET $1 LIMIT $2`,
                    [offset, limit]
                );
                const count = await client.query<{ total: string }>('SELECT COUNT(*) AS total FROM users');

                return {
                    principals: rows.rows.map(toPrincipal),
                    total: Number(count.rows[0]?.total ?? 0),
                };
            });
        },

        async update(id, changes) {
            if (!isUuid(id)) return null;

            const values: unknown[] = [id];
            const assignments: string[] = [];
            const assign = (column: string, value: unknown, expression = (param: string) => param): void => {
                values.push(value);
                assignments.push(`${column} = ${expression(`$${values.length}`)}`);
            };

            if (changes.firstName !== undefined) assign('first_name', changes.firstName);
            if (changes.lastName !== undefined) assign('last_name', changes.lastName);
            if (changes.isActive !== undefined) assign('is_active', changes.isActive);
            if (changes.roleName !== undefined) {
                assign('role_id', changes.roleName, (param) => `(SELECT id FROM roles WHERE name = ${param})`);
            }

            if (assignments.length === 0) {
                const current = await db.write((client) =>
                    client.query<PrincipalRow>(`${SELECT_PRINCIPAL} WHERE u.id = $1`, [id])
                );
                return current.rows.length > 0 ? toPrincipal(current.rows[0]) : null;
            }

            const result = await db.write((client) =>
                client.query<PrincipalRow>(
                    `WITH u AS (
                        UPDATE users SET ${assignments.join(', ')}, updated_at = NOW()
                        WHERE id = $1
                        RETURNING *
                     )
                     SELECT ${PRINCIPAL_COLUMNS} FROM u LEFT JOIN roles r ON r.id = u.role_id`,
                    values
                )
            );
            return result.rows.length > 0 ? toPrincipal(result.rows[0]) : null;
        },
    };
}
