import { Database } from '../config/database';
import { RoleStore } from '../core/auth/stores';
import { Role } from '../core/auth/types';
import { logger } from '../shared/logger';

interface RoleRow {
    name: string;
    description: string | null;
    permissions: unknown;
}

function toRole(row: RoleRow): Role {
    const raw = Array.isArray(row.permissions) ? row.permissions : [];
    const permissions = raw.filter((value): value is string => typeof value === 'string');

    if (permissions.length !== raw.length) {
        logger.warn(`Role ${row.name} carries non-string permission entries; they are ignored`);
    }

    return { name: row.name, description: row.description, permissions };
}

export function createRoleRepository(db: Database): RoleStore {
    return {
        async findByName(name) {
            const result = await db.read((client) =>
                client.query<RoleRow>('SELECT name, description, permissions FROM roles WHERE name = $1', [name])
            );
            return result.rows.length > 0 ? toRole(result.rows[0]) : null;
        },

        async list() {
            const result = await db.read((client) =>
                client.query<RoleRow>('SELECT name, description, permissions FROM roles ORDER BY name')
            );
            return result.rows.map(toRole);
        },
    };
}
