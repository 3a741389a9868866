import { createDatabase } from '../config/database';
import { createRoleRepository } from './role.repository';

describe('role repository', () => {
    const primaryQuery = jest.fn();
    const replicaQuery = jest.fn();

    beforeEach(() => {
        primaryQuery.mockReset();
        replicaQuery.mockReset();
    });

    it('should read roles from the replica', async () => {
        replicaQuery.mockResolvedValue({
            rows: [{ name: 'user', description: 'Standard user', permissions: ['read:self', 'update:self'] }],
            rowCount: 1,
        });
        const roles = createRoleRepository(createDatabase({ query: primaryQuery }, { query: replicaQuery }));

        await expect(roles.findByName('user')).resolves.toEqual({
            name: 'user',
            description: 'Standard user',
            permissions: ['read:self', 'update:self'],
        });
        expect(primaryQuery).not.toHaveBeenCalled();
    });

    it('should fall back to the primary when the replica fails', async () => {
        replicaQuery.mockRejectedValue(new Error('replica down'));
        primaryQuery.mockResolvedValue({ rows: [], rowCount: 0 });
        const roles = createRoleRepository(createDatabase({ query: primaryQuery }, { query: replicaQuery }));

        await expect(roles.list()).resolves.toEqual([]);
        expect(primaryQuery).toHaveBeenCalledTimes(1);
    });

    it('should keep every string permission and drop only non-string entries', async () => {
        primaryQuery.mockResolvedValue({
            rows: [
                {
                    name: 'ops',
                    description: null,
                    permissions: ['user:read', 'reports:export-csv', 42, 'billing:read2', null, 'api.v1:read'],
                },
            ],
            rowCount: 1,
        });
        const roles = createRoleRepository(createDatabase({ query: primaryQuery }));

        await expect(roles.findByName('ops')).resolves.toEqual({
            name: 'ops',
            description: null,
            permissions: ['user:read', 'reports:export-csv', 'billing:read2', 'api.v1:read'],
        });
    });

    it('should treat a non-array permissions column as empty', async () => {
        primaryQuery.mockResolvedValue({ rows: [{ name: 'odd', description: null, permissions: null }], rowCount: 1 });
        const roles = createRoleRepository(createDatabase({ query: primaryQuery }));

        await expect(roles.findByName('odd')).resolves.toMatchObject({ permissions: [] });
    });
});
