import { createDatabase } from '../config/database';
import { ConflictError } from '../shared/errors';
import { createPrincipalRepository } from './principal.repository';

const USER_ID = '3f1c2a9e-0000-4000-8000-000000000001';

const userRow = {
    id: USER_ID,
    email: 'a@b.com',
    hashed_password: '$2a$04$hash',
    is_active: true,
    first_name: 'Ada',
    last_name: null,
    last_login: null,
    role_name: 'user',
};

describe('principal repository', () => {
    const query = jest.fn();
    const principals = createPrincipalRepository(createDatabase({ query }));

    beforeEach(() => {
        query.mockReset();
    });

    it('should map a user row with its role name', async () => {
        query.mockResolvedValue({
            rows: [
                {
                    id: 'user-1',
                    email: 'a@b.com',
                    hashed_password: '$2a$04$hash',
                    is_active: true,
                    first_name: 'Ada',
                    last_name: null,
                    last_login: null,
                    role_name: 'user',
                },
            ],
            rowCount: 1,
        });

        await expect(principals.findByEmail('a@b.com')).resolves.toEqual({
            id: 'user-1',
            email: 'a@b.com',
            passwordHash: '$2a$04$hash',
            isActive: true,
            roleName: 'user',
            firstName: 'Ada',
            lastName: null,
            lastLoginAt: null,
        });
        expect(query.mock.calls[0][1]).toEqual(['a@b.com']);
    });

    it('should return null for an unknown id', async () => {
        query.mockResolvedValue({ rows: [], rowCount: 0 });

        await expect(principals.findById(USER_ID)).resolves.toBeNull();
    });

    it('should compare the uuid column directly', async () => {
        query.mockResolvedValue({ rows: [userRow], rowCount: 1 });

        await principals.findById(USER_ID);

        expect(query.mock.calls[0][0]).toContain('WHERE u.id = $1');
        expect(query.mock.calls[0][0]).not.toContain('u.id::text =');
        expect(query.mock.calls[0][1]).toEqual([USER_ID]);
    });

    it('should answer a non-uuid id without querying', async () => {
        await expect(principals.findById('user-1')).resolves.toBeNull();
        await expect(principals.update('not-a-uuid', { isActive: false })).resolves.toBeNull();
        await principals.updatePasswordHash('42', '$2a$04$new');
        await principals.recordLogin('', new Date());

        expect(query).not.toHaveBeenCalled();
    });

    it('should write the new hash', async () => {
        query.mockResolvedValue({ rows: [], rowCount: 1 });

        await principals.updatePasswordHash(USER_ID, '$2a$04$new');

        expect(query.mock.calls[0][0]).toContain('WHERE id = $1');
        expect(query.mock.calls[0][1]).toEqual([USER_ID, '$2a$04$new']);
    });

    it('should insert with the role resolved by name', async () => {
        query.mockResolvedValue({ rows: [userRow], rowCount: 1 });

        const created = await principals.create({
            email: 'a@b.com',
            passwordHash: '$2a$04$hash',
            roleName: 'user',
            firstName: 'Ada',
            lastName: null,
        });

        expect(created).toMatchObject({ id: USER_ID, roleName: 'user' });
        expect(query.mock.calls[0][0]).toContain('(SELECT id FROM roles WHERE name = $3)');
        expect(query.mock.calls[0][1]).toEqual(['a@b.com', '$2a$04$hash', 'user', 'Ada', null]);
    });

    it('should turn a duplicate email into a conflict', async () => {
        query.mockRejectedValue(Object.assign(new Error('duplicate key value'), { code: '23505' }));

        const error = await principals
            .create({ email: 'a@b.com', passwordHash: 'x', roleName: 'user', firstName: null, lastName: null })
            .catch((err: unknown) => err);

        expect(error).toBeInstanceOf(ConflictError);
        expect(error).toMatchObject({ statusCode: 409, details: { email: 'a@b.com' } });
    });

    it('should pass other insert failures through', async () => {
        query.mockRejectedValue(new Error('connection reset'));

        await expect(
            principals.create({ email: 'a@b.com', passwordHash: 'x', roleName: 'user', firstName: null, lastName: null })
        ).rejects.toThrow('connection reset');
    });

    it('should page newest first and report the total', async () => {
        query.mockResolvedValueOnce({ rows: [userRow], rowCount: 1 });
        query.mockResolvedValueOnce({ rows: [{ total: '21' }], rowCount: 1 });

        const page = await principals.list({ offset: 20, limit: 10 });

        expect(page.total).toBe(21);
        expect(page.principals.map((principal) => principal.id)).toEqual([USER_ID]);
        expect(query.mock.calls[0][0]).toContain('ORDER BY u.created_at DESC OFFSET $1 LIMIT $2');
        expect(query.mock.calls[0][1]).toEqual([20, 10]);
    });

    it('should update only the fields given', async () => {
        query.mockResolvedValue({ rows: [{ ...userRow, is_active: false, role_name: 'admin' }], rowCount: 1 });

        const updated = await principals.update(USER_ID, { isActive: false, roleName: 'admin' });

        expect(updated).toMatchObject({ isActive: false, roleName: 'admin' });
        expect(query.mock.calls[0][0]).toContain(
            'SET is_active = $2, role_id = (SELECT id FROM roles WHERE name = $3), updated_at = NOW()'
        );
        expect(query.mock.calls[0][1]).toEqual([USER_ID, false, 'admin']);
    });

    it('should return null when the user to update is gone', async () => {
        query.mockResolvedValue({ rows: [], rowCount: 0 });

        await expect(principals.update(USER_ID, { firstName: 'Grace' })).resolves.toBeNull();
    });
});
