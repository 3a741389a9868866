import {
    AuthenticationFailedError,
    InvalidTokenError,
    TokenRevokedError,
    UpstreamUnavailableError,
} from '../shared/errors';
import { AuthHarness, createAuthHarness } from '../tests/helpers/harness';
import { makePrincipal } from '../tests/helpers/fakes';

const USER_ID = '3f1c2a9e-0000-4000-8000-000000000001';

describe('AuthService', () => {
    let harness: AuthHarness;

    beforeEach(() => {
        harness = createAuthHarness();
    });

    describe('login', () => {
        it('should issue a bearer pair that authorizes the role permissions', async () => {
            const tokens = await harness.service.login('a@b.com', 'Passw0rd!');

            expect(tokens.expiresIn).toBe(3600);
            expect(tokens.tokenType).toBe('bearer');
            await expect(harness.service.authorize(tokens.accessToken, 'read:self')).resolves.toMatchObject({
                sub: USER_ID,
                role: 'user',
            });
        });

        it('should record the login time', async () => {
            await harness.service.login('a@b.com', 'Passw0rd!');

            expect(harness.stores.principals.principals.get(USER_ID)?.lastLoginAt).toBeInstanceOf(Date);
        });

        it('should reject a wrong password', async () => {
            await expect(harness.service.login('a@b.com', 'wrong')).rejects.toThrow(AuthenticationFailedError);
        });

        it('should give principals without a role the default role', async () => {
            harness.stores.principals.add(makePrincipal({ id: 'plain-1', email: 'plain@b.com', roleName: null }));

            const tokens = await harness.service.login('plain@b.com', 'Passw0rd!');

            expect(harness.codec.decode(tokens.accessToken, 'access').role).toBe('user');
        });

        it('should report an unreachable principal store as unavailable', async () => {
            harness.stores.principals.failWith = new Error('ECONNREFUSED');

            await expect(harness.service.login('a@b.com', 'Passw0rd!')).rejects.toThrow(UpstreamUnavailableError);
        });
    });

    describe('logout', () => {
        it('should revoke the access token and the refresh token issued with it', async () => {
            const tokens = await harness.service.login('a@b.com', 'Passw0rd!');

            await harness.service.logout(tokens.accessToken);

            await expect(harness.service.authenticate(tokens.accessToken)).rejects.toThrow(TokenRevokedError);
            await expect(harness.service.refresh(tokens.refreshToken)).rejects.toThrow('Session has been revoked');
        });

        it('should not touch other sessions', async () => {
            const first = await harness.service.login('a@b.com', 'Passw0rd!');
            const second = await harness.service.login('a@b.com', 'Passw0rd!');

            await harness.service.logout(first.accessToken);

            await expect(harness.service.authenticate(second.accessToken)).resolves.toMatchObject({ sub: USER_ID });
        });

        it('should reject a token it cannot decode', async () => {
            await expect(harness.service.logout('garbage')).rejects.toThrow(InvalidTokenError);
        });

        it('should reject an expired access token', async () => {
            const tokens = await harness.service.login('a@b.com', 'Passw0rd!');
            harness.clock.advanceSeconds(3600);

            await expect(harness.service.logout(tokens.accessToken)).rejects.toThrow(InvalidTokenError);
        });
    });

    describe('password reset', () => {
        it('should set the new password and end every session', async () => {
            const tokens = await harness.service.login('a@b.com', 'Passw0rd!');
            const resetToken = await harness.service.requestPasswordReset('a@b.com');

            await harness.service.confirmPasswordReset(resetToken, 'N3w-Passw0rd!');

            await expect(harness.service.login('a@b.com', 'Passw0rd!')).rejects.toThrow(AuthenticationFailedError);
            await expect(harness.service.login('a@b.com', 'N3w-Passw0rd!')).resolves.toMatchObject({ tokenType: 'bearer' });
            await expect(harness.service.refresh(tokens.refreshToken)).rejects.toThrow(TokenRevokedError);
            await expect(harness.service.authenticate(tokens.accessToken)).rejects.toThrow(TokenRevokedError);
        });

        it('should accept a reset token only once', async () => {
            const resetToken = await harness.service.requestPasswordReset('a@b.com');
            await harness.service.confirmPasswordReset(resetToken, 'N3w-Passw0rd!');

            await expect(harness.service.confirmPasswordReset(resetToken, 'Another-1!')).rejects.toThrow(
                'Invalid or expired reset token'
            );
        });

        it('should reject an expired reset token', async () => {
            const resetToken = await harness.service.requestPasswordReset('a@b.com');
            harness.clock.advanceSeconds(900);

            await expect(harness.service.confirmPasswordReset(resetToken, 'N3w-Passw0rd!')).rejects.toThrow(InvalidTokenError);
        });

        it('should refuse to issue a token for an unknown email', async () => {
            await expect(harness.service.requestPasswordReset('nobody@b.com')).rejects.toThrow(AuthenticationFailedError);
        });

        it('should refuse to reset the password of a deactivated principal', async () => {
            const resetToken = await harness.service.requestPasswordReset('a@b.com');
            const principal = harness.stores.principals.principals.get(USER_ID);
            if (!principal) throw new Error('principal missing');
            principal.isActive = false;

            await expect(harness.service.confirmPasswordReset(resetToken, 'N3w-Passw0rd!')).rejects.toThrow(
                AuthenticationFailedError
            );
        });
    });

    describe('changePassword', () => {
        it('should require the current password', async () => {
            await expect(harness.service.changePassword(USER_ID, 'wrong', 'N3w-Passw0rd!')).rejects.toThrow(
                AuthenticationFailedError
            );
        });

        it('should change the password and revoke existing sessions', async () => {
            const tokens = await harness.service.login('a@b.com', 'Passw0rd!');

            await harness.service.changePassword(USER_ID, 'Passw0rd!', 'N3w-Passw0rd!');

            await expect(harness.service.refresh(tokens.refreshToken)).rejects.toThrow(TokenRevokedError);
            await expect(harness.service.login('a@b.com', 'N3w-Passw0rd!')).resolves.toMatchObject({ expiresIn: 3600 });
        });
    });

    describe('profile and roles', () => {
        it('should return the profile without the password hash', async () => {
            const profile = await harness.service.getCurrentUser(USER_ID);

            expect(profile).toEqual({
                id: USER_ID,
                email: 'a@b.com',
                isActive: true,
                roleName: 'user',
                role: 'user',
                firstName: 'Ada',
                lastName: 'Tester',
                lastLoginAt: null,
            });
        });

        it('should return null for an unknown principal', async () => {
            await expect(harness.service.getCurrentUser('missing')).resolves.toBeNull();
        });

        it('should list roles with their permissions', async () => {
            const roles = await harness.service.listRoles();

            expect(roles.map((role) => role.name)).toEqual(['admin', 'user']);
            await expect(harness.service.getRole('user')).resolves.toEqual({
                name: 'user',
                permissions: ['read:self', 'update:self'],
                description: 'Standard user',
            });
        });
    });
});
