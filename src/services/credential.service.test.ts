import { CredentialService, createBcryptHasher, normalizeEmail } from './credential.service';
import { AuthenticationFailedError, UpstreamUnavailableError } from '../shared/errors';
import { InMemoryPrincipalStore, makePrincipal, TEST_BCRYPT_COST } from '../tests/helpers/fakes';

describe('CredentialService', () => {
    let principals: InMemoryPrincipalStore;
    let service: CredentialService;

    beforeEach(() => {
        principals = new InMemoryPrincipalStore();
        principals.add(makePrincipal());
        service = new CredentialService(principals, createBcryptHasher(TEST_BCRYPT_COST), {
            upstreamTimeoutMs: 50,
            bcryptCost: TEST_BCRYPT_COST,
        });
    });

    it('should return the principal for matching credentials', async () => {
        const principal = await service.verify('a@b.com', 'Passw0rd!');

        expect(principal.id).toBe('3f1c2a9e-0000-4000-8000-000000000001');
        expect(principal.roleName).toBe('user');
    });

    it('should normalize the email before lookup', async () => {
        const principal = await service.verify('  A@B.com ', 'Passw0rd!');

        expect(principal.email).toBe('a@b.com');
    });

    it('should fail with the same error for a wrong password and an unknown email', async () => {
        const wrongPassword = service.verify('a@b.com', 'wrong');
        const unknownEmail = service.verify('nobody@b.com', 'Passw0rd!');

        await expect(wrongPassword).rejects.toThrow(AuthenticationFailedError);
        await expect(unknownEmail).rejects.toThrow(AuthenticationFailedError);
        await expect(service.verify('a@b.com', 'wrong')).rejects.toThrow('Invalid email or password');
        await expect(service.verify('nobody@b.com', 'x')).rejects.toThrow('Invalid email or password');
    });

    it('should compare against a dummy hash when the principal is missing', async () => {
        const hasher = createBcryptHasher(TEST_BCRYPT_COST);
        const verify = jest.spyOn(hasher, 'verify');
        const spied = new CredentialService(principals, hasher, { upstreamTimeoutMs: 50, bcryptCost: TEST_BCRYPT_COST });

        await expect(spied.verify('nobody@b.com', 'Passw0rd!')).rejects.toThrow(AuthenticationFailedError);

        expect(verify).toHaveBeenCalledTimes(1);
    });

    it('should reject an inactive principal', async () => {
        principals.add(makePrincipal({ id: 'inactive-1', email: 'off@b.com', isActive: false }));

        await expect(service.verify('off@b.com', 'Passw0rd!')).rejects.toThrow(AuthenticationFailedError);
    });

    it('should surface a store failure as upstream unavailable', async () => {
        principals.failWith = new Error('connection refused');

        await expect(service.verify('a@b.com', 'Passw0rd!')).rejects.toThrow(UpstreamUnavailableError);
    });
});

describe('normalizeEmail', () => {
    it('should trim and lowercase', () => {
        expect(normalizeEmail(' Someone@Example.COM ')).toBe('someone@example.com');
    });
});
