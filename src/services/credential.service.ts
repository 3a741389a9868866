import bcrypt from 'bcryptjs';
import { PasswordHasher, PrincipalStore } from '../core/auth/stores';
import { Principal } from '../core/auth/types';
import { AuthenticationFailedError } from '../shared/errors/authentication-failed.error';
import { logger } from '../shared/logger';
import { withTimeout } from '../shared/timeout';

// ============================================
// PASSWORD HASHING
// ============================================

export function createBcryptHasher(cost: number): PasswordHasher {
    return {
        hash: (secret) => bcrypt.hash(secret, cost),
        verify: (secret, passwordHash) => bcrypt.compare(secret, passwordHash),
    };
}

export function normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
}

// ============================================
// CREDENTIAL VERIFIER
// ============================================

export interface CredentialServiceOptions {
    upstreamTimeoutMs: number;
    /** Cost used for the dummy hash; must match the cost of stored hashes */
    bcryptCost: number;
}

export class CredentialService {
    private readonly dummyHash: string;

    constructor(
        private readonly principals: PrincipalStore,
        private readonly hasher: PasswordHasher,
        private readonly options: CredentialServiceOptions
    ) {
        // Compared against when no principal matches so both failure
        // paths spend one hash comparison
        this.dummyHash = bcrypt.hashSync('tokengate-dummy-secret', options.bcryptCost);
    }

    async verify(email: string, secret: string): Promise<Principal> {
        const normalized = normalizeEmail(email);

        const principal = await withTimeout(
            this.principals.findByEmail(normalized),
            this.options.upstreamTimeoutMs,
            'principal lookup'
        );

        const matches = await this.hasher.verify(secret, principal ? principal.passwordHash : this.dummyHash);

        if (!principal || !matches || !principal.isActive) {
            logger.info('Credential verification failed');
            throw new AuthenticationFailedError();
        }

        return principal;
    }
}
