import { UnauthenticatedError } from './unauthenticated.error';

/**
 * A superseded refresh token was presented again. Kept apart from
 * TokenRevokedError so audit trails can tell a replay from a logout.
 */
export class TokenReuseDetectedError extends UnauthenticatedError {
    public readonly familyId: string;

    constructor(familyId: string) {
        super('Refresh token reuse detected, session revoked', 'TOKEN_REUSE_DETECTED');
        this.familyId = familyId;
    }
}
