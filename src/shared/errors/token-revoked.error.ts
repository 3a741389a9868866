import { UnauthenticatedError } from './unauthenticated.error';

export class TokenRevokedError extends UnauthenticatedError {
    constructor(message: string = 'Token has been revoked') {
        super(message, 'TOKEN_REVOKED');
    }
}
