import { UnauthenticatedError } from './unauthenticated.error';

export class TokenExpiredError extends UnauthenticatedError {
    constructor(message: string = 'Token has expired, please sign in again') {
        super(message, 'TOKEN_EXPIRED');
    }
}
