import { BaseError } from './base.error';

/**
 * Parent of every token-validity failure
 */
export class UnauthenticatedError extends BaseError {
    constructor(message: string = 'Authentication required', code: string = 'UNAUTHENTICATED', details?: unknown) {
        super(message, 401, code, details);
    }
}
