import { BaseError } from './base.error';

/**
 * Bad credentials. The message never says whether the account exists.
 */
export class AuthenticationFailedError extends BaseError {
    constructor() {
        super('Invalid email or password', 401, 'AUTHENTICATION_FAILED');
    }
}
