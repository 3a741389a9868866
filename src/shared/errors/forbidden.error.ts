import { BaseError } from './base.error';

/**
 * Authenticated, but the token's role does not grant the permission, or the
 * action is refused even though it does
 */
export class ForbiddenError extends BaseError {
    public readonly permission?: string;

    constructor(permission?: string, message?: string) {
        super(
            message ?? (permission ? `Missing required permission: ${permission}` : 'Insufficient permissions'),
            403,
            'FORBIDDEN',
            permission ? { permission } : undefined
        );
        this.permission = permission;
    }
}
