/** Role that implicitly satisfies every permission check */
export const ADMIN_ROLE = 'admin';

/** Role assigned to principals that reference none */
export const DEFAULT_ROLE = 'user';

/**
 * Permissions are open-ended `resource:action` strings stored on roles.
 * These are the ones the service itself checks; roles may carry others.
 */
export const Permission = {
    SELF_READ: 'read:self',
    SELF_UPDATE: 'update:self',
    USER_READ: 'user:read',
    USER_UPDATE: 'user:update',
    ROLE_READ: 'roles:read',
} as const;

/**
 * Exact set-membership check against a role's permission list; there is
 * no wildcard matching
 */
export function roleGrants(roleName: string, permissions: readonly string[], required: string): boolean {
    if (roleName === ADMIN_ROLE) {
        return true;
    }
    return permissions.includes(required);
}
