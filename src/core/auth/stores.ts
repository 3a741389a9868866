import { NewPrincipal, Principal, PrincipalChanges, PrincipalPage, RefreshTokenRecord, Role } from './types';

// ============================================
// COLLABORATOR CONTRACTS
// ============================================
// Implemented by the PostgreSQL repositories and the Redis adapter in
// production, and by in-memory fakes in tests. Lookups resolve to null
// for "not found"; rejections mean the collaborator itself failed.

export interface PrincipalStore {
    /** Email is expected to be normalized by the caller */
    findByEmail(email: string): Promise<Principal | null>;
    findById(id: string): Promise<Principal | null>;
    updatePasswordHash(id: string, passwordHash: string): Promise<void>;
    recordLogin(id: string, at: Date): Promise<void>;
    /** Rejects with ConflictError when the email is taken */
    create(principal: NewPrincipal): Promise<Principal>;
    /** Newest first */
    list(page: { offset: number; limit: number }): Promise<PrincipalPage>;
    update(id: string, changes: PrincipalChanges): Promise<Principal | null>;
}

export interface RoleStore {
    findByName(name: string): Promise<Role | null>;
    list(): Promise<Role[]>;
}

export interface RefreshTokenStore {
    create(record: RefreshTokenRecord): Promise<void>;
    findByHash(tokenHash: string): Promise<RefreshTokenRecord | null>;
    /**
     * Atomically mark the record revoked if it is still the live token of its
     * family. Exactly one concurrent caller gets true.
     */
    revokeIfLatest(familyId: string, tokenId: string): Promise<boolean>;
    linkReplacement(tokenId: string, replacedBy: string): Promise<void>;
    /**
     * Undo a rotation whose new pair was never returned: revoke the successor
     * record and clear the link to it, in one atomic step
     */
    voidReplacement(tokenId: string, successorId: string): Promise<void>;
    /** Returns the number of records newly revoked */
    revokeFamily(familyId: string): Promise<number>;
    /** Revokes every live record of the subject; returns the affected family ids */
    revokeAllForSubject(subjectId: string): Promise<string[]>;
    deleteExpired(before: Date): Promise<number>;
}

export interface KeyValueStore {
    put(key: string, ttlSeconds: number): Promise<void>;
    /** Set only when absent; true when this call created the key */
    putIfAbsent(key: string, ttlSeconds: number): Promise<boolean>;
    /** Presence of each key, in order, in a single round trip */
    exists(keys: string[]): Promise<boolean[]>;
}

export interface PasswordHasher {
    hash(secret: string): Promise<string>;
    verify(secret: string, passwordHash: string): Promise<boolean>;
}

export interface AuthStores {
    principals: PrincipalStore;
    roles: RoleStore;
    refreshTokens: RefreshTokenStore;
    keyValue: KeyValueStore;
}
