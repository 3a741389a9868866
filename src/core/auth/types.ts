export type TokenType = 'access' | 'refresh' | 'password_reset';

export const PASSWORD_RESET_PURPOSE = 'password-reset';

interface BaseClaims {
    sub: string;        // Principal ID
    jti: string;        // Token ID for revocation
    iat: number;        // Issued at
    exp: number;        // Expiration
    iss: string;
}

export interface AccessTokenClaims extends BaseClaims {
    typ: 'access';
    role: string;       // Snapshotted at issuance
    fid: string;        // Token family
}

export interface RefreshTokenClaims extends BaseClaims {
    typ: 'refresh';
    fid: string;
}

export interface ResetTokenClaims extends BaseClaims {
    typ: 'password_reset';
    purpose: typeof PASSWORD_RESET_PURPOSE;
}

export interface ClaimsByType {
    access: AccessTokenClaims;
    refresh: RefreshTokenClaims;
    password_reset: ResetTokenClaims;
}

export type TokenClaims = ClaimsByType[TokenType];

/** Claims as supplied to the codec; it stamps iat, exp and iss */
export type UnsignedClaims<T extends TokenClaims = TokenClaims> = T extends TokenClaims
    ? Omit<T, 'iat' | 'exp' | 'iss'>
    : never;

export interface Principal {
    id: string;
    email: string;
    passwordHash: string;
    isActive: boolean;
    roleName: string | null;
    firstName: string | null;
    lastName: string | null;
    lastLoginAt: Date | null;
}

export type PrincipalProfile = Omit<Principal, 'passwordHash'> & { role: string };

export interface NewPrincipal {
    email: string;
    passwordHash: string;
    roleName: string;
    firstName: string | null;
    lastName: string | null;
}

/** Absent fields are left as they are */
export interface PrincipalChanges {
    firstName?: string;
    lastName?: string;
    roleName?: string;
    isActive?: boolean;
}

export interface PrincipalPage {
    principals: Principal[];
    total: number;
}

export interface Role {
    name: string;
    permissions: string[];
    description: string | null;
}

export interface RefreshTokenRecord {
    tokenId: string;
    subjectId: string;
    familyId: string;
    tokenHash: string;
    expiresAt: Date;
    revoked: boolean;
    replacedBy: string | null;
    createdAt: Date;
}

export interface IssueSubject {
    id: string;
    role: string;
}

export interface IssuedTokenPair {
    accessToken: string;
    refreshToken: string;
    expiresIn: number;
    familyId: string;
    accessTokenId: string;
    refreshTokenId: string;
}

/** What the HTTP layer hands back to clients */
export interface AuthTokens {
    accessToken: string;
    refreshToken: string;
    expiresIn: number;
    tokenType: 'bearer';
}
