import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { SigningKey } from '../config';
import {
    ClaimsByType,
    PASSWORD_RESET_PURPOSE,
    TokenType,
    UnsignedClaims,
} from '../core/auth/types';
import { InvalidSignatureError, InvalidTokenError, MalformedTokenError } from '../shared/errors/invalid-token.error';
import { TokenExpiredError } from '../shared/errors/token-expired.error';

const ALGORITHM = 'HS256' as const;

// ============================================
// CLAIM SCHEMAS
// ============================================

const baseClaims = {
    sub: z.string().min(1),
    jti: z.string().min(1),
    iat: z.number().int(),
    exp: z.number().int(),
    iss: z.string(),
};

const CLAIM_SCHEMAS: { [K in TokenType]: z.ZodType<ClaimsByType[K]> } = {
    access: z.object({
        ...baseClaims,
        typ: z.literal('access'),
        role: z.string().min(1),
        fid: z.string().min(1),
    }),
    refresh: z.object({
        ...baseClaims,
        typ: z.literal('refresh'),
        fid: z.string().min(1),
    }),
    password_reset: z.object({
        ...baseClaims,
        typ: z.literal('password_reset'),
        purpose: z.literal(PASSWORD_RESET_PURPOSE),
    }),
};

// ============================================
// CLAIMS CODEC
// ============================================

export interface ClaimsCodecOptions {
    /** Ordered: the first key signs, every key verifies */
    keys: readonly SigningKey[];
    issuer: string;
    clockSkewSeconds: number;
    /** Milliseconds since epoch */
    now?: () => number;
}

export interface EncodedToken {
    token: string;
    issuedAt: number;
    expiresAt: number;
}

export class ClaimsCodec {
    private readonly keys: readonly SigningKey[];
    private readonly now: () => number;

    constructor(private readonly options: ClaimsCodecOptions) {
        if (options.keys.length === 0) {
            throw new Error('ClaimsCodec requires at least one signing key');
        }
        this.keys = options.keys;
        this.now = options.now ?? Date.now;
    }

    nowSeconds(): number {
        return Math.floor(this.now() / 1000);
    }

    encode(claims: UnsignedClaims, ttlSeconds: number): EncodedToken {
        const [signingKey] = this.keys;
        const issuedAt = this.nowSeconds();
        const expiresAt = issuedAt + ttlSeconds;

        const token = jwt.sign(
            { ...claims, iat: issuedAt, exp: expiresAt, iss: this.options.issuer },
            signingKey.secret,
            { algorithm: ALGORITHM, keyid: signingKey.kid }
        );

        return { token, issuedAt, expiresAt };
    }

    /**
     * Verify signature, expiry, issuer and claim shape, in that order
     */
    decode<T extends TokenType>(token: string, type: T): ClaimsByType[T] {
        const decoded = jwt.decode(token, { complete: true });

        if (!decoded || typeof decoded.payload === 'string') {
            throw new MalformedTokenError();
        }

        if (decoded.header.alg !== ALGORITHM) {
            throw new InvalidSignatureError('Unsupported token algorithm');
        }

        const { kid } = decoded.header;
        const candidates = kid ? this.keys.filter((key) => key.kid === kid) : this.keys;

        if (candidates.length === 0) {
            throw new InvalidSignatureError('Token signed with an unknown key');
        }

        const payload = this.verifyWithKeys(token, candidates);

        if (payload.typ !== type) {
            throw new InvalidTokenError('Unexpected token type');
        }

        const parsed = CLAIM_SCHEMAS[type].safeParse(payload);
        if (!parsed.success) {
            throw new MalformedTokenError('Token claims are malformed');
        }

        return parsed.data;
    }

    /**
     * Seconds until the token expires, never negative
     */
    remainingLifetime(claims: { exp: number }): number {
        return Math.max(0, claims.exp - this.nowSeconds());
    }

    private verifyWithKeys(token: string, candidates: readonly SigningKey[]): jwt.JwtPayload {
        for (const key of candidates) {
            try {
                const payload = jwt.verify(token, key.secret, {
                    algorithms: [ALGORITHM],
                    issuer: this.options.issuer,
                    clockTimestamp: this.nowSeconds(),
                    clockTolerance: this.options.clockSkewSeconds,
                });

                if (typeof payload === 'string') {
                    throw new MalformedTokenError();
                }
                return payload;
            } catch (error) {
                if (error instanceof jwt.TokenExpiredError) {
                    throw new TokenExpiredError();
                }
                if (error instanceof jwt.JsonWebTokenError && error.message === 'invalid signature') {
                    continue;
                }
                if (error instanceof MalformedTokenError) {
                    throw error;
                }
                if (error instanceof jwt.JsonWebTokenError && error.message.startsWith('jwt issuer invalid')) {
                    throw new InvalidTokenError('Token issuer is not trusted');
                }
                throw new MalformedTokenError();
            }
        }

        throw new InvalidSignatureError();
    }
}
