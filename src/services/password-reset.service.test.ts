import jwt from 'jsonwebtoken';
import { ClaimsCodec } from './claims-codec.service';
import { PasswordResetService } from './password-reset.service';
import { RevocationService } from './revocation.service';
import { InvalidTokenError, MalformedTokenError, TokenExpiredError, TokenRevokedError } from '../shared/errors';
import { TestClock } from '../tests/helpers/clock';
import { InMemoryKeyValueStore } from '../tests/helpers/fakes';

describe('PasswordResetService', () => {
    let clock: TestClock;
    let codec: ClaimsCodec;
    let store: InMemoryKeyValueStore;
    let resets: PasswordResetService;

    beforeEach(() => {
        clock = new TestClock();
        codec = new ClaimsCodec({
            keys: [{ kid: 'k1', secret: 'test-secret' }],
            issuer: 'tokengate-test',
            clockSkewSeconds: 0,
            now: clock.now,
        });
        store = new InMemoryKeyValueStore(clock);
        resets = new PasswordResetService(codec, new RevocationService(store, 20), 900);
    });

    it('should issue a reset token carrying its purpose', () => {
        const token = resets.issueResetToken('user-1');

        const claims = codec.decode(token, 'password_reset');

        expect(claims).toMatchObject({ sub: 'user-1', typ: 'password_reset', purpose: 'password-reset' });
        expect(claims.exp - claims.iat).toBe(900);
    });

    it('should consume a token exactly once', async () => {
        const token = resets.issueResetToken('user-1');

        await expect(resets.consumeResetToken(token)).resolves.toBe('user-1');
        await expect(resets.consumeResetToken(token)).rejects.toThrow(TokenRevokedError);
    });

    it('should let only one of two concurrent consumers succeed', async () => {
        const token = resets.issueResetToken('user-1');

        const results = await Promise.allSettled([resets.consumeResetToken(token), resets.consumeResetToken(token)]);

        expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
    });

    it('should reject an expired reset token', async () => {
        const token = resets.issueResetToken('user-1');
        clock.advanceSeconds(901);

        await expect(resets.consumeResetToken(token)).rejects.toThrow(TokenExpiredError);
    });

    it('should refuse an access token in place of a reset token', async () => {
        const { token } = codec.encode({ typ: 'access', sub: 'user-1', jti: 'jti-1', role: 'user', fid: 'family-1' }, 60);

        await expect(resets.consumeResetToken(token)).rejects.toThrow(InvalidTokenError);
    });

    it('should refuse a reset-typed token minted for another purpose', async () => {
        const token = jwt.sign(
            {
                typ: 'password_reset',
                sub: 'user-1',
                jti: 'jti-2',
                purpose: 'email-verify',
                iss: 'tokengate-test',
                exp: codec.nowSeconds() + 60,
            },
            'test-secret',
            { algorithm: 'HS256', keyid: 'k1' }
        );

        await expect(resets.consumeResetToken(token)).rejects.toThrow(MalformedTokenError);
        expect(store.existsCalls).toBe(0);
    });
});
