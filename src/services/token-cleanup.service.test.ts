import { TokenCleanupService } from './token-cleanup.service';
import { InMemoryRefreshTokenStore } from '../tests/helpers/fakes';

describe('TokenCleanupService', () => {
    const record = (tokenId: string, expiresAt: Date) => ({
        tokenId,
        subjectId: 'user-1',
        familyId: 'family-1',
        tokenHash: `hash-${tokenId}`,
        expiresAt,
        revoked: false,
        replacedBy: null,
        createdAt: new Date(expiresAt.getTime() - 1000),
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it('should delete only records that expired before the cutoff', async () => {
        jest.useFakeTimers({ now: new Date('2030-01-02T00:00:00Z') });
        const store = new InMemoryRefreshTokenStore();
        await store.create(record('old', new Date('2029-12-31T00:00:00Z')));
        await store.create(record('recent', new Date('2030-01-01T12:00:00Z')));
        await store.create(record('live', new Date('2030-01-05T00:00:00Z')));

        const deleted = await new TokenCleanupService(store).cleanup(24);

        expect(deleted).toBe(1);
        expect([...store.records.keys()]).toEqual(['recent', 'live']);
    });

    it('should run on a schedule until stopped', async () => {
        jest.useFakeTimers({ now: new Date('2030-01-02T00:00:00Z') });
        const store = new InMemoryRefreshTokenStore();
        const deleteExpired = jest.spyOn(store, 'deleteExpired');
        const service = new TokenCleanupService(store);

        service.start(6, 24);
        expect(deleteExpired).toHaveBeenCalledTimes(1);

        jest.advanceTimersByTime(6 * 60 * 60 * 1000);
        expect(deleteExpired).toHaveBeenCalledTimes(2);

        service.stop();
        jest.advanceTimersByTime(12 * 60 * 60 * 1000);
        expect(deleteExpired).toHaveBeenCalledTimes(2);
    });
});
