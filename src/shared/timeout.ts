import { BaseError } from './errors/base.error';
import { UpstreamUnavailableError } from './errors/upstream-unavailable.error';
import { logger } from './logger';

/**
 * Run a collaborator call with an upper bound on its duration.
 * Timeouts and collaborator failures both surface as UpstreamUnavailableError;
 * typed errors raised by our own code pass through untouched.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
            reject(new UpstreamUnavailableError(label, new Error(`${label} timed out after ${timeoutMs}ms`)));
        }, timeoutMs);
    });

    try {
        return await Promise.race([operation, timeout]);
    } catch (error) {
        if (error instanceof BaseError) {
            if (error instanceof UpstreamUnavailableError) {
                logger.error(`Upstream call failed: ${label}`, { cause: String(error.cause) });
            }
            throw error;
        }
        logger.error(`Upstream call failed: ${label}`, { error });
        throw new UpstreamUnavailableError(label, error);
    } finally {
        if (timer) clearTimeout(timer);
    }
}
