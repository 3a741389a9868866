import { BaseError } from './base.error';

export class UpstreamUnavailableError extends BaseError {
    public readonly operation: string;

    constructor(operation: string, cause?: unknown) {
        super('A required upstream service is unavailable', 503, 'UPSTREAM_UNAVAILABLE');
        this.operation = operation;
        if (cause !== undefined) {
            this.cause = cause;
        }
    }
}
