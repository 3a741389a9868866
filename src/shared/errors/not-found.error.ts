import { BaseError } from './base.error';

export class NotFoundError extends BaseError {
    constructor(resource: string, identifier?: string) {
        super(identifier ? `${resource} not found: ${identifier}` : `${resource} not found`, 404, 'NOT_FOUND');
    }
}
