import { BaseError } from './base.error';

export class ConflictError extends BaseError {
    constructor(message: string, details?: Record<string, string>) {
        super(message, 409, 'CONFLICT', details);
    }
}
