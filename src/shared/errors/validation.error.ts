import { ZodError } from 'zod';
import { BaseError } from './base.error';

export interface ValidationErrorDetail {
    field: string;
    message: string;
    code: string;
}

export class ValidationError extends BaseError {
    constructor(details: ValidationErrorDetail[]) {
        super('Validation failed', 400, 'VALIDATION_ERROR', details);
    }

    static fromZod(error: ZodError): ValidationError {
        return new ValidationError(
            error.errors.map((issue) => ({
                field: issue.path.join('.'),
                message: issue.message,
                code: 'INVALID_' + issue.code.toUpperCase(),
            }))
        );
    }
}
