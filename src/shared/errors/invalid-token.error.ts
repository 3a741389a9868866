import { UnauthenticatedError } from './unauthenticated.error';

export class InvalidTokenError extends UnauthenticatedError {
    constructor(message: string = 'Invalid token', code: string = 'INVALID_TOKEN') {
        super(message, code);
    }
}

export class InvalidSignatureError extends InvalidTokenError {
    constructor(message: string = 'Token signature is invalid') {
        super(message, 'INVALID_SIGNATURE');
    }
}

export class MalformedTokenError extends InvalidTokenError {
    constructor(message: string = 'Token is malformed') {
        super(message, 'MALFORMED_TOKEN');
    }
}
