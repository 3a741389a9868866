import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

declare global {
    namespace Express {
        interface Request {
            requestId?: string;
        }
    }
}

const MAX_REQUEST_ID_LENGTH = 128;

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
    const incoming = req.header('x-request-id');
    req.requestId = incoming && incoming.length <= MAX_REQUEST_ID_LENGTH ? incoming : uuidv4();
    res.setHeader('X-Request-Id', req.requestId);
    next();
}

export function getRequestId(req: Request): string {
    return req.requestId || 'unknown';
}
