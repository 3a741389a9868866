export { BaseError } from './base.error';
export { AuthenticationFailedError } from './authentication-failed.error';
export { UnauthenticatedError } from './unauthenticated.error';
export { InvalidTokenError, InvalidSignatureError, MalformedTokenError } from './invalid-token.error';
export { TokenExpiredError } from './token-expired.error';
export { TokenRevokedError } from './token-revoked.error';
export { TokenReuseDetectedError } from './token-reuse-detected.error';
export { ForbiddenError } from './forbidden.error';
export { UpstreamUnavailableError } from './upstream-unavailable.error';
export { ValidationError } from './validation.error';
export type { ValidationErrorDetail } from './validation.error';
export { NotFoundError } from './not-found.error';
export { ConflictError } from './conflict.error';
