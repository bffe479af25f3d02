/**
 * Registry Platform: Domain Error Taxonomy
 * Translates kernel rejections into platform exceptions carrying an HTTP status.
 */
import { ErrorCode, RegistryError } from '../kernel-core/Errors.js';

export abstract class PlatformError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly status: number,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when the caller cannot be authenticated.
 */
export class AuthenticationError extends PlatformError {
    constructor(message: string, code: string) {
        super(message, code, 401);
    }
}

/**
 * Thrown when identity or institution checks fail.
 */
export class SecurityViolationError extends PlatformError {
    constructor(message: string, code: string, metadata?: Record<string, unknown>) {
        super(message, code, 403, metadata);
    }
}

/**
 * Thrown when a referenced record or institution is missing or not in the expected state.
 */
export class NotFoundError extends PlatformError {
    constructor(message: string, code: string) {
        super(message, code, 404);
    }
}

/**
 * Thrown when the request collides with existing state (duplicates, replays).
 */
export class ConflictError extends PlatformError {
    constructor(message: string, code: string) {
        super(message, code, 409);
    }
}

/**
 * Thrown when a request is malformed or a field is out of bounds.
 */
export class ValidationError extends PlatformError {
    constructor(message: string, metadata?: Record<string, unknown>) {
        super(message, ErrorCode.INVALID_FIELD, 400, metadata);
    }
}

/**
 * Thrown when the hash chain or ledger invariants are breached.
 */
export class DataIntegrityError extends PlatformError {
    constructor(message: string) {
        super(message, ErrorCode.INTEGRITY_BREACH, 500);
    }
}

/**
 * Thrown when the environment fails (e.g. storage unavailable).
 */
export class InfrastructureError extends PlatformError {
    constructor(message: string) {
        super(message, 'INFRASTRUCTURE_FAILURE', 500);
    }
}

export function translateError(e: unknown): PlatformError {
    if (e instanceof PlatformError) return e;
    if (!(e instanceof RegistryError)) {
        return new InfrastructureError(e instanceof Error ? e.message : 'Unknown failure');
    }

    switch (e.code) {
        case ErrorCode.SIGNATURE_INVALID:
            return new AuthenticationError(e.reason, e.code);
        case ErrorCode.NOT_AUTHORIZED:
        case ErrorCode.NOT_VERIFIED:
            return new SecurityViolationError(e.reason, e.code, e.metadata);
        case ErrorCode.INVALID_RECORD:
        case ErrorCode.INVALID_INSTITUTION:
            return new NotFoundError(e.reason, e.code);
        case ErrorCode.INSTITUTION_EXISTS:
        case ErrorCode.REPLAY_DETECTED:
            return new ConflictError(e.reason, e.code);
        case ErrorCode.INVALID_FIELD:
            return new ValidationError(e.reason, e.metadata);
        case ErrorCode.INTEGRITY_BREACH:
            return new DataIntegrityError(e.reason);
    }
}
