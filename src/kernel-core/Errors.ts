/**
 * Registry Error Taxonomy
 * Centralized error codes for formal rejections and terminal failures.
 */

export enum ErrorCode {
    // I. Authority (caller lacks the role or relationship)
    NOT_AUTHORIZED = 'NOT_AUTHORIZED',
    NOT_VERIFIED = 'NOT_VERIFIED',

    // II. Referential (target missing or in the wrong state)
    INVALID_RECORD = 'INVALID_RECORD',
    INVALID_INSTITUTION = 'INVALID_INSTITUTION',
    INSTITUTION_EXISTS = 'INSTITUTION_EXISTS',

    // III. Input
    INVALID_FIELD = 'INVALID_FIELD',

    // IV. Authentication & Ledger
    SIGNATURE_INVALID = 'SIGNATURE_INVALID',
    REPLAY_DETECTED = 'REPLAY_DETECTED',
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',
}

export class RegistryError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly reason: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Registry:${code}] ${reason}`);
        this.name = 'RegistryError';
    }
}

export type Result<T> =
    | { ok: true; value: T }
    | { ok: false; error: RegistryError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });
export const fail = <T>(error: RegistryError): Result<T> => ({ ok: false, error });
