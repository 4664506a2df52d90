/**
 * Access Kernel Error Taxonomy
 * Centralized error codes for rejected operations. Every code is a local precondition:
 * a failed operation leaves no state behind.
 */

export enum ErrorCode {
    // I. Initialization
    ALREADY_INITIALIZED = 'ALREADY_INITIALIZED',
    INVALID_INITIALIZATION_ORDER = 'INVALID_INITIALIZATION_ORDER',

    // II. Ownership
    INVALID_OWNER = 'INVALID_OWNER',
    NO_HANDOVER_REQUEST = 'NO_HANDOVER_REQUEST',

    // III. Authorization
    UNAUTHORIZED = 'UNAUTHORIZED',
    INVALID_ROLE = 'INVALID_ROLE',
    INVALID_PRINCIPAL = 'INVALID_PRINCIPAL',

    // IV. Infrastructure & Ingress
    STATE_CORRUPTED = 'STATE_CORRUPTED',
    STATE_CONFLICT = 'STATE_CONFLICT',
    AUTHENTICATION_FAILED = 'AUTHENTICATION_FAILED',
}

export class AccessError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly reason: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Access:${code}] ${reason}`);
        this.name = 'AccessError';
    }
}

export function isAccessError(err: unknown, code?: ErrorCode): err is AccessError {
    return err instanceof AccessError && (code === undefined || err.code === code);
}
